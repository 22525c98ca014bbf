/** Engine configuration, read from the environment (and `.env`) and validated once. */
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { EngineError } from '@/utils/errors';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const unit = z.coerce.number().min(0).max(1);
const positiveInt = z.coerce.number().int().positive();

const envSchema = z
  .object({
    AUTONOMY_HIGH_THRESHOLD: unit.default(0.7),
    AUTONOMY_MEDIUM_THRESHOLD: unit.default(0.4),
    AUTONOMY_MEDIUM_ACTION: z.enum(['notice', 'confirm']).default('notice'),
    AUTONOMY_MEMORY_WEIGHT: unit.default(0.3),
    TOOL_TIMEOUT_MS: positiveInt.default(15000),
    TOOL_MAX_ATTEMPTS: positiveInt.default(3),
    RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(200),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(5000),
    REASONING_TIMEOUT_MS: positiveInt.default(8000),
    REFINEMENT_MIN_STEPS: positiveInt.default(2),
    MAX_PARALLEL_STEPS: positiveInt.default(4),
    MEMORY_RECENT_TURNS: positiveInt.default(10),
    MEMORY_MAX_PATTERNS: positiveInt.default(500),
    MEMORY_SESSION_TTL_MINUTES: positiveInt.default(30),
    REDIS_URL: z.string().url().optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_MODEL_SMALL: z.string().min(1).default('gpt-4o-mini'),
    OPENAI_MODEL_MAIN: z.string().min(1).default('gpt-4.1-mini'),
    LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    LOG_TYPE: z.enum(['pretty', 'json', 'hidden']).default('pretty'),
  })
  .refine((env) => env.AUTONOMY_HIGH_THRESHOLD > env.AUTONOMY_MEDIUM_THRESHOLD, {
    message: 'AUTONOMY_HIGH_THRESHOLD must be greater than AUTONOMY_MEDIUM_THRESHOLD',
    path: ['AUTONOMY_HIGH_THRESHOLD'],
  });

export type MediumConfidenceAction = 'notice' | 'confirm';

export interface AutonomyPolicy {
  highThreshold: number;
  mediumThreshold: number;
  /** What a mutating step between the two thresholds does: run with a notice, or stop and ask. */
  mediumAction: MediumConfidenceAction;
  /** Share of the exact-pattern memory confidence in the effective confidence. */
  memoryWeight: number;
}

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface EngineConfig {
  autonomy: AutonomyPolicy;
  retry: RetryPolicy;
  toolTimeoutMs: number;
  /** Deadline for reasoning, refinement, critique and reflection model calls. */
  reasoningTimeoutMs: number;
  refinementMinSteps: number;
  maxParallelSteps: number;
  memory: {
    recentTurns: number;
    maxPatterns: number;
    sessionTtlMinutes: number;
    redisUrl?: string;
  };
  llm: {
    apiKey?: string;
    smallModel: string;
    mainModel: string;
  };
  log: {
    level: 'silly' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
    type: 'pretty' | 'json' | 'hidden';
  };
}

export class ConfigValidationError extends EngineError {
  constructor(public readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid engine configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`, 'INVALID_CONFIG');
    this.name = 'ConfigValidationError';
  }
}

/** Blank values count as unset so `.env` templates with empty keys still load. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = envSchema.safeParse(withoutBlanks(env));
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    );
  }
  const e = result.data;
  return {
    autonomy: {
      highThreshold: e.AUTONOMY_HIGH_THRESHOLD,
      mediumThreshold: e.AUTONOMY_MEDIUM_THRESHOLD,
      mediumAction: e.AUTONOMY_MEDIUM_ACTION,
      memoryWeight: e.AUTONOMY_MEMORY_WEIGHT,
    },
    retry: {
      maxAttempts: e.TOOL_MAX_ATTEMPTS,
      initialDelayMs: e.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    toolTimeoutMs: e.TOOL_TIMEOUT_MS,
    reasoningTimeoutMs: e.REASONING_TIMEOUT_MS,
    refinementMinSteps: e.REFINEMENT_MIN_STEPS,
    maxParallelSteps: e.MAX_PARALLEL_STEPS,
    memory: {
      recentTurns: e.MEMORY_RECENT_TURNS,
      maxPatterns: e.MEMORY_MAX_PATTERNS,
      sessionTtlMinutes: e.MEMORY_SESSION_TTL_MINUTES,
      ...(e.REDIS_URL ? { redisUrl: e.REDIS_URL } : {}),
    },
    llm: {
      ...(e.OPENAI_API_KEY ? { apiKey: e.OPENAI_API_KEY } : {}),
      smallModel: e.OPENAI_MODEL_SMALL,
      mainModel: e.OPENAI_MODEL_MAIN,
    },
    log: {
      level: e.LOG_LEVEL,
      type: e.LOG_TYPE,
    },
  };
}

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: EngineConfig[K] extends object ? Partial<EngineConfig[K]> : EngineConfig[K];
};

/** Environment config with per-call overrides merged section by section. */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = loadEngineConfig(),
): EngineConfig {
  const autonomy = { ...base.autonomy, ...overrides.autonomy };
  if (autonomy.highThreshold <= autonomy.mediumThreshold) {
    throw new ConfigValidationError([
      { path: 'autonomy.highThreshold', message: 'must be greater than autonomy.mediumThreshold' },
    ]);
  }
  return {
    autonomy,
    retry: { ...base.retry, ...overrides.retry },
    toolTimeoutMs: overrides.toolTimeoutMs ?? base.toolTimeoutMs,
    reasoningTimeoutMs: overrides.reasoningTimeoutMs ?? base.reasoningTimeoutMs,
    refinementMinSteps: overrides.refinementMinSteps ?? base.refinementMinSteps,
    maxParallelSteps: overrides.maxParallelSteps ?? base.maxParallelSteps,
    memory: { ...base.memory, ...overrides.memory },
    llm: { ...base.llm, ...overrides.llm },
    log: { ...base.log, ...overrides.log },
  };
}
