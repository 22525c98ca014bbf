/**
 * Error taxonomy. Only planning, synthesis and request/config validation errors
 * escape `runPipeline`; tool and reasoning failures are recorded on the step.
 */

export type EngineErrorCode =
  | 'PLANNING_ERROR'
  | 'TOOL_EXECUTION_ERROR'
  | 'REASONING_GENERATION_ERROR'
  | 'SYNTHESIS_ERROR'
  | 'INVALID_REQUEST'
  | 'INVALID_CONFIG'
  | 'TIMEOUT';

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  /** Whether retrying the same call could succeed. */
  readonly retryable: boolean;

  constructor(message: string, code: EngineErrorCode, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'EngineError';
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

/** Malformed plan: dependency cycle or a dependency on a step that does not exist. Fatal. */
export class PlanningError extends EngineError {
  constructor(
    message: string,
    /** Step ids forming the cycle, first id repeated at the end; empty for unknown dependencies. */
    public readonly cycle: string[] = [],
  ) {
    super(message, 'PLANNING_ERROR');
    this.name = 'PlanningError';
  }
}

export class ToolExecutionError extends EngineError {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, 'TOOL_EXECUTION_ERROR', { retryable: true, cause });
    this.name = 'ToolExecutionError';
  }
}

export class ReasoningGenerationError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'REASONING_GENERATION_ERROR', { retryable: true, cause });
    this.name = 'ReasoningGenerationError';
  }
}

export class TimeoutError extends EngineError {
  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT', { retryable: true });
    this.name = 'TimeoutError';
  }
}

/** The response could not be rendered. Carries the raw per-step results for the caller. */
export class SynthesisError extends EngineError {
  constructor(
    message: string,
    public readonly results: Array<{ stepId: string; success: boolean; payload?: unknown; error?: string }>,
    cause?: unknown,
  ) {
    super(message, 'SYNTHESIS_ERROR', { cause });
    this.name = 'SynthesisError';
  }
}

export class RequestValidationError extends EngineError {
  constructor(public readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid request: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`, 'INVALID_REQUEST');
    this.name = 'RequestValidationError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
