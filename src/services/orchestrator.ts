// src/services/orchestrator.ts: one request, one graph walk
import { v4 as uuidv4 } from 'uuid';
import { validateRequestContext, type RequestContextInput } from '@/agent/agent.validation';
import type { EngineConfig } from '@/config/app.config';
import type { ExecutionRecord, MemoryContext, MemoryEntry, MemoryStore } from '@/memory/MemoryStore';
import { PlanRefiner } from '@/refinement/plan-refiner';
import { ToolRegistry } from '@/tools/registry';
import { isEmptyPayload, type DomainTool } from '@/tools/tool-contract';
import type { QueryAnalysis, RequestContext } from '@/types/core';
import type {
  CritiqueReport,
  ExecutionPlan,
  ExecutionResult,
  GateVerdict,
  ReasoningEntry,
  ReflectionReport,
  RefinementAction,
  Step,
} from '@/types/planning';
import { errorMessage, RequestValidationError } from '@/utils/errors';
import { runWithConcurrency } from '@/utils/worker-pool';
import { synthesizeAnswer } from './answer-synthesizer';
import { evaluateAutonomy } from './autonomy-gate';
import { critiqueExecution } from './critique-agent';
import { createRouterFromConfig } from './llm-client';
import { configureLogger, logger } from './logger';
import type { SimpleModelRouter } from './model-router';
import { decomposeQuery } from './query-decomposition';
import { analyzeQuery } from './query-understanding';
import { ReasoningRecorder } from './reasoning-recorder';
import { reflectOnExecution } from './reflection-agent';
import { StepExecutor } from './step-plan-executor';
import { assertPlanCoversSteps, buildExecutionPlan, routeSteps } from './step-planner';
import { WorkflowEventEmitter, type EventSinkLike } from './workflow-events';

export interface OrchestratorDeps {
  tools: ToolRegistry | readonly DomainTool[];
  memory: MemoryStore;
  /** Without a router every model-backed stage uses its heuristic path. `createEngine` builds one from `config.llm`. */
  router?: SimpleModelRouter;
  config: EngineConfig;
  sinks?: readonly EventSinkLike[];
  now?: () => number;
}

export type PipelineResponse =
  | {
      kind: 'answer';
      text: string;
      success: boolean;
      completed: number;
      total: number;
      notices: string[];
    }
  | {
      kind: 'clarification';
      question: string;
      missing: string[];
      /** Step the autonomy gate stopped at; absent when the request itself was unclear. */
      stepId?: string;
      verdict?: GateVerdict;
    };

export interface PipelineResult {
  requestId: string;
  response: PipelineResponse;
  analysis: QueryAnalysis;
  steps: Step[];
  plan: ExecutionPlan | null;
  reasoning: readonly ReasoningEntry[];
  results: ExecutionResult[];
  critique: CritiqueReport | null;
  reflection: ReflectionReport | null;
  refinements: RefinementAction[];
  cancelled: boolean;
  durationMs: number;
}

export const UNCLEAR_REQUEST_QUESTION =
  "I'm not sure what you'd like me to do. Which of your mail, calendar, tasks or documents is this about, and what should I do with them?";

const AWAITING_CLARIFICATION = 'awaiting clarification';
const CANCELLED = 'cancelled';

interface Halt {
  question: string;
  missing: string[];
  stepId: string;
  verdict: GateVerdict;
}

function toRegistry(tools: OrchestratorDeps['tools']): ToolRegistry {
  return tools instanceof ToolRegistry ? tools : new ToolRegistry(tools);
}

/** Memory is best effort: a failed read or write is logged and the walk goes on. */
async function withMemory<T>(op: string, fn: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    logger.warn('pipeline:memory_failed', { op, error: errorMessage(err) });
    return fallback;
  }
}

/** Pending steps downstream of a failed or skipped step are skipped, transitively. */
function cascadeSkips(steps: Step[]): void {
  const byId = new Map(steps.map((s) => [s.id, s]));
  let changed = true;
  while (changed) {
    changed = false;
    for (const step of steps) {
      if (step.status !== 'pending') continue;
      const blocker = step.dependencies
        .map((id) => byId.get(id))
        .find((dep) => dep !== undefined && (dep.status === 'failed' || dep.status === 'skipped'));
      if (!blocker) continue;
      step.status = 'skipped';
      step.skipReason = `dependency ${blocker.id} ${blocker.status}`;
      changed = true;
    }
  }
}

function readySteps(plan: ExecutionPlan, steps: readonly Step[]): Step[] {
  const byId = new Map(steps.map((s) => [s.id, s]));
  return plan.order
    .map((id) => byId.get(id))
    .filter((step): step is Step => step !== undefined && step.status === 'pending')
    .filter((step) => step.dependencies.every((dep) => byId.get(dep)?.status === 'succeeded'));
}

function skipPending(steps: readonly Step[], reason: string): void {
  for (const step of steps) {
    if (step.status !== 'pending') continue;
    step.status = 'skipped';
    step.skipReason = reason;
  }
}

export async function runPipeline(input: RequestContextInput, deps: OrchestratorDeps): Promise<PipelineResult> {
  const validation = validateRequestContext(input);
  if (!validation.success) {
    throw new RequestValidationError(validation.error);
  }
  const ctx: RequestContext = validation.data;
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const requestId = uuidv4();
  const { config, memory, router } = deps;
  const registry = toRegistry(deps.tools);
  const events = new WorkflowEventEmitter(requestId, deps.sinks ?? [], now);

  logger.info('runPipeline:start', { requestId, query: ctx.query.slice(0, 200), sessionId: ctx.sessionId });
  await events.emit('planning_started', { query: ctx.query });

  const emptyContext: MemoryContext = { recentTurns: [], patterns: [] };
  // history only changes pronoun resolution, never the pattern, so one read covers both
  const firstPass = analyzeQuery(ctx.query);
  const session = await withMemory(
    'getContext',
    () => memory.getContext(ctx.sessionId, firstPass.pattern),
    emptyContext,
  );
  const analysis =
    session.recentTurns.length > 0 ? analyzeQuery(ctx.query, { recentTurns: session.recentTurns }) : firstPass;
  await events.emit('analysis_completed', {
    intent: analysis.intent,
    confidence: analysis.confidence,
    pattern: analysis.pattern,
  });

  const finishClarification = async (
    question: string,
    missing: string[],
    steps: Step[],
    plan: ExecutionPlan | null,
    extra: Partial<Pick<PipelineResult, 'reasoning' | 'results' | 'refinements'>> & { halt?: Halt } = {},
  ): Promise<PipelineResult> => {
    const response: PipelineResponse = {
      kind: 'clarification',
      question,
      missing,
      ...(extra.halt ? { stepId: extra.halt.stepId, verdict: extra.halt.verdict } : {}),
    };
    await events.emit('clarification_required', {
      question,
      missing,
      ...(extra.halt ? { stepId: extra.halt.stepId, verdict: extra.halt.verdict } : {}),
    });
    const durationMs = now() - startedAt;
    await persist(memory, ctx, { requestId, pattern: analysis.pattern, steps, plan, outcome: 'clarification', durationMs }, question, now);
    await events.emit('response_ready', { kind: 'clarification', success: false, cancelled: false });
    logger.info('runPipeline:clarification', { requestId, missing, durationMs });
    return {
      requestId,
      response,
      analysis,
      steps,
      plan,
      reasoning: extra.reasoning ?? [],
      results: extra.results ?? [],
      critique: null,
      reflection: null,
      refinements: extra.refinements ?? [],
      cancelled: false,
      durationMs,
    };
  };

  if (analysis.intent === 'clarification_needed') {
    return finishClarification(UNCLEAR_REQUEST_QUESTION, [...analysis.missing], [], null);
  }

  const memoryEntry: MemoryEntry | null = await withMemory('getEntry', () => memory.getEntry(analysis.pattern), null);
  logger.debug('runPipeline:memory_priors', {
    pattern: analysis.pattern,
    exact: memoryEntry?.confidence ?? null,
    similar: session.patterns.map((p) => p.pattern),
  });

  const steps = await decomposeQuery(analysis, ctx.query, {
    ...(router ? { router } : {}),
    recentTurns: session.recentTurns,
    priors: session.patterns,
    timeoutMs: config.reasoningTimeoutMs,
  });
  if (steps.length === 0) {
    return finishClarification(UNCLEAR_REQUEST_QUESTION, [...analysis.missing], [], null);
  }

  const reroutes = routeSteps(steps, registry);
  // PlanningError is fatal and propagates to the caller
  let plan = buildExecutionPlan(steps);
  await events.emit('plan_created', {
    stepCount: steps.length,
    waves: plan.waves,
    ...(reroutes.length > 0 ? { reroutes } : {}),
  });
  logger.info('runPipeline:plan', { requestId, steps: steps.length, waves: plan.waves.length });

  const toolNames = registry.names();
  const recorder = new ReasoningRecorder({
    ...(router ? { router } : {}),
    timeoutMs: config.reasoningTimeoutMs,
    availableTools: toolNames,
    now,
  });
  const executor = new StepExecutor({
    registry,
    recorder,
    retry: config.retry,
    toolTimeoutMs: config.toolTimeoutMs,
    now,
  });
  const refiner = new PlanRefiner({
    ...(router ? { router } : {}),
    timeoutMs: config.reasoningTimeoutMs,
    minSteps: config.refinementMinSteps,
    availableTools: toolNames,
  });

  const results: ExecutionResult[] = [];
  const resultsById = new Map<string, ExecutionResult>();
  const refinements: RefinementAction[] = [];
  const notices: string[] = [];
  const isCancelled = (): boolean => ctx.signal?.aborted === true;
  let cancelled = false;
  let halt: Halt | null = null;

  for (;;) {
    cascadeSkips(steps);
    const wave = readySteps(plan, steps);
    if (wave.length === 0) break;
    if (isCancelled()) {
      cancelled = true;
      break;
    }

    // the whole wave is gated before any of it runs
    const waveNotices: string[] = [];
    for (const step of wave) {
      const decision = evaluateAutonomy(step, analysis, memoryEntry, config.autonomy);
      if (decision.verdict === 'halt' || decision.verdict === 'confirm') {
        halt = {
          question: decision.clarification ?? UNCLEAR_REQUEST_QUESTION,
          missing: decision.missing,
          stepId: step.id,
          verdict: decision.verdict,
        };
        logger.info('gate:stopped', {
          requestId,
          stepId: step.id,
          verdict: decision.verdict,
          effectiveConfidence: decision.effectiveConfidence,
        });
        break;
      }
      if (decision.notice) waveNotices.push(decision.notice);
    }
    if (halt) break;
    notices.push(...waveNotices);

    for (const step of wave) {
      const entry = await executor.prepare(step, analysis, results);
      await events.emit('reasoning_recorded', { stepId: step.id, confidence: entry.confidence, source: entry.source });
    }

    const outcomes = await runWithConcurrency(wave, config.maxParallelSteps, async (step) => {
      if (isCancelled()) {
        step.status = 'skipped';
        step.skipReason = CANCELLED;
        return null;
      }
      await events.emit('step_started', { stepId: step.id, tool: step.toolName });
      const dependencyResults: Record<string, unknown> = {};
      for (const dep of step.dependencies) dependencyResults[dep] = resultsById.get(dep)?.payload;
      const result = await executor.invoke(step, dependencyResults, {
        userId: ctx.userId,
        sessionId: ctx.sessionId,
        maxResults: ctx.maxResults,
        entities: analysis.entities,
        ...(ctx.signal ? { signal: ctx.signal } : {}),
      });
      await events.emit('step_completed', { stepId: step.id, success: result.success, attempts: result.attempts });
      if (result.success) {
        await events.emit('partial_result', {
          stepId: step.id,
          tool: step.toolName,
          empty: isEmptyPayload(result.payload),
        });
      }
      return result;
    });

    let inserted = false;
    for (const result of outcomes) {
      if (!result) continue;
      results.push(result);
      resultsById.set(result.stepId, result);
      const completedStep = steps.find((s) => s.id === result.stepId);
      if (!completedStep) continue;
      const actions = await refiner.refine({ steps, completedStep, results: resultsById, analysis });
      if (actions.length === 0) continue;
      refinements.push(...actions);
      inserted = inserted || actions.some((a) => a.kind === 'insert');
      for (const action of actions) {
        if (action.kind === 'propose_reorder') plan = { ...plan, proposedOrder: action.order };
      }
      await events.emit('refinement_applied', { afterStepId: completedStep.id, actions });
    }
    if (inserted) {
      const proposedOrder = plan.proposedOrder;
      routeSteps(steps, registry);
      plan = { ...buildExecutionPlan(steps), ...(proposedOrder ? { proposedOrder } : {}) };
      assertPlanCoversSteps(plan, steps);
    }
  }

  const reasoning = recorder.list();

  if (halt) {
    skipPending(steps, AWAITING_CLARIFICATION);
    return finishClarification(halt.question, halt.missing, steps, plan, { halt, reasoning, results, refinements });
  }

  // a wave member skipped at dispatch counts even when nothing else was left to run
  if (!cancelled && steps.some((s) => s.skipReason === CANCELLED)) cancelled = true;
  if (cancelled) {
    skipPending(steps, CANCELLED);
    logger.info('runPipeline:cancelled', { requestId });
  }

  const critique = await critiqueExecution({ query: ctx.query, analysis, steps, reasoning }, router, {
    timeoutMs: config.reasoningTimeoutMs,
  });
  await events.emit('critique_completed', { selfRating: critique.selfRating, approachOptimal: critique.approachOptimal });

  // SynthesisError propagates with the raw per-step results
  const answer = await synthesizeAnswer({ query: ctx.query, steps, results, notices, cancelled }, router, {
    timeoutMs: config.reasoningTimeoutMs,
  });

  const reflection = await reflectOnExecution({ query: ctx.query, steps, critique }, router, {
    timeoutMs: config.reasoningTimeoutMs,
  });
  await events.emit('reflection_completed', {
    goalAchieved: reflection.goalAchieved,
    efficiencyScore: reflection.efficiencyScore,
  });

  if (!cancelled) {
    await withMemory<MemoryEntry | null>(
      'recordOutcome',
      () => memory.recordOutcome(analysis.pattern, analysis.intent, reflection.goalAchieved === 'yes', reflection.lessons),
      null,
    );
  }

  const durationMs = now() - startedAt;
  await persist(
    memory,
    ctx,
    {
      requestId,
      pattern: analysis.pattern,
      steps,
      plan,
      outcome: cancelled ? 'cancelled' : reflection.goalAchieved,
      durationMs,
    },
    answer.text,
    now,
  );
  await events.emit('response_ready', { kind: 'answer', success: answer.success, cancelled });
  logger.info('runPipeline:success', {
    requestId,
    completed: answer.completed,
    total: answer.total,
    goalAchieved: reflection.goalAchieved,
    durationMs,
  });

  return {
    requestId,
    response: { kind: 'answer', ...answer, notices },
    analysis,
    steps,
    plan,
    reasoning,
    results,
    critique,
    reflection,
    refinements,
    cancelled,
    durationMs,
  };
}

async function persist(
  memory: MemoryStore,
  ctx: RequestContext,
  record: Omit<ExecutionRecord, 'sessionId' | 'query' | 'timestamp'>,
  answer: string,
  now: () => number,
): Promise<void> {
  const timestamp = now();
  await withMemory(
    'archiveExecution',
    () =>
      memory.archiveExecution({
        ...record,
        sessionId: ctx.sessionId,
        query: ctx.query,
        steps: record.steps.map((s) => ({ ...s, dependencies: [...s.dependencies] })),
        timestamp,
      }),
    undefined,
  );
  await withMemory('appendTurn', () => memory.appendTurn(ctx.sessionId, { query: ctx.query, answer, timestamp }), undefined);
}

export interface Engine {
  run(input: RequestContextInput): Promise<PipelineResult>;
  readonly tools: ToolRegistry;
  readonly memory: MemoryStore;
}

/**
 * Binds the dependencies once; each `run` is an independent walk. Applies the
 * config's log settings, and builds an OpenAI router from it when none is given.
 */
export function createEngine(deps: OrchestratorDeps): Engine {
  configureLogger(deps.config.log);
  const tools = toRegistry(deps.tools);
  const router = deps.router ?? createRouterFromConfig(deps.config.llm);
  const bound: OrchestratorDeps = { ...deps, tools, ...(router ? { router } : {}) };
  return {
    run: (input) => runPipeline(input, bound),
    tools,
    memory: deps.memory,
  };
}
