/**
 * Step Executor: reasoning first, then the tool call under a per-call timeout and
 * bounded retries. A step that exhausts its retries is marked failed with the error
 * kept; the walk carries on with whatever is still runnable.
 */
import type { RetryPolicy } from '@/config/app.config';
import { RetryExhaustedError, retryWithBackoff } from '@/stability/retryWithBackoff';
import { withTimeout } from '@/stability/withTimeout';
import type { ToolRegistry } from '@/tools/registry';
import type { ToolContext } from '@/tools/tool-contract';
import { isMutatingAction, type QueryAnalysis } from '@/types/core';
import type { ExecutionResult, ReasoningEntry, Step } from '@/types/planning';
import { EngineError, errorMessage, TimeoutError, ToolExecutionError } from '@/utils/errors';
import { logger } from './logger';
import type { ReasoningRecorder } from './reasoning-recorder';

export interface StepExecutorOptions {
  registry: ToolRegistry;
  recorder: ReasoningRecorder;
  retry: RetryPolicy;
  toolTimeoutMs: number;
  now?: () => number;
}

export type InvocationContext = Omit<ToolContext, 'stepId' | 'action'>;

/**
 * A timed-out call may still land, so a mutating step is never re-sent after a
 * timeout. Engine errors retry only when marked retryable; anything else a tool
 * throws is treated as transient.
 */
export function isRetryableFailure(step: Pick<Step, 'action'>, error: unknown): boolean {
  if (error instanceof TimeoutError && isMutatingAction(step.action)) return false;
  if (error instanceof EngineError) return error.retryable;
  return true;
}

export class StepExecutor {
  private readonly now: () => number;

  constructor(private readonly options: StepExecutorOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Records the step's reasoning entry. Never throws. */
  prepare(step: Step, analysis: QueryAnalysis, completed: readonly ExecutionResult[]): Promise<ReasoningEntry> {
    return this.options.recorder.record(step, analysis, completed);
  }

  async invoke(
    step: Step,
    dependencyResults: Readonly<Record<string, unknown>>,
    context: InvocationContext,
  ): Promise<ExecutionResult> {
    const started = this.now();
    const tool = this.options.registry.get(step.toolName);
    step.status = 'running';

    if (!tool) {
      return this.fail(step, new ToolExecutionError(`No tool registered for "${step.toolName}"`, step.toolName, 0), started);
    }
    if (!this.options.registry.supports(tool.name, step.action)) {
      return this.fail(
        step,
        new ToolExecutionError(`${tool.name} does not support "${step.action}"`, tool.name, 0),
        started,
      );
    }

    const { maxAttempts, initialDelayMs, maxDelayMs } = this.options.retry;
    try {
      const payload = await retryWithBackoff(
        (attempt) => {
          step.attempts = attempt;
          return withTimeout(
            tool.execute(step.subQuery, dependencyResults, { ...context, stepId: step.id, action: step.action }),
            this.options.toolTimeoutMs,
            `${tool.name}.${step.action}`,
          );
        },
        {
          maxAttempts,
          initialDelay: initialDelayMs,
          maxDelay: maxDelayMs,
          label: `${tool.name}.${step.action}`,
          ...(context.signal ? { signal: context.signal } : {}),
          shouldRetry: (error) => isRetryableFailure(step, error),
          onRetry: (error, attempt) =>
            logger.warn('executor:retry', { stepId: step.id, tool: tool.name, attempt, error: errorMessage(error) }),
        },
      );
      step.status = 'succeeded';
      step.result = payload;
      return {
        stepId: step.id,
        success: true,
        payload,
        latencyMs: this.now() - started,
        attempts: step.attempts,
      };
    } catch (err) {
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      const attempts = err instanceof RetryExhaustedError ? err.attempts : step.attempts;
      return this.fail(
        step,
        new ToolExecutionError(
          `${tool.name} failed after ${attempts} attempt(s): ${errorMessage(cause)}`,
          tool.name,
          attempts,
          cause,
        ),
        started,
      );
    }
  }

  private fail(step: Step, error: ToolExecutionError, started: number): ExecutionResult {
    step.status = 'failed';
    step.error = error.message;
    step.attempts = error.attempts;
    logger.warn('executor:step_failed', { stepId: step.id, tool: error.toolName, attempts: error.attempts, error: error.message });
    return {
      stepId: step.id,
      success: false,
      error: error.message,
      latencyMs: this.now() - started,
      attempts: error.attempts,
    };
  }
}
