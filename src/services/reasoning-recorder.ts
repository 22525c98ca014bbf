/**
 * Reasoning Recorder: one entry per step attempt, written before the tool runs and
 * never changed afterwards. Generation is bounded by a timeout; on any failure a
 * heuristic entry (tool name + default confidence) is written instead.
 */
import { z } from 'zod';
import { withTimeout } from '@/stability/withTimeout';
import type { QueryAnalysis } from '@/types/core';
import type { ExecutionResult, ReasoningEntry, Step } from '@/types/planning';
import { errorMessage, ReasoningGenerationError } from '@/utils/errors';
import { logger } from './logger';
import type { SimpleModelRouter } from './model-router';
import { extractJsonObject } from './safe-parse-json';

export const DEFAULT_REASONING_CONFIDENCE = 0.5;

const reasoningSchema = z.object({
  expectedOutcome: z.string().min(1),
  alternatives: z.array(z.string()).default([]),
  confidence: z.coerce.number().min(0).max(1),
});

export interface ReasoningRecorderOptions {
  router?: SimpleModelRouter;
  timeoutMs: number;
  /** Tool names the step could have used instead. */
  availableTools?: readonly string[];
  now?: () => number;
}

function freezeEntry(entry: ReasoningEntry): ReasoningEntry {
  return Object.freeze({ ...entry, alternatives: Object.freeze([...entry.alternatives]) });
}

export class ReasoningRecorder {
  private readonly entries: ReasoningEntry[] = [];
  private queue: Promise<void> = Promise.resolve();
  private readonly now: () => number;

  constructor(private readonly options: ReasoningRecorderOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Entries in the order steps were attempted. */
  list(): readonly ReasoningEntry[] {
    return [...this.entries];
  }

  /** Serialized: concurrent callers are recorded one after another, in call order. */
  record(step: Step, analysis: QueryAnalysis, completed: readonly ExecutionResult[]): Promise<ReasoningEntry> {
    const run = this.queue.then(() => this.generate(step, analysis, completed));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  heuristicEntry(step: Step): ReasoningEntry {
    return freezeEntry({
      stepId: step.id,
      toolName: step.toolName,
      expectedOutcome: `${step.action} results from ${step.toolName}`,
      alternatives: [],
      confidence: DEFAULT_REASONING_CONFIDENCE,
      timestamp: this.now(),
      source: 'heuristic',
    });
  }

  private async generate(
    step: Step,
    analysis: QueryAnalysis,
    completed: readonly ExecutionResult[],
  ): Promise<ReasoningEntry> {
    let entry: ReasoningEntry;
    const router = this.options.router;
    if (!router) {
      entry = this.heuristicEntry(step);
    } else {
      try {
        entry = await this.fromModel(router, step, analysis, completed);
      } catch (err) {
        logger.warn('reasoning:fallback', { stepId: step.id, error: errorMessage(err) });
        entry = this.heuristicEntry(step);
      }
    }
    this.entries.push(entry);
    return entry;
  }

  private async fromModel(
    router: SimpleModelRouter,
    step: Step,
    analysis: QueryAnalysis,
    completed: readonly ExecutionResult[],
  ): Promise<ReasoningEntry> {
    const alternatives = (this.options.availableTools ?? []).filter((t) => t !== step.toolName);
    const prompt = `Before running a tool, state what you expect.

User intent: ${analysis.intent} (confidence ${analysis.confidence})
Step: ${step.action} via "${step.toolName}": ${JSON.stringify(step.subQuery)}
Other tools available: ${alternatives.join(', ') || 'none'}
Steps finished so far: ${completed.map((r) => `${r.stepId}=${r.success ? 'ok' : 'failed'}`).join(', ') || 'none'}

Return JSON only:
{"expectedOutcome": "one sentence", "alternatives": ["other tool or approach"], "confidence": 0.0-1.0}`;

    const raw = await withTimeout(router.reason(prompt), this.options.timeoutMs, 'reasoning');
    const parsed = reasoningSchema.safeParse(extractJsonObject(raw));
    if (!parsed.success) {
      throw new ReasoningGenerationError(`Unusable reasoning output for ${step.id}`);
    }
    return freezeEntry({
      stepId: step.id,
      toolName: step.toolName,
      expectedOutcome: parsed.data.expectedOutcome,
      alternatives: parsed.data.alternatives,
      confidence: parsed.data.confidence,
      timestamp: this.now(),
      source: 'model',
    });
  }
}
