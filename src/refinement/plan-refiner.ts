// src/refinement/plan-refiner.ts
import { z } from 'zod';
import { logger } from '@/services/logger';
import { stepActionSchema } from '@/services/intent-patterns';
import type { SimpleModelRouter } from '@/services/model-router';
import { extractJsonObject } from '@/services/safe-parse-json';
import { withTimeout } from '@/stability/withTimeout';
import { isEmptyPayload } from '@/tools/tool-contract';
import type { QueryAnalysis, StepAction } from '@/types/core';
import type { ExecutionResult, RefinementAction, Step } from '@/types/planning';
import { errorMessage } from '@/utils/errors';

export const NO_INPUT_DATA = 'no input data';

/** Actions that only make sense with data from the step they depend on. */
const INPUT_CONSUMING: ReadonlySet<StepAction> = new Set<StepAction>([
  'summarize',
  'analyze',
  'create',
  'update',
  'delete',
  'send',
]);

const MAX_INSERTS_PER_PASS = 2;
const MAX_TOTAL_STEPS = 12;

const refinementSchema = z.object({
  modify: z
    .array(z.object({ stepId: z.string(), subQuery: z.string().min(1).optional(), toolName: z.string().min(1).optional() }))
    .default([]),
  insert: z
    .array(z.object({ toolName: z.string().min(1), action: stepActionSchema, subQuery: z.string().min(1) }))
    .default([]),
  skip: z.array(z.object({ stepId: z.string(), reason: z.string().min(1) })).default([]),
  reorder: z.array(z.string()).default([]),
});

type ModelRefinement = z.infer<typeof refinementSchema>;

export interface PlanRefinerOptions {
  router?: SimpleModelRouter;
  timeoutMs: number;
  /** Plans with fewer steps are never refined. */
  minSteps: number;
  /** Registered tool names; modifications and insertions must target one of these. */
  availableTools: readonly string[];
}

export interface RefineInput {
  steps: Step[];
  completedStep: Step;
  results: ReadonlyMap<string, ExecutionResult>;
  analysis: QueryAnalysis;
}

function nextStepId(steps: readonly Step[]): string {
  const max = steps.reduce((acc, s) => {
    const n = Number(/^step_(\d+)$/.exec(s.id)?.[1] ?? 0);
    return Number.isFinite(n) && n > acc ? n : acc;
  }, 0);
  return `step_${Math.max(max, steps.length) + 1}`;
}

function summarizePayload(payload: unknown): string {
  try {
    return (JSON.stringify(payload) ?? 'undefined').slice(0, 600);
  } catch {
    return '[unserializable payload]';
  }
}

/**
 * Adjusts the pending frontier after a step completes. Steps that already ran
 * (or are running, failed or skipped) are never touched.
 */
export class PlanRefiner {
  constructor(private readonly options: PlanRefinerOptions) {}

  async refine(input: RefineInput): Promise<RefinementAction[]> {
    if (input.steps.length < this.options.minSteps) return [];
    const actions = this.applyEmptyInputRule(input);
    if (this.options.router && input.steps.some((s) => s.status === 'pending')) {
      actions.push(...(await this.applyModelSuggestions(this.options.router, input)));
    }
    if (actions.length > 0) {
      logger.info('refiner:applied', { after: input.completedStep.id, actions: actions.map((a) => a.kind) });
    }
    return actions;
  }

  private applyEmptyInputRule({ steps, completedStep }: RefineInput): RefinementAction[] {
    if (completedStep.status !== 'succeeded' || !isEmptyPayload(completedStep.result)) return [];
    const actions: RefinementAction[] = [];
    for (const step of steps) {
      if (step.status !== 'pending' || !step.dependencies.includes(completedStep.id)) continue;
      if (!INPUT_CONSUMING.has(step.action)) continue;
      step.status = 'skipped';
      step.skipReason = NO_INPUT_DATA;
      step.modifiedByRefinement = true;
      actions.push({ kind: 'skip', stepId: step.id, reason: NO_INPUT_DATA });
    }
    return actions;
  }

  private async applyModelSuggestions(router: SimpleModelRouter, input: RefineInput): Promise<RefinementAction[]> {
    const pending = input.steps.filter((s) => s.status === 'pending');
    const prompt = `A plan is running. Decide whether the REMAINING steps should change given the latest result.

User query intent: ${input.analysis.intent}
Completed step: ${input.completedStep.id} (${input.completedStep.action} via ${input.completedStep.toolName}), status ${input.completedStep.status}
Result: ${summarizePayload(input.completedStep.result ?? input.completedStep.error ?? null)}

Remaining steps:
${pending.map((s) => `- ${s.id}: ${s.action} via ${s.toolName}: ${JSON.stringify(s.subQuery)} (depends on ${s.dependencies.join(', ') || 'nothing'})`).join('\n')}

Available tools: ${this.options.availableTools.join(', ')}

Only change what the result makes necessary. Return JSON only:
{"modify": [{"stepId": "...", "subQuery": "...", "toolName": "..."}], "insert": [{"toolName": "...", "action": "search", "subQuery": "..."}], "skip": [{"stepId": "...", "reason": "..."}], "reorder": []}`;

    let suggestion: ModelRefinement;
    try {
      const raw = await withTimeout(router.refine(prompt), this.options.timeoutMs, 'refinement');
      const parsed = refinementSchema.safeParse(extractJsonObject(raw) ?? {});
      if (!parsed.success) {
        logger.warn('refiner:invalid_model_output', { raw: raw.slice(0, 300) });
        return [];
      }
      suggestion = parsed.data;
    } catch (err) {
      logger.warn('refiner:model_failed', { error: errorMessage(err) });
      return [];
    }
    return this.applySuggestion(suggestion, input);
  }

  private applySuggestion(suggestion: ModelRefinement, { steps, completedStep }: RefineInput): RefinementAction[] {
    const actions: RefinementAction[] = [];
    const byId = new Map(steps.map((s) => [s.id, s]));
    const isPending = (id: string): boolean => byId.get(id)?.status === 'pending';
    const knownTool = (name: string): boolean => this.options.availableTools.includes(name);

    for (const { stepId, reason } of suggestion.skip) {
      const step = byId.get(stepId);
      if (!step || step.status !== 'pending') continue;
      step.status = 'skipped';
      step.skipReason = reason;
      step.modifiedByRefinement = true;
      actions.push({ kind: 'skip', stepId, reason });
    }

    for (const change of suggestion.modify) {
      const step = byId.get(change.stepId);
      if (!step || step.status !== 'pending') continue;
      const toolName = change.toolName && knownTool(change.toolName) ? change.toolName : undefined;
      if (!change.subQuery && !toolName) continue;
      if (change.subQuery) step.subQuery = change.subQuery;
      if (toolName) step.toolName = toolName;
      step.modifiedByRefinement = true;
      actions.push({
        kind: 'modify',
        stepId: step.id,
        ...(change.subQuery ? { subQuery: change.subQuery } : {}),
        ...(toolName ? { toolName } : {}),
      });
    }

    let inserted = 0;
    for (const proposal of suggestion.insert) {
      if (inserted >= MAX_INSERTS_PER_PASS || steps.length >= MAX_TOTAL_STEPS) break;
      if (!knownTool(proposal.toolName)) continue;
      const step: Step = {
        id: nextStepId(steps),
        toolName: proposal.toolName,
        action: proposal.action,
        subQuery: proposal.subQuery,
        dependencies: [completedStep.id],
        status: 'pending',
        modifiedByRefinement: true,
        insertedBy: completedStep.id,
        attempts: 0,
      };
      steps.push(step);
      byId.set(step.id, step);
      inserted++;
      actions.push({ kind: 'insert', step: { ...step }, motivatedBy: completedStep.id });
    }

    // reordering is only proposed; the planner's order stands
    const pendingIds = steps.filter((s) => s.status === 'pending').map((s) => s.id);
    const reorder = suggestion.reorder;
    if (
      reorder.length > 0 &&
      reorder.length === pendingIds.length &&
      new Set(reorder).size === reorder.length &&
      reorder.every(isPending)
    ) {
      actions.push({ kind: 'propose_reorder', order: [...reorder] });
    }

    return actions;
  }
}
