// src/services/critique-agent.ts: post-execution self-critique (advisory only)
import { z } from 'zod';
import { withTimeout } from '@/stability/withTimeout';
import { isEmptyPayload } from '@/tools/tool-contract';
import { isMutatingAction, type QueryAnalysis } from '@/types/core';
import type { CritiqueReport, ReasoningEntry, Step } from '@/types/planning';
import { errorMessage } from '@/utils/errors';
import { logger } from './logger';
import type { SimpleModelRouter } from './model-router';
import { extractJsonObject } from './safe-parse-json';

/** Reasoning confidence below which running a mutating step counts as a flaw. */
const LOW_REASONING_CONFIDENCE = 0.4;

export interface CritiqueInput {
  query: string;
  analysis: QueryAnalysis;
  steps: readonly Step[];
  reasoning: readonly ReasoningEntry[];
}

export interface CritiqueOptions {
  timeoutMs: number;
}

const critiqueSchema = z.object({
  approachOptimal: z.boolean(),
  mistakes: z.array(z.string()).default([]),
  wrongAssumptions: z.array(z.string()).default([]),
  reasoningFlaws: z.array(z.string()).default([]),
  simplerAlternative: z.string().min(1).nullable().default(null),
  selfRating: z.coerce.number().min(1).max(10),
});

function clampRating(value: number): number {
  return Math.min(10, Math.max(1, Math.round(value)));
}

function freezeReport(report: CritiqueReport): CritiqueReport {
  return Object.freeze({
    ...report,
    mistakes: Object.freeze([...report.mistakes]),
    wrongAssumptions: Object.freeze([...report.wrongAssumptions]),
    reasoningFlaws: Object.freeze([...report.reasoningFlaws]),
  });
}

export function heuristicCritique({ steps, reasoning }: Pick<CritiqueInput, 'steps' | 'reasoning'>): CritiqueReport {
  const byId = new Map(steps.map((s) => [s.id, s]));
  const failed = steps.filter((s) => s.status === 'failed');
  const skipped = steps.filter((s) => s.status === 'skipped');
  const retries = steps.reduce((sum, s) => sum + Math.max(0, s.attempts - 1), 0);

  const mistakes = failed.map((s) => `${s.id} (${s.action} via ${s.toolName}) failed: ${s.error ?? 'unknown error'}`);

  const wrongAssumptions: string[] = [];
  const reasoningFlaws: string[] = [];
  for (const entry of reasoning) {
    const step = byId.get(entry.stepId);
    if (!step) continue;
    if (step.status !== 'succeeded') {
      wrongAssumptions.push(`${step.id}: expected "${entry.expectedOutcome}" but the step ${step.status}`);
    } else if (isEmptyPayload(step.result)) {
      wrongAssumptions.push(`${step.id}: expected "${entry.expectedOutcome}" but it returned nothing`);
    }
    if (isMutatingAction(step.action) && step.status === 'succeeded' && entry.confidence < LOW_REASONING_CONFIDENCE) {
      reasoningFlaws.push(`${step.id} ran a ${step.action} at only ${Math.round(entry.confidence * 100)}% confidence`);
    }
  }
  for (const step of skipped) {
    if (step.skipReason === 'no input data') {
      reasoningFlaws.push(`${step.id} was planned on data that ${step.dependencies.join(', ')} did not produce`);
    }
  }

  const kept = steps.filter((s) => s.status === 'succeeded').map((s) => s.id);
  const simplerAlternative =
    skipped.length > 0
      ? kept.length > 0
        ? `Run only ${kept.join(', ')}; ${skipped.map((s) => s.id).join(', ')} added nothing.`
        : 'Ask for the missing details before planning any step.'
      : null;

  return freezeReport({
    approachOptimal: failed.length === 0 && skipped.length === 0 && retries === 0,
    mistakes,
    wrongAssumptions,
    reasoningFlaws,
    simplerAlternative,
    selfRating: clampRating(10 - 3 * failed.length - 2 * skipped.length - retries),
    source: 'heuristic',
  });
}

function describeExecution(steps: readonly Step[], reasoning: readonly ReasoningEntry[]): string {
  return steps
    .map((s) => {
      const entry = reasoning.find((r) => r.stepId === s.id);
      const expected = entry ? ` expected: "${entry.expectedOutcome}" (${entry.confidence})` : '';
      const outcome =
        s.status === 'failed'
          ? `failed: ${s.error ?? ''}`
          : s.status === 'skipped'
            ? `skipped: ${s.skipReason ?? ''}`
            : `${s.status}${isEmptyPayload(s.result) ? ' (empty result)' : ''}`;
      return `- ${s.id}: ${s.action} via ${s.toolName} "${s.subQuery}" after ${s.attempts} attempt(s);${expected}; ${outcome}`;
    })
    .join('\n');
}

export async function critiqueExecution(
  input: CritiqueInput,
  router: SimpleModelRouter | undefined,
  options: CritiqueOptions,
): Promise<CritiqueReport> {
  const fallback = heuristicCritique(input);
  if (!router) return fallback;

  const prompt = `You are reviewing how an assistant handled a request. Be specific and brief.

Request: ${JSON.stringify(input.query)}
Intent: ${input.analysis.intent} (confidence ${input.analysis.confidence})

Steps:
${describeExecution(input.steps, input.reasoning)}

Judge whether the approach was optimal, list concrete mistakes, wrong assumptions and reasoning flaws,
suggest a simpler alternative if one exists, and rate the execution from 1 to 10.

Return JSON only:
{"approachOptimal": true, "mistakes": [], "wrongAssumptions": [], "reasoningFlaws": [], "simplerAlternative": null, "selfRating": 8}`;

  try {
    const raw = await withTimeout(router.critique(prompt), options.timeoutMs, 'critique');
    const parsed = critiqueSchema.safeParse(extractJsonObject(raw));
    if (!parsed.success) {
      logger.warn('critique:invalid_model_output', { issues: parsed.error.errors.length });
      return fallback;
    }
    const report = freezeReport({ ...parsed.data, selfRating: clampRating(parsed.data.selfRating), source: 'model' });
    logger.info('critique:done', { selfRating: report.selfRating, approachOptimal: report.approachOptimal });
    return report;
  } catch (err) {
    logger.warn('critique:fallback', { error: errorMessage(err) });
    return fallback;
  }
}
