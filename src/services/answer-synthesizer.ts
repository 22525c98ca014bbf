/**
 * Synthesizer: renders every step's outcome into one answer. Failed and skipped
 * steps are always named in a gap section, so partial failure is never silent.
 */
import { withTimeout } from '@/stability/withTimeout';
import { isEmptyPayload, payloadItems } from '@/tools/tool-contract';
import type { StepAction } from '@/types/core';
import type { ExecutionResult, Step } from '@/types/planning';
import { errorMessage, SynthesisError } from '@/utils/errors';
import { logger } from './logger';
import type { SimpleModelRouter } from './model-router';

export interface SynthesisInput {
  query: string;
  steps: readonly Step[];
  results: readonly ExecutionResult[];
  /** Medium-confidence notices from the autonomy gate. */
  notices: readonly string[];
  cancelled?: boolean;
}

export interface SynthesisOptions {
  timeoutMs?: number;
}

export interface SynthesizedAnswer {
  text: string;
  /** Every step succeeded and the run was not cancelled. */
  success: boolean;
  completed: number;
  total: number;
}

const MAX_LISTED_ITEMS = 10;

const DONE_LABEL: Partial<Record<StepAction, string>> = {
  create: 'Created',
  update: 'Updated',
  delete: 'Deleted',
  send: 'Sent',
};

const ITEM_NOUN: Record<string, [string, string]> = {
  mail: ['email', 'emails'],
  calendar: ['event', 'events'],
  tasks: ['task', 'tasks'],
  knowledge: ['document', 'documents'],
};

const LABEL_KEYS = ['title', 'subject', 'name', 'summary', 'text'] as const;

function noun(toolName: string, count: number): string {
  const [one, many] = ITEM_NOUN[toolName] ?? ['result', 'results'];
  return count === 1 ? one : many;
}

export function emptyStatement(toolName: string): string {
  return `No matching ${noun(toolName, 2)} were found.`;
}

function itemLabel(item: unknown): string {
  if (typeof item === 'string') return item;
  if (typeof item === 'number' || typeof item === 'boolean') return String(item);
  if (typeof item === 'object' && item !== null) {
    for (const key of LABEL_KEYS) {
      const value: unknown = Reflect.get(item, key);
      if (typeof value === 'string' && value.trim()) return value.trim();
    }
  }
  return JSON.stringify(item) ?? String(item);
}

function renderStep(step: Step): string {
  const label = DONE_LABEL[step.action];
  if (label) {
    const target = isEmptyPayload(step.result) ? step.subQuery : itemLabel(step.result);
    return `${label} via ${step.toolName}: ${target}`;
  }
  if (isEmptyPayload(step.result)) return emptyStatement(step.toolName);
  if (typeof step.result === 'string') return step.result.trim();

  const items = payloadItems(step.result);
  if (!items) return itemLabel(step.result);
  const lines = items.slice(0, MAX_LISTED_ITEMS).map((item) => `- ${itemLabel(item)}`);
  const more = items.length > MAX_LISTED_ITEMS ? [`- and ${items.length - MAX_LISTED_ITEMS} more`] : [];
  return [`Found ${items.length} ${noun(step.toolName, items.length)}:`, ...lines, ...more].join('\n');
}

function stepName(step: Step): string {
  return `${step.id} (${step.action} via ${step.toolName})`;
}

/** "I completed 1 of 2 requested actions." plus one line per failed or skipped step. */
export function renderGaps(steps: readonly Step[], cancelled = false): string | null {
  const gaps = steps.filter((s) => s.status === 'failed' || s.status === 'skipped' || s.status === 'pending');
  if (gaps.length === 0 && !cancelled) return null;
  const completed = steps.filter((s) => s.status === 'succeeded').length;
  const lines = [`I completed ${completed} of ${steps.length} requested actions.`];
  if (cancelled) lines.push('The request was cancelled before every step could run.');
  for (const step of gaps) {
    if (step.status === 'failed') {
      lines.push(`- ${stepName(step)} could not be done because ${step.error ?? 'the tool reported an error'}.`);
    } else {
      lines.push(`- ${stepName(step)} was skipped: ${step.skipReason ?? 'not reached'}.`);
    }
  }
  return lines.join('\n');
}

function renderBody(steps: readonly Step[]): string {
  return steps
    .filter((s) => s.status === 'succeeded')
    .map(renderStep)
    .join('\n\n');
}

async function rewriteBody(
  router: SimpleModelRouter,
  query: string,
  body: string,
  timeoutMs: number,
): Promise<string> {
  const prompt = `Rewrite these tool results as a short, direct answer to the user's request.
Do not add facts. Do not mention steps that are not listed.

Request: ${JSON.stringify(query)}

Results:
${body}`;
  const text = (await withTimeout(router.synthesize(prompt), timeoutMs, 'synthesis')).trim();
  return text || body;
}

export async function synthesizeAnswer(
  input: SynthesisInput,
  router?: SimpleModelRouter,
  options: SynthesisOptions = {},
): Promise<SynthesizedAnswer> {
  const total = input.steps.length;
  const completed = input.steps.filter((s) => s.status === 'succeeded').length;

  let body: string;
  let gaps: string | null;
  try {
    body = renderBody(input.steps);
    gaps = renderGaps(input.steps, input.cancelled);
  } catch (err) {
    throw new SynthesisError(
      `Could not render the response: ${errorMessage(err)}`,
      input.results.map((r) => ({
        stepId: r.stepId,
        success: r.success,
        ...(r.payload !== undefined ? { payload: r.payload } : {}),
        ...(r.error !== undefined ? { error: r.error } : {}),
      })),
      err,
    );
  }

  if (router && body) {
    try {
      body = await rewriteBody(router, input.query, body, options.timeoutMs ?? 10000);
    } catch (err) {
      logger.warn('synthesis:model_fallback', { error: errorMessage(err) });
    }
  }

  const sections = [body, gaps, ...input.notices.map((n) => `Note: ${n}`)].filter(
    (section): section is string => typeof section === 'string' && section.length > 0,
  );
  const text = sections.length > 0 ? sections.join('\n\n') : 'I could not find anything to do for that request.';

  return {
    text,
    success: total > 0 && completed === total && !input.cancelled,
    completed,
    total,
  };
}
