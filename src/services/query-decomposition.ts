/**
 * Query Decomposer: raw request → ordered Step list.
 *
 * Pattern splitting first; when the split leaves a fragment without an action or a
 * tool, or a lone clause joins objects from different domains ("emails from Jordan
 * and meetings with Sam"), a model (if configured) re-decomposes into one step per
 * tool domain. Without a model, fragments borrow the missing parts from their neighbours.
 */
import { z } from 'zod';
import type { MemoryEntry } from '@/memory/MemoryStore';
import { withTimeout } from '@/stability/withTimeout';
import type { ConversationTurn, QueryAnalysis, StepAction, ToolDomain } from '@/types/core';
import type { Step } from '@/types/planning';
import { errorMessage } from '@/utils/errors';
import {
  clauseDomain,
  detectDomains,
  findBackReferences,
  leadingVerb,
  splitClauses,
  stepActionSchema,
  TOOL_DOMAINS,
  toolDomainSchema,
} from './intent-patterns';
import { logger } from './logger';
import type { SimpleModelRouter } from './model-router';
import { extractJsonObject } from './safe-parse-json';

export interface DecomposeOptions {
  router?: SimpleModelRouter;
  recentTurns?: readonly ConversationTurn[];
  /** Deadline for the model fallback. */
  timeoutMs?: number;
  /** Stored patterns similar to this request, most similar first. */
  priors?: readonly MemoryEntry[];
}

/** Priors below this confidence say nothing about where a request should go. */
const PRIOR_MIN_CONFIDENCE = 0.5;
const MAX_PRIOR_LESSONS = 5;

interface DraftStep {
  subQuery: string;
  verb: string | null;
  action: StepAction | null;
  toolName: ToolDomain | null;
  /** Indices of earlier drafts. */
  dependsOn: number[];
}

const DATA_PRODUCING: ReadonlySet<StepAction> = new Set<StepAction>(['search', 'list', 'summarize', 'analyze']);

export function stepId(index: number): string {
  return `step_${index + 1}`;
}

function toSteps(drafts: DraftStep[], fallbackTool: ToolDomain): Step[] {
  return drafts.map((draft, index): Step => ({
    id: stepId(index),
    toolName: draft.toolName ?? fallbackTool,
    action: draft.action ?? 'search',
    subQuery: draft.subQuery,
    dependencies: [...new Set(draft.dependsOn)].sort((a, b) => a - b).map(stepId),
    status: 'pending',
    attempts: 0,
  }));
}

/** Most recent earlier draft a back-reference in `clause` points at. */
function resolveReferences(clause: string, index: number, drafts: DraftStep[]): number[] {
  if (index === 0) return [];
  const targets: number[] = [];
  for (const ref of findBackReferences(clause)) {
    let target = -1;
    for (let j = index - 1; j >= 0; j--) {
      const candidate = drafts[j];
      if (!candidate) continue;
      const matches =
        ref.kind === 'definite'
          ? candidate.toolName === ref.domain
          : candidate.action === null || DATA_PRODUCING.has(candidate.action);
      if (matches) {
        target = j;
        break;
      }
    }
    if (target === -1 && ref.kind !== 'definite') target = index - 1;
    if (target !== -1 && !targets.includes(target)) targets.push(target);
  }
  return targets;
}

function draftClauses(clauses: string[]): DraftStep[] {
  const drafts: DraftStep[] = [];
  clauses.forEach((clause, index) => {
    const lead = leadingVerb(clause);
    let toolName = clauseDomain(clause, lead?.verb);
    // a verbless opening clause that names a domain reads as a lookup
    const action = lead?.action ?? (index === 0 && toolName ? 'search' : null);
    const dependsOn = resolveReferences(clause, index, drafts);
    if (!toolName) {
      const source = dependsOn.length > 0 ? drafts[Math.max(...dependsOn)] : undefined;
      toolName = source?.toolName ?? null;
    }
    drafts.push({ subQuery: clause, verb: lead?.verb ?? null, action, toolName, dependsOn });
  });
  return drafts;
}

/** Fills gaps from the nearest neighbour that has the missing part. */
function borrowScope(drafts: DraftStep[], analysis: QueryAnalysis, fallbackTool: ToolDomain): DraftStep[] {
  const neighbour = <K extends 'action' | 'toolName'>(index: number, key: K): DraftStep | undefined => {
    for (let d = 1; d < drafts.length; d++) {
      const before = drafts[index - d];
      if (before && before[key] !== null) return before;
      const after = drafts[index + d];
      if (after && after[key] !== null) return after;
    }
    return undefined;
  };

  return drafts.map((draft, index) => {
    const next = { ...draft };
    if (next.action === null) {
      const donor = neighbour(index, 'action');
      next.action = donor?.action ?? analysis.actions[0] ?? 'search';
      if (donor?.verb) next.subQuery = `${donor.verb} ${draft.subQuery}`;
    }
    if (next.toolName === null) {
      next.toolName = neighbour(index, 'toolName')?.toolName ?? fallbackTool;
    }
    return next;
  });
}

/** Domain named in the most trusted prior pattern, for requests that name none. */
export function recommendedDomain(priors: readonly MemoryEntry[]): ToolDomain | null {
  const trusted = priors
    .filter((entry) => entry.confidence >= PRIOR_MIN_CONFIDENCE)
    .sort((a, b) => b.confidence - a.confidence);
  for (const entry of trusted) {
    const domain = TOOL_DOMAINS.find((d) => entry.pattern.split('_').includes(d));
    if (domain) return domain;
  }
  return null;
}

function priorLessons(priors: readonly MemoryEntry[]): string[] {
  return [...new Set(priors.flatMap((entry) => entry.lessons))].slice(0, MAX_PRIOR_LESSONS);
}

const CONJUNCTION_RE = /\s*(?:,\s*and\b|,|\band\b)\s*/i;

/**
 * A lone clause whose "and" joins objects of different domains, one scope per
 * domain. Domain-less pieces stay with the scope before them. Null when the
 * clause stays within one domain.
 */
function conjunctionScopes(clause: string): string[] | null {
  const scopes: Array<{ text: string; domain: ToolDomain | null }> = [];
  for (const piece of clause.split(CONJUNCTION_RE).map((p) => p.trim()).filter(Boolean)) {
    const domain = detectDomains(piece)[0] ?? null;
    const last = scopes[scopes.length - 1];
    if (last && (domain === null || scopes.some((scope) => scope.domain === domain))) {
      last.text = `${last.text} and ${piece}`;
      continue;
    }
    scopes.push({ text: piece, domain });
  }
  const domains = new Set(scopes.map((scope) => scope.domain).filter((d) => d !== null));
  return domains.size > 1 ? scopes.map((scope) => scope.text) : null;
}

const modelStepSchema = z.object({
  tool: toolDomainSchema,
  action: stepActionSchema,
  subQuery: z.string().min(1),
  dependsOn: z.array(z.number().int().min(0)).optional().default([]),
});

const modelDecompositionSchema = z.object({
  steps: z.array(modelStepSchema).min(1),
});

type ModelStep = z.infer<typeof modelStepSchema>;

/** One step per tool domain: later steps for an already-seen tool fold into the first. */
function mergeByTool(steps: ModelStep[]): DraftStep[] {
  const merged: DraftStep[] = [];
  const mergedIndexByTool = new Map<ToolDomain, number>();
  const mergedIndexOf: number[] = [];

  steps.forEach((step, original) => {
    const existing = mergedIndexByTool.get(step.tool);
    const target = existing ?? merged.length;
    mergedIndexOf[original] = target;

    const deps = step.dependsOn
      .filter((dep) => dep < original)
      .map((dep) => mergedIndexOf[dep])
      .filter((dep): dep is number => dep !== undefined && dep !== target && dep < target);

    if (existing === undefined) {
      mergedIndexByTool.set(step.tool, target);
      merged.push({ subQuery: step.subQuery, verb: null, action: step.action, toolName: step.tool, dependsOn: deps });
      return;
    }
    const draft = merged[existing];
    if (!draft) return;
    draft.subQuery = `${draft.subQuery}; ${step.subQuery}`;
    for (const dep of deps) if (!draft.dependsOn.includes(dep)) draft.dependsOn.push(dep);
  });
  return merged;
}

function buildDecompositionPrompt(
  query: string,
  recentTurns: readonly ConversationTurn[],
  lessons: readonly string[],
): string {
  const lessonsBlock =
    lessons.length > 0 ? `\nLessons from similar past requests:\n${lessons.map((l) => `- ${l}`).join('\n')}\n` : '';
  const historyBlock =
    recentTurns.length > 0
      ? `\nRecent conversation:\n${recentTurns
          .slice(-3)
          .map((t, i) => `${i + 1}. ${t.query}`)
          .join('\n')}\n`
      : '';

  return `Split the user's request into tool steps.

Available tools: ${TOOL_DOMAINS.join(', ')}.
Actions: search, list, summarize, analyze, create, update, delete, send.

Rules:
- Emit at most one step per tool.
- "dependsOn" lists 0-based indices of EARLIER steps whose output this step needs. Leave it empty when the step needs nothing from another step.
- "subQuery" is the part of the request that tool should handle.

User request: ${JSON.stringify(query)}
${historyBlock}${lessonsBlock}
Return JSON only:
{"steps": [{"tool": "mail", "action": "search", "subQuery": "...", "dependsOn": []}]}`;
}

async function decomposeWithModel(
  query: string,
  router: SimpleModelRouter,
  recentTurns: readonly ConversationTurn[],
  lessons: readonly string[],
  timeoutMs: number,
): Promise<DraftStep[] | null> {
  try {
    const raw = await withTimeout(
      router.decompose(buildDecompositionPrompt(query, recentTurns, lessons)),
      timeoutMs,
      'decompose',
    );
    const parsed = modelDecompositionSchema.safeParse(extractJsonObject(raw));
    if (!parsed.success) {
      logger.warn('decomposer:invalid_model_output', { issues: parsed.error.errors.length, raw: raw.slice(0, 300) });
      return null;
    }
    return mergeByTool(parsed.data.steps);
  } catch (err) {
    logger.warn('decomposer:model_failed', { error: errorMessage(err) });
    return null;
  }
}

export async function decomposeQuery(
  analysis: QueryAnalysis,
  query: string,
  options: DecomposeOptions = {},
): Promise<Step[]> {
  if (analysis.intent === 'clarification_needed') return [];
  const priors = options.priors ?? [];
  const fallbackTool: ToolDomain = analysis.domains[0] ?? recommendedDomain(priors) ?? 'knowledge';
  const clauses = splitClauses(query);

  const modelSplit = async (minSteps: number): Promise<Step[] | null> => {
    if (!options.router) return null;
    const modelDrafts = await decomposeWithModel(
      query,
      options.router,
      options.recentTurns ?? [],
      priorLessons(priors),
      options.timeoutMs ?? 8000,
    );
    if (!modelDrafts || modelDrafts.length < minSteps) return null;
    logger.info('decomposer:model_split', { steps: modelDrafts.length });
    return toSteps(modelDrafts, fallbackTool);
  };

  if (clauses.length <= 1) {
    const text = clauses[0] ?? query.trim();
    const scopes = conjunctionScopes(text);
    // one clause, one domain: one step, no model call
    if (!scopes) {
      const lead = leadingVerb(text);
      return toSteps(
        [
          {
            subQuery: text,
            verb: lead?.verb ?? null,
            action: lead?.action ?? analysis.actions[0] ?? 'search',
            toolName: clauseDomain(text, lead?.verb) ?? fallbackTool,
            dependsOn: [],
          },
        ],
        fallbackTool,
      );
    }
    const fromModel = await modelSplit(2);
    if (fromModel) return fromModel;
    logger.info('decomposer:scope_split', { steps: scopes.length });
    return toSteps(borrowScope(draftClauses(scopes), analysis, fallbackTool), fallbackTool);
  }

  const drafts = draftClauses(clauses);
  const confident = drafts.every((d) => d.action !== null && d.toolName !== null);
  if (confident) {
    logger.debug('decomposer:pattern_split', { steps: drafts.length });
    return toSteps(drafts, fallbackTool);
  }

  const fromModel = await modelSplit(1);
  if (fromModel) return fromModel;

  logger.info('decomposer:borrowed_scope', { steps: drafts.length });
  return toSteps(borrowScope(drafts, analysis, fallbackTool), fallbackTool);
}
