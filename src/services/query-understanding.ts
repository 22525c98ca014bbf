/**
 * Query Analyzer: intent, domains, entities and a confidence score from the raw text.
 * Deterministic and synchronous; no model call.
 */
import { buildPattern } from '@/memory/pattern';
import type {
  ConversationTurn,
  Entities,
  Intent,
  QueryAnalysis,
  StepAction,
  ToolDomain,
} from '@/types/core';
import {
  clauseDomain,
  detectDomains,
  extractEntities,
  isPronoun,
  leadingVerb,
  missingEntities,
  splitClauses,
} from './intent-patterns';

/** Certainty when both a domain and an action verb are recognized. */
const FULL_MATCH_CERTAINTY = 0.9;
/** Certainty when only one of the two is. */
const PARTIAL_MATCH_CERTAINTY = 0.6;
const UNRESOLVED_PRONOUN_PENALTY = 0.25;
const MISSING_ENTITY_PENALTY = 0.6;

export interface AnalyzeOptions {
  /** Recent turns of the session; a prior turn gives pronouns something to point at. */
  recentTurns?: readonly ConversationTurn[];
}

const ACTION_INTENT: Record<StepAction, Intent> = {
  search: 'search',
  list: 'search',
  summarize: 'analyze',
  analyze: 'analyze',
  create: 'create',
  send: 'create',
  update: 'update',
  delete: 'delete',
};

export function intentForAction(action: StepAction | undefined): Intent {
  return action ? ACTION_INTENT[action] : 'search';
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function freezeAnalysis(analysis: QueryAnalysis): QueryAnalysis {
  return Object.freeze({
    ...analysis,
    domains: Object.freeze([...analysis.domains]),
    entities: Object.freeze({ ...analysis.entities }),
    actions: Object.freeze([...analysis.actions]),
    missing: Object.freeze([...analysis.missing]),
    ambiguities: Object.freeze([...analysis.ambiguities]),
  });
}

export function clarificationAnalysis(missing: string[] = ['request details']): QueryAnalysis {
  return freezeAnalysis({
    intent: 'clarification_needed',
    domains: [],
    entities: {},
    complexity: 'single_step',
    confidence: 0,
    actions: [],
    missing,
    ambiguities: [],
    pattern: buildPattern('clarification_needed', [], 'single_step'),
  });
}

/** Pronouns with nothing earlier in the query (or conversation) they could refer to. */
function unresolvedPronouns(text: string, hasHistory: boolean): string[] {
  if (hasHistory) return [];
  const unresolved: string[] = [];
  for (const match of text.matchAll(/[a-z0-9][a-z0-9'-]*/gi)) {
    const token = match[0].toLowerCase();
    if (!isPronoun(token)) continue;
    const prefix = text.slice(0, match.index ?? 0);
    const hasReferent = detectDomains(prefix).length > 0 || Object.keys(extractEntities(prefix)).length > 0;
    if (!hasReferent) unresolved.push(token);
  }
  return unresolved;
}

export function analyzeQuery(query: string, options: AnalyzeOptions = {}): QueryAnalysis {
  const text = query.replace(/\s+/g, ' ').trim();
  if (!/[a-z]/i.test(text)) return clarificationAnalysis();

  const clauses = splitClauses(text);
  const entities: Entities = extractEntities(text);

  const domains: ToolDomain[] = detectDomains(text);
  const actions: StepAction[] = [];
  const missing: string[] = [];
  let verbFound = false;

  for (const clause of clauses) {
    const lead = leadingVerb(clause);
    const domain = clauseDomain(clause, lead?.verb);
    if (domain && !domains.includes(domain)) domains.push(domain);
    if (lead) verbFound = true;
    const action: StepAction | null = lead?.action ?? (domain ? 'search' : null);
    if (!action) continue;
    actions.push(action);
    for (const name of missingEntities(clause, domain, action, entities)) {
      if (!missing.includes(name)) missing.push(name);
    }
  }

  if (domains.length === 0 && !verbFound) return clarificationAnalysis();

  const ambiguities = unresolvedPronouns(text, (options.recentTurns?.length ?? 0) > 0);
  const certainty = domains.length > 0 && verbFound ? FULL_MATCH_CERTAINTY : PARTIAL_MATCH_CERTAINTY;
  const confidence = round2(
    clamp01(certainty - UNRESOLVED_PRONOUN_PENALTY * ambiguities.length - MISSING_ENTITY_PENALTY * missing.length),
  );

  const intent = intentForAction(actions[0]);
  const complexity = clauses.length > 1 ? 'multi_step' : 'single_step';

  return freezeAnalysis({
    intent,
    domains,
    entities,
    complexity,
    confidence,
    actions,
    missing,
    ambiguities,
    pattern: buildPattern(intent, domains, complexity),
  });
}
