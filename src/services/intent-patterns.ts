/**
 * Keyword tables and the clause/entity heuristics shared by the analyzer,
 * the decomposer and the autonomy gate. Tables live in config/intent-patterns.json.
 */
import { z } from 'zod';
import rawPatterns from '@/config/intent-patterns.json';
import type { Entities, EntityName, StepAction, ToolDomain } from '@/types/core';

export const TOOL_DOMAINS: readonly ToolDomain[] = ['mail', 'calendar', 'tasks', 'knowledge'];

export const stepActionSchema = z.enum(['search', 'list', 'summarize', 'analyze', 'create', 'update', 'delete', 'send']);
export const toolDomainSchema = z.enum(['mail', 'calendar', 'tasks', 'knowledge']);
const wordList = z.array(z.string().min(1));

const patternsSchema = z.object({
  domainKeywords: z.object({
    mail: wordList,
    calendar: wordList,
    tasks: wordList,
    knowledge: wordList,
  }),
  actionVerbs: z.record(z.string(), stepActionSchema),
  verbDomains: z.record(z.string(), toolDomainSchema),
  queryWords: wordList,
  fillerWords: wordList,
  pronouns: wordList,
  resultReferences: wordList,
  strongConnectives: wordList,
  dateWords: wordList,
  priorityWords: wordList,
  replyVerbs: wordList,
  actionEstimatesMs: z.record(z.string(), z.number().positive()),
});

const patterns = patternsSchema.parse(rawPatterns);

const KEYWORD_DOMAIN = new Map<string, ToolDomain>();
for (const domain of TOOL_DOMAINS) {
  for (const word of patterns.domainKeywords[domain]) KEYWORD_DOMAIN.set(word, domain);
}
const ACTION_VERBS = new Map<string, StepAction>(Object.entries(patterns.actionVerbs));
const VERB_DOMAINS = new Map<string, ToolDomain>(Object.entries(patterns.verbDomains));
const QUERY_WORDS = new Set(patterns.queryWords);
const FILLER_WORDS = new Set(patterns.fillerWords);
const PRONOUNS = new Set(patterns.pronouns);
const REPLY_VERBS = new Set(patterns.replyVerbs);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Longest first so "and then" wins over "then". */
function alternation(words: readonly string[]): string {
  return [...words]
    .sort((a, b) => b.length - a.length)
    .map((w) => escapeRegExp(w).replace(/ /g, '\\s+'))
    .join('|');
}

const STRONG_SPLIT_RE = new RegExp(
  `\\s*[;]\\s*|\\s*(?:,\\s*)?\\b(?:${alternation(patterns.strongConnectives)})\\b[,]?\\s*`,
  'i',
);
const VERB_JOIN_RE = new RegExp(
  `\\s*(?:,\\s*and\\b|,|\\band\\b)\\s+(?=(?:${alternation([...ACTION_VERBS.keys()])})\\b)`,
  'i',
);
const ENUMERATION_RE = /(?:^|\s)(?:\d+[.)]|\(\d+\))\s+/g;
const RESULT_REFERENCE_RE = new RegExp(`\\b(?:${alternation(patterns.resultReferences)})\\b`, 'i');
const DEFINITE_NOUN_RE = /\b(?:the|that|those|these|this)\s+([a-z][a-z-]*)/gi;

const DATE_RE = new RegExp(
  `\\b(?:${alternation(patterns.dateWords)})\\b|\\b\\d{4}-\\d{2}-\\d{2}\\b|\\b\\d{1,2}/\\d{1,2}(?:/\\d{2,4})?\\b`,
  'i',
);
const PRIORITY_RE = new RegExp(`\\b(?:${alternation(patterns.priorityWords)})\\b`, 'i');
const NAME = `[A-Z][A-Za-z'.-]*(?:\\s+[A-Z][A-Za-z'.-]*)*`;
const EMAIL = `[\\w.+-]+@[\\w-]+\\.[\\w.]+`;
const SENDER_RE = new RegExp(`\\bfrom\\s+(${EMAIL}|${NAME})`);
const RECIPIENT_RE = new RegExp(`\\bto\\s+(${EMAIL}|${NAME})`);
const ATTENDEE_RE = new RegExp(`\\bwith\\s+(${EMAIL}|${NAME})`);
const TOPIC_RE = /\babout\s+(.+?)(?=\s+(?:and|then|by|on|from|to|for|before|after|with)\b|[,.;!?]|$)/i;
const LEADING_ARTICLE_RE = /^(?:the|a|an|my|our|their)\s+/i;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9][a-z0-9'-]*/g) ?? [];
}

export interface LeadingVerb {
  verb: string;
  action: StepAction;
  /** True when the clause opens with a question word rather than an imperative. */
  interrogative: boolean;
}

/** First content word of a clause, if it is an action verb or a question word. */
export function leadingVerb(clause: string): LeadingVerb | null {
  for (const token of tokenize(clause)) {
    if (FILLER_WORDS.has(token)) continue;
    const action = ACTION_VERBS.get(token);
    if (action) return { verb: token, action, interrogative: false };
    if (QUERY_WORDS.has(token)) return { verb: token, action: 'search', interrogative: true };
    return null;
  }
  return null;
}

/** Domains in order of first mention. */
export function detectDomains(text: string): ToolDomain[] {
  const found: ToolDomain[] = [];
  for (const token of tokenize(text)) {
    const domain = KEYWORD_DOMAIN.get(token);
    if (domain && !found.includes(domain)) found.push(domain);
  }
  return found;
}

export function domainForVerb(verb: string | null | undefined): ToolDomain | null {
  return verb ? VERB_DOMAINS.get(verb) ?? null : null;
}

/** Tool a clause routes to by its own words: verb hint first, then the earliest domain noun. */
export function clauseDomain(clause: string, verb: string | null | undefined): ToolDomain | null {
  return domainForVerb(verb) ?? detectDomains(clause)[0] ?? null;
}

function cleanClause(part: string): string {
  return part
    .trim()
    .replace(/^(?:and|,|;)\s+/i, '')
    .replace(/[\s,.;!?]+$/, '')
    .trim();
}

function splitEnumeration(text: string): string[] | null {
  const markers = text.match(ENUMERATION_RE);
  if (!markers || markers.length < 2) return null;
  return text.split(ENUMERATION_RE);
}

/**
 * Splits a request into clauses on multi-action connectives ("and then", "after that",
 * enumerations, ";") and on "and"/"," directly followed by an action verb.
 */
export function splitClauses(query: string): string[] {
  const text = query.replace(/\s+/g, ' ').trim();
  if (!text) return [];
  const out: string[] = [];
  for (const piece of splitEnumeration(text) ?? [text]) {
    for (const strong of piece.split(STRONG_SPLIT_RE)) {
      for (const part of strong.split(VERB_JOIN_RE)) {
        const cleaned = cleanClause(part);
        if (cleaned) out.push(cleaned);
      }
    }
  }
  return out;
}

export type BackReference =
  | { kind: 'pronoun'; text: string }
  | { kind: 'results'; text: string }
  | { kind: 'definite'; text: string; domain: ToolDomain };

/**
 * References in a clause to data produced elsewhere: pronouns, "the results",
 * and definite domain nouns ("the email").
 */
export function findBackReferences(clause: string): BackReference[] {
  const refs: BackReference[] = [];
  const results = clause.match(RESULT_REFERENCE_RE);
  if (results) refs.push({ kind: 'results', text: results[0].toLowerCase() });
  for (const token of tokenize(clause)) {
    if (PRONOUNS.has(token)) refs.push({ kind: 'pronoun', text: token });
  }
  for (const match of clause.matchAll(DEFINITE_NOUN_RE)) {
    const noun = match[1]?.toLowerCase();
    const domain = noun ? KEYWORD_DOMAIN.get(noun) : undefined;
    if (noun && domain) refs.push({ kind: 'definite', text: match[0].toLowerCase(), domain });
  }
  return refs;
}

export function isPronoun(token: string): boolean {
  return PRONOUNS.has(token);
}

function isDateWord(text: string): boolean {
  const match = text.match(DATE_RE);
  return match !== null && match[0].length === text.length;
}

function matchName(re: RegExp, text: string): string | undefined {
  const value = text.match(re)?.[1]?.trim();
  if (!value || value === 'I' || isDateWord(value)) return undefined;
  return value;
}

export function extractEntities(text: string): Entities {
  const entities: Entities = {};
  const date = text.match(DATE_RE)?.[0];
  if (date) entities.date = date.toLowerCase();
  const sender = matchName(SENDER_RE, text);
  if (sender) entities.sender = sender;
  const recipient = matchName(RECIPIENT_RE, text);
  if (recipient) entities.recipient = recipient;
  const attendee = matchName(ATTENDEE_RE, text);
  if (attendee) entities.attendee = attendee;
  const topic = text.match(TOPIC_RE)?.[1]?.replace(LEADING_ARTICLE_RE, '').trim();
  if (topic) entities.topic = topic;
  const priority = text.match(PRIORITY_RE)?.[0];
  if (priority) entities.priority = priority.toLowerCase();
  return entities;
}

/** Entities an action cannot run without. Replies go back to the sender, so they need no recipient. */
export function requiredEntities(
  domain: string | null,
  action: StepAction,
  verb: string | null | undefined,
): EntityName[] {
  if (domain === 'mail' && action === 'send' && !(verb && REPLY_VERBS.has(verb))) return ['recipient'];
  if (domain === 'calendar' && action === 'create') return ['date'];
  return [];
}

/** Required entities absent from the clause and from the request-wide entities. */
export function missingEntities(
  clause: string,
  domain: string | null,
  action: StepAction,
  requestEntities: Entities = {},
): EntityName[] {
  const verb = leadingVerb(clause)?.verb;
  const entities: Entities = { ...requestEntities, ...extractEntities(clause) };
  return requiredEntities(domain, action, verb).filter((name) => !entities[name]);
}

export function actionEstimateMs(action: StepAction): number {
  return patterns.actionEstimatesMs[action] ?? 1000;
}
