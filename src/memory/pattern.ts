import type { Intent, QueryComplexity, ToolDomain } from '@/types/core';

/** Similarity above which a stored pattern counts as relevant to a new query. */
export const PATTERN_SIMILARITY_THRESHOLD = 0.3;

/** e.g. `search_mail_tasks_multi`. Domains are sorted so mention order does not matter. */
export function buildPattern(intent: Intent, domains: readonly ToolDomain[], complexity: QueryComplexity): string {
  const uniqueDomains = [...new Set(domains)].sort();
  return [intent, ...uniqueDomains, complexity === 'multi_step' ? 'multi' : 'single'].join('_');
}

/** Jaccard similarity over `_`-separated pattern tokens. */
export function patternSimilarity(a: string, b: string): number {
  const left = new Set(a.split('_').filter(Boolean));
  const right = new Set(b.split('_').filter(Boolean));
  if (left.size === 0 && right.size === 0) return 1;
  let shared = 0;
  for (const token of left) if (right.has(token)) shared++;
  const union = left.size + right.size - shared;
  return union === 0 ? 0 : shared / union;
}

/**
 * Smoothed success ratio mapped into (0.1, 1): never 0 so a pattern can be
 * retried, never 1 so doubt remains.
 */
export function computeConfidence(successCount: number, failureCount: number): number {
  const s = Math.max(0, successCount);
  const f = Math.max(0, failureCount);
  return 0.1 + 0.9 * ((s + 1) / (s + f + 2));
}
