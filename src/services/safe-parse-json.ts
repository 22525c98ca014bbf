/**
 * Pulls the first JSON object out of a model answer. Models wrap answers in
 * prose and code fences, so the object is located by bracket matching.
 */
import { logger } from '@/services/logger';

/** End index (inclusive) of the balanced object starting at `start`, or -1. */
function matchClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let quote = '';
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === quote) inString = false;
      continue;
    }
    if (ch === '"' || ch === "'") {
      inString = true;
      quote = ch;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function stripFences(raw: string): string {
  let txt = raw.trim();
  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(candidate: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    if (isRecord(parsed)) return parsed;
  } catch {
    // single-quoted keys and strings are common in small-model output
    try {
      const parsed: unknown = JSON.parse(candidate.replace(/'/g, '"'));
      if (isRecord(parsed)) return parsed;
    } catch {
      return null;
    }
  }
  return null;
}

/** First parseable JSON object in `raw`, or null. Tries each `{` in turn. */
export function extractJsonObject(raw: string): Record<string, unknown> | null {
  const txt = stripFences(raw);
  let from = txt.indexOf('{');
  while (from !== -1) {
    const end = matchClosingBrace(txt, from);
    if (end !== -1) {
      const parsed = tryParse(txt.slice(from, end + 1));
      if (parsed) return parsed;
    }
    from = txt.indexOf('{', from + 1);
  }
  return null;
}

/** Like `extractJsonObject` but logs and returns `{}` when nothing parses. */
export function safeParseJson(raw: string, context: string): Record<string, unknown> {
  const parsed = extractJsonObject(raw);
  if (parsed) return parsed;
  logger.warn('safeParseJson:parse_error', {
    context,
    error: 'No JSON object found in model output',
    raw: raw.slice(0, 300),
  });
  return {};
}
