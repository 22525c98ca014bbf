/**
 * Contract for domain tools (mail, calendar, tasks, knowledge). The engine routes a
 * step to a tool by its declared name; the concrete clients live behind this interface.
 */
import type { Entities, StepAction, ToolDomain } from '@/types/core';

export interface ToolContext {
  stepId: string;
  action: StepAction;
  userId: string;
  sessionId: string;
  maxResults: number;
  /** Entities extracted from the request, e.g. `recipient` or `date`. */
  entities: Readonly<Entities>;
  signal?: AbortSignal;
}

export interface DomainTool {
  readonly name: string;
  readonly description: string;
  /** Domain the tool serves when its name is not the domain itself, e.g. `mail` for `mail-archive`. */
  readonly domain?: ToolDomain;
  /** Actions the tool accepts; omitted means any. Steps for other actions are re-routed or fail unrun. */
  readonly actions?: readonly StepAction[];
  /**
   * Runs `subQuery` with the payloads of the step's dependencies (keyed by step id).
   * Throws on failure; the executor retries.
   */
  execute(subQuery: string, dependencyResults: Readonly<Record<string, unknown>>, context: ToolContext): Promise<unknown>;
}

const ITEM_KEYS = ['items', 'results', 'emails', 'messages', 'events', 'tasks', 'documents'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The list a payload carries: the payload itself, or its first well-known list field. */
export function payloadItems(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) return payload;
  if (!isRecord(payload)) return null;
  for (const key of ITEM_KEYS) {
    const value = payload[key];
    if (Array.isArray(value)) return value;
  }
  return null;
}

/** Nothing to operate on: null, blank text, an empty list, or an object whose lists are all empty. */
export function isEmptyPayload(payload: unknown): boolean {
  if (payload === null || payload === undefined) return true;
  if (typeof payload === 'string') return payload.trim() === '';
  if (Array.isArray(payload)) return payload.length === 0;
  if (isRecord(payload)) {
    const values: unknown[] = Object.values(payload);
    if (values.length === 0) return true;
    const lists = values.filter((v): v is unknown[] => Array.isArray(v));
    return lists.length > 0 && lists.every((list) => list.length === 0);
  }
  return false;
}
