// src/types/core.ts
export type Intent = 'search' | 'create' | 'update' | 'delete' | 'analyze' | 'clarification_needed';

/** Tool domains the engine knows how to route to. Tools register under these names. */
export type ToolDomain = 'mail' | 'calendar' | 'tasks' | 'knowledge';

export type StepAction =
  | 'search'
  | 'list'
  | 'summarize'
  | 'analyze'
  | 'create'
  | 'update'
  | 'delete'
  | 'send';

export type QueryComplexity = 'single_step' | 'multi_step';

/** Actions with side effects outside the engine. Only these pass through the autonomy gate. */
export const MUTATING_ACTIONS: ReadonlySet<StepAction> = new Set<StepAction>([
  'send',
  'create',
  'update',
  'delete',
]);

export function isMutatingAction(action: StepAction): boolean {
  return MUTATING_ACTIONS.has(action);
}

/** Entity slots the analyzer extracts. */
export type EntityName = 'date' | 'sender' | 'recipient' | 'attendee' | 'topic' | 'priority';

export type Entities = Partial<Record<EntityName, string>>;

export interface RequestContext {
  query: string;
  userId: string;
  sessionId: string;
  /** Upper bound on items a search-type tool should return. */
  maxResults: number;
  /** Cancels the walk between steps; in-flight tool calls finish. */
  signal?: AbortSignal;
}

export interface QueryAnalysis {
  readonly intent: Intent;
  readonly domains: readonly ToolDomain[];
  readonly entities: Readonly<Entities>;
  readonly complexity: QueryComplexity;
  readonly confidence: number;
  /** Detected actions in the order they appear in the query. */
  readonly actions: readonly StepAction[];
  /** Required entities absent for the detected action, e.g. `recipient` for a send. */
  readonly missing: readonly string[];
  /** Pronouns that could not be tied to anything earlier in the query or conversation. */
  readonly ambiguities: readonly string[];
  /** Normalized query shape used as the long-term memory key. */
  readonly pattern: string;
}

/** One turn in the conversation thread (short-term memory). */
export interface ConversationTurn {
  query: string;
  answer: string;
  timestamp: number;
}
