import type { StepAction } from '@/types/core';

export type StepStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

/** One atomic tool invocation. Steps are mutated in place and never removed from the set. */
export interface Step {
  id: string;
  /** Name of the registered tool this step routes to, e.g. 'mail'. */
  toolName: string;
  action: StepAction;
  /** Natural-language slice of the request routed to the tool. */
  subQuery: string;
  /** Ids of steps that must succeed before this one runs. */
  dependencies: string[];
  status: StepStatus;
  result?: unknown;
  error?: string;
  skipReason?: string;
  modifiedByRefinement?: boolean;
  /** Id of the step whose outcome caused the refiner to insert this one. */
  insertedBy?: string;
  /** Tool attempts made so far, retries included. */
  attempts: number;
}

/** Dependency-ordered, wave-grouped view over a Step set. */
export interface ExecutionPlan {
  order: string[];
  /** Each wave holds steps whose dependencies all sit in earlier waves. */
  waves: string[][];
  estimatedDurationMs: number;
  /** Reordering suggested by the refiner. Recorded, never applied. */
  proposedOrder?: string[];
}

export interface ReasoningEntry {
  readonly stepId: string;
  readonly toolName: string;
  readonly expectedOutcome: string;
  readonly alternatives: readonly string[];
  readonly confidence: number;
  readonly timestamp: number;
  readonly source: 'model' | 'heuristic';
}

export interface ExecutionResult {
  stepId: string;
  success: boolean;
  payload?: unknown;
  error?: string;
  latencyMs: number;
  attempts: number;
}

export interface CritiqueReport {
  readonly approachOptimal: boolean;
  readonly mistakes: readonly string[];
  readonly wrongAssumptions: readonly string[];
  readonly reasoningFlaws: readonly string[];
  readonly simplerAlternative: string | null;
  /** 1 (poor) to 10 (excellent). */
  readonly selfRating: number;
  readonly source: 'model' | 'heuristic';
}

export type GoalAchieved = 'yes' | 'no' | 'partial';

export interface ReflectionReport {
  readonly goalAchieved: GoalAchieved;
  /** Succeeded steps per tool attempt, 0 to 1. */
  readonly efficiencyScore: number;
  readonly lessons: readonly string[];
  readonly source: 'model' | 'heuristic';
}

export type GateVerdict = 'proceed' | 'proceed_with_notice' | 'confirm' | 'halt';

export interface GateDecision {
  verdict: GateVerdict;
  effectiveConfidence: number;
  /** Attached to the response for `proceed_with_notice`. */
  notice?: string;
  /** Missing information named in the clarification for `halt` and `confirm`. */
  missing: string[];
  /** Question put to the user for `halt` and `confirm`. */
  clarification?: string;
}

export type RefinementAction =
  | { kind: 'skip'; stepId: string; reason: string }
  | { kind: 'modify'; stepId: string; subQuery?: string; toolName?: string }
  | { kind: 'insert'; step: Step; motivatedBy: string }
  | { kind: 'propose_reorder'; order: string[] };
