/**
 * Push-only progress channel. The engine appends events and never reads them back;
 * a failing sink is logged and the walk carries on.
 */
import type { GateVerdict, RefinementAction } from '@/types/planning';
import { errorMessage } from '@/utils/errors';
import { logger } from './logger';
import type { ToolReroute } from './step-planner';

export interface WorkflowEventPayloads {
  planning_started: { query: string };
  analysis_completed: { intent: string; confidence: number; pattern: string };
  plan_created: { stepCount: number; waves: string[][]; reroutes?: ToolReroute[] };
  reasoning_recorded: { stepId: string; confidence: number; source: 'model' | 'heuristic' };
  step_started: { stepId: string; tool: string };
  step_completed: { stepId: string; success: boolean; attempts: number };
  partial_result: { stepId: string; tool: string; empty: boolean };
  refinement_applied: { afterStepId: string; actions: RefinementAction[] };
  clarification_required: { question: string; missing: string[]; verdict?: GateVerdict; stepId?: string };
  critique_completed: { selfRating: number; approachOptimal: boolean };
  reflection_completed: { goalAchieved: string; efficiencyScore: number };
  response_ready: { kind: 'answer' | 'clarification'; success: boolean; cancelled: boolean };
}

export type WorkflowEventType = keyof WorkflowEventPayloads;

export interface WorkflowEvent<K extends WorkflowEventType = WorkflowEventType> {
  type: K;
  requestId: string;
  /** 1-based, per request. */
  sequence: number;
  timestamp: number;
  data: WorkflowEventPayloads[K];
}

export interface EventSink {
  write(event: WorkflowEvent): void | Promise<void>;
}

export type EventSinkLike = EventSink | ((event: WorkflowEvent) => void | Promise<void>);

export class WorkflowEventEmitter {
  private sequence = 0;
  private readonly sinks: EventSink[];

  constructor(
    readonly requestId: string,
    sinks: readonly EventSinkLike[] = [],
    private readonly now: () => number = Date.now,
  ) {
    this.sinks = sinks.map((sink) => (typeof sink === 'function' ? { write: sink } : sink));
  }

  async emit<K extends WorkflowEventType>(type: K, data: WorkflowEventPayloads[K]): Promise<void> {
    const event: WorkflowEvent<K> = {
      type,
      requestId: this.requestId,
      sequence: ++this.sequence,
      timestamp: this.now(),
      data,
    };
    for (const sink of this.sinks) {
      try {
        await sink.write(event);
      } catch (err) {
        logger.warn('events:sink_failed', { type, requestId: this.requestId, error: errorMessage(err) });
      }
    }
  }
}

/** Keeps every event in memory, in emission order. */
export class CollectingEventSink implements EventSink {
  readonly events: WorkflowEvent[] = [];

  write(event: WorkflowEvent): void {
    this.events.push(event);
  }

  types(): WorkflowEventType[] {
    return this.events.map((e) => e.type);
  }
}
