import { describe, it, expect, vi } from 'vitest';
import { CollectingEventSink, WorkflowEventEmitter, type WorkflowEvent } from '@/services/workflow-events';

describe('WorkflowEventEmitter', () => {
  it('numbers events per request and stamps them', async () => {
    const sink = new CollectingEventSink();
    const emitter = new WorkflowEventEmitter('req-1', [sink], () => 1234);

    await emitter.emit('planning_started', { query: 'Show my tasks' });
    await emitter.emit('plan_created', { stepCount: 1, waves: [['step_1']] });

    expect(sink.events).toEqual([
      { type: 'planning_started', requestId: 'req-1', sequence: 1, timestamp: 1234, data: { query: 'Show my tasks' } },
      { type: 'plan_created', requestId: 'req-1', sequence: 2, timestamp: 1234, data: { stepCount: 1, waves: [['step_1']] } },
    ]);
    expect(sink.types()).toEqual(['planning_started', 'plan_created']);
  });

  it('accepts plain functions as sinks', async () => {
    const received: WorkflowEvent[] = [];
    const emitter = new WorkflowEventEmitter('req-2', [(event) => void received.push(event)]);

    await emitter.emit('step_started', { stepId: 'step_1', tool: 'mail' });

    expect(received.map((e) => e.type)).toEqual(['step_started']);
  });

  it('keeps delivering to other sinks when one throws', async () => {
    const failing = { write: vi.fn(async () => Promise.reject(new Error('socket closed'))) };
    const sink = new CollectingEventSink();
    const emitter = new WorkflowEventEmitter('req-3', [failing, sink]);

    await expect(emitter.emit('step_completed', { stepId: 'step_1', success: true, attempts: 1 })).resolves.toBeUndefined();
    await emitter.emit('response_ready', { kind: 'answer', success: true, cancelled: false });

    expect(failing.write).toHaveBeenCalledTimes(2);
    expect(sink.events.map((e) => e.sequence)).toEqual([1, 2]);
  });

  it('emits nothing without sinks', async () => {
    const emitter = new WorkflowEventEmitter('req-4');

    await expect(emitter.emit('planning_started', { query: 'q' })).resolves.toBeUndefined();
  });
});
