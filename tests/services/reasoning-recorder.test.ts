import { describe, it, expect } from 'vitest';
import { DEFAULT_REASONING_CONFIDENCE, ReasoningRecorder } from '@/services/reasoning-recorder';
import { SimpleModelRouter, type LlmClient } from '@/services/model-router';
import { makeAnalysis, makeRouter, makeStep } from '../helpers/fakes';

const TOOLS = ['mail', 'calendar', 'tasks', 'knowledge'];

describe('ReasoningRecorder', () => {
  it('writes a heuristic entry without a model', async () => {
    const recorder = new ReasoningRecorder({ timeoutMs: 1000, now: () => 42 });

    const entry = await recorder.record(makeStep(), makeAnalysis(), []);

    expect(entry).toEqual({
      stepId: 'step_1',
      toolName: 'mail',
      expectedOutcome: 'search results from mail',
      alternatives: [],
      confidence: DEFAULT_REASONING_CONFIDENCE,
      timestamp: 42,
      source: 'heuristic',
    });
    expect(recorder.list()).toEqual([entry]);
  });

  it('uses a valid model answer', async () => {
    const { router, complete } = makeRouter(
      '{"expectedOutcome": "Emails mentioning the invoice", "alternatives": ["knowledge"], "confidence": "0.8"}',
    );
    const recorder = new ReasoningRecorder({ router, timeoutMs: 1000, availableTools: TOOLS, now: () => 7 });

    const entry = await recorder.record(makeStep(), makeAnalysis(), [
      { stepId: 'step_0', success: true, latencyMs: 1, attempts: 1 },
    ]);

    expect(entry).toMatchObject({
      expectedOutcome: 'Emails mentioning the invoice',
      alternatives: ['knowledge'],
      confidence: 0.8,
      source: 'model',
    });
    const [prompt] = complete.mock.calls[0] ?? [];
    expect(prompt).toContain('Other tools available: calendar, tasks, knowledge');
    expect(prompt).toContain('Steps finished so far: step_0=ok');
  });

  it('falls back to a heuristic entry on unusable output', async () => {
    const { router } = makeRouter('{"expectedOutcome": "", "confidence": 3}');
    const recorder = new ReasoningRecorder({ router, timeoutMs: 1000 });

    expect((await recorder.record(makeStep(), makeAnalysis(), [])).source).toBe('heuristic');
  });

  it('falls back when the model is slower than the deadline', async () => {
    const client: LlmClient = { complete: () => new Promise<string>(() => undefined) };
    const recorder = new ReasoningRecorder({ router: new SimpleModelRouter(client), timeoutMs: 10 });

    expect((await recorder.record(makeStep(), makeAnalysis(), [])).source).toBe('heuristic');
  });

  it('records concurrent calls in call order', async () => {
    const delays = [30, 0];
    let call = 0;
    const client: LlmClient = {
      complete: async () => {
        const delay = delays[call++] ?? 0;
        await new Promise((r) => setTimeout(r, delay));
        return '{"expectedOutcome": "something", "confidence": 0.6}';
      },
    };
    const recorder = new ReasoningRecorder({ router: new SimpleModelRouter(client), timeoutMs: 1000 });

    await Promise.all([
      recorder.record(makeStep({ id: 'step_1' }), makeAnalysis(), []),
      recorder.record(makeStep({ id: 'step_2' }), makeAnalysis(), []),
    ]);

    expect(recorder.list().map((e) => e.stepId)).toEqual(['step_1', 'step_2']);
  });

  it('freezes entries', async () => {
    const recorder = new ReasoningRecorder({ timeoutMs: 1000 });
    const entry = await recorder.record(makeStep(), makeAnalysis(), []);

    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.alternatives)).toBe(true);
  });
});
