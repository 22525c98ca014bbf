import { describe, it, expect } from 'vitest';
import {
  assertPlanCoversSteps,
  buildExecutionPlan,
  detectCycle,
  estimateDurationMs,
  routeSteps,
} from '@/services/step-planner';
import { ToolRegistry } from '@/tools/registry';
import { PlanningError } from '@/utils/errors';
import type { Step } from '@/types/planning';
import { makeStep, makeTool } from '../helpers/fakes';

/** mulberry32: small deterministic PRNG so generated graphs are reproducible. */
function seededRandom(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomDag(random: () => number, size: number): Step[] {
  const ids = Array.from({ length: size }, (_, i) => `step_${i + 1}`);
  const steps = ids.map((id, i) =>
    makeStep({
      id,
      dependencies: ids.slice(0, i).filter(() => random() < 0.3),
    }),
  );
  // creation order need not follow dependency order
  for (let i = steps.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const current = steps[i];
    const other = steps[j];
    if (current && other) {
      steps[i] = other;
      steps[j] = current;
    }
  }
  return steps;
}

describe('buildExecutionPlan', () => {
  it('orders a dependent step after the step it needs', () => {
    const plan = buildExecutionPlan([
      makeStep({ id: 'step_1', action: 'search' }),
      makeStep({ id: 'step_2', toolName: 'tasks', action: 'create', dependencies: ['step_1'] }),
    ]);

    expect(plan.order).toEqual(['step_1', 'step_2']);
    expect(plan.waves).toEqual([['step_1'], ['step_2']]);
    expect(plan.estimatedDurationMs).toBe(2700);
  });

  it('groups independent steps into one wave and keeps creation order', () => {
    const plan = buildExecutionPlan([
      makeStep({ id: 'step_2', toolName: 'calendar', action: 'list' }),
      makeStep({ id: 'step_1', action: 'search' }),
      makeStep({ id: 'step_3', action: 'summarize', dependencies: ['step_1', 'step_2'] }),
    ]);

    expect(plan.waves).toEqual([['step_2', 'step_1'], ['step_3']]);
    // slowest per wave: search 1500, then summarize 2500
    expect(plan.estimatedDurationMs).toBe(4000);
  });

  it('returns an empty plan for no steps', () => {
    expect(buildExecutionPlan([])).toEqual({ order: [], waves: [], estimatedDurationMs: 0 });
  });

  it('rejects a cycle and names it', () => {
    const steps = [
      makeStep({ id: 'a', dependencies: ['b'] }),
      makeStep({ id: 'b', dependencies: ['a'] }),
    ];

    expect(() => buildExecutionPlan(steps)).toThrow(PlanningError);
    try {
      buildExecutionPlan(steps);
    } catch (err) {
      expect(err).toBeInstanceOf(PlanningError);
      if (err instanceof PlanningError) {
        expect(err.message).toBe('Dependency cycle: a -> b -> a');
        expect(err.cycle).toEqual(['a', 'b', 'a']);
        expect(err.code).toBe('PLANNING_ERROR');
      }
    }
  });

  it('rejects a self dependency', () => {
    expect(() => buildExecutionPlan([makeStep({ id: 'a', dependencies: ['a'] })])).toThrow('Dependency cycle: a -> a');
  });

  it('rejects a dependency on an unknown step', () => {
    expect(() => buildExecutionPlan([makeStep({ id: 'step_1', dependencies: ['step_9'] })])).toThrow(
      'Step step_1 depends on unknown step step_9',
    );
  });

  it('rejects duplicate ids', () => {
    expect(() => buildExecutionPlan([makeStep(), makeStep()])).toThrow('Duplicate step ids in plan');
  });

  it('places every dependency in an earlier wave for generated graphs', () => {
    const random = seededRandom(20240601);
    for (let run = 0; run < 50; run++) {
      const steps = randomDag(random, 1 + Math.floor(random() * 9));
      const plan = buildExecutionPlan(steps);
      const waveOf = new Map<string, number>();
      plan.waves.forEach((wave, index) => wave.forEach((id) => waveOf.set(id, index)));

      expect(plan.order).toHaveLength(steps.length);
      expect(new Set(plan.order).size).toBe(steps.length);
      for (const step of steps) {
        for (const dep of step.dependencies) {
          expect(waveOf.get(dep) ?? Infinity).toBeLessThan(waveOf.get(step.id) ?? -Infinity);
        }
      }
      expect(() => assertPlanCoversSteps(plan, steps)).not.toThrow();
    }
  });
});

describe('detectCycle', () => {
  it('returns null for an acyclic graph', () => {
    expect(detectCycle([makeStep({ id: 'a' }), makeStep({ id: 'b', dependencies: ['a'] })])).toBeNull();
  });

  it('finds a longer cycle', () => {
    expect(
      detectCycle([
        makeStep({ id: 'a', dependencies: ['c'] }),
        makeStep({ id: 'b', dependencies: ['a'] }),
        makeStep({ id: 'c', dependencies: ['b'] }),
      ]),
    ).toEqual(['a', 'c', 'b', 'a']);
  });
});

describe('estimateDurationMs', () => {
  it('sums the slowest step of each wave', () => {
    const steps = [
      makeStep({ id: 'x', action: 'delete' }),
      makeStep({ id: 'y', action: 'analyze' }),
    ];
    expect(estimateDurationMs([['x', 'y']], steps)).toBe(3000);
    expect(estimateDurationMs([['x'], ['y']], steps)).toBe(3800);
  });
});

describe('assertPlanCoversSteps', () => {
  it('fails when a step is missing from the plan', () => {
    const steps = [makeStep({ id: 'a' }), makeStep({ id: 'b' })];
    expect(() => assertPlanCoversSteps({ order: ['a'], waves: [['a']], estimatedDurationMs: 0 }, steps)).toThrow(
      'Execution plan diverged from its step set',
    );
  });
});

describe('routeSteps', () => {
  it('leaves steps whose tool accepts the action alone', () => {
    const steps = [makeStep()];

    expect(routeSteps(steps, new ToolRegistry([makeTool('mail')]))).toEqual([]);
    expect(steps[0]?.toolName).toBe('mail');
  });

  it('moves a step off an unregistered tool to one serving the same domain', () => {
    const steps = [makeStep(), makeStep({ id: 'step_2', toolName: 'knowledge' })];
    const registry = new ToolRegistry([makeTool('mail-archive', async () => [], { domain: 'mail' })]);

    expect(routeSteps(steps, registry)).toEqual([{ stepId: 'step_1', from: 'mail', to: 'mail-archive' }]);
    expect(steps.map((s) => s.toolName)).toEqual(['mail-archive', 'knowledge']);
  });

  it('moves an action the tool does not declare to a sibling that accepts it', () => {
    const steps = [makeStep({ toolName: 'calendar', action: 'delete' })];
    const registry = new ToolRegistry([
      makeTool('calendar', async () => [], { actions: ['list'] }),
      makeTool('calendar-admin', async () => [], { domain: 'calendar' }),
    ]);

    expect(routeSteps(steps, registry)).toEqual([{ stepId: 'step_1', from: 'calendar', to: 'calendar-admin' }]);
  });

  it('only touches pending steps', () => {
    const steps = [makeStep({ status: 'succeeded' })];

    expect(routeSteps(steps, new ToolRegistry([makeTool('mail-archive', async () => [], { domain: 'mail' })]))).toEqual([]);
    expect(steps[0]?.toolName).toBe('mail');
  });
});
