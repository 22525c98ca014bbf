/**
 * Execution Planner: topological order plus parallel-eligible waves over a Step set.
 * Cycles and dangling dependencies are fatal (PlanningError), never retried.
 */
import type { ToolRegistry } from '@/tools/registry';
import type { ExecutionPlan, Step } from '@/types/planning';
import { PlanningError } from '@/utils/errors';
import { actionEstimateMs } from './intent-patterns';
import { logger } from './logger';

/**
 * DFS with an on-stack set. Returns the first cycle found as a path whose first
 * id is repeated at the end (`['a', 'b', 'a']`), or null.
 */
export function detectCycle(steps: readonly Step[]): string[] | null {
  const byId = new Map(steps.map((s) => [s.id, s]));
  const visited = new Set<string>();
  const inStack = new Set<string>();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    if (inStack.has(id)) {
      const start = path.indexOf(id);
      return [...path.slice(start), id];
    }
    if (visited.has(id)) return null;
    visited.add(id);
    inStack.add(id);
    path.push(id);
    for (const dep of byId.get(id)?.dependencies ?? []) {
      if (!byId.has(dep)) continue;
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    path.pop();
    inStack.delete(id);
    return null;
  };

  for (const step of steps) {
    const cycle = visit(step.id);
    if (cycle) return cycle;
  }
  return null;
}

function assertKnownDependencies(steps: readonly Step[]): void {
  const ids = new Set(steps.map((s) => s.id));
  if (ids.size !== steps.length) {
    throw new PlanningError('Duplicate step ids in plan');
  }
  for (const step of steps) {
    for (const dep of step.dependencies) {
      if (!ids.has(dep)) {
        throw new PlanningError(`Step ${step.id} depends on unknown step ${dep}`);
      }
    }
  }
}

/** Kahn layering. Within a wave, steps keep their creation order. */
function layerWaves(steps: readonly Step[]): string[][] {
  const remaining = new Map(steps.map((s) => [s.id, new Set(s.dependencies)]));
  const waves: string[][] = [];
  while (remaining.size > 0) {
    const wave = steps.filter((s) => remaining.get(s.id)?.size === 0).map((s) => s.id);
    if (wave.length === 0) {
      // unreachable after detectCycle; kept so a bad graph can never spin
      throw new PlanningError('Dependency cycle: no step is ready');
    }
    for (const id of wave) remaining.delete(id);
    for (const deps of remaining.values()) for (const id of wave) deps.delete(id);
    waves.push(wave);
  }
  return waves;
}

export function estimateDurationMs(waves: string[][], steps: readonly Step[]): number {
  const byId = new Map(steps.map((s) => [s.id, s]));
  return waves.reduce((total, wave) => {
    const slowest = Math.max(0, ...wave.map((id) => {
      const step = byId.get(id);
      return step ? actionEstimateMs(step.action) : 0;
    }));
    return total + slowest;
  }, 0);
}

export function buildExecutionPlan(steps: readonly Step[]): ExecutionPlan {
  assertKnownDependencies(steps);
  const cycle = detectCycle(steps);
  if (cycle) {
    logger.warn('planner:cycle', { cycle });
    throw new PlanningError(`Dependency cycle: ${cycle.join(' -> ')}`, cycle);
  }
  const waves = layerWaves(steps);
  return {
    order: waves.flat(),
    waves,
    estimatedDurationMs: estimateDurationMs(waves, steps),
  };
}

export interface ToolReroute {
  stepId: string;
  from: string;
  to: string;
}

/**
 * Points each pending step at a registered tool that accepts its action, moving it
 * to another tool of the same domain when its own cannot. Steps with no such tool
 * are left as they are; the executor fails them without a call.
 */
export function routeSteps(steps: readonly Step[], registry: ToolRegistry): ToolReroute[] {
  const reroutes: ToolReroute[] = [];
  for (const step of steps) {
    if (step.status !== 'pending' || registry.supports(step.toolName, step.action)) continue;
    const target = registry.findFor(registry.domainOf(step.toolName), step.action);
    if (!target) {
      logger.warn('planner:unroutable', { stepId: step.id, tool: step.toolName, action: step.action });
      continue;
    }
    reroutes.push({ stepId: step.id, from: step.toolName, to: target.name });
    step.toolName = target.name;
  }
  if (reroutes.length > 0) logger.info('planner:rerouted', { reroutes });
  return reroutes;
}

/** Every plan id names a step and every step appears once in the plan. */
export function assertPlanCoversSteps(plan: ExecutionPlan, steps: readonly Step[]): void {
  const ids = new Set(steps.map((s) => s.id));
  const planned = new Set(plan.order);
  if (planned.size !== plan.order.length || planned.size !== ids.size || plan.order.some((id) => !ids.has(id))) {
    throw new PlanningError('Execution plan diverged from its step set');
  }
}
