/**
 * Autonomy Gate: decides whether a mutating step runs, runs with a notice, waits for
 * confirmation, or halts for clarification. Irreversible actions never run below
 * the medium threshold.
 */
import type { AutonomyPolicy } from '@/config/app.config';
import type { MemoryEntry } from '@/memory/MemoryStore';
import { isMutatingAction, type QueryAnalysis } from '@/types/core';
import type { GateDecision, Step } from '@/types/planning';
import { missingEntities } from './intent-patterns';

function unitOrZero(value: number): number {
  return Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;
}

/** Analysis confidence blended with the exact-pattern memory confidence, when one exists. */
export function effectiveConfidence(
  analysisConfidence: number,
  memoryEntry: Pick<MemoryEntry, 'confidence'> | null | undefined,
  memoryWeight: number,
): number {
  const a = unitOrZero(analysisConfidence);
  if (!memoryEntry) return a;
  const w = unitOrZero(memoryWeight);
  return (1 - w) * a + w * unitOrZero(memoryEntry.confidence);
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

function joinNames(names: readonly string[]): string {
  if (names.length <= 1) return names[0] ?? '';
  return `${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}`;
}

export function describeStep(step: Pick<Step, 'action' | 'toolName' | 'subQuery'>): string {
  return `${step.action} via ${step.toolName} ("${step.subQuery}")`;
}

export function evaluateAutonomy(
  step: Step,
  analysis: QueryAnalysis,
  memoryEntry: MemoryEntry | null | undefined,
  policy: AutonomyPolicy,
): GateDecision {
  const effective = effectiveConfidence(analysis.confidence, memoryEntry, policy.memoryWeight);
  if (!isMutatingAction(step.action)) {
    return { verdict: 'proceed', effectiveConfidence: effective, missing: [] };
  }

  // a missing required entity halts regardless of how confident memory is
  const missing: string[] = missingEntities(step.subQuery, step.toolName, step.action, analysis.entities);
  if (missing.length > 0 || effective < policy.mediumThreshold) {
    const named = missing.length > 0 ? missing : clarificationTargets(analysis);
    return {
      verdict: 'halt',
      effectiveConfidence: effective,
      missing: named,
      clarification: `I need the ${joinNames(named)} before I can ${describeStep(step)}. Please provide the ${joinNames(named)}.`,
    };
  }

  if (effective < policy.highThreshold) {
    if (policy.mediumAction === 'confirm') {
      return {
        verdict: 'confirm',
        effectiveConfidence: effective,
        missing: [],
        clarification: `Please confirm: should I ${describeStep(step)}? (confidence ${percent(effective)})`,
      };
    }
    return {
      verdict: 'proceed_with_notice',
      effectiveConfidence: effective,
      missing: [],
      notice: `I went ahead with ${describeStep(step)} at ${percent(effective)} confidence; please double-check it.`,
    };
  }

  return { verdict: 'proceed', effectiveConfidence: effective, missing: [] };
}

function clarificationTargets(analysis: QueryAnalysis): string[] {
  if (analysis.missing.length > 0) return [...analysis.missing];
  if (analysis.ambiguities.length > 0) {
    return analysis.ambiguities.map((pronoun) => `what "${pronoun}" refers to`);
  }
  return ['details of what you want done'];
}
