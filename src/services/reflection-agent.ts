/**
 * Reflection Unit: the last judgement before memory is written. Goal state and
 * efficiency are counted from the steps; a model, when configured, only adds lessons.
 */
import { z } from 'zod';
import { MAX_LESSONS_PER_PATTERN } from '@/memory/MemoryStore';
import { withTimeout } from '@/stability/withTimeout';
import type { CritiqueReport, GoalAchieved, ReflectionReport, Step } from '@/types/planning';
import { errorMessage } from '@/utils/errors';
import { logger } from './logger';
import type { SimpleModelRouter } from './model-router';
import { extractJsonObject } from './safe-parse-json';

export interface ReflectionInput {
  query: string;
  steps: readonly Step[];
  critique: CritiqueReport;
}

export interface ReflectionOptions {
  timeoutMs: number;
}

const lessonsSchema = z.object({
  lessons: z.array(z.string().min(1)).max(10),
});

export function goalAchieved(steps: readonly Step[]): GoalAchieved {
  const succeeded = steps.filter((s) => s.status === 'succeeded').length;
  if (steps.length > 0 && succeeded === steps.length) return 'yes';
  if (succeeded === 0) return 'no';
  return 'partial';
}

/** Succeeded steps per tool attempt, two decimals. Zero when nothing was attempted. */
export function efficiencyScore(steps: readonly Step[]): number {
  const attempts = steps.reduce((sum, s) => sum + s.attempts, 0);
  if (attempts === 0) return 0;
  const succeeded = steps.filter((s) => s.status === 'succeeded').length;
  return Math.round(Math.min(1, succeeded / attempts) * 100) / 100;
}

function uniqueLessons(lessons: readonly string[]): string[] {
  const out: string[] = [];
  for (const lesson of lessons) {
    const trimmed = lesson.trim();
    if (trimmed && !out.includes(trimmed)) out.push(trimmed);
  }
  return out.slice(0, MAX_LESSONS_PER_PATTERN);
}

function critiqueLessons(critique: CritiqueReport): string[] {
  return [...critique.mistakes, ...(critique.simplerAlternative ? [critique.simplerAlternative] : [])];
}

export async function reflectOnExecution(
  input: ReflectionInput,
  router: SimpleModelRouter | undefined,
  options: ReflectionOptions,
): Promise<ReflectionReport> {
  const goal = goalAchieved(input.steps);
  const efficiency = efficiencyScore(input.steps);
  const heuristic = uniqueLessons(critiqueLessons(input.critique));
  const report = (lessons: string[], source: ReflectionReport['source']): ReflectionReport =>
    Object.freeze({ goalAchieved: goal, efficiencyScore: efficiency, lessons: Object.freeze(lessons), source });

  if (!router) return report(heuristic, 'heuristic');

  const prompt = `Summarize what to do differently next time for requests like this one.

Request: ${JSON.stringify(input.query)}
Goal achieved: ${goal}; efficiency ${efficiency}
Critique mistakes: ${input.critique.mistakes.join(' | ') || 'none'}
Simpler alternative: ${input.critique.simplerAlternative ?? 'none'}

Return JSON only, at most 3 short lessons:
{"lessons": ["..."]}`;

  try {
    const raw = await withTimeout(router.reflect(prompt), options.timeoutMs, 'reflection');
    const parsed = lessonsSchema.safeParse(extractJsonObject(raw));
    if (!parsed.success) {
      logger.warn('reflection:invalid_model_output', { issues: parsed.error.errors.length });
      return report(heuristic, 'heuristic');
    }
    return report(uniqueLessons([...parsed.data.lessons, ...heuristic]), 'model');
  } catch (err) {
    logger.warn('reflection:fallback', { error: errorMessage(err) });
    return report(heuristic, 'heuristic');
  }
}
