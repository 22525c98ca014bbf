// src/services/logger.ts: structured logging for the engine
import { Logger } from 'tslog';
import type { EngineConfig } from '@/config/app.config';

const LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
type LevelName = (typeof LEVELS)[number];

function isLevelName(value: string): value is LevelName {
  return LEVELS.some((level) => level === value);
}

function resolveMinLevel(raw: string | undefined): number {
  const name: LevelName = raw && isLevelName(raw) ? raw : 'info';
  return LEVELS.indexOf(name);
}

function resolveType(raw: string | undefined): 'pretty' | 'json' | 'hidden' {
  return raw === 'json' || raw === 'hidden' ? raw : 'pretty';
}

export const logger = new Logger({
  name: 'task-engine',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: resolveType(process.env.LOG_TYPE),
});

/** Applies the validated config's log section; the env-derived defaults hold until then. */
export function configureLogger(settings: EngineConfig['log']): void {
  logger.settings.minLevel = LEVELS.indexOf(settings.level);
  logger.settings.type = settings.type;
}
