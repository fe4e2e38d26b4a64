import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../shared/logger';
import { ConfigError } from '../shared/errors';
import { DEFAULT_SETTINGS_FILE } from '../core/state/SettingsStore';
import { DEFAULT_TICK_MS } from '../core/scheduler/TickScheduler';

export interface AppConfig {
  settingsFile: string;
  logLevel: LogLevel;
  tickMs: number;
}

const envSchema = z.object({
  FOCUS_TIMER_SETTINGS_FILE: z.string().min(1).default(DEFAULT_SETTINGS_FILE),
  FOCUS_TIMER_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  FOCUS_TIMER_TICK_MS: z.coerce.number().int().positive().default(DEFAULT_TICK_MS),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return {
    settingsFile: parsed.data.FOCUS_TIMER_SETTINGS_FILE,
    logLevel: parsed.data.FOCUS_TIMER_LOG_LEVEL,
    tickMs: parsed.data.FOCUS_TIMER_TICK_MS,
  };
}
