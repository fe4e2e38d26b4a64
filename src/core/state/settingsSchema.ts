import { z } from 'zod';
import type { Settings } from '../../shared/types';

const MAX_MINUTES = 24 * 60;

const minutes = z.number().int().positive().max(MAX_MINUTES);

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  workMinutes: 25,
  breakMinutes: 5,
  longBreakMinutes: 15,
  sessionsBeforeLongBreak: 4,
  soundEnabled: true,
  autoAdvance: false,
};

export const settingsSchema = z.object({
  workMinutes: minutes,
  breakMinutes: minutes,
  longBreakMinutes: minutes,
  sessionsBeforeLongBreak: z.number().int().positive(),
  soundEnabled: z.boolean(),
  autoAdvance: z.boolean(),
});

/**
 * Persisted key for each settings field. The file keeps the flat
 * snake_case layout of earlier settings files.
 */
export const PERSISTED_KEYS = {
  workMinutes: 'work_time',
  breakMinutes: 'break_time',
  longBreakMinutes: 'long_break_time',
  sessionsBeforeLongBreak: 'sessions_before_long_break',
  soundEnabled: 'sound_enabled',
  autoAdvance: 'auto_start_breaks',
} as const satisfies Record<keyof Settings, string>;

export type PersistedSettings = {
  [K in keyof Settings as (typeof PERSISTED_KEYS)[K]]: Settings[K];
};

export function validateSettings(settings: Settings): string[] {
  const result = settingsSchema.safeParse(settings);
  if (result.success) return [];
  return result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
}

export function toPersisted(settings: Settings): PersistedSettings {
  return {
    work_time: settings.workMinutes,
    break_time: settings.breakMinutes,
    long_break_time: settings.longBreakMinutes,
    sessions_before_long_break: settings.sessionsBeforeLongBreak,
    sound_enabled: settings.soundEnabled,
    auto_start_breaks: settings.autoAdvance,
  };
}
