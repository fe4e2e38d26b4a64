import { readFile, rename, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Settings } from '../../shared/types';
import type { Logger } from '../../shared/logger';
import { SettingsError } from '../../shared/errors';
import {
  DEFAULT_SETTINGS,
  PERSISTED_KEYS,
  settingsSchema,
  type PersistedSettings,
  toPersisted,
  validateSettings,
} from './settingsSchema';

export const DEFAULT_SETTINGS_FILE = 'pomodoro_settings.json';

/**
 * Persisted overrides, one field per known key. A missing or invalid value
 * falls back to its default; unknown keys are stripped.
 */
function buildOverridesSchema(filePath: string, logger: Logger) {
  const field = <T>(schema: z.ZodType<T>, fallback: T, key: string) =>
    schema.catch(ctx => {
      if (ctx.input !== undefined) {
        logger.warn(`Ignoring invalid value for "${key}" in ${filePath}`, ctx.input);
      }
      return fallback;
    });

  const shape = settingsSchema.shape;
  return z.object({
    work_time: field(shape.workMinutes, DEFAULT_SETTINGS.workMinutes, PERSISTED_KEYS.workMinutes),
    break_time: field(shape.breakMinutes, DEFAULT_SETTINGS.breakMinutes, PERSISTED_KEYS.breakMinutes),
    long_break_time: field(shape.longBreakMinutes, DEFAULT_SETTINGS.longBreakMinutes, PERSISTED_KEYS.longBreakMinutes),
    sessions_before_long_break: field(
      shape.sessionsBeforeLongBreak,
      DEFAULT_SETTINGS.sessionsBeforeLongBreak,
      PERSISTED_KEYS.sessionsBeforeLongBreak,
    ),
    sound_enabled: field(shape.soundEnabled, DEFAULT_SETTINGS.soundEnabled, PERSISTED_KEYS.soundEnabled),
    auto_start_breaks: field(shape.autoAdvance, DEFAULT_SETTINGS.autoAdvance, PERSISTED_KEYS.autoAdvance),
  } satisfies Record<keyof PersistedSettings, z.ZodTypeAny>);
}

export class SettingsStore {
  private readonly _overridesSchema: ReturnType<typeof buildOverridesSchema>;
  // Tail of the save queue; always settles.
  private _pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {
    this._overridesSchema = buildOverridesSchema(filePath, logger);
  }

  get path(): string { return this.filePath; }

  /** Defaults merged with whatever valid overrides the file holds. Never rejects. */
  async load(): Promise<Settings> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.debug(`No settings file at ${this.filePath}, using defaults`);
      } else {
        this.logger.warn(`Could not read ${this.filePath}, using defaults`, err);
      }
      return { ...DEFAULT_SETTINGS };
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`Settings file ${this.filePath} is not valid JSON, using defaults`, err);
      return { ...DEFAULT_SETTINGS };
    }

    const parsed = this._overridesSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(`Settings file ${this.filePath} does not hold an object, using defaults`);
      return { ...DEFAULT_SETTINGS };
    }

    const o = parsed.data;
    return {
      workMinutes: o.work_time,
      breakMinutes: o.break_time,
      longBreakMinutes: o.long_break_time,
      sessionsBeforeLongBreak: o.sessions_before_long_break,
      soundEnabled: o.sound_enabled,
      autoAdvance: o.auto_start_breaks,
    };
  }

  /**
   * Overwrites the file with every field. Saves run one at a time in call
   * order, each written to a temp file and renamed over the target, so the
   * file always holds one complete save. Rejects with SettingsError on bad
   * input or I/O failure.
   */
  async save(settings: Settings): Promise<void> {
    const issues = validateSettings(settings);
    if (issues.length > 0) {
      throw new SettingsError(`Refusing to save invalid settings: ${issues.join('; ')}`);
    }

    const data = JSON.stringify(toPersisted(settings));
    const write = this._pending.then(() => this._write(data));
    this._pending = write.catch((err: unknown) => {
      this.logger.debug('Queued save failed', err);
    });
    return write;
  }

  /** Resolves once every save queued so far has finished, whether or not it succeeded. */
  flush(): Promise<void> {
    return this._pending;
  }

  private async _write(data: string): Promise<void> {
    const tmp = `${this.filePath}.tmp`;
    try {
      await writeFile(tmp, data, 'utf8');
      await rename(tmp, this.filePath);
    } catch (err) {
      throw new SettingsError(`Failed to save settings to ${this.filePath}`, { cause: err });
    }
    this.logger.info(`Saved settings to ${this.filePath}`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
