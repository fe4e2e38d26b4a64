import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { SettingsStore } from '../SettingsStore';
import { DEFAULT_SETTINGS } from '../settingsSchema';
import { SettingsError } from '../../../shared/errors';
import { createNoopLogger, type Logger } from '../../../shared/logger';
import type { Settings } from '../../../shared/types';

describe('SettingsStore', () => {
  let dir: string;
  let file: string;
  let logger: Logger;
  let store: SettingsStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'focus-timer-'));
    file = path.join(dir, 'pomodoro_settings.json');
    logger = { ...createNoopLogger(), warn: vi.fn(), debug: vi.fn() };
    store = new SettingsStore(file, logger);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('returns defaults when the file is missing', async () => {
      expect(await store.load()).toEqual(DEFAULT_SETTINGS);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('returns a fresh copy of the defaults', async () => {
      const loaded = await store.load();
      loaded.workMinutes = 99;
      expect(DEFAULT_SETTINGS.workMinutes).toBe(25);
    });

    it('merges overrides over defaults', async () => {
      await writeFile(file, JSON.stringify({ work_time: 50, auto_start_breaks: true }));
      expect(await store.load()).toEqual({
        ...DEFAULT_SETTINGS,
        workMinutes: 50,
        autoAdvance: true,
      });
    });

    it('ignores unknown keys', async () => {
      await writeFile(file, JSON.stringify({ break_time: 10, theme: 'dark' }));
      const loaded = await store.load();
      expect(loaded).toEqual({ ...DEFAULT_SETTINGS, breakMinutes: 10 });
      expect(loaded).not.toHaveProperty('theme');
    });

    it('returns defaults for corrupt JSON', async () => {
      await writeFile(file, '{"work_time": 3');
      expect(await store.load()).toEqual(DEFAULT_SETTINGS);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it.each([['null'], ['[1,2]'], ['"text"'], ['12']])('returns defaults when the file holds %s', async raw => {
      await writeFile(file, raw);
      expect(await store.load()).toEqual(DEFAULT_SETTINGS);
    });

    it('returns defaults when the path cannot be read as a file', async () => {
      await mkdir(file);
      expect(await store.load()).toEqual(DEFAULT_SETTINGS);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('keeps defaults for invalid values and logs each', async () => {
      await writeFile(file, JSON.stringify({
        work_time: 0,
        break_time: -3,
        long_break_time: 7.5,
        sessions_before_long_break: '4',
        sound_enabled: 'yes',
        auto_start_breaks: true,
      }));
      expect(await store.load()).toEqual({ ...DEFAULT_SETTINGS, autoAdvance: true });
      expect(logger.warn).toHaveBeenCalledTimes(5);
    });

    it('rejects durations above a day', async () => {
      await writeFile(file, JSON.stringify({ long_break_time: 1441 }));
      expect((await store.load()).longBreakMinutes).toBe(15);
    });
  });

  describe('save', () => {
    it('writes every key in the flat persisted layout', async () => {
      await store.save({ ...DEFAULT_SETTINGS, soundEnabled: false });
      expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({
        work_time: 25,
        break_time: 5,
        long_break_time: 15,
        sessions_before_long_break: 4,
        sound_enabled: false,
        auto_start_breaks: false,
      });
    });

    it('overwrites previous data', async () => {
      await writeFile(file, JSON.stringify({ work_time: 40, extra: 1 }));
      await store.save(DEFAULT_SETTINGS);
      const data: unknown = JSON.parse(await readFile(file, 'utf8'));
      expect(data).not.toHaveProperty('extra');
      expect(data).toHaveProperty('work_time', 25);
    });

    it('round-trips through load', async () => {
      const settings: Settings = {
        workMinutes: 45,
        breakMinutes: 10,
        longBreakMinutes: 30,
        sessionsBeforeLongBreak: 3,
        soundEnabled: false,
        autoAdvance: true,
      };
      await store.save(settings);
      expect(await store.load()).toEqual(settings);
    });

    it('rejects invalid settings without writing', async () => {
      await expect(store.save({ ...DEFAULT_SETTINGS, workMinutes: -1 })).rejects.toBeInstanceOf(SettingsError);
      await expect(readFile(file, 'utf8')).rejects.toThrow();
    });

    it('applies overlapping saves in call order', async () => {
      const first = store.save({ ...DEFAULT_SETTINGS, soundEnabled: false, autoAdvance: false });
      const second = store.save({ ...DEFAULT_SETTINGS, soundEnabled: true, autoAdvance: true });
      await Promise.all([first, second]);
      expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({
        work_time: 25,
        break_time: 5,
        long_break_time: 15,
        sessions_before_long_break: 4,
        sound_enabled: true,
        auto_start_breaks: true,
      });
      expect(await store.load()).toEqual({ ...DEFAULT_SETTINGS, soundEnabled: true, autoAdvance: true });
    });

    it('keeps the file parseable across many unawaited saves', async () => {
      const saves: Promise<void>[] = [];
      for (let i = 1; i <= 20; i++) {
        saves.push(store.save({ ...DEFAULT_SETTINGS, workMinutes: i, soundEnabled: i % 2 === 0 }));
      }
      await Promise.all(saves);
      expect(await store.load()).toEqual({ ...DEFAULT_SETTINGS, workMinutes: 20, soundEnabled: true });
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('leaves no temp file behind', async () => {
      await store.save(DEFAULT_SETTINGS);
      expect(await readdir(dir)).toEqual(['pomodoro_settings.json']);
    });

    it('flush waits for queued saves', async () => {
      const saved = store.save({ ...DEFAULT_SETTINGS, breakMinutes: 9 });
      await store.flush();
      expect(JSON.parse(await readFile(file, 'utf8'))).toHaveProperty('break_time', 9);
      await saved;
    });

    it('keeps saving after a failed save', async () => {
      await mkdir(`${file}.tmp`);
      const failed = store.save({ ...DEFAULT_SETTINGS, workMinutes: 30 }).catch((e: unknown) => e);
      expect(await failed).toBeInstanceOf(SettingsError);
      await rm(`${file}.tmp`, { recursive: true });

      await store.save({ ...DEFAULT_SETTINGS, workMinutes: 35 });
      expect((await store.load()).workMinutes).toBe(35);
    });

    it('flush resolves after a failed save', async () => {
      const broken = new SettingsStore(path.join(dir, 'missing', 'settings.json'), logger);
      const failed = broken.save(DEFAULT_SETTINGS).catch((e: unknown) => e);
      await expect(broken.flush()).resolves.toBeUndefined();
      expect(await failed).toBeInstanceOf(SettingsError);
    });

    it('surfaces write failures with the cause attached', async () => {
      const broken = new SettingsStore(path.join(dir, 'missing', 'settings.json'), logger);
      const err = await broken.save(DEFAULT_SETTINGS).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SettingsError);
      expect(err).toHaveProperty('cause.code', 'ENOENT');
    });
  });
});
