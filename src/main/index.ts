import type { Settings } from '../shared/types';
import { createLogger } from '../shared/logger';
import { loadConfig } from './config';
import { createFocusTimer } from './app';
import { SettingsStore } from '../core/state/SettingsStore';
import { TickScheduler } from '../core/scheduler/TickScheduler';
import { SoundPlayer } from '../core/audio/SoundPlayer';
import { CompletionNotifier } from '../core/notify/CompletionNotifier';
import { TerminalDisplay } from '../ui/TerminalDisplay';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  // ── Settings ──────────────────────────────────────
  const store = new SettingsStore(config.settingsFile, logger);
  const settings = await store.load();

  // ── UI ────────────────────────────────────────────
  const display = new TerminalDisplay(
    process.stdin,
    process.stdout,
    process.platform === 'darwin' ? 'macos' : 'other',
    {
      onStartWork: () => timer.engine.startWork(),
      onStartBreak: () => timer.engine.startBreak(),
      onReset: () => timer.engine.reset(),
      onToggleSound: () => {
        const current = timer.engine.settings;
        applySettings({ ...current, soundEnabled: !current.soundEnabled });
      },
      onToggleAutoAdvance: () => {
        const current = timer.engine.settings;
        applySettings({ ...current, autoAdvance: !current.autoAdvance });
      },
      onQuit: () => shutdown(),
    },
  );
  const notifier = new CompletionNotifier(new SoundPlayer(logger), display, logger, settings.soundEnabled);

  // ── State ─────────────────────────────────────────
  const timer = createFocusTimer({
    settings,
    scheduler: new TickScheduler(logger, config.tickMs),
    onComplete: (event) => notifier.notify(event),
  });
  const { engine, stats } = timer;

  const refresh = (): void => display.update(engine.snapshot(), stats.snapshot());
  engine.on('tick', refresh);
  engine.on('phaseChange', refresh);
  engine.on('complete', refresh);

  function applySettings(next: Settings): void {
    engine.updateSettings(next);
    notifier.setSoundEnabled(next.soundEnabled);
    display.setToggles(next);
    store.save(next).catch((err: unknown) => {
      const reason = err instanceof Error ? err.message : String(err);
      logger.error('Settings were not saved', err);
      display.showMessage(`Could not save settings: ${reason}`).catch((promptErr: unknown) => {
        logger.error('Save failure message failed', promptErr);
      });
    });
  }

  function shutdown(): void {
    timer.dispose();
    display.detach();
    // A toggle pressed just before quitting may still be writing.
    void store.flush().then(() => process.exit(0));
  }

  display.attach();
  display.setToggles(settings);
  refresh();
  logger.info(`Loaded settings from ${store.path}`);
}

main().catch((err) => {
  console.error('Failed to start focus timer:', err);
  process.exitCode = 1;
});
