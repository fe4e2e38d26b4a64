import type {
  ActivePhase,
  Clock,
  CompletionEvent,
  EngineSnapshot,
  Settings,
  TimerPhase,
} from '../../shared/types';
import { SettingsError } from '../../shared/errors';
import { validateSettings } from './settingsSchema';
import type { SessionStats } from './SessionStats';

interface EngineEvents {
  tick: EngineSnapshot;
  phaseChange: EngineSnapshot;
  complete: CompletionEvent;
}

type EngineEventType = keyof EngineEvents;
type EngineListener<E extends EngineEventType> = (payload: EngineEvents[E]) => void;

export function completionMessage(ended: ActivePhase): string {
  return ended === 'work' ? "It's time to take a break!" : "It's time to focus!";
}

/**
 * Work / break / long-break state machine.
 *
 * The countdown is driven by wall-clock deltas between ticks rather than a
 * fixed decrement per tick, so late or skipped ticks (a suspended host, a
 * busy event loop) still land on the right remaining time.
 */
export class TimerEngine {
  private _phase: TimerPhase = 'idle';
  private _remainingSeconds: number;
  private _totalSeconds: number;
  private _isRunning = false;
  private _completedSinceLongBreak = 0;
  private _lastTickAt: number | null = null;
  private _listeners: { [E in EngineEventType]: Set<EngineListener<E>> } = {
    tick: new Set(),
    phaseChange: new Set(),
    complete: new Set(),
  };

  constructor(
    private _settings: Settings,
    private readonly stats: SessionStats,
    private readonly clock: Clock = Date.now,
  ) {
    assertValid(_settings);
    this._totalSeconds = _settings.workMinutes * 60;
    this._remainingSeconds = this._totalSeconds;
  }

  on<E extends EngineEventType>(event: E, fn: EngineListener<E>): void {
    this._listeners[event].add(fn);
  }

  off<E extends EngineEventType>(event: E, fn: EngineListener<E>): void {
    this._listeners[event].delete(fn);
  }

  private _emit<E extends EngineEventType>(event: E, payload: EngineEvents[E]): void {
    this._listeners[event].forEach(fn => fn(payload));
  }

  snapshot(): EngineSnapshot {
    return {
      phase: this._phase,
      remainingSeconds: this._remainingSeconds,
      totalSeconds: this._totalSeconds,
      isRunning: this._isRunning,
      progress: this.progress,
      completedSinceLongBreak: this._completedSinceLongBreak,
    };
  }

  get phase(): TimerPhase { return this._phase; }
  get remainingSeconds(): number { return this._remainingSeconds; }
  get totalSeconds(): number { return this._totalSeconds; }
  get isRunning(): boolean { return this._isRunning; }
  get completedSinceLongBreak(): number { return this._completedSinceLongBreak; }
  get settings(): Settings { return { ...this._settings }; }

  get progress(): number {
    if (this._totalSeconds <= 0) return 0;
    return (this._totalSeconds - this._remainingSeconds) / this._totalSeconds;
  }

  /** New values apply from the next phase start; an idle display is refreshed now. */
  updateSettings(settings: Settings): void {
    assertValid(settings);
    this._settings = { ...settings };
    if (this._phase === 'idle') {
      this._totalSeconds = settings.workMinutes * 60;
      this._remainingSeconds = this._totalSeconds;
      this._emit('phaseChange', this.snapshot());
    }
  }

  startWork(now: number = this.clock()): void {
    if (this._isRunning) this._halt();
    this.stats.startSession(now);
    this._begin('work', this._settings.workMinutes * 60, now);
  }

  startBreak(now: number = this.clock()): void {
    if (this._isRunning) this._halt();
    if (this._completedSinceLongBreak >= this._settings.sessionsBeforeLongBreak) {
      this._completedSinceLongBreak = 0;
      this._begin('longBreak', this._settings.longBreakMinutes * 60, now);
    } else {
      this._begin('break', this._settings.breakMinutes * 60, now);
    }
  }

  reset(): void {
    this._halt();
    this._emit('phaseChange', this.snapshot());
  }

  /**
   * Advance the countdown by the whole seconds elapsed since the last tick
   * and return the fraction of the phase that has elapsed. No-op while
   * stopped.
   */
  tick(now: number = this.clock()): number {
    if (!this._isRunning || this._lastTickAt === null) return this.progress;

    const deltaMs = now - this._lastTickAt;
    if (deltaMs < 0) {
      // Clock moved backwards: re-anchor, count nothing.
      this._lastTickAt = now;
      return this.progress;
    }

    const elapsed = Math.floor(deltaMs / 1000);
    // Keep the sub-second remainder for the next tick.
    this._lastTickAt += elapsed * 1000;
    this._remainingSeconds = Math.max(0, this._remainingSeconds - elapsed);

    const progress = this.progress;
    const ticked = this.snapshot();
    // The phase completes before tick listeners run.
    if (this._remainingSeconds === 0) this._complete(now);
    this._emit('tick', ticked);
    return progress;
  }

  private _begin(phase: ActivePhase, seconds: number, now: number): void {
    this._phase = phase;
    this._totalSeconds = seconds;
    this._remainingSeconds = seconds;
    this._isRunning = true;
    this._lastTickAt = now;
    this._emit('phaseChange', this.snapshot());
  }

  /** Back to idle without notifying listeners. */
  private _halt(): void {
    this._isRunning = false;
    this._phase = 'idle';
    this._totalSeconds = this._settings.workMinutes * 60;
    this._remainingSeconds = this._totalSeconds;
    this._lastTickAt = null;
    this.stats.abandonSession();
  }

  private _complete(now: number): void {
    const ended = this._phase;
    if (ended === 'idle') return;

    if (ended === 'work') {
      this._completedSinceLongBreak++;
      this.stats.endSession(now);
    }

    this._halt();
    if (this._settings.autoAdvance) {
      if (ended === 'work') this.startBreak(now);
      else this.startWork(now);
    } else {
      this._emit('phaseChange', this.snapshot());
    }

    this._emit('complete', {
      endedPhase: ended,
      message: completionMessage(ended),
      snapshot: this.snapshot(),
    });
  }
}

function assertValid(settings: Settings): void {
  const issues = validateSettings(settings);
  if (issues.length > 0) {
    throw new SettingsError(`Invalid timer settings: ${issues.join('; ')}`);
  }
}
