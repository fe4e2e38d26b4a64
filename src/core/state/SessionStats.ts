import type { Clock, StatsSnapshot } from '../../shared/types';

/** Completed work sessions and accumulated focus time for the process lifetime. */
export class SessionStats {
  private _completedPomodoros = 0;
  private _totalFocusSeconds = 0;
  private _activeSessionStart: number | null = null;

  constructor(private readonly clock: Clock = Date.now) {}

  get completedPomodoros(): number { return this._completedPomodoros; }
  get totalFocusSeconds(): number { return this._totalFocusSeconds; }
  get activeSessionStart(): number | null { return this._activeSessionStart; }
  get hasActiveSession(): boolean { return this._activeSessionStart !== null; }

  /** Ignored while a session is already active, so its elapsed time is not lost. */
  startSession(now: number = this.clock()): void {
    if (this._activeSessionStart !== null) return;
    this._activeSessionStart = now;
  }

  endSession(now: number = this.clock()): void {
    if (this._activeSessionStart === null) return;
    const elapsedMs = Math.max(0, now - this._activeSessionStart);
    this._totalFocusSeconds += Math.floor(elapsedMs / 1000);
    this._completedPomodoros++;
    this._activeSessionStart = null;
  }

  /** Drop an interrupted session without counting it. */
  abandonSession(): void {
    this._activeSessionStart = null;
  }

  snapshot(): StatsSnapshot {
    return {
      completedPomodoros: this._completedPomodoros,
      totalFocusMinutes: Math.floor(this._totalFocusSeconds / 60),
    };
  }
}
