export type TimerPhase = 'idle' | 'work' | 'break' | 'longBreak';

export type ActivePhase = Exclude<TimerPhase, 'idle'>;

export type Platform = 'macos' | 'other';

export interface Settings {
  workMinutes: number;
  breakMinutes: number;
  longBreakMinutes: number;
  sessionsBeforeLongBreak: number;
  soundEnabled: boolean;
  autoAdvance: boolean;
}

export interface EngineSnapshot {
  phase: TimerPhase;
  remainingSeconds: number;
  totalSeconds: number;
  isRunning: boolean;
  progress: number; // 0..1, fraction elapsed
  completedSinceLongBreak: number;
}

export interface CompletionEvent {
  endedPhase: ActivePhase;
  message: string;
  snapshot: EngineSnapshot; // state after the transition
}

export interface StatsSnapshot {
  completedPomodoros: number;
  totalFocusMinutes: number;
}

/** Epoch milliseconds. */
export type Clock = () => number;
