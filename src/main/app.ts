import type { Clock, CompletionEvent, EngineSnapshot, Settings } from '../shared/types';
import { TimerEngine } from '../core/state/TimerEngine';
import { SessionStats } from '../core/state/SessionStats';

export interface Scheduler {
  readonly active: boolean;
  start(onTick: (now: number) => void): void;
  stop(): void;
}

export interface FocusTimerDeps {
  settings: Settings;
  scheduler: Scheduler;
  onComplete: (event: CompletionEvent) => void;
  clock?: Clock;
}

export interface FocusTimer {
  engine: TimerEngine;
  stats: SessionStats;
  dispose(): void;
}

/**
 * One engine, one stats object, one scheduler. The scheduler runs only
 * while the engine is running.
 */
export function createFocusTimer(deps: FocusTimerDeps): FocusTimer {
  const clock = deps.clock ?? Date.now;
  const stats = new SessionStats(clock);
  const engine = new TimerEngine(deps.settings, stats, clock);
  const { scheduler } = deps;

  const syncScheduler = (snap: EngineSnapshot): void => {
    if (snap.isRunning) {
      scheduler.start(now => { engine.tick(now); });
    } else {
      scheduler.stop();
    }
  };

  engine.on('phaseChange', syncScheduler);
  engine.on('complete', deps.onComplete);

  return {
    engine,
    stats,
    dispose: () => {
      engine.off('phaseChange', syncScheduler);
      engine.off('complete', deps.onComplete);
      scheduler.stop();
    },
  };
}
