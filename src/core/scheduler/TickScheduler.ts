import type { Clock } from '../../shared/types';
import type { Logger } from '../../shared/logger';

export const DEFAULT_TICK_MS = 1000;

type TickCallback = (now: number) => void;

/**
 * Cooperative ticker: one setTimeout at a time, re-armed after each
 * callback for as long as it is active.
 */
export class TickScheduler {
  private _handle: ReturnType<typeof setTimeout> | null = null;
  private _onTick: TickCallback | null = null;

  constructor(
    private readonly logger: Logger,
    private readonly intervalMs: number = DEFAULT_TICK_MS,
    private readonly clock: Clock = Date.now,
  ) {}

  get active(): boolean { return this._onTick !== null; }

  start(onTick: TickCallback): void {
    if (this._onTick) return;
    this._onTick = onTick;
    this._arm();
  }

  stop(): void {
    if (this._handle) clearTimeout(this._handle);
    this._handle = null;
    this._onTick = null;
  }

  private _arm(): void {
    this._handle = setTimeout(this._fire, this.intervalMs);
  }

  private _fire = (): void => {
    const onTick = this._onTick;
    this._handle = null;
    if (!onTick) return;

    try {
      onTick(this.clock());
    } catch (err) {
      this.logger.error('Tick callback failed', err);
    }

    // The callback may have stopped or restarted the scheduler.
    if (this._onTick === onTick && this._handle === null) this._arm();
  };
}
