import { ConfigError } from "../errors";

export type ClockState = "running" | "paused";

/**
 * Decides when the next automatic generation is due, independent of frame
 * rate. A tick is due once `tickIntervalMs` has elapsed since the last one
 * fired, and never while paused.
 *
 * Timestamps are monotonic milliseconds (e.g. performance.now() or the rAF
 * timestamp).
 */
export class SimulationClock {
  readonly tickIntervalMs: number;

  private _state: ClockState = "running";
  private _lastTickTimestamp: number;

  constructor(tickIntervalMs: number, now = 0) {
    if (!Number.isFinite(tickIntervalMs) || tickIntervalMs <= 0) {
      throw new ConfigError(`Tick interval must be a positive number of milliseconds, got ${tickIntervalMs}`);
    }
    this.tickIntervalMs = tickIntervalMs;
    this._lastTickTimestamp = now;
  }

  get state(): ClockState {
    return this._state;
  }

  get paused(): boolean {
    return this._state === "paused";
  }

  get lastTickTimestamp(): number {
    return this._lastTickTimestamp;
  }

  /** Flips between running and paused. Calling it twice restores the original state. */
  togglePause(): ClockState {
    this._state = this._state === "running" ? "paused" : "running";
    return this._state;
  }

  isTickDue(now: number): boolean {
    return !this.paused && now - this._lastTickTimestamp >= this.tickIntervalMs;
  }

  /** Restarts the interval from `now`, whether or not the caller advances a generation. */
  fireTick(now: number): void {
    this._lastTickTimestamp = now;
  }

  /** Fires and returns true if a tick is due at `now`; otherwise returns false. */
  consumeTick(now: number): boolean {
    if (!this.isTickDue(now)) return false;
    this.fireTick(now);
    return true;
  }

  /** Restarts the interval without changing the running/paused state. */
  reset(now: number): void {
    this._lastTickTimestamp = now;
  }
}
