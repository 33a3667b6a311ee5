/**
 * Call timestamps, in unix seconds.
 */

export interface Clock {
  now(): number;
}

/**
 * Wall-clock time that never goes backwards, even if the host clock is
 * adjusted between calls.
 */
export class SystemClock implements Clock {
  private _last = 0;

  now(): number {
    const current = Math.floor(Date.now() / 1000);
    this._last = Math.max(this._last, current);
    return this._last;
  }
}

/** Clock driven by hand, for tests and simulations. */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 1_700_000_000) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  advance(seconds: number): void {
    if (seconds < 0) {
      throw new Error(`Clock cannot move backwards (advance by ${seconds})`);
    }
    this._now += seconds;
  }
}
