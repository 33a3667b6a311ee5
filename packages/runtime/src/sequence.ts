/**
 * Monotonic id allocator.
 *
 * Ids are never reused: a rolled-back call releases the id it took, but
 * a committed id stays allocated forever.
 */

import type { Journal } from "./journal.js";
import { JournaledValue } from "./journal.js";

export class Sequence {
  private readonly _next: JournaledValue<number>;
  private readonly _start: number;

  constructor(journal: Journal, start = 0) {
    this._start = start;
    this._next = new JournaledValue(journal, start);
  }

  /** Allocate and return the next id. */
  next(): number {
    const id = this._next.get();
    this._next.set(id + 1);
    return id;
  }

  /** The id the next call to `next()` will return. */
  peek(): number {
    return this._next.get();
  }

  /** Number of ids allocated so far. */
  get allocated(): number {
    return this._next.get() - this._start;
  }

  /** Whether `id` has been handed out. */
  contains(id: number): boolean {
    return Number.isInteger(id) && id >= this._start && id < this._next.get();
  }
}
