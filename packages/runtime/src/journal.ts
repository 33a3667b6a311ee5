/**
 * Journal — undo log for atomic calls.
 *
 * Every mutation made inside a call frame records a closure that
 * reverses it. A failed frame unwinds its closures newest-first, so the
 * ledger returns to exactly the state it had when the frame began.
 *
 * Frames nest: a value-transfer hook may call back into the runtime.
 * The undo log is discarded once the outermost frame commits.
 */

export type Undo = () => void;

export class Journal {
  private readonly _undos: Undo[] = [];
  private _depth = 0;

  /** True while at least one call frame is open. */
  get active(): boolean {
    return this._depth > 0;
  }

  /** Record how to reverse a mutation. No-op outside a frame. */
  record(undo: Undo): void {
    if (this._depth > 0) {
      this._undos.push(undo);
    }
  }

  /** Open a frame; the returned mark identifies its first undo entry. */
  begin(): number {
    this._depth++;
    return this._undos.length;
  }

  commit(): void {
    this._close();
  }

  /** Reverse every mutation recorded since `mark`, then close the frame. */
  rollback(mark: number): void {
    while (this._undos.length > mark) {
      const undo = this._undos.pop();
      undo?.();
    }
    this._close();
  }

  private _close(): void {
    if (this._depth === 0) {
      throw new Error("Journal frame closed without being opened");
    }
    this._depth--;
    if (this._depth === 0) {
      this._undos.length = 0;
    }
  }
}

// =============================================================================
// Journaled containers
// =============================================================================

/** Map whose writes and deletes are reversible through the journal. */
export class JournaledMap<K, V extends NonNullable<unknown>> {
  private readonly _entries = new Map<K, V>();

  constructor(private readonly journal: Journal) {}

  get size(): number {
    return this._entries.size;
  }

  has(key: K): boolean {
    return this._entries.has(key);
  }

  get(key: K): V | undefined {
    return this._entries.get(key);
  }

  set(key: K, value: V): void {
    const previous = this._entries.get(key);
    this._entries.set(key, value);
    this.journal.record(() => {
      if (previous === undefined) {
        this._entries.delete(key);
      } else {
        this._entries.set(key, previous);
      }
    });
  }

  delete(key: K): void {
    const previous = this._entries.get(key);
    if (previous === undefined) return;
    this._entries.delete(key);
    this.journal.record(() => {
      this._entries.set(key, previous);
    });
  }
}

/** Single reversible value (e.g. the current owner or a fee setting). */
export class JournaledValue<T> {
  private _value: T;

  constructor(
    private readonly journal: Journal,
    initial: T,
  ) {
    this._value = initial;
  }

  get(): T {
    return this._value;
  }

  set(value: T): void {
    const previous = this._value;
    this._value = value;
    this.journal.record(() => {
      this._value = previous;
    });
  }
}
