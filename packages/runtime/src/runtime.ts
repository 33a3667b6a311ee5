/**
 * Runtime — the reference execution environment.
 *
 * Provides what the ledger engines assume of their host:
 * - caller identity and attached value per call
 * - a monotonic timestamp per call
 * - atomic calls: a failed call leaves no trace (journal rollback)
 * - a native value-transfer primitive (NativeBank)
 * - an audit log: events staged during a call are appended to the
 *   EventStore only when the outermost call commits
 *
 * Calls are synchronous and serialized. An operation must not return a
 * promise: nothing may run between its validation and its effects.
 */

import { randomUUID } from "node:crypto";
import type { Address, DomainEvent } from "@concord/types";
import { InMemoryEventStore, LEDGER_EVENTS } from "@concord/event-store";
import type {
  EventStore,
  LedgerEventPayloads,
  LedgerEventType,
} from "@concord/event-store";
import type { Clock } from "./clock.js";
import { SystemClock } from "./clock.js";
import { LedgerError } from "./errors.js";
import { Journal } from "./journal.js";
import { NativeBank } from "./bank.js";

// =============================================================================
// Call Context
// =============================================================================

/**
 * What an engine operation sees of the call it runs in.
 *
 * `value` is the amount the caller attached. The runtime does not move
 * it; a payable operation collects it from the caller through the bank.
 */
export interface CallContext {
  readonly caller: Address;
  readonly value: bigint;
  /** Unix seconds */
  readonly timestamp: number;
  /** Shared by every event of the outermost call */
  readonly correlationId: string;

  /** Stage an event; it reaches the event store only if the call commits. */
  emit<K extends LedgerEventType>(
    streamId: string,
    type: K,
    payload: LedgerEventPayloads[K],
  ): void;
}

export interface ExecuteOptions {
  /** Native value attached to the call. Default: 0 */
  readonly value?: bigint;
}

export interface RuntimeOptions {
  readonly clock?: Clock;
  readonly eventStore?: EventStore;
}

interface PendingEvent {
  readonly streamId: string;
  readonly event: DomainEvent;
}

// =============================================================================
// Runtime
// =============================================================================

export class Runtime {
  readonly journal = new Journal();
  readonly bank: NativeBank;
  readonly clock: Clock;
  readonly eventStore: EventStore;

  private readonly _pending: PendingEvent[] = [];
  private _correlationId: string | undefined;

  constructor(options: RuntimeOptions = {}) {
    this.bank = new NativeBank(this.journal);
    this.clock = options.clock ?? new SystemClock();
    this.eventStore = options.eventStore ?? new InMemoryEventStore();
  }

  /**
   * Run one operation as an atomic call on behalf of `caller`.
   *
   * On success the call's mutations stand and, once the outermost call
   * returns, its events are appended to the event store. On failure every
   * mutation and staged event of the call is discarded and the error is
   * rethrown unchanged.
   */
  execute<T>(
    caller: Address,
    operation: (ctx: CallContext) => T,
    options: ExecuteOptions = {},
  ): T {
    const value = options.value ?? 0n;
    if (value < 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Attached value must be >= 0, got ${value}`);
    }

    const outermost = !this.journal.active;
    const outerCorrelationId = this._correlationId;
    const correlationId = outerCorrelationId ?? randomUUID();
    const frame = new CallFrame(this, caller, value, this.clock.now(), correlationId);

    this._correlationId = correlationId;
    let result: T;
    try {
      result = this._invoke(frame, operation);
    } finally {
      this._correlationId = outerCorrelationId;
    }

    if (outermost) {
      this._flush();
    }
    return result;
  }

  /** Number of events staged by calls that have not yet committed. */
  get pendingEvents(): number {
    return this._pending.length;
  }

  /** @internal */
  stage(streamId: string, event: DomainEvent): void {
    this._pending.push({ streamId, event });
    this.journal.record(() => {
      this._pending.pop();
    });
  }

  private _invoke<T>(frame: CallFrame, operation: (ctx: CallContext) => T): T {
    const mark = this.journal.begin();
    try {
      const result = operation(frame);
      this.journal.commit();
      return result;
    } catch (err) {
      this.journal.rollback(mark);
      throw err;
    }
  }

  private _flush(): void {
    const batch = this._pending.splice(0);
    for (const { streamId, event } of batch) {
      this.eventStore.append(streamId, [event]);
    }
  }
}

// =============================================================================
// Call Frame
// =============================================================================

class CallFrame implements CallContext {
  constructor(
    private readonly runtime: Runtime,
    readonly caller: Address,
    readonly value: bigint,
    readonly timestamp: number,
    readonly correlationId: string,
  ) {}

  emit<K extends LedgerEventType>(
    streamId: string,
    type: K,
    payload: LedgerEventPayloads[K],
  ): void {
    this.runtime.stage(streamId, {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date(this.timestamp * 1000).toISOString(),
        actor: this.caller,
        correlationId: this.correlationId,
        source: LEDGER_EVENTS[type],
      },
      payload,
    });
  }
}
