/**
 * @concord/runtime — Reference execution environment for the ledger engines.
 *
 * Provides:
 * - Runtime: atomic, serialized calls with caller identity, attached value,
 *   monotonic timestamps and journaled rollback
 * - NativeBank: native value balances with transfer hooks
 * - ReentrancyGuard, Sequence, AccountIndex: engine building blocks
 * - LedgerError: the failure taxonomy shared by every engine
 *
 * @packageDocumentation
 */

export { Runtime } from "./runtime.js";
export type { CallContext, ExecuteOptions, RuntimeOptions } from "./runtime.js";

export { Journal, JournaledMap, JournaledValue } from "./journal.js";
export type { Undo } from "./journal.js";

export { SystemClock, ManualClock } from "./clock.js";
export type { Clock } from "./clock.js";

export { NativeBank } from "./bank.js";
export type { Transfer, TransferHook } from "./bank.js";

export { ReentrancyGuard } from "./reentrancy-guard.js";
export { Sequence } from "./sequence.js";
export { AccountIndex } from "./account-index.js";

export {
  LedgerError,
  ERROR_CATEGORIES,
  isRetryable,
  isLedgerError,
} from "./errors.js";
export type { LedgerErrorCode, LedgerErrorCategory } from "./errors.js";
