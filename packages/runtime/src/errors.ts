/**
 * Ledger error taxonomy.
 *
 * Every failed operation throws a LedgerError naming the precondition
 * that was violated (`code`) and its broad class (`category`). The
 * category tells a caller whether retrying with different input can
 * help.
 */

// =============================================================================
// Codes & Categories
// =============================================================================

export type LedgerErrorCategory =
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "INVALID_INPUT"
  | "INVALID_STATE"
  | "INSUFFICIENT_FEE"
  | "REENTRANT"
  | "TRANSFER_FAILED";

export type LedgerErrorCode =
  // Unauthorized
  | "NOT_ADMIN"
  | "NOT_OWNER"
  | "NOT_CURATOR"
  | "NOT_SUBMITTER"
  | "NOT_CREATOR"
  | "NOT_REQUIRED_SIGNER"
  // Not found
  | "ITEM_NOT_FOUND"
  | "DOCUMENT_NOT_FOUND"
  | "DOCUMENT_INACTIVE"
  // Invalid input
  | "INVALID_ACCOUNT"
  | "EMPTY_URI"
  | "EMPTY_DOCUMENT_HASH"
  | "EMPTY_SIGNER_LIST"
  | "INVALID_SIGNER"
  | "INVALID_AMOUNT"
  // Invalid state
  | "ALREADY_GRANTED"
  | "NOT_GRANTED"
  | "ALREADY_INACTIVE"
  | "ALREADY_COMPLETED"
  | "ALREADY_SIGNED"
  // Fees, re-entry, transfers
  | "INSUFFICIENT_FEE"
  | "REENTRANT_CALL"
  | "INSUFFICIENT_BALANCE"
  | "TRANSFER_REJECTED";

export const ERROR_CATEGORIES: Readonly<Record<LedgerErrorCode, LedgerErrorCategory>> = {
  NOT_ADMIN: "UNAUTHORIZED",
  NOT_OWNER: "UNAUTHORIZED",
  NOT_CURATOR: "UNAUTHORIZED",
  NOT_SUBMITTER: "UNAUTHORIZED",
  NOT_CREATOR: "UNAUTHORIZED",
  NOT_REQUIRED_SIGNER: "UNAUTHORIZED",
  ITEM_NOT_FOUND: "NOT_FOUND",
  DOCUMENT_NOT_FOUND: "NOT_FOUND",
  DOCUMENT_INACTIVE: "NOT_FOUND",
  INVALID_ACCOUNT: "INVALID_INPUT",
  EMPTY_URI: "INVALID_INPUT",
  EMPTY_DOCUMENT_HASH: "INVALID_INPUT",
  EMPTY_SIGNER_LIST: "INVALID_INPUT",
  INVALID_SIGNER: "INVALID_INPUT",
  INVALID_AMOUNT: "INVALID_INPUT",
  ALREADY_GRANTED: "INVALID_STATE",
  NOT_GRANTED: "INVALID_STATE",
  ALREADY_INACTIVE: "INVALID_STATE",
  ALREADY_COMPLETED: "INVALID_STATE",
  ALREADY_SIGNED: "INVALID_STATE",
  INSUFFICIENT_FEE: "INSUFFICIENT_FEE",
  REENTRANT_CALL: "REENTRANT",
  INSUFFICIENT_BALANCE: "TRANSFER_FAILED",
  TRANSFER_REJECTED: "TRANSFER_FAILED",
};

const RETRYABLE = new Set<LedgerErrorCategory>([
  "INVALID_INPUT",
  "INSUFFICIENT_FEE",
  "TRANSFER_FAILED",
]);

// =============================================================================
// Error
// =============================================================================

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly category: LedgerErrorCategory;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
  }
}

/**
 * Whether a caller may succeed by adjusting its input (a different
 * argument, a larger attached value, more funds) and calling again.
 */
export function isRetryable(error: LedgerError): boolean {
  return RETRYABLE.has(error.category);
}

export function isLedgerError(value: unknown): value is LedgerError {
  return value instanceof LedgerError;
}
