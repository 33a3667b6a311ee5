/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * LedgerError maps by category, so every code in a category shares a
 * status. The precise code is always in the envelope.
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import { isLedgerError, isRetryable } from "@concord/runtime";
import type { LedgerErrorCategory } from "@concord/runtime";
import { EventStoreError } from "@concord/event-store";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 402 | 403 | 404 | 409 | 422 | 500;

export const CATEGORY_STATUS: Readonly<Record<LedgerErrorCategory, ErrorStatus>> = {
  UNAUTHORIZED: 403,
  NOT_FOUND: 404,
  INVALID_INPUT: 400,
  INVALID_STATE: 409,
  INSUFFICIENT_FEE: 402,
  REENTRANT: 409,
  TRANSFER_FAILED: 422,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (isLedgerError(err)) {
    const envelope = createErrorEnvelope(err.code, err.message, {
      category: err.category,
      retryable: isRetryable(err),
    });
    return c.json(envelope, CATEGORY_STATUS[err.category]);
  }

  if (err instanceof EventStoreError) {
    return c.json(createErrorEnvelope(err.code, err.message), 400);
  }

  if (err instanceof ZodError) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        issues: err.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      }),
      400,
    );
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
