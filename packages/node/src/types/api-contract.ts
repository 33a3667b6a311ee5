/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ConcordService } from "../services/concord-service.js";

/**
 * Hono environment type for the Concord app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 * Per-route variables (caller, validatedBody) are declared by the
 * middleware that sets them.
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger service (set once for every /api request) */
    service: ConcordService;
  };
}
