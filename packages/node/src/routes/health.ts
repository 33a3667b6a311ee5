/**
 * Health check routes.
 *
 * GET /health — Liveness probe, plus event log position and chain status
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ConcordService } from "../services/concord-service.js";

export function createHealthRoutes(service: ConcordService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const integrity = service.verifyIntegrity();
    return c.json(
      {
        status: integrity.valid ? "ok" : "degraded",
        events: service.eventCount(),
        timestamp: new Date().toISOString(),
      },
      integrity.valid ? 200 : 503,
    );
  });

  return routes;
}
