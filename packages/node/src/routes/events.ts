/**
 * Event log routes.
 *
 * GET /api/v1/events            — Committed events in global order
 * GET /api/v1/events/integrity  — Hash chain verification
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events?afterPosition=&limit=
  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const { afterPosition, limit } = queryResult.data;
    // Fetch one extra to detect hasMore
    const page = c.get("service").readEvents({
      fromPosition: afterPosition + 1,
      maxCount: limit + 1,
    });
    const hasMore = page.length > limit;
    const data = hasMore ? page.slice(0, limit) : page;
    const last = data.at(-1);

    return c.json({
      data,
      pagination: {
        nextPosition: hasMore && last !== undefined ? last.globalPosition : null,
        hasMore,
      },
    });
  });

  routes.get("/integrity", (c) => {
    return c.json({ data: c.get("service").verifyIntegrity() });
  });

  return routes;
}
