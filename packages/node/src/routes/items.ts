/**
 * Registry item routes.
 *
 * POST /api/v1/items                 — Register an item
 * GET  /api/v1/items/:id             — Get an item
 * POST /api/v1/items/:id/moderate    — Set verified/active (CURATOR)
 * POST /api/v1/items/:id/deactivate  — Deactivate own item (submitter)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requireCaller } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";
import { IdParamSchema, ModerateItemSchema, RegisterItemSchema } from "../types/dto.js";

export function createItemRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requireCaller(), validateBody(RegisterItemSchema), (c) => {
    const { uri, category } = c.get("validatedBody");
    const item = c.get("service").registerItem(c.get("caller"), uri, category);
    return c.json({ data: item }, 201);
  });

  routes.get("/:id", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    return c.json({ data: c.get("service").getItem(id) });
  });

  routes.post("/:id/moderate", requireCaller(), validateBody(ModerateItemSchema), (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const { verified, active } = c.get("validatedBody");
    const item = c.get("service").moderateItem(c.get("caller"), id, verified, active);
    return c.json({ data: item });
  });

  routes.post("/:id/deactivate", requireCaller(), (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const item = c.get("service").deactivateOwnItem(c.get("caller"), id);
    return c.json({ data: item });
  });

  return routes;
}
