/**
 * Document attestation routes.
 *
 * POST /api/v1/documents                          — Create (fee in `value`)
 * GET  /api/v1/documents/:id                      — Document details
 * POST /api/v1/documents/:id/sign                 — Sign as the caller
 * POST /api/v1/documents/:id/revoke               — Revoke (creator)
 * GET  /api/v1/documents/:id/signers/:account     — Signer status
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requireCaller } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";
import { CreateDocumentSchema, IdParamSchema } from "../types/dto.js";

export function createDocumentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requireCaller(), validateBody(CreateDocumentSchema), (c) => {
    const { documentHash, requiredSigners, value } = c.get("validatedBody");
    const document = c
      .get("service")
      .createDocument(c.get("caller"), documentHash, requiredSigners, value);
    return c.json({ data: document }, 201);
  });

  routes.get("/:id", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    return c.json({ data: c.get("service").getDocument(id) });
  });

  routes.post("/:id/sign", requireCaller(), (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    return c.json({ data: c.get("service").signDocument(c.get("caller"), id) });
  });

  routes.post("/:id/revoke", requireCaller(), (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    return c.json({ data: c.get("service").revokeDocument(c.get("caller"), id) });
  });

  routes.get("/:id/signers/:account", (c) => {
    const id = IdParamSchema.parse(c.req.param("id"));
    const account = c.req.param("account");
    return c.json({ data: { account, ...c.get("service").signerStatus(id, account) } });
  });

  return routes;
}
