/**
 * Access control routes.
 *
 * GET  /api/v1/access/owner            — Current owner
 * POST /api/v1/access/ownership        — Transfer ownership (owner)
 * POST /api/v1/access/roles/grant      — Grant a role (ADMIN)
 * POST /api/v1/access/roles/revoke     — Revoke a role (ADMIN)
 * GET  /api/v1/access/roles/:account   — Roles held by an account
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requireCaller } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";
import { RoleChangeSchema, TransferOwnershipSchema } from "../types/dto.js";

export function createAccessRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/owner", (c) => {
    return c.json({ data: { owner: c.get("service").owner() } });
  });

  routes.post(
    "/ownership",
    requireCaller(),
    validateBody(TransferOwnershipSchema),
    (c) => {
      const service = c.get("service");
      const { newOwner } = c.get("validatedBody");
      service.transferOwnership(c.get("caller"), newOwner);
      return c.json({ data: { owner: service.owner() } });
    },
  );

  routes.post("/roles/grant", requireCaller(), validateBody(RoleChangeSchema), (c) => {
    const service = c.get("service");
    const { account, role } = c.get("validatedBody");
    service.grantRole(c.get("caller"), account, role);
    return c.json({ data: { account, roles: service.rolesOf(account) } });
  });

  routes.post("/roles/revoke", requireCaller(), validateBody(RoleChangeSchema), (c) => {
    const service = c.get("service");
    const { account, role } = c.get("validatedBody");
    service.revokeRole(c.get("caller"), account, role);
    return c.json({ data: { account, roles: service.rolesOf(account) } });
  });

  routes.get("/roles/:account", (c) => {
    const account = c.req.param("account");
    return c.json({ data: { account, roles: c.get("service").rolesOf(account) } });
  });

  return routes;
}
