/**
 * Fee treasury routes.
 *
 * GET  /api/v1/treasury           — Fee, balance and account
 * PUT  /api/v1/treasury/fee       — Set the storage fee (owner)
 * POST /api/v1/treasury/withdraw  — Withdraw the whole balance (owner)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requireCaller } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";
import { SetStorageFeeSchema, toTreasuryDto } from "../types/dto.js";

export function createTreasuryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: toTreasuryDto(c.get("service").treasuryState()) });
  });

  routes.put("/fee", requireCaller(), validateBody(SetStorageFeeSchema), (c) => {
    const { fee } = c.get("validatedBody");
    const state = c.get("service").setStorageFee(c.get("caller"), fee);
    return c.json({ data: toTreasuryDto(state) });
  });

  routes.post("/withdraw", requireCaller(), (c) => {
    const service = c.get("service");
    const amount = service.withdrawFees(c.get("caller"));
    return c.json({
      data: { amount: amount.toString(), treasury: toTreasuryDto(service.treasuryState()) },
    });
  });

  return routes;
}
