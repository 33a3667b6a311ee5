/**
 * Per-account discovery routes.
 *
 * GET /api/v1/accounts/:account/items      — Items the account submitted
 * GET /api/v1/accounts/:account/documents  — Documents the account created
 * GET /api/v1/accounts/:account/signing    — Documents naming it as signer
 * GET /api/v1/accounts/:account/balance    — Native balance
 *
 * Reads only. `concord:treasury` is a reserved account: its balance is
 * the collected fees (also under GET /api/v1/treasury), and it can never
 * act as a caller, hold a role or become the owner.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:account/items", (c) => {
    return c.json({ data: c.get("service").getItemsOf(c.req.param("account")) });
  });

  routes.get("/:account/documents", (c) => {
    return c.json({ data: c.get("service").getUserDocuments(c.req.param("account")) });
  });

  routes.get("/:account/signing", (c) => {
    return c.json({ data: c.get("service").getSignerDocuments(c.req.param("account")) });
  });

  routes.get("/:account/balance", (c) => {
    const account = c.req.param("account");
    const balance = c.get("service").balanceOf(account);
    return c.json({ data: { account, balance: balance.toString() } });
  });

  return routes;
}
