/**
 * Caller identity middleware.
 *
 * Mutating routes act on behalf of the identity in X-Caller-Address.
 * The service trusts whatever sits in front of it to have authenticated
 * that identity; it only insists that one is named and that it is not
 * a reserved identity (the null address or the treasury account).
 */

import type { MiddlewareHandler } from "hono";
import { isAccount } from "@concord/types";
import type { Address } from "@concord/types";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Address";

export interface CallerEnv {
  Variables: {
    caller: Address;
  };
}

export function requireCaller(): MiddlewareHandler<CallerEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER)?.trim();
    if (caller === undefined || caller === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Missing ${CALLER_HEADER} header`),
        401,
      );
    }

    if (!isAccount(caller)) {
      return c.json(
        createErrorEnvelope(
          "UNAUTHORIZED",
          `Reserved identity '${caller}' cannot call the ledger`,
        ),
        401,
      );
    }

    c.set("caller", caller);
    await next();
  };
}
