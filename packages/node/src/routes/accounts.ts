/**
 * Account routes.
 *
 * POST /api/v1/accounts            : Register an account (linked or not)
 * GET  /api/v1/accounts/:id        : Get an account and its certificate ids
 * PUT  /api/v1/accounts/:id/wallet : Link a wallet to an unlinked account
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { LinkWalletSchema, RegisterAccountSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { parseBody } from "../middleware/validate.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseBody(c, RegisterAccountSchema);
    const account = c.get("service").registerAccount(body.id, body.owner);
    return c.json({ data: account }, 201);
  });

  routes.get("/:id", (c) => {
    const id = c.req.param("id");
    const account = c.get("service").getAccount(id);

    if (account === undefined) {
      throw new ApiError("NOT_FOUND", `Account '${id}' not found`);
    }

    return c.json({ data: account });
  });

  routes.put("/:id/wallet", async (c) => {
    const body = await parseBody(c, LinkWalletSchema);
    const account = c.get("service").linkWallet(c.req.param("id"), body.owner);
    return c.json({ data: account });
  });

  return routes;
}
