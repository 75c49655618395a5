/**
 * Directory routes: read-only views of the ledger account.
 *
 * GET /api/v1/me       — The authenticated user
 * GET /api/v1/friends  — Their friends
 * GET /api/v1/groups   — Their groups
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createDirectoryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/me", async (c) => {
    return c.json({ data: await c.get("service").principal() });
  });

  routes.get("/friends", async (c) => {
    const friends = await c.get("service").friends();
    return c.json({ data: friends, total: friends.length });
  });

  routes.get("/groups", async (c) => {
    const groups = await c.get("service").groups();
    return c.json({ data: groups, total: groups.length });
  });

  return routes;
}
