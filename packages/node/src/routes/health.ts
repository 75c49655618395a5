/**
 * Health check route.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 *
 * The ledger is not contacted: its availability is reported by the
 * API routes that need it.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ForwardingService } from "../services/forwarding-service.js";

export function createHealthRoutes(service: ForwardingService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      extraction: service.canExtract ? "enabled" : "disabled",
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
