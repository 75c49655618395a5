/**
 * Request logging middleware.
 *
 * Hands one entry per request to a log callback; main.ts routes it to
 * pino at the entry's level.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** info for 2xx/3xx, warn for 4xx, error for 5xx */
  readonly level: RequestLogLevel;
}

function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) {
    return "error";
  }
  return status >= 400 ? "warn" : "info";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      level: levelForStatus(c.res.status),
    });
  };
}
