/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ForwardingService } from "../services/forwarding-service.js";

/**
 * Hono environment type for the splitrelay app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Forwarding service for the configured ledger account */
    service: ForwardingService;
  };
}

/**
 * Added to the environment by validateBody() for the handlers after it.
 */
export interface ValidatedBodyEnv<T> {
  Variables: {
    validatedBody: T;
  };
}
