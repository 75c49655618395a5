/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Errors from the converter, extractor and ledger SDK all carry a
 * string `code`; known codes map to an HTTP status, anything else is
 * reported as a 500 without its message.
 */

import type { Context } from "hono";
import { InputValidationError } from "@splitrelay/converter";
import { ExternalServiceError } from "@splitrelay/sdk";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Error Code → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 422 | 500 | 502 | 503 | 504;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Caller input
  VALIDATION_ERROR: 400,
  INPUT_VALIDATION: 400,
  INVALID_EMAIL: 400,

  // Conversion outcomes
  BALANCE_INVARIANT: 422,
  LOW_CONFIDENCE: 422,

  // Language model
  EXTRACTION_FAILED: 502,

  // Ledger API
  UNAUTHENTICATED: 401,
  TOKEN_MISSING: 401,
  EXPENSE_REJECTED: 502,
  CLIENT_ERROR: 502,
  SERVER_ERROR: 502,
  NETWORK_ERROR: 502,
  INVALID_RESPONSE: 502,
  TIMEOUT: 504,

  // Server configuration
  CONFIG_MISSING: 503,
};

export function statusForCode(code: string): ErrorStatus {
  return STATUS_MAP[code] ?? 500;
}

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function errorDetails(err: Error): Record<string, unknown> | undefined {
  if (err instanceof InputValidationError) {
    return { issues: err.issues };
  }
  if (err instanceof ExternalServiceError && err.statusCode !== 0) {
    return { upstreamStatus: err.statusCode };
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = errorCode(err);
  const status = code === undefined ? 500 : statusForCode(code);

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, errorDetails(err)), status);
}
