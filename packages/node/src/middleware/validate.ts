/**
 * Request body validation.
 *
 * Bodies that are not JSON, or that fail the route's schema, are
 * answered with 400 VALIDATION_ERROR before the handler runs. Issues
 * use the same `{ path, message }` shape as a rejected candidate expense.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodIssue, ZodType, ZodTypeDef } from "zod";
import type { InputIssue } from "@splitrelay/converter";
import type { AppEnv, ValidatedBodyEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<AppEnv & ValidatedBodyEnv<T>> {
  return async (c, next) => {
    const raw = await c.req.text();
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"), 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues.map(toInputIssue);
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", { issues }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

function toInputIssue(issue: ZodIssue): InputIssue {
  return { path: issue.path.join("."), message: issue.message };
}
