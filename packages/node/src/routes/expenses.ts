/**
 * Expense routes.
 *
 * POST /api/v1/expenses/forward  — Extract, convert and submit a forwarded email
 * POST /api/v1/expenses/preview  — Convert an extracted candidate without submitting
 *
 * A record that fails the balance check, or an extraction below the
 * confidence threshold, is answered with 422 and nothing is submitted.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ForwardEmailSchema, PreviewExpenseSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createExpenseRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/expenses/forward
  routes.post("/forward", validateBody(ForwardEmailSchema), async (c) => {
    const service = c.get("service");
    const { subject, body, sender, groupId, dryRun } = c.get("validatedBody");

    const outcome = await service.forwardEmail(
      { subject, body, ...(sender !== undefined ? { sender } : {}) },
      { groupId, dryRun },
    );
    const { confidence, summary } = outcome.extraction;

    switch (outcome.status) {
      case "submitted":
        return c.json(
          {
            data: {
              status: outcome.status,
              expenseId: outcome.expenseId,
              record: outcome.record,
              warnings: outcome.warnings,
              confidence,
              summary,
            },
          },
          201,
        );

      case "previewed":
        return c.json(
          {
            data: {
              status: outcome.status,
              record: outcome.record,
              warnings: outcome.warnings,
              confidence,
              summary,
            },
          },
          200,
        );

      case "blocked":
        return c.json(
          createErrorEnvelope("BALANCE_INVARIANT", outcome.error.message, {
            check: outcome.error.check,
            record: outcome.record,
            warnings: outcome.warnings,
          }),
          422,
        );

      case "low-confidence":
        return c.json(
          createErrorEnvelope(
            "LOW_CONFIDENCE",
            `Extraction confidence ${confidence} is below the minimum of ${outcome.minConfidence}`,
            {
              confidence,
              minConfidence: outcome.minConfidence,
              ...(outcome.extraction.notes !== undefined ? { notes: outcome.extraction.notes } : {}),
            },
          ),
          422,
        );
    }
  });

  // POST /api/v1/expenses/preview
  routes.post("/preview", validateBody(PreviewExpenseSchema), async (c) => {
    const service = c.get("service");
    const { candidate, groupId } = c.get("validatedBody");

    const result = await service.preview(candidate, groupId);
    if (!result.ok) {
      return c.json(
        createErrorEnvelope("BALANCE_INVARIANT", result.error.message, {
          check: result.error.check,
          record: result.record,
          warnings: result.warnings,
        }),
        422,
      );
    }

    return c.json({
      data: {
        record: result.record,
        payerId: result.payer.id,
        warnings: result.warnings,
      },
    });
  });

  return routes;
}
