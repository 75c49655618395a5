/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body validation.
 */

import { z } from "zod";

const GroupIdSchema = z.number().int().positive();

// =============================================================================
// Expense DTOs
// =============================================================================

/**
 * A forwarded email. Blank subjects and bodies are rejected by the
 * extractor with INVALID_EMAIL.
 */
export const ForwardEmailSchema = z.object({
  subject: z.string().max(1024),
  body: z.string().max(100_000),
  sender: z.string().max(512).optional(),
  groupId: GroupIdSchema.optional(),
  dryRun: z.boolean().default(false),
});

export type ForwardEmailDto = z.infer<typeof ForwardEmailSchema>;

/**
 * An already-extracted candidate. The candidate itself is validated
 * by the converter, which reports INPUT_VALIDATION issues.
 */
export const PreviewExpenseSchema = z.object({
  candidate: z.unknown(),
  groupId: GroupIdSchema.optional(),
});

export type PreviewExpenseDto = z.infer<typeof PreviewExpenseSchema>;
