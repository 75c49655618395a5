/**
 * Email input validation.
 */

import { z } from "zod";
import type { EmailContent } from "./types.js";
import { ExtractionError } from "./types.js";

export const EmailContentSchema = z.object({
  subject: z.string().trim().min(1, "Subject cannot be empty"),
  body: z.string().trim().min(1, "Body cannot be empty"),
  sender: z
    .string()
    .trim()
    .nullish()
    .transform((value) => (value === null || value === undefined || value === "" ? undefined : value)),
});

/**
 * @throws {ExtractionError} INVALID_EMAIL listing the offending fields
 */
export function parseEmail(input: unknown): EmailContent {
  const result = EmailContentSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new ExtractionError(
      "INVALID_EMAIL",
      `Invalid email: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`,
      issues,
    );
  }

  const { subject, body, sender } = result.data;
  return sender !== undefined ? { subject, body, sender } : { subject, body };
}
