/**
 * Candidate expense validation.
 *
 * The extraction step hands over an untyped record. This is the one
 * boundary where it becomes a CandidateExpense: amounts are normalized
 * to 2-decimal strings, currency codes are uppercased and missing
 * optionals are dropped. Anything that breaks an invariant throws
 * InputValidationError before a single lookup is made.
 */

import { z } from "zod";
import { SPLIT_POLICIES } from "@splitrelay/types";
import type { CandidateExpense } from "@splitrelay/types";
import { normalizeAmount, parseAmount, SplitError } from "@splitrelay/split";
import { InputValidationError } from "./errors.js";

// =============================================================================
// Field Schemas
// =============================================================================

const AmountSchema = z.unknown().transform((value, ctx): string => {
  if (value === undefined || value === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Amount is required" });
    return z.NEVER;
  }
  if (typeof value !== "number" && typeof value !== "string") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Amount must be a number or a decimal string" });
    return z.NEVER;
  }

  let amount: string;
  try {
    amount = normalizeAmount(value);
  } catch (error) {
    if (error instanceof SplitError) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Amount must be a decimal number" });
      return z.NEVER;
    }
    throw error;
  }

  if (parseAmount(amount) <= 0n) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Amount must be greater than 0" });
    return z.NEVER;
  }
  return amount;
});

const CURRENCY_PATTERN = /^[A-Za-z]{3}$/;

/** Blank reads as absent, so the default currency applies. */
const CurrencySchema = z
  .string({ invalid_type_error: "Currency must be a string" })
  .trim()
  .nullish()
  .transform((value, ctx): string | undefined => {
    if (value === undefined || value === null || value === "") {
      return undefined;
    }
    if (!CURRENCY_PATTERN.test(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Currency must be a 3-letter code" });
      return z.NEVER;
    }
    return value.toUpperCase();
  });

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(T.*)?$/;

/**
 * Reduce YYYY-MM-DD or an ISO 8601 timestamp to its calendar date, as
 * written (no timezone shift). Returns undefined for impossible dates.
 */
export function toCalendarDate(value: string): string | undefined {
  const match = DATE_PATTERN.exec(value);
  if (match === null) {
    return undefined;
  }

  const [, year = "", month = "", day = "", time] = match;
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  const probe = new Date(Date.UTC(y, m - 1, d));
  if (probe.getUTCFullYear() !== y || probe.getUTCMonth() !== m - 1 || probe.getUTCDate() !== d) {
    return undefined;
  }
  if (time !== undefined && Number.isNaN(Date.parse(value))) {
    return undefined;
  }
  return `${year}-${month}-${day}`;
}

const DateSchema = z
  .string({ invalid_type_error: "Date must be a string" })
  .trim()
  .nullish()
  .transform((value, ctx): string | undefined => {
    if (value === undefined || value === null || value === "") {
      return undefined;
    }
    const date = toCalendarDate(value);
    if (date === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Date must be a valid YYYY-MM-DD date or ISO 8601 timestamp",
      });
      return z.NEVER;
    }
    return date;
  });

const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value): string | undefined => {
    const trimmed = value?.trim();
    return trimmed === undefined || trimmed === "" ? undefined : trimmed;
  });

export const CandidateExpenseSchema = z.object({
  description: z
    .string({ required_error: "Description is required", invalid_type_error: "Description must be a string" })
    .trim()
    .min(1, "Description cannot be empty"),
  amount: AmountSchema,
  currency: CurrencySchema,
  date: DateSchema,
  category: OptionalTextSchema,
  participants: z
    .array(z.string({ invalid_type_error: "Participant must be a name or email" }))
    .nullish()
    .transform((value) => value ?? []),
  splitPolicy: z
    .enum(SPLIT_POLICIES, {
      errorMap: () => ({ message: `Split policy must be one of: ${SPLIT_POLICIES.join(", ")}` }),
    })
    .nullish()
    .transform((value) => value ?? "equal"),
  payer: OptionalTextSchema,
});

// =============================================================================
// Parser
// =============================================================================

/**
 * Validate an untyped candidate expense.
 *
 * @param defaultCurrency - Applied when the candidate names no currency
 * @throws {InputValidationError} listing every offending field
 */
export function parseCandidate(input: unknown, defaultCurrency: string): CandidateExpense {
  const result = CandidateExpenseSchema.safeParse(input);
  if (!result.success) {
    throw new InputValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    );
  }

  const data = result.data;
  return {
    description: data.description,
    amount: data.amount,
    currency: data.currency ?? defaultCurrency.toUpperCase(),
    participants: data.participants,
    splitPolicy: data.splitPolicy,
    ...(data.date !== undefined ? { date: data.date } : {}),
    ...(data.category !== undefined ? { category: data.category } : {}),
    ...(data.payer !== undefined ? { payer: data.payer } : {}),
  };
}
