/**
 * Runtime Type Guards
 *
 * Narrowing functions for splitrelay domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, external integrations).
 */

import type { ShareLine, SplitPolicy, SubmissionRecord } from "./expense.js";
import type { Identity } from "./identity.js";

// =============================================================================
// Expense guards
// =============================================================================

export const SPLIT_POLICIES = ["equal", "exact", "percentage"] as const satisfies readonly SplitPolicy[];

const SPLIT_POLICY_SET = new Set<string>(SPLIT_POLICIES);
const AMOUNT_PATTERN = /^-?\d+\.\d{2}$/;
const CURRENCY_PATTERN = /^[A-Z]{3}$/;

export function isSplitPolicy(value: unknown): value is SplitPolicy {
  return typeof value === "string" && SPLIT_POLICY_SET.has(value);
}

function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

export function isShareLine(value: unknown): value is ShareLine {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isPositiveInteger(v.userId) &&
    isAmountString(v.paidShare) &&
    isAmountString(v.owedShare)
  );
}

export function isSubmissionRecord(value: unknown): value is SubmissionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAmountString(v.cost) &&
    typeof v.description === "string" &&
    typeof v.currencyCode === "string" &&
    CURRENCY_PATTERN.test(v.currencyCode) &&
    (v.date === undefined || typeof v.date === "string") &&
    (v.categoryId === undefined || isPositiveInteger(v.categoryId)) &&
    (v.groupId === undefined || isPositiveInteger(v.groupId)) &&
    Array.isArray(v.shares) &&
    v.shares.every(isShareLine) &&
    typeof v.splitEqually === "boolean"
  );
}

// =============================================================================
// Identity guards
// =============================================================================

export function isIdentity(value: unknown): value is Identity {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isPositiveInteger(v.id) &&
    typeof v.firstName === "string" &&
    (v.lastName === undefined || typeof v.lastName === "string") &&
    (v.email === undefined || typeof v.email === "string")
  );
}
