/**
 * @splitrelay/split — Balance Validator.
 *
 * The gate every submission record passes before it is sent to the
 * ledger service. Checks run in order and stop at the first failure.
 *
 * 1. cost is a well-formed, positive amount
 * 2. description is not blank
 * 3. there is at least one share line
 * 4. paid shares sum to the cost (±0.01)
 * 5. owed shares sum to the cost (±0.01)
 *
 * Never throws: malformed amounts fail the check they belong to.
 */

import type { SubmissionRecord } from "@splitrelay/types";
import { formatAmount, safeParseAmount, sumAmounts, withinTolerance } from "./money-math.js";
import type { BalanceCheck, BalanceFailure, BalanceValidation } from "./types.js";

function fail(reason: BalanceCheck, message: string): BalanceFailure {
  return { valid: false, reason, message };
}

/**
 * Validate that a submission record balances.
 */
export function validateSubmission(record: SubmissionRecord): BalanceValidation {
  const cost = safeParseAmount(record.cost);
  if (cost === undefined) {
    return fail(
      "cost-not-positive",
      `Cost is malformed: expected a decimal amount with at most 2 places, got "${String(record.cost)}"`,
    );
  }
  if (cost <= 0n) {
    return fail("cost-not-positive", `Cost must be a positive amount, got "${String(record.cost)}"`);
  }

  if (typeof record.description !== "string" || record.description.trim() === "") {
    return fail("description-blank", "Description must not be blank");
  }

  if (record.shares.length === 0) {
    return fail("no-share-lines", "Expense has no share lines");
  }

  const paid = sumAmounts(record.shares.map((line) => line.paidShare));
  if (paid === undefined) {
    return fail("paid-sum-mismatch", "Paid shares contain a malformed amount");
  }
  if (!withinTolerance(paid, cost)) {
    return fail(
      "paid-sum-mismatch",
      `Paid shares sum to ${formatAmount(paid)} but cost is ${formatAmount(cost)}`,
    );
  }

  const owed = sumAmounts(record.shares.map((line) => line.owedShare));
  if (owed === undefined) {
    return fail("owed-sum-mismatch", "Owed shares contain a malformed amount");
  }
  if (!withinTolerance(owed, cost)) {
    return fail(
      "owed-sum-mismatch",
      `Owed shares sum to ${formatAmount(owed)} but cost is ${formatAmount(cost)}`,
    );
  }

  return { valid: true };
}
