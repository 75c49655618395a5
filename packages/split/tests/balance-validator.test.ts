/**
 * Balance Validator Tests
 *
 * Verifies:
 * - Each of the five checks fails with its own reason
 * - Checks short-circuit in order
 * - The ±0.01 tolerance
 * - Malformed amounts never throw
 */

import { describe, it, expect } from "vitest";
import type { ShareLine, SubmissionRecord } from "@splitrelay/types";
import { validateSubmission } from "../src/balance-validator.js";

// =============================================================================
// Helpers
// =============================================================================

function record(overrides: Partial<SubmissionRecord> = {}): SubmissionRecord {
  return {
    cost: "45.00",
    description: "Dinner at Pizza Palace",
    currencyCode: "USD",
    shares: [
      { userId: 1, paidShare: "45.00", owedShare: "15.00" },
      { userId: 2, paidShare: "0.00", owedShare: "15.00" },
      { userId: 3, paidShare: "0.00", owedShare: "15.00" },
    ],
    splitEqually: true,
    ...overrides,
  };
}

function shares(...lines: Array<[number, string, string]>): ShareLine[] {
  return lines.map(([userId, paidShare, owedShare]) => ({ userId, paidShare, owedShare }));
}

// =============================================================================
// Passing records
// =============================================================================

describe("validateSubmission passing", () => {
  it("accepts a balanced record", () => {
    expect(validateSubmission(record())).toEqual({ valid: true });
  });

  it("accepts owed shares one cent short of the cost", () => {
    const result = validateSubmission(
      record({
        cost: "10.00",
        shares: shares([1, "10.00", "3.33"], [2, "0.00", "3.33"], [3, "0.00", "3.33"]),
      }),
    );

    expect(result).toEqual({ valid: true });
  });
});

// =============================================================================
// Failing checks
// =============================================================================

describe("validateSubmission failures", () => {
  it("fails a zero cost", () => {
    const result = validateSubmission(record({ cost: "0.00" }));

    expect(result).toEqual({
      valid: false,
      reason: "cost-not-positive",
      message: 'Cost must be a positive amount, got "0.00"',
    });
  });

  it("fails an unparseable cost", () => {
    const result = validateSubmission(record({ cost: "forty" }));

    expect(result.valid).toBe(false);
    expect(!result.valid && result.reason).toBe("cost-not-positive");
  });

  it("reports a cost with too many decimal places as malformed", () => {
    const result = validateSubmission(record({ cost: "45.001" }));

    expect(result).toEqual({
      valid: false,
      reason: "cost-not-positive",
      message: 'Cost is malformed: expected a decimal amount with at most 2 places, got "45.001"',
    });
  });

  it("fails a blank description", () => {
    const result = validateSubmission(record({ description: "   " }));

    expect(!result.valid && result.reason).toBe("description-blank");
  });

  it("fails a record with no share lines", () => {
    const result = validateSubmission(record({ shares: [] }));

    expect(!result.valid && result.reason).toBe("no-share-lines");
  });

  it("fails when paid shares deviate by more than a cent", () => {
    const result = validateSubmission(
      record({
        shares: shares([1, "44.98", "15.00"], [2, "0.00", "15.00"], [3, "0.00", "15.00"]),
      }),
    );

    expect(result).toEqual({
      valid: false,
      reason: "paid-sum-mismatch",
      message: "Paid shares sum to 44.98 but cost is 45.00",
    });
  });

  it("fails when owed shares deviate by more than a cent", () => {
    const result = validateSubmission(
      record({
        shares: shares([1, "45.00", "15.00"], [2, "0.00", "15.00"], [3, "0.00", "14.00"]),
      }),
    );

    expect(result).toEqual({
      valid: false,
      reason: "owed-sum-mismatch",
      message: "Owed shares sum to 44.00 but cost is 45.00",
    });
  });

  it("treats a malformed paid share as a paid-sum mismatch", () => {
    const result = validateSubmission(
      record({ shares: shares([1, "45.0x", "45.00"]) }),
    );

    expect(!result.valid && result.reason).toBe("paid-sum-mismatch");
  });

  it("reports the first failing check only", () => {
    const result = validateSubmission(record({ description: "", shares: [] }));

    expect(!result.valid && result.reason).toBe("description-blank");
  });
});
