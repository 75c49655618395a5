/**
 * Split Calculator Tests
 *
 * Verifies:
 * - Equal split amounts and payer lines
 * - Remainder cents go to the first participants
 * - Non-equal policies are computed as equal and reported
 * - Invariant breaches throw SplitError with a specific code
 */

import { describe, it, expect } from "vitest";
import type { Identity } from "@splitrelay/types";
import { allocateEqually, computeShares } from "../src/split-calculator.js";
import { SplitError } from "../src/types.js";
import type { SplitErrorCode } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const principal: Identity = { id: 1, firstName: "Mike", email: "mike@example.com" };
const john: Identity = { id: 2, firstName: "John", lastName: "Smith" };
const sarah: Identity = { id: 3, firstName: "Sarah" };
const dana: Identity = { id: 4, firstName: "Dana" };

function errorCode(fn: () => unknown): SplitErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof SplitError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

// =============================================================================
// allocateEqually
// =============================================================================

describe("allocateEqually", () => {
  it("divides evenly when possible", () => {
    expect(allocateEqually(1000n, 4)).toEqual([250n, 250n, 250n, 250n]);
  });

  it("gives the leftover cent to the first part", () => {
    expect(allocateEqually(1000n, 3)).toEqual([334n, 333n, 333n]);
  });

  it("spreads several leftover cents over the leading parts", () => {
    expect(allocateEqually(100n, 7)).toEqual([15n, 15n, 14n, 14n, 14n, 14n, 14n]);
  });

  it("handles totals smaller than the participant count", () => {
    expect(allocateEqually(1n, 3)).toEqual([1n, 0n, 0n]);
  });

  it("rejects a zero count", () => {
    expect(errorCode(() => allocateEqually(100n, 0))).toBe("NO_PARTICIPANTS");
  });
});

// =============================================================================
// computeShares — equal split
// =============================================================================

describe("computeShares", () => {
  it("splits 45.00 three ways with the principal paying", () => {
    const result = computeShares("45.00", [principal, john, sarah], principal);

    expect(result.lines).toEqual([
      { userId: 1, paidShare: "45.00", owedShare: "15.00" },
      { userId: 2, paidShare: "0.00", owedShare: "15.00" },
      { userId: 3, paidShare: "0.00", owedShare: "15.00" },
    ]);
    expect(result.appliedPolicy).toBe("equal");
  });

  it("splits 10.00 four ways into 2.50 each", () => {
    const result = computeShares("10.00", [principal, john, sarah, dana], principal);

    expect(result.lines.map((line) => line.owedShare)).toEqual(["2.50", "2.50", "2.50", "2.50"]);
  });

  it("splits 10.00 three ways so the owed shares sum to exactly 10.00", () => {
    const result = computeShares("10.00", [principal, john, sarah], principal);

    expect(result.lines.map((line) => line.owedShare)).toEqual(["3.34", "3.33", "3.33"]);
  });

  it("credits the full total to a payer who is not first", () => {
    const result = computeShares("45.00", [principal, john, sarah], john);

    expect(result.lines.map((line) => line.paidShare)).toEqual(["0.00", "45.00", "0.00"]);
  });

  it("gives a sole participant the whole expense", () => {
    const result = computeShares("12.34", [principal], principal);

    expect(result.lines).toEqual([{ userId: 1, paidShare: "12.34", owedShare: "12.34" }]);
  });

  it("pads a total given without cents", () => {
    const result = computeShares("30", [principal, john], principal);

    expect(result.lines).toEqual([
      { userId: 1, paidShare: "30.00", owedShare: "15.00" },
      { userId: 2, paidShare: "0.00", owedShare: "15.00" },
    ]);
  });

  it("does not report a downgrade for the equal policy", () => {
    const result = computeShares("45.00", [principal, john], principal, "equal");

    expect("downgradedFrom" in result).toBe(false);
  });
});

// =============================================================================
// computeShares — policy fallback
// =============================================================================

describe("computeShares policy fallback", () => {
  it("computes percentage as an equal split and reports it", () => {
    const equal = computeShares("10.00", [principal, john, sarah], principal, "equal");
    const percentage = computeShares("10.00", [principal, john, sarah], principal, "percentage");

    expect(percentage.lines).toEqual(equal.lines);
    expect(percentage.appliedPolicy).toBe("equal");
    expect(percentage.downgradedFrom).toBe("percentage");
  });

  it("computes exact as an equal split and reports it", () => {
    const equal = computeShares("45.00", [principal, john, sarah], principal);
    const exact = computeShares("45.00", [principal, john, sarah], principal, "exact");

    expect(exact.lines).toEqual(equal.lines);
    expect(exact.downgradedFrom).toBe("exact");
  });
});

// =============================================================================
// computeShares — invariant breaches
// =============================================================================

describe("computeShares errors", () => {
  it("rejects an empty participant list", () => {
    expect(errorCode(() => computeShares("10.00", [], principal))).toBe("NO_PARTICIPANTS");
  });

  it("rejects a payer outside the participants", () => {
    expect(errorCode(() => computeShares("10.00", [principal, john], sarah))).toBe(
      "PAYER_NOT_PARTICIPANT",
    );
  });

  it("rejects a participant listed twice", () => {
    expect(errorCode(() => computeShares("10.00", [principal, john, john], principal))).toBe(
      "DUPLICATE_PARTICIPANT",
    );
  });

  it("rejects zero and negative totals", () => {
    expect(errorCode(() => computeShares("0.00", [principal], principal))).toBe("INVALID_AMOUNT");
    expect(errorCode(() => computeShares("-5.00", [principal], principal))).toBe("INVALID_AMOUNT");
  });

  it("rejects a total with sub-cent precision", () => {
    expect(errorCode(() => computeShares("1.234", [principal], principal))).toBe("INVALID_AMOUNT");
  });
});
