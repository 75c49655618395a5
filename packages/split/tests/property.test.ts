/**
 * Property-Based Tests for @splitrelay/split
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Split completeness (owed and paid shares each sum to the total)
 * 2. Payer uniqueness (exactly one line has a non-zero paid share)
 * 3. Fairness (owed shares differ by at most one cent)
 * 4. Policy fallback (exact/percentage equal the equal split)
 * 5. Every computed record passes the balance gate
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Identity } from "@splitrelay/types";
import { computeShares } from "../src/split-calculator.js";
import { validateSubmission } from "../src/balance-validator.js";
import { formatAmount, parseAmount } from "../src/money-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** A positive total, up to ten million, as a 2-decimal string. */
const arbTotal = fc.bigInt({ min: 1n, max: 1_000_000_000n }).map((cents) => formatAmount(cents));

/** A non-empty participant list with distinct ids, plus a payer index. */
const arbParticipants = fc
  .uniqueArray(fc.integer({ min: 1, max: 1_000_000 }), { minLength: 1, maxLength: 40 })
  .chain((ids) =>
    fc.tuple(
      fc.constant(ids.map((id): Identity => ({ id, firstName: `user-${String(id)}` }))),
      fc.nat({ max: ids.length - 1 }),
    ),
  );

function sum(amounts: readonly string[]): bigint {
  return amounts.reduce((acc, amount) => acc + parseAmount(amount), 0n);
}

// =============================================================================
// Properties
// =============================================================================

describe("split properties", () => {
  it("owed and paid shares each sum to the total", () => {
    fc.assert(
      fc.property(arbTotal, arbParticipants, (total, [participants, payerIndex]) => {
        const payer = participants[payerIndex] ?? participants[0];
        if (payer === undefined) return;

        const { lines } = computeShares(total, participants, payer);

        expect(lines).toHaveLength(participants.length);
        expect(sum(lines.map((line) => line.owedShare))).toBe(parseAmount(total));
        expect(sum(lines.map((line) => line.paidShare))).toBe(parseAmount(total));
      }),
    );
  });

  it("exactly one line carries a paid share", () => {
    fc.assert(
      fc.property(arbTotal, arbParticipants, (total, [participants, payerIndex]) => {
        const payer = participants[payerIndex] ?? participants[0];
        if (payer === undefined) return;

        const { lines } = computeShares(total, participants, payer);
        const payers = lines.filter((line) => line.paidShare !== "0.00");

        expect(payers).toHaveLength(1);
        expect(payers[0]?.userId).toBe(payer.id);
      }),
    );
  });

  it("owed shares differ by at most one cent", () => {
    fc.assert(
      fc.property(arbTotal, arbParticipants, (total, [participants]) => {
        const payer = participants[0];
        if (payer === undefined) return;

        const owed = computeShares(total, participants, payer).lines.map((line) =>
          parseAmount(line.owedShare),
        );
        const max = owed.reduce((a, b) => (a > b ? a : b));
        const min = owed.reduce((a, b) => (a < b ? a : b));

        expect(max - min <= 1n).toBe(true);
      }),
    );
  });

  it("exact and percentage produce the equal split", () => {
    fc.assert(
      fc.property(
        arbTotal,
        arbParticipants,
        fc.constantFrom("exact" as const, "percentage" as const),
        (total, [participants, payerIndex], policy) => {
          const payer = participants[payerIndex] ?? participants[0];
          if (payer === undefined) return;

          const equal = computeShares(total, participants, payer, "equal");
          const downgraded = computeShares(total, participants, payer, policy);

          expect(downgraded.lines).toEqual(equal.lines);
          expect(downgraded.downgradedFrom).toBe(policy);
        },
      ),
    );
  });

  it("every computed split passes the balance gate", () => {
    fc.assert(
      fc.property(arbTotal, arbParticipants, (total, [participants, payerIndex]) => {
        const payer = participants[payerIndex] ?? participants[0];
        if (payer === undefined) return;

        const { lines } = computeShares(total, participants, payer);
        const result = validateSubmission({
          cost: total,
          description: "property",
          currencyCode: "USD",
          shares: lines,
          splitEqually: true,
        });

        expect(result).toEqual({ valid: true });
      }),
    );
  });
});
