/**
 * @splitrelay/split — Split Calculator.
 *
 * Computes each participant's paid/owed shares for an expense.
 *
 * Rules:
 * - Only the equal policy is computed; "exact" and "percentage"
 *   are computed as equal and reported through `downgradedFrom`
 * - The payer paid the full total; everyone else paid 0.00
 * - Owed amounts always sum to exactly the total
 * - All arithmetic is bigint cents via money-math
 */

import type { Identity, ShareLine, SplitPolicy } from "@splitrelay/types";
import { formatAmount, parseAmount } from "./money-math.js";
import type { SplitResult } from "./types.js";
import { SplitError } from "./types.js";

/**
 * Divide `totalCents` into `count` integer parts that differ by at most
 * one cent. The leftover cents go to the first parts, so earlier
 * participants (the principal first) absorb the remainder.
 *
 * 1000n / 3 → [334n, 333n, 333n]
 */
export function allocateEqually(totalCents: bigint, count: number): bigint[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new SplitError("NO_PARTICIPANTS", `Cannot split among ${String(count)} participants`);
  }

  const n = BigInt(count);
  const base = totalCents / n;
  const remainder = totalCents - base * n;

  const parts: bigint[] = [];
  for (let i = 0n; i < n; i++) {
    parts.push(i < remainder ? base + 1n : base);
  }
  return parts;
}

/**
 * Compute share lines for an expense.
 *
 * @param total - Total cost as a decimal string with at most 2 fractional digits
 * @param participants - Resolved participants in resolution order
 * @param payer - Must be one of `participants`
 * @param policy - Requested split policy
 */
export function computeShares(
  total: string,
  participants: readonly Identity[],
  payer: Identity,
  policy: SplitPolicy = "equal",
): SplitResult {
  const totalCents = parseAmount(total);
  if (totalCents <= 0n) {
    throw new SplitError("INVALID_AMOUNT", `Total must be greater than 0, got "${total}"`);
  }

  if (participants.length === 0) {
    throw new SplitError("NO_PARTICIPANTS", "Cannot split an expense with no participants");
  }

  const seen = new Set<number>();
  for (const participant of participants) {
    if (seen.has(participant.id)) {
      throw new SplitError(
        "DUPLICATE_PARTICIPANT",
        `Participant ${String(participant.id)} appears more than once`,
      );
    }
    seen.add(participant.id);
  }

  if (!seen.has(payer.id)) {
    throw new SplitError(
      "PAYER_NOT_PARTICIPANT",
      `Payer ${String(payer.id)} is not among the participants`,
    );
  }

  const owed = allocateEqually(totalCents, participants.length);
  const paidTotal = formatAmount(totalCents);
  const zero = formatAmount(0n);

  const lines: ShareLine[] = participants.map((participant, index) => ({
    userId: participant.id,
    paidShare: participant.id === payer.id ? paidTotal : zero,
    owedShare: formatAmount(owed[index] ?? 0n),
  }));

  if (policy === "equal") {
    return { lines, appliedPolicy: "equal" };
  }
  return { lines, appliedPolicy: "equal", downgradedFrom: policy };
}
