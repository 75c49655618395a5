/**
 * @splitrelay/split — Types for the split engine.
 *
 * Rules:
 * - All types are readonly
 * - Amounts crossing the package boundary are 2-decimal strings
 * - Invariant breaches inside the engine throw SplitError;
 *   balance checks on finished records never throw
 */

import type { ShareLine, SplitPolicy } from "@splitrelay/types";

// ─── Split Results ───────────────────────────────────────────────────────

/**
 * Output of the split calculator.
 *
 * `downgradedFrom` is set when a non-equal policy was requested and the
 * equal split was computed in its place.
 */
export interface SplitResult {
  readonly lines: readonly ShareLine[];
  readonly appliedPolicy: "equal";
  readonly downgradedFrom?: Exclude<SplitPolicy, "equal">;
}

// ─── Balance Validation ──────────────────────────────────────────────────

/**
 * The checks run against a submission record, in evaluation order.
 */
export type BalanceCheck =
  | "cost-not-positive"
  | "description-blank"
  | "no-share-lines"
  | "paid-sum-mismatch"
  | "owed-sum-mismatch";

export interface BalancePass {
  readonly valid: true;
}

export interface BalanceFailure {
  readonly valid: false;
  readonly reason: BalanceCheck;
  readonly message: string;
}

export type BalanceValidation = BalancePass | BalanceFailure;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for the split engine. */
export type SplitErrorCode =
  | "INVALID_AMOUNT"
  | "NO_PARTICIPANTS"
  | "DUPLICATE_PARTICIPANT"
  | "PAYER_NOT_PARTICIPANT";

/**
 * Structured error from the split engine.
 * Always thrown — never returns error codes silently.
 */
export class SplitError extends Error {
  public readonly code: SplitErrorCode;

  constructor(code: SplitErrorCode, message: string) {
    super(message);
    this.name = "SplitError";
    this.code = code;
  }
}
