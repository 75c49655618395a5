/**
 * @splitrelay/converter — Errors.
 */

import type { BalanceCheck, BalanceFailure } from "@splitrelay/split";

export interface InputIssue {
  /** Dotted path of the offending field ("amount", "participants.2") */
  readonly path: string;
  readonly message: string;
}

/**
 * A candidate expense that breaks the input invariants.
 * Thrown before any lookup or network call.
 */
export class InputValidationError extends Error {
  public readonly code = "INPUT_VALIDATION" as const;
  public readonly issues: readonly InputIssue[];

  constructor(issues: readonly InputIssue[]) {
    super(
      `Invalid candidate expense: ${issues
        .map((issue) => (issue.path === "" ? issue.message : `${issue.path}: ${issue.message}`))
        .join("; ")}`,
    );
    this.name = "InputValidationError";
    this.issues = issues;
  }
}

/**
 * A submission record that failed the balance gate.
 * Returned inside a failed result so the caller can decide what to do.
 */
export class BalanceInvariantError extends Error {
  public readonly code = "BALANCE_INVARIANT" as const;
  public readonly check: BalanceCheck;

  constructor(failure: BalanceFailure) {
    super(failure.message);
    this.name = "BalanceInvariantError";
    this.check = failure.reason;
  }
}
