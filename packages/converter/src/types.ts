/**
 * @splitrelay/converter — Conversion types.
 *
 * Rules:
 * - All types are readonly
 * - Non-fatal problems travel as warnings on the result
 * - Fatal input problems throw InputValidationError
 * - Balance failures are returned, never thrown
 */

import type {
  CandidateExpense,
  CategoryDirectory,
  CurrencyCode,
  ExpenseSink,
  Identity,
  IdentityDirectory,
  SubmissionConfirmation,
  SubmissionRecord,
} from "@splitrelay/types";
import type { Logger } from "pino";
import type { BalanceInvariantError } from "./errors.js";

// ─── Warnings ────────────────────────────────────────────────────────────

export type ConversionWarningKind =
  | "participant-unresolved"
  | "payer-unresolved"
  | "category-unresolved"
  | "policy-downgraded";

/**
 * A problem the conversion worked around.
 * `subject` is the token, category name or policy concerned.
 */
export interface ConversionWarning {
  readonly kind: ConversionWarningKind;
  readonly subject: string;
  readonly message: string;
}

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Session-wide defaults, passed in at construction.
 */
export interface ConverterConfig {
  /** Used when a candidate carries no currency */
  readonly defaultCurrency: CurrencyCode;
  /** Used when a conversion names no group */
  readonly defaultGroupId?: number | undefined;
}

export interface ExpenseConverterOptions {
  /** The acting user; loaded once per session and never mutated */
  readonly principal: Identity;
  readonly identities: IdentityDirectory;
  readonly categories: CategoryDirectory;
  readonly sink: ExpenseSink;
  readonly config: ConverterConfig;
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
}

// ─── Results ─────────────────────────────────────────────────────────────

export interface ConversionSuccess {
  readonly ok: true;
  readonly candidate: CandidateExpense;
  readonly payer: Identity;
  readonly record: SubmissionRecord;
  readonly warnings: readonly ConversionWarning[];
}

export interface ConversionFailure {
  readonly ok: false;
  readonly error: BalanceInvariantError;
  readonly record: SubmissionRecord;
  readonly warnings: readonly ConversionWarning[];
}

export type ConversionResult = ConversionSuccess | ConversionFailure;

export interface SubmittedOutcome {
  readonly status: "submitted";
  readonly record: SubmissionRecord;
  readonly confirmation: SubmissionConfirmation;
  readonly warnings: readonly ConversionWarning[];
}

export interface BlockedOutcome {
  readonly status: "blocked";
  readonly record: SubmissionRecord;
  readonly error: BalanceInvariantError;
  readonly warnings: readonly ConversionWarning[];
}

export type SubmissionOutcome = SubmittedOutcome | BlockedOutcome;
