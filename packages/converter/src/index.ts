/**
 * @splitrelay/converter — Candidate expense to balanced ledger record.
 *
 * Validates untyped extraction output, resolves participants against
 * the ledger's directory, picks the payer, splits the cost equally and
 * gates the result on the balance invariant before submission.
 */

// Orchestrator
export { ExpenseConverter } from "./converter.js";

// Building blocks
export { parseCandidate, CandidateExpenseSchema, toCalendarDate } from "./candidate.js";
export { IdentityResolver } from "./identity-resolver.js";
export type { ResolvedParticipants } from "./identity-resolver.js";
export { determinePayer } from "./payer.js";
export type { PayerDetermination } from "./payer.js";
export { selectCategoryId } from "./category.js";
export { normalizeToken, matchesIdentity, findMatchingIdentity, displayName } from "./matching.js";

// Errors
export { InputValidationError, BalanceInvariantError } from "./errors.js";
export type { InputIssue } from "./errors.js";

// Types
export type {
  ConversionWarningKind,
  ConversionWarning,
  ConverterConfig,
  ExpenseConverterOptions,
  ConversionSuccess,
  ConversionFailure,
  ConversionResult,
  SubmittedOutcome,
  BlockedOutcome,
  SubmissionOutcome,
} from "./types.js";
