/**
 * @splitrelay/types — Shared domain types for the splitrelay stack.
 *
 * These types are used across all splitrelay packages:
 * - Candidate expenses and submission records
 * - Identities and groups owned by the ledger service
 * - Found/not-found lookup results
 * - Capability contracts the conversion engine depends on
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are decimal strings, never floats
 */

// Expense types
export type {
  SplitPolicy,
  CurrencyCode,
  CandidateExpense,
  ShareLine,
  SubmissionRecord,
  SubmissionConfirmation,
  LedgerCategory,
  LedgerSubcategory,
} from "./expense.js";

// Identity types
export type { Identity, LedgerGroup } from "./identity.js";

// Lookup results
export type { Found, NotFound, Lookup } from "./lookup.js";
export { found, notFound } from "./lookup.js";

// Capabilities
export type {
  IdentityDirectory,
  CategoryDirectory,
  ExpenseSink,
} from "./capabilities.js";

// Runtime type guards
export {
  SPLIT_POLICIES,
  isSplitPolicy,
  isShareLine,
  isSubmissionRecord,
  isIdentity,
} from "./guards.js";
