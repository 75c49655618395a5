/**
 * @splitrelay/split — Equal-split engine and balance gate.
 *
 * A pure TypeScript split engine with zero runtime dependencies.
 * Enforces the balance invariant of a shared expense:
 * - Paid shares sum to the cost
 * - Owed shares sum to the cost
 * - All monetary arithmetic uses bigint cents (no floating point)
 * - Every amount leaves the engine with exactly 2 fractional digits
 */

// Split computation
export { computeShares, allocateEqually } from "./split-calculator.js";

// Balance gate
export { validateSubmission } from "./balance-validator.js";

// Money arithmetic
export {
  MONEY_DECIMALS,
  BALANCE_TOLERANCE,
  parseAmount,
  safeParseAmount,
  formatAmount,
  roundAmount,
  normalizeAmount,
  expandExponent,
  sumAmounts,
  withinTolerance,
} from "./money-math.js";

// Types
export type {
  SplitResult,
  BalanceCheck,
  BalancePass,
  BalanceFailure,
  BalanceValidation,
  SplitErrorCode,
} from "./types.js";

export { SplitError } from "./types.js";
