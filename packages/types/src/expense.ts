/**
 * Expense Types
 *
 * Core records exchanged between the conversion engine and the
 * ledger service.
 *
 * Rules:
 * - All monetary amounts are decimal strings with exactly 2 fractional digits
 * - Currency is always an explicit 3-letter uppercase code
 * - Optional fields are omitted, never null
 */

/**
 * How an expense is divided among its participants.
 * Only "equal" is computed; the others fall back to it.
 */
export type SplitPolicy = "equal" | "exact" | "percentage";

/**
 * A 3-letter ISO 4217 currency code, uppercase (e.g., "USD", "EUR").
 */
export type CurrencyCode = string;

/**
 * A validated, structured expense derived from free text.
 */
export interface CandidateExpense {
  /** Trimmed, non-empty description */
  readonly description: string;

  /** Total amount, decimal string with 2 fractional digits (e.g., "45.00") */
  readonly amount: string;

  readonly currency: CurrencyCode;

  /** Calendar date, YYYY-MM-DD */
  readonly date?: string;

  /** Free-text category name as written by the sender */
  readonly category?: string;

  /** Names or emails, in the order they were mentioned */
  readonly participants: readonly string[];

  readonly splitPolicy: SplitPolicy;

  /** Name or email of whoever paid */
  readonly payer?: string;
}

/**
 * One participant's side of an expense.
 */
export interface ShareLine {
  readonly userId: number;

  /** What this participant paid up front */
  readonly paidShare: string;

  /** What this participant owes in total */
  readonly owedShare: string;
}

/**
 * The expense exactly as it will be handed to the ledger service.
 * Built once per conversion; never mutated afterwards.
 */
export interface SubmissionRecord {
  readonly cost: string;
  readonly description: string;
  readonly currencyCode: CurrencyCode;

  /** ISO 8601 timestamp at midnight UTC (YYYY-MM-DDT00:00:00Z) */
  readonly date?: string;

  readonly categoryId?: number;
  readonly groupId?: number;
  readonly shares: readonly ShareLine[];
  readonly splitEqually: boolean;
}

/**
 * Returned by the ledger service once an expense is stored.
 */
export interface SubmissionConfirmation {
  readonly expenseId: number;
}

/**
 * A subcategory in the ledger's category tree.
 */
export interface LedgerSubcategory {
  readonly id: number;
  readonly name: string;
}

/**
 * A top-level category in the ledger's category tree.
 */
export interface LedgerCategory {
  readonly id: number;
  readonly name: string;
  readonly subcategories: readonly LedgerSubcategory[];
}
