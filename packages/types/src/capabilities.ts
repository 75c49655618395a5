/**
 * Capability Contracts
 *
 * The three calls the conversion engine needs from the ledger service.
 * Implementations own transport, authentication, timeouts and retries;
 * the engine never catches their failures.
 */

import type { Identity } from "./identity.js";
import type { Lookup } from "./lookup.js";
import type { SubmissionConfirmation, SubmissionRecord } from "./expense.js";

/**
 * Resolves a name or email to a known identity.
 * Matching is exact and case-insensitive on email, first name,
 * last name, or "first last".
 */
export interface IdentityDirectory {
  findIdentity(token: string): Promise<Lookup<Identity>>;
}

/**
 * Resolves a category name to a category identifier.
 */
export interface CategoryDirectory {
  findCategory(name: string): Promise<Lookup<number>>;
}

/**
 * Stores a balanced expense on the ledger service.
 */
export interface ExpenseSink {
  submit(record: SubmissionRecord): Promise<SubmissionConfirmation>;
}
