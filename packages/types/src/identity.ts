/**
 * Identity Types
 *
 * Identities are owned by the ledger service. The conversion engine
 * only reads them and compares them by `id`.
 */

/**
 * A user known to the ledger service (the principal or one of their friends).
 */
export interface Identity {
  readonly id: number;
  readonly firstName: string;
  readonly lastName?: string;
  readonly email?: string;
}

/**
 * A group of users on the ledger service.
 */
export interface LedgerGroup {
  readonly id: number;
  readonly name: string;
  readonly memberIds: readonly number[];
}
