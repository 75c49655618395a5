/**
 * Ledger capabilities backed by the ledger API client.
 *
 * Adapts LedgerClient to the directory and sink contracts the converter
 * depends on, plus the read calls the service exposes. Failures from the
 * client propagate unchanged.
 */

import type {
  CategoryDirectory,
  ExpenseSink,
  Identity,
  IdentityDirectory,
  LedgerGroup,
} from "@splitrelay/types";
import { found, notFound } from "@splitrelay/types";
import { findMatchingIdentity, selectCategoryId } from "@splitrelay/converter";
import type { LedgerClient } from "@splitrelay/sdk";

export interface LedgerCapabilities extends IdentityDirectory, CategoryDirectory, ExpenseSink {
  /** The authenticated user, used as the principal */
  currentUser(): Promise<Identity>;
  listFriends(): Promise<readonly Identity[]>;
  listGroups(): Promise<readonly LedgerGroup[]>;
}

/**
 * Every lookup reads the ledger afresh; the converter caches
 * identity lookups within a single conversion.
 */
export function createLedgerCapabilities(client: LedgerClient): LedgerCapabilities {
  return {
    async findIdentity(token) {
      const match = findMatchingIdentity(await client.friends.list(), token);
      return match === undefined ? notFound() : found(match);
    },

    async findCategory(name) {
      return selectCategoryId(await client.categories.list(), name);
    },

    submit: (record) => client.expenses.create(record),
    currentUser: () => client.users.current(),
    listFriends: () => client.friends.list(),
    listGroups: () => client.groups.list(),
  };
}
