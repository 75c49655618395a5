/**
 * Category selection.
 *
 * Walks the ledger's category tree in order. For each top-level category:
 * - an exact (case-insensitive) name match resolves to its "Other"
 *   subcategory, when it has one
 * - otherwise its first subcategory with an exact name match is used
 * No match anywhere means the expense stays uncategorized.
 */

import { found, notFound } from "@splitrelay/types";
import type { LedgerCategory, Lookup } from "@splitrelay/types";
import { normalizeToken } from "./matching.js";

const CATCH_ALL_SUBCATEGORY = "other";

export function selectCategoryId(categories: readonly LedgerCategory[], name: string): Lookup<number> {
  const needle = normalizeToken(name);
  if (needle === "") {
    return notFound();
  }

  for (const category of categories) {
    if (normalizeToken(category.name) === needle) {
      const other = category.subcategories.find(
        (sub) => normalizeToken(sub.name) === CATCH_ALL_SUBCATEGORY,
      );
      if (other !== undefined) {
        return found(other.id);
      }
    }

    const sub = category.subcategories.find((s) => normalizeToken(s.name) === needle);
    if (sub !== undefined) {
      return found(sub.id);
    }
  }

  return notFound();
}
