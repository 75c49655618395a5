/**
 * In-memory stand-ins for the ledger capabilities.
 * Each records its calls so tests can assert what was asked of it.
 */

import { found, notFound } from "@splitrelay/types";
import type {
  CategoryDirectory,
  ExpenseSink,
  Identity,
  IdentityDirectory,
  LedgerCategory,
  Lookup,
  SubmissionConfirmation,
  SubmissionRecord,
} from "@splitrelay/types";
import { findMatchingIdentity } from "../src/matching.js";
import { selectCategoryId } from "../src/category.js";

export const principal: Identity = {
  id: 100,
  firstName: "Mike",
  lastName: "Jones",
  email: "mike@example.com",
};

export const john: Identity = { id: 201, firstName: "John", lastName: "Smith", email: "john@example.com" };
export const sarah: Identity = { id: 202, firstName: "Sarah", lastName: "Lee", email: "sarah@example.com" };
export const alice: Identity = { id: 203, firstName: "Alice" };
export const bob: Identity = { id: 204, firstName: "Bob" };
export const carol: Identity = { id: 205, firstName: "Carol" };

export const friends: readonly Identity[] = [john, sarah, alice, bob, carol];

export const categoryTree: readonly LedgerCategory[] = [
  {
    id: 1,
    name: "Food and drink",
    subcategories: [
      { id: 12, name: "Dining out" },
      { id: 13, name: "Groceries" },
      { id: 14, name: "Other" },
    ],
  },
  {
    id: 2,
    name: "Transportation",
    subcategories: [
      { id: 21, name: "Taxi" },
      { id: 22, name: "Parking" },
    ],
  },
];

export class FakeIdentityDirectory implements IdentityDirectory {
  readonly calls: string[] = [];

  constructor(private readonly identities: readonly Identity[] = friends) {}

  async findIdentity(token: string): Promise<Lookup<Identity>> {
    this.calls.push(token);
    const match = findMatchingIdentity(this.identities, token);
    return match === undefined ? notFound() : found(match);
  }
}

export class FakeCategoryDirectory implements CategoryDirectory {
  readonly calls: string[] = [];

  constructor(private readonly tree: readonly LedgerCategory[] = categoryTree) {}

  async findCategory(name: string): Promise<Lookup<number>> {
    this.calls.push(name);
    return selectCategoryId(this.tree, name);
  }
}

export class FakeExpenseSink implements ExpenseSink {
  readonly submitted: SubmissionRecord[] = [];
  private nextId = 5000;

  async submit(record: SubmissionRecord): Promise<SubmissionConfirmation> {
    this.submitted.push(record);
    const expenseId = this.nextId;
    this.nextId += 1;
    return { expenseId };
  }
}
