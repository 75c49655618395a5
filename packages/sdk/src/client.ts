/**
 * @splitrelay/sdk — Ledger Client.
 *
 * Main entry point for the ledger API.
 *
 * Provides typed methods for:
 * - The authenticated user (users.current)
 * - Directory data (friends, groups, categories)
 * - Expenses (create, list)
 *
 * Design:
 * - Delegates to HttpClient for transport
 * - Namespace grouping: client.users, client.friends, client.expenses, ...
 * - Every response body is checked against a zod schema before use
 * - Snake-case wire fields are mapped to the camel-case domain types
 */

import { z } from "zod";
import type {
  Identity,
  LedgerCategory,
  LedgerGroup,
  SubmissionConfirmation,
  SubmissionRecord,
} from "@splitrelay/types";
import { HttpClient, extractErrorMessages } from "./http-client.js";
import type { RequestOptions } from "./http-client.js";
import type {
  LedgerClientConfig,
  LedgerExpense,
  LedgerResponse,
  ListExpensesParams,
  QueryParams,
} from "./types.js";
import { ExternalServiceError } from "./types.js";

// =============================================================================
// Wire Schemas
// =============================================================================

const UserSchema = z.object({
  id: z.number().int(),
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
  email: z.string().nullish(),
});

const GroupSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  members: z.array(z.object({ id: z.number().int() })).nullish(),
});

const CategorySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  subcategories: z.array(z.object({ id: z.number().int(), name: z.string() })).nullish(),
});

const ExpenseSchema = z.object({
  id: z.number().int(),
  description: z.string().nullish(),
  cost: z.string(),
  currency_code: z.string(),
  date: z.string().nullish(),
  group_id: z.number().int().nullish(),
});

const CurrentUserResponse = z.object({ user: UserSchema });
const FriendsResponse = z.object({ friends: z.array(UserSchema) });
const GroupsResponse = z.object({ groups: z.array(GroupSchema) });
const CategoriesResponse = z.object({ categories: z.array(CategorySchema) });
const ExpensesResponse = z.object({ expenses: z.array(ExpenseSchema) });

const CreateExpenseResponse = z.object({
  expenses: z.array(z.object({ id: z.number().int() })).default([]),
  errors: z.unknown().optional(),
});

// =============================================================================
// Mapping
// =============================================================================

function toIdentity(user: z.infer<typeof UserSchema>): Identity {
  const lastName = user.last_name ?? "";
  const email = user.email ?? "";
  return {
    id: user.id,
    firstName: user.first_name ?? "",
    ...(lastName !== "" ? { lastName } : {}),
    ...(email !== "" ? { email } : {}),
  };
}

function toGroup(group: z.infer<typeof GroupSchema>): LedgerGroup {
  return {
    id: group.id,
    name: group.name,
    memberIds: (group.members ?? []).map((member) => member.id),
  };
}

function toCategory(category: z.infer<typeof CategorySchema>): LedgerCategory {
  return {
    id: category.id,
    name: category.name,
    subcategories: (category.subcategories ?? []).map((sub) => ({ id: sub.id, name: sub.name })),
  };
}

function toExpense(expense: z.infer<typeof ExpenseSchema>): LedgerExpense {
  return {
    id: expense.id,
    description: expense.description ?? "",
    cost: expense.cost,
    currencyCode: expense.currency_code,
    ...(expense.date !== undefined && expense.date !== null ? { date: expense.date } : {}),
    ...(expense.group_id !== undefined && expense.group_id !== null ? { groupId: expense.group_id } : {}),
  };
}

/**
 * Serialize a submission record to the ledger's flattened form:
 * share lines become `users__<i>__user_id`, `users__<i>__paid_share`
 * and `users__<i>__owed_share`. Absent optionals are left out.
 *
 * `split_equally` is only sent for a record without share lines: the
 * ledger would otherwise divide the cost itself and ignore the lines.
 */
export function serializeExpense(record: SubmissionRecord): Record<string, string | number | boolean> {
  const body: Record<string, string | number | boolean> = {
    cost: record.cost,
    description: record.description,
    currency_code: record.currencyCode,
  };

  if (record.splitEqually && record.shares.length === 0) {
    body["split_equally"] = true;
  }

  if (record.date !== undefined) {
    body["date"] = record.date;
  }
  if (record.categoryId !== undefined) {
    body["category_id"] = record.categoryId;
  }
  if (record.groupId !== undefined) {
    body["group_id"] = record.groupId;
  }

  record.shares.forEach((line, index) => {
    body[`users__${index}__user_id`] = line.userId;
    body[`users__${index}__paid_share`] = line.paidShare;
    body[`users__${index}__owed_share`] = line.owedShare;
  });

  return body;
}

/**
 * Check a response body against its schema.
 */
function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  response: LedgerResponse,
  endpoint: string,
): z.infer<S> {
  const result = schema.safeParse(response.data);
  if (!result.success) {
    throw new ExternalServiceError(
      "INVALID_RESPONSE",
      `Unexpected response from ${endpoint}`,
      response.status,
      result.error.issues,
    );
  }
  return result.data;
}

// =============================================================================
// Namespace Classes
// =============================================================================

/**
 * The authenticated user.
 */
class UsersNamespace {
  constructor(private readonly client: LedgerClient) {}

  async current(): Promise<Identity> {
    const response = await this.client.call("/get_current_user");
    return toIdentity(parseBody(CurrentUserResponse, response, "get_current_user").user);
  }
}

/**
 * The authenticated user's friends.
 */
class FriendsNamespace {
  constructor(private readonly client: LedgerClient) {}

  async list(): Promise<readonly Identity[]> {
    const response = await this.client.call("/get_friends");
    return parseBody(FriendsResponse, response, "get_friends").friends.map(toIdentity);
  }
}

/**
 * Groups the authenticated user belongs to.
 */
class GroupsNamespace {
  constructor(private readonly client: LedgerClient) {}

  async list(): Promise<readonly LedgerGroup[]> {
    const response = await this.client.call("/get_groups");
    return parseBody(GroupsResponse, response, "get_groups").groups.map(toGroup);
  }
}

/**
 * The ledger's category tree.
 */
class CategoriesNamespace {
  constructor(private readonly client: LedgerClient) {}

  async list(): Promise<readonly LedgerCategory[]> {
    const response = await this.client.call("/get_categories");
    return parseBody(CategoriesResponse, response, "get_categories").categories.map(toCategory);
  }
}

/**
 * Expense creation and listing.
 */
class ExpensesNamespace {
  constructor(private readonly client: LedgerClient) {}

  /**
   * Store an expense. Sent once, never retried: a failure after the
   * ledger stored the expense would otherwise create a duplicate.
   * The API reports validation problems in an `errors` field with a
   * 200 status; those become EXPENSE_REJECTED.
   */
  async create(record: SubmissionRecord): Promise<SubmissionConfirmation> {
    const response = await this.client.call("/create_expense", {
      body: serializeExpense(record),
      retry: false,
    });
    const body = parseBody(CreateExpenseResponse, response, "create_expense");

    const messages = extractErrorMessages({ errors: body.errors });
    if (messages.length > 0) {
      throw new ExternalServiceError(
        "EXPENSE_REJECTED",
        `Ledger rejected the expense: ${messages.join("; ")}`,
        response.status,
        body.errors,
      );
    }

    const created = body.expenses[0];
    if (created === undefined) {
      throw new ExternalServiceError(
        "EXPENSE_REJECTED",
        "Ledger returned no expense for the submission",
        response.status,
      );
    }

    return { expenseId: created.id };
  }

  /**
   * Most recent expenses, newest first.
   */
  async list(params?: ListExpensesParams): Promise<readonly LedgerExpense[]> {
    const response = await this.client.call("/get_expenses", {
      query: { limit: params?.limit ?? 10, group_id: params?.groupId },
    });
    return parseBody(ExpensesResponse, response, "get_expenses").expenses.map(toExpense);
  }
}

// =============================================================================
// Ledger Client
// =============================================================================

/**
 * One API call: GET with `query`, or POST with `body`.
 */
export interface CallOptions extends RequestOptions {
  readonly body?: unknown;
  readonly query?: QueryParams | undefined;
}

/**
 * Ledger API client.
 *
 * Usage:
 * ```typescript
 * const client = new LedgerClient({
 *   baseUrl: "https://secure.splitwise.com/api/v3.0",
 *   accessToken: "test-token",
 * });
 *
 * const me = await client.users.current();
 * const friends = await client.friends.list();
 * const { expenseId } = await client.expenses.create(record);
 * ```
 */
export class LedgerClient {
  private readonly http: HttpClient;

  /** Authenticated user */
  readonly users: UsersNamespace;

  /** Friends directory */
  readonly friends: FriendsNamespace;

  /** Groups */
  readonly groups: GroupsNamespace;

  /** Category tree */
  readonly categories: CategoriesNamespace;

  /** Expense operations */
  readonly expenses: ExpensesNamespace;

  constructor(config: LedgerClientConfig) {
    this.http = new HttpClient(config);
    this.users = new UsersNamespace(this);
    this.friends = new FriendsNamespace(this);
    this.groups = new GroupsNamespace(this);
    this.categories = new CategoriesNamespace(this);
    this.expenses = new ExpensesNamespace(this);
  }

  /**
   * Issue an authenticated call: GET without a body, POST with one.
   *
   * @internal Used by the namespaces
   * @throws {ExternalServiceError} TOKEN_MISSING when no access token is configured
   */
  async call(path: string, options: CallOptions = {}): Promise<LedgerResponse> {
    if (!this.http.authenticated) {
      throw new ExternalServiceError(
        "TOKEN_MISSING",
        "Access token is required. Authenticate first.",
        0,
      );
    }
    return options.body === undefined
      ? this.http.get(path, options.query)
      : this.http.post(path, options.body, { retry: options.retry });
  }
}
