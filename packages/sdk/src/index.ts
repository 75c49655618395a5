/**
 * @splitrelay/sdk — Typed client for the ledger API.
 *
 * Usage:
 * ```typescript
 * import { LedgerClient } from "@splitrelay/sdk";
 *
 * const client = new LedgerClient({
 *   baseUrl: "https://secure.splitwise.com/api/v3.0",
 *   accessToken: "test-token",
 * });
 *
 * const friends = await client.friends.list();
 * ```
 */

// Main client
export { LedgerClient, serializeExpense } from "./client.js";
export type { CallOptions } from "./client.js";

// OAuth flow
export { OAuthClient } from "./oauth.js";

// Low-level HTTP client (for advanced use)
export { HttpClient, extractErrorMessages } from "./http-client.js";
export type { HttpClientConfig, RequestOptions } from "./http-client.js";

// Types
export type {
  TransportConfig,
  LedgerClientConfig,
  OAuthClientConfig,
  LedgerResponse,
  QueryParams,
  LedgerExpense,
  ListExpensesParams,
  AccessToken,
  AuthorizationRequest,
} from "./types.js";

export { ExternalServiceError } from "./types.js";
