/**
 * @splitrelay/sdk — SDK types.
 *
 * Types specific to the SDK client layer.
 * Domain types are imported from @splitrelay/types.
 */

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Transport settings shared by the ledger and OAuth clients.
 */
export interface TransportConfig {
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** First backoff delay in milliseconds; doubles per attempt, capped at 10s (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

/**
 * Configuration for the ledger API client.
 */
export interface LedgerClientConfig extends TransportConfig {
  /** Base URL of the ledger API (e.g., "https://secure.splitwise.com/api/v3.0") */
  readonly baseUrl: string;
  /** OAuth 2.0 bearer token; calls fail with TOKEN_MISSING without one */
  readonly accessToken?: string | undefined;
}

/**
 * Configuration for the OAuth 2.0 authorization-code flow.
 */
export interface OAuthClientConfig extends TransportConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly redirectUri: string;
  readonly authUrl: string;
  readonly tokenUrl: string;
  /** Requested scopes (default: ["user", "expenses"]) */
  readonly scopes?: readonly string[] | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * A raw API response. `data` is the parsed JSON body, still unchecked.
 */
export interface LedgerResponse<T = unknown> {
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

/** Query-string values accepted by GET requests. */
export type QueryParams = Readonly<Record<string, string | number | boolean | undefined>>;

// =============================================================================
// Ledger Records
// =============================================================================

/**
 * An expense as listed by the ledger API.
 */
export interface LedgerExpense {
  readonly id: number;
  readonly description: string;
  readonly cost: string;
  readonly currencyCode: string;
  readonly date?: string;
  readonly groupId?: number;
}

export interface ListExpensesParams {
  /** Maximum number of expenses (default: 10) */
  readonly limit?: number | undefined;
  readonly groupId?: number | undefined;
}

/**
 * Result of a successful token exchange.
 */
export interface AccessToken {
  readonly accessToken: string;
  readonly tokenType: string;
}

/**
 * Where to send the user, and the state value to check on the way back.
 */
export interface AuthorizationRequest {
  readonly url: string;
  readonly state: string;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the ledger API or the transport.
 *
 * Codes raised by the SDK:
 * - TIMEOUT, NETWORK_ERROR, SERVER_ERROR, CLIENT_ERROR (transport)
 * - UNAUTHENTICATED (401), TOKEN_MISSING (no token, or none returned)
 * - EXPENSE_REJECTED (the API refused an expense)
 * - INVALID_RESPONSE (a body that does not have the documented shape)
 * - AUTHORIZATION_DENIED, AUTHORIZATION_CODE_MISSING (OAuth callback)
 */
export class ExternalServiceError extends Error {
  /** Error code (e.g., "TIMEOUT", "EXPENSE_REJECTED") */
  readonly code: string;
  /** HTTP status code, 0 when no response was received */
  readonly statusCode: number;
  /** Additional error details (API error messages, schema issues) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "ExternalServiceError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
