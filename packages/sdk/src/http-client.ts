/**
 * @splitrelay/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Bearer token injection
 * - Request ID generation
 * - Timeout handling
 * - Retry logic (exponential backoff for 5xx, network errors and timeouts),
 *   which a non-idempotent call turns off with `retry: false`
 * - Error normalization
 *
 * Design:
 * - Uses native fetch; bodies come back as unchecked JSON
 * - Callers validate response shapes
 * - Custom fetch function for testing
 */

import { z } from "zod";
import type { LedgerResponse, QueryParams, TransportConfig } from "./types.js";
import { ExternalServiceError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

const MAX_BACKOFF_MS = 10000;

/** Generate a simple request ID */
function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/** Sleep for the given number of milliseconds */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return { raw: text };
  }
}

/**
 * Extract selected headers from a Response.
 */
function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = [
    "content-type",
    "x-request-id",
    "x-ratelimit-remaining",
    "retry-after",
  ];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

const ErrorBodySchema = z.object({
  error: z.string().optional(),
  errors: z
    .union([
      z.array(z.string()),
      z.record(z.union([z.string(), z.array(z.string())])),
    ])
    .optional(),
});

/**
 * Collect the human-readable messages from a ledger error body.
 *
 * Handles `{ error: "..." }`, `{ errors: ["..."] }` and
 * `{ errors: { base: ["..."], cost: "..." } }`.
 */
export function extractErrorMessages(body: unknown): string[] {
  const parsed = ErrorBodySchema.safeParse(body);
  if (!parsed.success) {
    return [];
  }

  const messages: string[] = [];
  if (parsed.data.error !== undefined && parsed.data.error !== "") {
    messages.push(parsed.data.error);
  }

  const errors = parsed.data.errors;
  if (Array.isArray(errors)) {
    messages.push(...errors);
  } else if (errors !== undefined) {
    for (const value of Object.values(errors)) {
      messages.push(...(Array.isArray(value) ? value : [value]));
    }
  }

  return messages.filter((message) => message.trim() !== "");
}

function errorCodeForStatus(status: number): string {
  if (status === 401) {
    return "UNAUTHENTICATED";
  }
  return status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR";
}

// =============================================================================
// HTTP Client
// =============================================================================

export interface HttpClientConfig extends TransportConfig {
  readonly baseUrl: string;
  readonly accessToken?: string | undefined;
}

export interface RequestOptions {
  /** Default true. A call that must reach the server at most once passes false. */
  readonly retry?: boolean | undefined;
}

type RequestBody =
  | { readonly kind: "json"; readonly value: unknown }
  | { readonly kind: "form"; readonly value: Readonly<Record<string, string>> };

/**
 * Low-level HTTP client for the ledger API.
 *
 * Provides get/post methods with automatic retries,
 * timeout handling, and error normalization.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly accessToken: string | undefined;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.accessToken = config.accessToken;
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /** Whether requests will carry a bearer token. */
  get authenticated(): boolean {
    return this.accessToken !== undefined;
  }

  /**
   * Perform a GET request. Undefined query values are left out.
   */
  async get(path: string, query?: QueryParams): Promise<LedgerResponse> {
    let target = path;
    if (query !== undefined) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          params.set(key, String(value));
        }
      }
      const qs = params.toString();
      if (qs !== "") {
        target = `${path}?${qs}`;
      }
    }
    return this.request("GET", target);
  }

  /**
   * Perform a POST request with a JSON body.
   */
  async post(path: string, body: unknown, options: RequestOptions = {}): Promise<LedgerResponse> {
    return this.request("POST", path, { kind: "json", value: body }, options);
  }

  /**
   * Perform a POST request with a form-encoded body.
   */
  async postForm(
    path: string,
    form: Readonly<Record<string, string>>,
    options: RequestOptions = {},
  ): Promise<LedgerResponse> {
    return this.request("POST", path, { kind: "form", value: form }, options);
  }

  /**
   * Core request method with retry logic.
   */
  private async request(
    method: string,
    path: string,
    body?: RequestBody,
    options: RequestOptions = {},
  ): Promise<LedgerResponse> {
    const url = `${this.baseUrl}${path}`;
    const maxRetries = options.retry === false ? 0 : this.maxRetries;
    const requestId = generateRequestId();

    const headers: Record<string, string> = {
      "Accept": "application/json",
      "X-Request-Id": requestId,
    };

    if (this.accessToken !== undefined) {
      headers["Authorization"] = `Bearer ${this.accessToken}`;
    }

    const init: RequestInit = {
      method,
      headers,
    };

    if (body?.kind === "json") {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(body.value);
    } else if (body?.kind === "form") {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      init.body = new URLSearchParams(body.value).toString();
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, init);
        const responseBody = await parseResponseBody(response);
        const responseHeaders = extractHeaders(response);

        // 2xx → success
        if (response.ok) {
          return {
            data: responseBody,
            status: response.status,
            headers: responseHeaders,
          };
        }

        const messages = extractErrorMessages(responseBody);

        // 4xx → don't retry (client errors)
        if (response.status >= 400 && response.status < 500) {
          throw new ExternalServiceError(
            errorCodeForStatus(response.status),
            messages.length > 0 ? messages.join("; ") : `HTTP ${response.status}`,
            response.status,
            responseBody,
          );
        }

        // 5xx → retry with backoff
        if (response.status >= 500 && attempt < maxRetries) {
          lastError = new ExternalServiceError("SERVER_ERROR", `HTTP ${response.status}`, response.status);
          await sleep(this.backoff(attempt));
          continue;
        }

        // 5xx on last attempt
        throw new ExternalServiceError(
          errorCodeForStatus(response.status),
          messages.length > 0
            ? messages.join("; ")
            : `HTTP ${response.status} after ${attempt + 1} attempts`,
          response.status,
          responseBody,
        );
      } catch (error) {
        if (error instanceof ExternalServiceError && error.code !== "TIMEOUT") {
          throw error;
        }

        // Network / timeout errors → retry
        if (attempt < maxRetries) {
          lastError = error instanceof Error ? error : new Error(String(error));
          await sleep(this.backoff(attempt));
          continue;
        }

        if (error instanceof ExternalServiceError) {
          throw error;
        }

        throw new ExternalServiceError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : (lastError?.message ?? "Network error"),
          0,
        );
      }
    }

    // Unreachable: the last attempt always returns or throws
    throw new ExternalServiceError(
      "NETWORK_ERROR",
      lastError?.message ?? "Request failed after all retries",
      0,
    );
  }

  private backoff(attempt: number): number {
    return Math.min(this.retryDelayMs * Math.pow(2, attempt), MAX_BACKOFF_MS);
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new ExternalServiceError(
          "TIMEOUT",
          `Request timed out after ${this.timeout}ms`,
          0,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
