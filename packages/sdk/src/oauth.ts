/**
 * @splitrelay/sdk — OAuth 2.0 authorization-code flow.
 *
 * 1. authorizationUrl() → send the user there
 * 2. The provider redirects to the callback URL with ?code=...
 * 3. extractAuthorizationCode(callbackUrl) → code
 * 4. exchangeCode(code) → access token for LedgerClient
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { HttpClient } from "./http-client.js";
import type { AccessToken, AuthorizationRequest, OAuthClientConfig } from "./types.js";
import { ExternalServiceError } from "./types.js";

const DEFAULT_SCOPES = ["user", "expenses"] as const;

const TokenResponse = z.object({
  access_token: z.string().min(1).optional(),
  token_type: z.string().optional(),
});

export class OAuthClient {
  private readonly config: OAuthClientConfig;
  private readonly http: HttpClient;

  constructor(config: OAuthClientConfig) {
    this.config = config;
    this.http = new HttpClient({
      baseUrl: config.tokenUrl,
      timeout: config.timeout,
      retries: config.retries ?? 0,
      retryDelayMs: config.retryDelayMs,
      fetchFn: config.fetchFn,
    });
  }

  /**
   * Build the provider URL the user must visit to grant access.
   */
  authorizationUrl(state: string = randomUUID()): AuthorizationRequest {
    const url = new URL(this.config.authUrl);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("client_id", this.config.clientId);
    url.searchParams.set("redirect_uri", this.config.redirectUri);
    url.searchParams.set("scope", (this.config.scopes ?? DEFAULT_SCOPES).join(" "));
    url.searchParams.set("state", state);
    return { url: url.toString(), state };
  }

  /**
   * Pull the authorization code out of the URL the provider redirected to.
   *
   * @param expectedState - When given, the callback's state must match it
   */
  extractAuthorizationCode(callbackUrl: string, expectedState?: string): string {
    let url: URL;
    try {
      url = new URL(callbackUrl.trim());
    } catch {
      throw new ExternalServiceError(
        "AUTHORIZATION_CODE_MISSING",
        `Not a valid callback URL: "${callbackUrl}"`,
        0,
      );
    }

    const denied = url.searchParams.get("error");
    if (denied !== null) {
      throw new ExternalServiceError("AUTHORIZATION_DENIED", `Authorization was denied: ${denied}`, 0);
    }

    if (expectedState !== undefined && url.searchParams.get("state") !== expectedState) {
      throw new ExternalServiceError(
        "AUTHORIZATION_DENIED",
        "Callback state does not match the authorization request",
        0,
      );
    }

    const code = url.searchParams.get("code");
    if (code === null || code === "") {
      throw new ExternalServiceError(
        "AUTHORIZATION_CODE_MISSING",
        "Authorization code not found in callback URL",
        0,
      );
    }
    return code;
  }

  /**
   * Trade an authorization code for an access token.
   */
  async exchangeCode(code: string): Promise<AccessToken> {
    const response = await this.http.postForm("", {
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      grant_type: "authorization_code",
      code,
      redirect_uri: this.config.redirectUri,
    });

    const parsed = TokenResponse.safeParse(response.data);
    if (!parsed.success || parsed.data.access_token === undefined) {
      throw new ExternalServiceError(
        "TOKEN_MISSING",
        "Access token not found in token response",
        response.status,
      );
    }

    return {
      accessToken: parsed.data.access_token,
      tokenType: parsed.data.token_type ?? "bearer",
    };
  }
}
