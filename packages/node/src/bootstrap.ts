/**
 * Wiring from configuration to live clients.
 *
 * Shared by the HTTP server and the CLI. Nothing here performs I/O:
 * clients connect on first use.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { Logger } from "pino";
import { LedgerClient, OAuthClient } from "@splitrelay/sdk";
import { ExpenseExtractor, createAnthropicCompletionClient } from "@splitrelay/extractor";
import type { AppConfig } from "./config.js";
import { requireSetting } from "./config.js";
import { createLedgerCapabilities } from "./services/ledger-capabilities.js";
import { ForwardingService } from "./services/forwarding-service.js";

export interface BootstrapOptions {
  readonly logger: Logger;
  /** Replaces global fetch for ledger calls */
  readonly fetchFn?: typeof fetch | undefined;
}

/**
 * Ledger client for the configured account. Without LEDGER_ACCESS_TOKEN
 * every call fails with TOKEN_MISSING.
 */
export function createLedgerClient(config: AppConfig, fetchFn?: typeof fetch): LedgerClient {
  return new LedgerClient({
    baseUrl: config.LEDGER_API_URL,
    accessToken: config.LEDGER_ACCESS_TOKEN,
    timeout: config.LEDGER_TIMEOUT_MS,
    retries: config.LEDGER_RETRIES,
    fetchFn,
  });
}

/**
 * @throws {ConfigError} when the client id or secret is missing
 */
export function createOAuthClient(config: AppConfig, fetchFn?: typeof fetch): OAuthClient {
  return new OAuthClient({
    clientId: requireSetting(config, "LEDGER_CLIENT_ID"),
    clientSecret: requireSetting(config, "LEDGER_CLIENT_SECRET"),
    redirectUri: config.LEDGER_REDIRECT_URI,
    authUrl: config.LEDGER_AUTH_URL,
    tokenUrl: config.LEDGER_TOKEN_URL,
    timeout: config.LEDGER_TIMEOUT_MS,
    fetchFn,
  });
}

/**
 * Extractor backed by the Anthropic API, or undefined when
 * ANTHROPIC_API_KEY is not set.
 */
export function createExtractor(config: AppConfig, logger: Logger): ExpenseExtractor | undefined {
  if (config.ANTHROPIC_API_KEY === undefined) {
    return undefined;
  }
  const anthropic = new Anthropic({ apiKey: config.ANTHROPIC_API_KEY });
  return new ExpenseExtractor(
    createAnthropicCompletionClient(anthropic, { model: config.EXTRACTION_MODEL }),
    { logger: logger.child({ component: "extractor" }) },
  );
}

export function createForwardingService(
  config: AppConfig,
  options: BootstrapOptions,
): ForwardingService {
  return new ForwardingService({
    capabilities: createLedgerCapabilities(createLedgerClient(config, options.fetchFn)),
    extractor: createExtractor(config, options.logger),
    settings: {
      defaultCurrency: config.DEFAULT_CURRENCY,
      defaultGroupId: config.DEFAULT_GROUP_ID,
      minConfidence: config.MIN_CONFIDENCE,
    },
    logger: options.logger.child({ component: "forwarding" }),
  });
}
