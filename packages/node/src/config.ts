/**
 * @splitrelay/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Entry points load `.env` through dotenv before calling loadConfig().
 */

import { z } from "zod";
import { DEFAULT_EXTRACTION_MODEL } from "@splitrelay/extractor";

// =============================================================================
// Schema
// =============================================================================

/** Value shipped in the sample .env file; treated as unset. */
export const GROUP_ID_PLACEHOLDER = "your_default_group_id_here";

function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const optionalSetting = z.preprocess(blankToUndefined, z.string().trim().optional());

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Ledger API
  LEDGER_API_URL: z.string().url().default("https://secure.splitwise.com/api/v3.0"),
  LEDGER_AUTH_URL: z.string().url().default("https://secure.splitwise.com/oauth/authorize"),
  LEDGER_TOKEN_URL: z.string().url().default("https://secure.splitwise.com/oauth/token"),
  LEDGER_REDIRECT_URI: z.string().url().default("http://localhost:8080/callback"),
  LEDGER_CLIENT_ID: optionalSetting,
  LEDGER_CLIENT_SECRET: optionalSetting,
  LEDGER_ACCESS_TOKEN: optionalSetting,
  LEDGER_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30000),
  LEDGER_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  // Extraction
  ANTHROPIC_API_KEY: optionalSetting,
  EXTRACTION_MODEL: z.string().min(1).default(DEFAULT_EXTRACTION_MODEL),
  MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.5),

  // Conversion defaults
  DEFAULT_CURRENCY: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z]{3}$/, "Must be a 3-letter currency code")
    .default("USD"),
  DEFAULT_GROUP_ID: z.preprocess(
    (value) => (value === GROUP_ID_PLACEHOLDER ? undefined : blankToUndefined(value)),
    z.coerce.number().int().positive().optional(),
  ),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Credentials
// =============================================================================

export type CredentialSetting =
  | "LEDGER_CLIENT_ID"
  | "LEDGER_CLIENT_SECRET"
  | "LEDGER_ACCESS_TOKEN"
  | "ANTHROPIC_API_KEY";

/**
 * A setting a command needs is not configured.
 */
export class ConfigError extends Error {
  readonly code = "CONFIG_MISSING";
  readonly setting: CredentialSetting;

  constructor(setting: CredentialSetting) {
    super(`${setting} is not set. Add it to the environment or the .env file.`);
    this.name = "ConfigError";
    this.setting = setting;
  }
}

/**
 * Read a credential that the current command cannot run without.
 *
 * @throws {ConfigError} when the setting is unset or blank
 */
export function requireSetting(config: AppConfig, key: CredentialSetting): string {
  const value = config[key];
  if (value === undefined) {
    throw new ConfigError(key);
  }
  return value;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
