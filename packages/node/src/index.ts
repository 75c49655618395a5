/**
 * @splitrelay/node — Forwarding service, HTTP surface and wiring.
 */

export { ForwardingService } from "./services/forwarding-service.js";
export type {
  ForwardingSettings,
  ForwardingServiceOptions,
  ForwardOptions,
  ForwardOutcome,
  SubmittedForward,
  PreviewedForward,
  BlockedForward,
  LowConfidenceForward,
} from "./services/forwarding-service.js";
export { createLedgerCapabilities } from "./services/ledger-capabilities.js";
export type { LedgerCapabilities } from "./services/ledger-capabilities.js";
export {
  loadConfig,
  requireSetting,
  ConfigSchema,
  ConfigError,
  GROUP_ID_PLACEHOLDER,
} from "./config.js";
export type { AppConfig, CredentialSetting } from "./config.js";
export {
  createForwardingService,
  createLedgerClient,
  createOAuthClient,
  createExtractor,
} from "./bootstrap.js";
export type { BootstrapOptions } from "./bootstrap.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
