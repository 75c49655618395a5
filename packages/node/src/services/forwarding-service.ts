/**
 * ForwardingService — Composition root for the forwarding pipeline.
 *
 * extract → confidence gate → convert → submit.
 *
 * Route handlers and CLI commands delegate to this service; they never
 * talk to the converter, extractor or ledger client directly. The
 * principal is loaded once per service and shared by every conversion.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { CurrencyCode, Identity, LedgerGroup, SubmissionRecord } from "@splitrelay/types";
import { ExpenseConverter } from "@splitrelay/converter";
import type {
  BalanceInvariantError,
  ConversionResult,
  ConversionWarning,
} from "@splitrelay/converter";
import { meetsConfidence } from "@splitrelay/extractor";
import type { ExpenseExtractor, ExtractionResult } from "@splitrelay/extractor";
import { ConfigError } from "../config.js";
import type { LedgerCapabilities } from "./ledger-capabilities.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ForwardingSettings {
  readonly defaultCurrency: CurrencyCode;
  readonly defaultGroupId?: number | undefined;
  /** Extractions below this confidence are not converted */
  readonly minConfidence: number;
}

export interface ForwardingServiceOptions {
  readonly capabilities: LedgerCapabilities;
  /** Without one, forwardEmail() fails with CONFIG_MISSING */
  readonly extractor?: ExpenseExtractor | undefined;
  readonly settings: ForwardingSettings;
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
}

export interface ForwardOptions {
  /** Overrides the default group for this expense */
  readonly groupId?: number | undefined;
  /** Convert and validate, but do not submit */
  readonly dryRun?: boolean | undefined;
}

// =============================================================================
// Outcomes
// =============================================================================

export interface SubmittedForward {
  readonly status: "submitted";
  readonly extraction: ExtractionResult;
  readonly record: SubmissionRecord;
  readonly expenseId: number;
  readonly warnings: readonly ConversionWarning[];
}

export interface PreviewedForward {
  readonly status: "previewed";
  readonly extraction: ExtractionResult;
  readonly record: SubmissionRecord;
  readonly warnings: readonly ConversionWarning[];
}

export interface BlockedForward {
  readonly status: "blocked";
  readonly extraction: ExtractionResult;
  readonly record: SubmissionRecord;
  readonly error: BalanceInvariantError;
  readonly warnings: readonly ConversionWarning[];
}

export interface LowConfidenceForward {
  readonly status: "low-confidence";
  readonly extraction: ExtractionResult;
  readonly minConfidence: number;
}

export type ForwardOutcome =
  | SubmittedForward
  | PreviewedForward
  | BlockedForward
  | LowConfidenceForward;

// =============================================================================
// Service
// =============================================================================

interface Session {
  readonly principal: Identity;
  readonly converter: ExpenseConverter;
}

export class ForwardingService {
  private readonly capabilities: LedgerCapabilities;
  private readonly extractor: ExpenseExtractor | undefined;
  private readonly settings: ForwardingSettings;
  private readonly logger: Logger;
  private sessionPromise: Promise<Session> | undefined;

  constructor(options: ForwardingServiceOptions) {
    this.capabilities = options.capabilities;
    this.extractor = options.extractor;
    this.settings = options.settings;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  /** Whether an extractor is configured, i.e. forwardEmail() can run */
  get canExtract(): boolean {
    return this.extractor !== undefined;
  }

  // ─── Forwarding ──────────────────────────────────────────────────

  /**
   * Turn a forwarded email into a ledger expense.
   *
   * @throws {ConfigError} when no extractor is configured
   * @throws {ExtractionError} for a blank email or an unusable model reply
   * @throws {InputValidationError} when the extracted expense is malformed
   * @throws {ExternalServiceError} when a ledger call fails
   */
  async forwardEmail(email: unknown, options: ForwardOptions = {}): Promise<ForwardOutcome> {
    if (this.extractor === undefined) {
      throw new ConfigError("ANTHROPIC_API_KEY");
    }

    const extraction = await this.extractor.extract(email);
    if (!meetsConfidence(extraction, this.settings.minConfidence)) {
      this.logger.warn(
        { confidence: extraction.confidence, minConfidence: this.settings.minConfidence },
        "Extraction confidence below threshold; nothing submitted",
      );
      return { status: "low-confidence", extraction, minConfidence: this.settings.minConfidence };
    }

    const { converter } = await this.session();
    const result = await converter.convert(extraction.candidate, options.groupId);
    if (!result.ok) {
      return {
        status: "blocked",
        extraction,
        record: result.record,
        error: result.error,
        warnings: result.warnings,
      };
    }

    if (options.dryRun === true) {
      return { status: "previewed", extraction, record: result.record, warnings: result.warnings };
    }

    const outcome = await converter.submit(result.record, result.warnings);
    if (outcome.status === "blocked") {
      return { ...outcome, extraction };
    }

    return {
      status: "submitted",
      extraction,
      record: outcome.record,
      expenseId: outcome.confirmation.expenseId,
      warnings: outcome.warnings,
    };
  }

  /**
   * Convert an already-extracted candidate without submitting it.
   *
   * @throws {InputValidationError} when the candidate is malformed
   */
  async preview(candidate: unknown, groupId?: number): Promise<ConversionResult> {
    const { converter } = await this.session();
    return converter.convert(candidate, groupId);
  }

  // ─── Directory ───────────────────────────────────────────────────

  async principal(): Promise<Identity> {
    return (await this.session()).principal;
  }

  friends(): Promise<readonly Identity[]> {
    return this.capabilities.listFriends();
  }

  groups(): Promise<readonly LedgerGroup[]> {
    return this.capabilities.listGroups();
  }

  // ─── Session ─────────────────────────────────────────────────────

  /**
   * Load the principal once. A failed load is forgotten so the next
   * call retries it.
   */
  private async session(): Promise<Session> {
    this.sessionPromise ??= this.openSession();
    try {
      return await this.sessionPromise;
    } catch (error) {
      this.sessionPromise = undefined;
      throw error;
    }
  }

  private async openSession(): Promise<Session> {
    const principal = await this.capabilities.currentUser();
    this.logger.info({ principalId: principal.id }, "Principal loaded");

    const converter = new ExpenseConverter({
      principal,
      identities: this.capabilities,
      categories: this.capabilities,
      sink: this.capabilities,
      config: {
        defaultCurrency: this.settings.defaultCurrency,
        defaultGroupId: this.settings.defaultGroupId,
      },
      logger: this.logger.child({ component: "converter" }),
    });

    return { principal, converter };
  }
}
