/**
 * Expense Converter — turns a candidate expense into a balanced
 * submission record and, on request, hands it to the ledger.
 *
 * Pipeline:
 * 1. Validate the candidate (throws before any lookup)
 * 2. Resolve participants, principal first
 * 3. Determine the payer among them
 * 4. Compute equal shares
 * 5. Resolve the category, best-effort
 * 6. Run the balance gate
 *
 * Capability failures propagate unchanged. Nothing is retried here.
 */

import pino from "pino";
import type { Logger } from "pino";
import { computeShares, validateSubmission } from "@splitrelay/split";
import type {
  CategoryDirectory,
  ExpenseSink,
  Identity,
  SubmissionRecord,
} from "@splitrelay/types";
import { parseCandidate } from "./candidate.js";
import { BalanceInvariantError } from "./errors.js";
import { IdentityResolver } from "./identity-resolver.js";
import { determinePayer } from "./payer.js";
import type {
  ConversionResult,
  ConversionWarning,
  ConverterConfig,
  ExpenseConverterOptions,
  SubmissionOutcome,
} from "./types.js";

export class ExpenseConverter {
  private readonly principal: Identity;
  private readonly resolver: IdentityResolver;
  private readonly categories: CategoryDirectory;
  private readonly sink: ExpenseSink;
  private readonly config: ConverterConfig;
  private readonly logger: Logger;

  constructor(options: ExpenseConverterOptions) {
    this.principal = options.principal;
    this.resolver = new IdentityResolver(options.identities);
    this.categories = options.categories;
    this.sink = options.sink;
    this.config = options.config;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  /**
   * Build and validate a submission record without submitting it.
   *
   * @throws {InputValidationError} when the candidate is malformed
   */
  async convert(input: unknown, groupId?: number): Promise<ConversionResult> {
    const candidate = parseCandidate(input, this.config.defaultCurrency);
    const warnings: ConversionWarning[] = [];

    const resolved = await this.resolver.resolve(candidate.participants, this.principal);
    warnings.push(...resolved.warnings);

    const { payer, warning: payerWarning } = determinePayer(
      candidate.payer,
      resolved.participants,
      this.principal,
    );
    if (payerWarning !== undefined) {
      warnings.push(payerWarning);
    }

    const split = computeShares(candidate.amount, resolved.participants, payer, candidate.splitPolicy);
    if (split.downgradedFrom !== undefined) {
      warnings.push({
        kind: "policy-downgraded",
        subject: split.downgradedFrom,
        message: `Split policy "${split.downgradedFrom}" is not supported; split equally instead`,
      });
    }

    let categoryId: number | undefined;
    if (candidate.category !== undefined) {
      const lookup = await this.categories.findCategory(candidate.category);
      if (lookup.found) {
        categoryId = lookup.value;
      } else {
        warnings.push({
          kind: "category-unresolved",
          subject: candidate.category,
          message: `No category matches "${candidate.category}"; expense left uncategorized`,
        });
      }
    }

    const group = groupId ?? this.config.defaultGroupId;
    const record: SubmissionRecord = Object.freeze({
      cost: candidate.amount,
      description: candidate.description,
      currencyCode: candidate.currency,
      ...(candidate.date !== undefined ? { date: `${candidate.date}T00:00:00Z` } : {}),
      ...(categoryId !== undefined ? { categoryId } : {}),
      ...(group !== undefined ? { groupId: group } : {}),
      shares: Object.freeze(split.lines.map((line) => Object.freeze({ ...line }))),
      splitEqually: true,
    });

    this.logWarnings(warnings);

    const validation = validateSubmission(record);
    if (!validation.valid) {
      this.logger.error({ check: validation.reason }, validation.message);
      return { ok: false, error: new BalanceInvariantError(validation), record, warnings };
    }

    this.logger.debug(
      { cost: record.cost, participants: record.shares.length, payerId: payer.id },
      "Expense converted",
    );
    return { ok: true, candidate, payer, record, warnings };
  }

  /**
   * Convert and, when the record balances, submit it.
   *
   * @throws {InputValidationError} when the candidate is malformed
   */
  async forward(input: unknown, groupId?: number): Promise<SubmissionOutcome> {
    const result = await this.convert(input, groupId);
    if (!result.ok) {
      return { status: "blocked", record: result.record, error: result.error, warnings: result.warnings };
    }
    return this.submit(result.record, result.warnings);
  }

  /**
   * Gate a finished record and submit it.
   * A record failing the balance check never reaches the sink.
   */
  async submit(
    record: SubmissionRecord,
    warnings: readonly ConversionWarning[] = [],
  ): Promise<SubmissionOutcome> {
    const validation = validateSubmission(record);
    if (!validation.valid) {
      this.logger.error({ check: validation.reason }, `Submission blocked: ${validation.message}`);
      return { status: "blocked", record, error: new BalanceInvariantError(validation), warnings };
    }

    const confirmation = await this.sink.submit(record);
    this.logger.info({ expenseId: confirmation.expenseId, cost: record.cost }, "Expense submitted");
    return { status: "submitted", record, confirmation, warnings };
  }

  private logWarnings(warnings: readonly ConversionWarning[]): void {
    for (const warning of warnings) {
      this.logger.warn({ kind: warning.kind, subject: warning.subject }, warning.message);
    }
  }
}
