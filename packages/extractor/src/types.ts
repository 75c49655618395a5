/**
 * @splitrelay/extractor — Types.
 *
 * The extractor turns free email text into an untyped candidate expense.
 * It never validates the candidate itself; that is the converter's job.
 */

// ─── Input ───────────────────────────────────────────────────────────────

export interface EmailContent {
  readonly subject: string;
  readonly body: string;
  readonly sender?: string;
}

// ─── Completion Port ─────────────────────────────────────────────────────

export interface CompletionRequest {
  readonly system: string;
  readonly prompt: string;
}

/**
 * A text-in, text-out language model call.
 * Implementations own the model choice, transport and retries.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

// ─── Output ──────────────────────────────────────────────────────────────

export interface ExtractionResult {
  /** The model's expense object, unvalidated */
  readonly candidate: unknown;
  /** Model-reported confidence in [0, 1] */
  readonly confidence: number;
  readonly notes?: string;
  /** One-line human summary of the expense */
  readonly summary?: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type ExtractionErrorCode = "INVALID_EMAIL" | "EXTRACTION_FAILED";

export class ExtractionError extends Error {
  public readonly code: ExtractionErrorCode;
  public readonly details?: unknown;

  constructor(code: ExtractionErrorCode, message: string, details?: unknown, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExtractionError";
    this.code = code;
    this.details = details;
  }
}
