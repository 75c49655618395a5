/**
 * Expense Extractor.
 *
 * email → prompt → completion → first JSON object → envelope check.
 * The expense inside the envelope is passed on untouched.
 */

import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";
import { parseEmail } from "./email.js";
import { buildExtractionPrompt, SYSTEM_PROMPT } from "./prompt.js";
import type { CompletionClient, ExtractionResult } from "./types.js";
import { ExtractionError } from "./types.js";

/** Confidence below which a result should not be acted on. */
export const DEFAULT_MIN_CONFIDENCE = 0.5;

const JSON_OBJECT = /\{[\s\S]*\}/;

const EnvelopeSchema = z.object({
  expense: z.unknown().refine((value) => value !== undefined && value !== null, "Expense is missing"),
  confidence: z.number().min(0).max(1),
  notes: z.string().nullish(),
  summary: z.string().nullish(),
});

/**
 * The outermost `{...}` span of a model reply, with any prose or code
 * fences around it dropped.
 */
export function extractJsonObject(text: string): string | undefined {
  return JSON_OBJECT.exec(text)?.[0];
}

export function meetsConfidence(
  result: Pick<ExtractionResult, "confidence">,
  minConfidence: number = DEFAULT_MIN_CONFIDENCE,
): boolean {
  return result.confidence >= minConfidence;
}

export interface ExpenseExtractorOptions {
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
}

export class ExpenseExtractor {
  private readonly logger: Logger;

  constructor(
    private readonly client: CompletionClient,
    options: ExpenseExtractorOptions = {},
  ) {
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  /**
   * @throws {ExtractionError} INVALID_EMAIL for a blank subject or body,
   *   EXTRACTION_FAILED when the model call fails or its reply is unusable
   */
  async extract(input: unknown): Promise<ExtractionResult> {
    const email = parseEmail(input);
    const prompt = buildExtractionPrompt(email);

    let reply: string;
    try {
      reply = await this.client.complete({ system: SYSTEM_PROMPT, prompt });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExtractionError("EXTRACTION_FAILED", `Completion request failed: ${reason}`, undefined, {
        cause: error,
      });
    }
    this.logger.debug({ reply }, "Model reply received");

    const json = extractJsonObject(reply);
    if (json === undefined) {
      this.logger.error({ reply }, "No JSON object in model reply");
      throw new ExtractionError("EXTRACTION_FAILED", "No JSON object found in the model reply", { reply });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      this.logger.error({ reply }, "Model reply is not valid JSON");
      throw new ExtractionError("EXTRACTION_FAILED", "Model reply is not valid JSON", { reply }, { cause: error });
    }

    const envelope = EnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      throw new ExtractionError(
        "EXTRACTION_FAILED",
        "Model reply does not match the extraction format",
        envelope.error.issues,
      );
    }

    const { expense, confidence, notes, summary } = envelope.data;
    this.logger.info({ confidence, subject: email.subject }, "Expense extracted");

    return {
      candidate: expense,
      confidence,
      ...(notes !== undefined && notes !== null && notes !== "" ? { notes } : {}),
      ...(summary !== undefined && summary !== null && summary !== "" ? { summary } : {}),
    };
  }
}
