/**
 * @splitrelay/extractor — Email text to candidate expense.
 */

export { ExpenseExtractor, extractJsonObject, meetsConfidence, DEFAULT_MIN_CONFIDENCE } from "./extractor.js";
export type { ExpenseExtractorOptions } from "./extractor.js";
export { EmailContentSchema, parseEmail } from "./email.js";
export { buildExtractionPrompt, SYSTEM_PROMPT } from "./prompt.js";
export { createAnthropicCompletionClient, DEFAULT_EXTRACTION_MODEL } from "./anthropic.js";
export type { MessagesClient, AnthropicCompletionOptions } from "./anthropic.js";

export type {
  EmailContent,
  CompletionRequest,
  CompletionClient,
  ExtractionResult,
  ExtractionErrorCode,
} from "./types.js";
export { ExtractionError } from "./types.js";
