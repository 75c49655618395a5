/**
 * Completion client backed by the Anthropic Messages API.
 */

import type { CompletionClient, CompletionRequest } from "./types.js";

export const DEFAULT_EXTRACTION_MODEL = "claude-3-5-haiku-20241022";

interface MessageBlock {
  readonly type: string;
  readonly text?: string;
}

/**
 * The part of the `@anthropic-ai/sdk` client used here.
 * An `Anthropic` instance satisfies it.
 */
export interface MessagesClient {
  readonly messages: {
    create(params: {
      model: string;
      max_tokens: number;
      temperature: number;
      system: string;
      messages: Array<{ role: "user"; content: string }>;
    }): PromiseLike<{ readonly content: readonly MessageBlock[] }>;
  };
}

export interface AnthropicCompletionOptions {
  readonly model?: string | undefined;
  /** Default: 1000 */
  readonly maxTokens?: number | undefined;
}

export function createAnthropicCompletionClient(
  client: MessagesClient,
  options: AnthropicCompletionOptions = {},
): CompletionClient {
  const model = options.model ?? DEFAULT_EXTRACTION_MODEL;
  const maxTokens = options.maxTokens ?? 1000;

  return {
    async complete(request: CompletionRequest): Promise<string> {
      const response = await client.messages.create({
        model,
        max_tokens: maxTokens,
        temperature: 0.1,
        system: request.system,
        messages: [{ role: "user", content: request.prompt }],
      });

      return response.content
        .map((block) => (block.type === "text" && block.text !== undefined ? block.text : ""))
        .join("")
        .trim();
    },
  };
}
