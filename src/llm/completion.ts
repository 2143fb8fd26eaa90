/**
 * completion.ts - Chat completion provider
 *
 * The router talks to the language model through CompletionProvider, a
 * single complete(messages) call returning text. The default provider wraps
 * LangChain's ChatAnthropic; tests inject a plain object with invoke().
 *
 * What parts are LangChain?
 * - ChatAnthropic: LangChain's wrapper for calling Claude
 * - [role, content] tuples: LangChain's shorthand for system/human messages
 * - MessageContent: either a string or an array of content blocks
 */

import { ChatAnthropic } from "@langchain/anthropic";
import type { MessageContent } from "@langchain/core/messages";

/** One message of the instruction set sent to the model */
export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

/**
 * The slice of a LangChain chat model the provider uses.
 *
 * ChatAnthropic satisfies it directly. Tests use
 * `{ invoke: vi.fn().mockResolvedValue({ content: "..." }) }`.
 */
export interface ChatModel {
  invoke(messages: Array<[string, string]>): Promise<{ content: MessageContent }>;
}

export interface CompletionProvider {
  /**
   * Sends the messages and resolves with the model's text output.
   * Rejects when the provider call fails.
   */
  complete(messages: ChatMessage[]): Promise<string>;
}

export interface AnthropicModelOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
}

/**
 * Builds the default ChatAnthropic model.
 *
 * The constructor only stores settings; the API key is first used on the
 * first invoke().
 */
export function createAnthropicModel(options: AnthropicModelOptions): ChatModel {
  return new ChatAnthropic({
    apiKey: options.apiKey,
    model: options.model,
    maxTokens: options.maxTokens,
  });
}

/**
 * Extracts the answer text from a model response.
 *
 * A plain string is returned as is. An array of content blocks yields the
 * concatenation of its text blocks; other block types (thinking, tool_use)
 * are not part of the answer.
 */
export function extractText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }

  let text = "";
  for (const block of content) {
    if (
      typeof block === "object" &&
      block !== null &&
      "type" in block &&
      block.type === "text" &&
      "text" in block
    ) {
      text += String(block.text);
    }
  }
  return text;
}

/** LangChain calls the user role "human" */
function toLangChainMessage(message: ChatMessage): [string, string] {
  return [message.role === "user" ? "human" : "system", message.content];
}

/**
 * Creates a provider around a chat model.
 *
 * @param options.model - Injectable chat model (ChatAnthropic in production)
 */
export function createCompletionProvider(options: {
  model: ChatModel;
}): CompletionProvider {
  const { model } = options;

  return {
    async complete(messages: ChatMessage[]): Promise<string> {
      let response: { content: MessageContent };
      try {
        response = await model.invoke(messages.map(toLangChainMessage));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Completion request failed: ${message}`, { cause: error });
      }
      return extractText(response.content);
    },
  };
}
