/**
 * OpenAI Provider Implementation
 *
 * Implements LLMProvider on the OpenAI chat completions API.
 */

import type OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { ResearchError } from "../../errors";
import type {
  LLMProvider,
  LlmCallOptions,
  LlmMessage,
} from "../../interfaces/llm-provider";
import { getClient, initializeOpenAI } from "./client";

const DEFAULT_MODEL = "gpt-4o-mini";

function toChatMessage(message: LlmMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

/**
 * OpenAI implementation of LLMProvider
 */
export class OpenAIProvider implements LLMProvider {
  private client: OpenAI | null = null;

  constructor(
    apiKey?: string,
    private readonly defaultModel: string = DEFAULT_MODEL
  ) {
    if (apiKey) {
      this.client = initializeOpenAI(apiKey);
    }
  }

  /**
   * Get the provider name
   */
  getName(): string {
    return "openai";
  }

  /**
   * Get the model name being used
   */
  getModel(): string {
    return this.defaultModel;
  }

  /**
   * Ensure the provider is initialized
   */
  private ensureClient(): OpenAI {
    if (!this.client) {
      this.client = getClient();
    }
    return this.client;
  }

  private async createCompletion(
    messages: LlmMessage[],
    options: LlmCallOptions | undefined,
    json: boolean
  ): Promise<string> {
    const client = this.ensureClient();

    const response = await client.chat.completions.create(
      {
        model: options?.model ?? this.defaultModel,
        temperature: options?.temperature ?? 0.7,
        messages: messages.map(toChatMessage),
        ...(json ? { response_format: { type: "json_object" as const } } : {}),
      },
      { signal: options?.signal }
    );

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new ResearchError("ProviderError", "No content in OpenAI response");
    }
    return content;
  }

  async query(
    messages: LlmMessage[],
    options?: LlmCallOptions
  ): Promise<unknown> {
    const content = await this.createCompletion(messages, options, true);
    try {
      return JSON.parse(content);
    } catch (error) {
      throw new ResearchError(
        "ProviderError",
        `OpenAI returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  async complete(
    messages: LlmMessage[],
    options?: LlmCallOptions
  ): Promise<string> {
    return this.createCompletion(messages, options, false);
  }
}

/**
 * Factory function to create OpenAI provider
 */
export function createOpenAIProvider(
  apiKey: string,
  model?: string
): OpenAIProvider {
  return new OpenAIProvider(apiKey, model);
}
