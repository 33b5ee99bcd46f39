/**
 * LLM Provider Interface
 *
 * Abstract interface for large language model providers.
 * Used by the optional research planner and report renderer.
 */

export interface LlmMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LlmCallOptions {
  model?: string;
  temperature?: number;
  signal?: AbortSignal;
}

/**
 * LLM Provider interface
 */
export interface LLMProvider {
  /**
   * Request a JSON object response and return it parsed
   */
  query(messages: LlmMessage[], options?: LlmCallOptions): Promise<unknown>;

  /**
   * Request a plain text completion
   */
  complete(messages: LlmMessage[], options?: LlmCallOptions): Promise<string>;

  /**
   * Get the provider name
   */
  getName(): string;
}
