/**
 * LLM Provider implementations
 */

export { OpenAIProvider, createOpenAIProvider } from "./openai-provider";
export { initializeOpenAI } from "./client";
