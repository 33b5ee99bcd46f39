/**
 * OpenAI client management
 */

import OpenAI from "openai";
import { ResearchError } from "../../errors";

let openaiClient: OpenAI | null = null;

/**
 * Initialize the shared OpenAI client
 */
export function initializeOpenAI(apiKey: string): OpenAI {
  openaiClient = new OpenAI({ apiKey });
  return openaiClient;
}

/**
 * Get the shared client; throws if not initialized
 */
export function getClient(): OpenAI {
  if (!openaiClient) {
    throw new ResearchError(
      "ConfigurationError",
      "OpenAI client not initialized. Call initializeOpenAI() first."
    );
  }
  return openaiClient;
}
