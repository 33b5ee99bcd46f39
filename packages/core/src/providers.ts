/**
 * Provider Factory Functions
 *
 * Centralized provider creation and initialization.
 * Allows easy switching between providers via configuration.
 */

import { ConfigurationError } from "./errors";
import type { Logger } from "./logger";
import type { LLMProvider } from "./interfaces/llm-provider";
import type { RenderingPolicy } from "./interfaces/rendering-policy";
import type { SearchProvider } from "./interfaces/search-provider";
import type { ToolProvider } from "./interfaces/tool-provider";
import { createOpenAIProvider } from "./services/llm/openai-provider";
import { BraveSearchProvider } from "./services/search/brave-provider";
import { SearchToolProvider } from "./services/search/search-tool";
import {
  getConfig,
  getModelConfig,
  type ResearchConfig,
} from "./services/research-engine/config";
import { LlmPlanner, TemplatePlanner } from "./services/research-engine/planner";
import { LlmRenderingPolicy } from "./services/research-engine/policies/llm-rendering";
import { MarkdownRenderingPolicy } from "./services/research-engine/policies/markdown-rendering";
import { ResearchSupervisor } from "./services/research-engine/supervisor";
import type { ResearchPlanner } from "./services/research-engine/types";

/**
 * LLM Provider types
 */
export type LLMProviderType = "openai" | "custom";

/**
 * Search Provider types
 */
export type SearchProviderType = "brave" | "custom";

/**
 * LLM Provider configuration
 */
export interface LLMProviderConfig {
  provider: LLMProviderType;
  apiKey?: string;
  model?: string;
  customProvider?: LLMProvider; // For custom implementations
}

/**
 * Search Provider configuration
 */
export interface SearchProviderConfig {
  provider: SearchProviderType;
  apiKey?: string;
  minRequestIntervalMs?: number;
  logger?: Logger;
  customProvider?: SearchProvider; // For custom implementations
}

/**
 * Create an LLM provider from configuration
 */
export function createLLMProvider(config: LLMProviderConfig): LLMProvider {
  switch (config.provider) {
    case "openai":
      if (!config.apiKey) {
        throw new ConfigurationError("OpenAI provider requires an API key");
      }
      return createOpenAIProvider(config.apiKey, config.model);

    case "custom":
      if (!config.customProvider) {
        throw new ConfigurationError(
          "Custom LLM provider specified but not provided in config.customProvider"
        );
      }
      return config.customProvider;
  }
}

/**
 * Create a search provider from configuration
 */
export function createSearchProvider(
  config: SearchProviderConfig
): SearchProvider {
  switch (config.provider) {
    case "brave":
      return new BraveSearchProvider({
        apiKey: config.apiKey,
        minRequestIntervalMs: config.minRequestIntervalMs,
        logger: config.logger,
      });

    case "custom":
      if (!config.customProvider) {
        throw new ConfigurationError(
          "Custom search provider specified but not provided in config.customProvider"
        );
      }
      return config.customProvider;
  }
}

/**
 * Wrap a search provider as the tool workers call, using the search settings
 */
export function createToolProvider(
  search: SearchProvider,
  config: ResearchConfig = getConfig()
): ToolProvider {
  return new SearchToolProvider(search, {
    filters: {
      count: config.search.resultsPerQuery,
      safesearch: config.search.safeSearch,
      country: config.search.country,
      language: config.search.language,
    },
  });
}

export interface ResearchSupervisorFactoryOptions {
  braveApiKey?: string;
  openaiApiKey?: string; // Enables LLM planning and the LLM renderer
  config?: ResearchConfig;
  logger?: Logger;
}

/**
 * Wire a supervisor from API keys and configuration.
 * Without an OpenAI key, planning uses the template and the report is
 * rendered as Markdown.
 */
export function createResearchSupervisor(
  options: ResearchSupervisorFactoryOptions
): ResearchSupervisor {
  const config = options.config ?? getConfig();

  const search = createSearchProvider({
    provider: config.search.provider,
    apiKey: options.braveApiKey,
    minRequestIntervalMs: config.search.minRequestIntervalMs,
    logger: options.logger,
  });

  let planner: ResearchPlanner = new TemplatePlanner();
  let renderingPolicy: RenderingPolicy = new MarkdownRenderingPolicy();

  if (options.openaiApiKey) {
    const llm = createLLMProvider({
      provider: config.llm.provider,
      apiKey: options.openaiApiKey,
    });
    planner = new LlmPlanner(llm, getModelConfig("planning", config));
    if (config.report.renderer === "llm") {
      renderingPolicy = new LlmRenderingPolicy(llm, getModelConfig("report", config));
    }
  }

  return new ResearchSupervisor({
    toolProvider: createToolProvider(search, config),
    planner,
    renderingPolicy,
    config,
    logger: options.logger,
  });
}
