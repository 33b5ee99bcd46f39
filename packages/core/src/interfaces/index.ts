/**
 * Provider and policy interfaces for dependency injection
 */

export type {
  ToolProvider,
  ToolResult,
  ToolContent,
  ToolInvokeOptions,
  Instruction,
} from "./tool-provider";

export type { DecisionPolicy, DecisionContext } from "./decision-policy";

export type { RenderingPolicy, RenderContext } from "./rendering-policy";

export type {
  SearchProvider,
  SearchFilters,
  SearchResultItem,
  SearchResponse,
} from "./search-provider";

export type { LLMProvider, LlmMessage, LlmCallOptions } from "./llm-provider";
