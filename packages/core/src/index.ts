/**
 * Core package entry point
 *
 * Exports the research engine, its models, provider interfaces, and
 * provider implementations.
 */

// Models
export {
  RESEARCH_DOMAINS,
  DOMAIN_LABELS,
  isResearchDomain,
} from "./models/research-domain";
export type { ResearchDomain } from "./models/research-domain";

export {
  createResearchRequest,
  MAX_SUBJECT_LENGTH,
  MAX_ROLE_TITLE_LENGTH,
  MAX_CONTEXT_LENGTH,
} from "./models/research-request";
export type {
  ResearchRequest,
  NewResearchRequest,
} from "./models/research-request";

export type { Finding, SourceCitation } from "./models/finding";

export { isTerminalState } from "./models/worker-result";
export type {
  WorkerStatus,
  WorkerState,
  WorkerErrorCode,
  WorkerErrorDescriptor,
  WorkerResult,
  AggregateState,
} from "./models/worker-result";

export type {
  DomainSummary,
  DomainStatuses,
  Report,
  ResearchOutcome,
} from "./models/report";

// Errors and logging
export {
  ResearchError,
  InvalidRequestError,
  ConfigurationError,
  StateStoreError,
  ToolError,
  toToolError,
  errorMessage,
} from "./errors";
export type { ResearchErrorCode, ToolErrorKind } from "./errors";
export { logger, createLogger } from "./logger";
export type { Logger } from "./logger";

// Interfaces
export type * from "./interfaces";

// Services
export * from "./services/research-engine";
export * from "./services/search";
export * from "./services/brave-search";
export * from "./services/llm";
export {
  PLANNING_PROMPTS,
  REPORT_PROMPTS,
  renderPrompt,
  formatPromptDate,
} from "./services/llm/prompts";

// Provider factories
export {
  createLLMProvider,
  createSearchProvider,
  createToolProvider,
  createResearchSupervisor,
} from "./providers";
export type {
  LLMProviderType,
  SearchProviderType,
  LLMProviderConfig,
  SearchProviderConfig,
  ResearchSupervisorFactoryOptions,
} from "./providers";
