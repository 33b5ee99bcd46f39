/**
 * Research Engine service
 *
 * Supervisor/worker flow for one research request:
 * 1. Plan a focus per domain (LLM planner, template fallback)
 * 2. Run one bounded worker per domain in parallel (via Tool provider)
 * 3. Collect terminal results in the state store
 * 4. Synthesize the report (via Rendering policy)
 */

export { ResearchSupervisor, runResearch } from "./supervisor";
export type { ResearchRunner } from "./supervisor";
export { ResearchWorker } from "./worker";
export type { WorkerOptions } from "./worker";
export { executeTaskUnit } from "./task-unit";
export type { TaskOutcome, TaskUnitOptions } from "./task-unit";
export { IterationBudget } from "./budget";
export { ResearchStateStore } from "./state-store";
export {
  Synthesizer,
  TOTAL_FAILURE_TEXT,
  formatResearchNote,
  summarize,
} from "./synthesizer";
export {
  TemplatePlanner,
  LlmPlanner,
  buildTemplatePlan,
  planWithFallback,
} from "./planner";
export * from "./policies";
export {
  DEFAULT_CONFIG,
  loadConfig,
  getConfig,
  clearConfigCache,
  getConfigPath,
  resolveConfig,
  mergeConfig,
  validateConfig,
  withConfigOverrides,
  getModelConfig,
  getDomainBudget,
  getDeadlineMs,
} from "./config";
export type {
  ResearchConfig,
  ConfigOverrides,
  ModelConfig,
  LLMConfig,
  SearchConfig,
  ResearchPipelineConfig,
  ToolsConfig,
  SupervisorConfig,
  PlanningConfig,
  ReportConfig,
} from "./config";
export type {
  WorkerSpec,
  ResearchPlan,
  ResearchPlanner,
  SupervisorOptions,
} from "./types";
