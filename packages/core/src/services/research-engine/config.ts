/**
 * Research Configuration System
 *
 * Loads and manages configuration from research-config.yaml
 * Provides strongly typed access to all configurable settings.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { ConfigurationError, errorMessage } from "../../errors";
import { logger } from "../../logger";
import {
  RESEARCH_DOMAINS,
  isResearchDomain,
  type ResearchDomain,
} from "../../models/research-domain";

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * LLM model configuration for a specific step
 */
export interface ModelConfig {
  model: string;
  temperature: number;
}

/**
 * LLM provider configuration
 */
export interface LLMConfig {
  provider: "openai";
  models: {
    planning: ModelConfig;
    report: ModelConfig;
  };
}

/**
 * Search provider configuration
 */
export interface SearchConfig {
  provider: "brave";
  resultsPerQuery: number;
  safeSearch: "off" | "moderate" | "strict";
  minRequestIntervalMs: number;
  country?: string;
  language?: string;
}

/**
 * Worker loop configuration
 */
export interface ResearchPipelineConfig {
  domains: ResearchDomain[];
  iterationBudget: number;
  domainBudgets: Partial<Record<ResearchDomain, number>>;
  minFindings: number;
  failedRatio: number; // failures / attempts at or above this fails the worker
}

/**
 * Task unit configuration
 */
export interface ToolsConfig {
  timeoutMs: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
}

/**
 * Supervisor configuration
 */
export interface SupervisorConfig {
  deadlineMs: number | null; // null derives the deadline from budgets
  deadlineGraceMs: number;
}

export interface PlanningConfig {
  enabled: boolean;
  timeoutMs: number;
}

export interface ReportConfig {
  renderer: "markdown" | "llm";
  timeoutMs: number; // Renderer time limit; the Markdown fallback applies past it
}

/**
 * Complete research configuration
 */
export interface ResearchConfig {
  llm: LLMConfig;
  search: SearchConfig;
  research: ResearchPipelineConfig;
  tools: ToolsConfig;
  supervisor: SupervisorConfig;
  planning: PlanningConfig;
  report: ReportConfig;
}

/**
 * Recursive partial used for YAML files and overrides
 */
export type ConfigOverrides = {
  [K in keyof ResearchConfig]?: Partial<ResearchConfig[K]>;
};

// =============================================================================
// Default Configuration
// =============================================================================

/**
 * Default configuration values (used when config file is not found)
 */
export const DEFAULT_CONFIG: ResearchConfig = {
  llm: {
    provider: "openai",
    models: {
      planning: {
        model: "gpt-4o-mini",
        temperature: 0.3,
      },
      report: {
        model: "gpt-4o-mini",
        temperature: 0.3,
      },
    },
  },
  search: {
    provider: "brave",
    resultsPerQuery: 5,
    safeSearch: "moderate",
    minRequestIntervalMs: 1000,
  },
  research: {
    domains: [...RESEARCH_DOMAINS],
    iterationBudget: 3,
    domainBudgets: {},
    minFindings: 3,
    failedRatio: 1,
  },
  tools: {
    timeoutMs: 15000,
    retryDelayMs: 500,
    maxRetryDelayMs: 4000,
  },
  supervisor: {
    deadlineMs: null,
    deadlineGraceMs: 5000,
  },
  planning: {
    enabled: true,
    timeoutMs: 10000,
  },
  report: {
    renderer: "markdown",
    timeoutMs: 30000,
  },
};

// =============================================================================
// Configuration Loader
// =============================================================================

let cachedConfig: ResearchConfig | null = null;
let configPath: string | null = null;

/**
 * Find the research-config.yaml file by searching upward from a starting directory
 */
function findConfigFile(startDir?: string): string | null {
  const filename = "research-config.yaml";
  let currentDir = startDir || process.cwd();

  // Search up to 10 levels up
  for (let i = 0; i < 10; i++) {
    const configFilePath = path.join(currentDir, filename);
    if (fs.existsSync(configFilePath)) {
      return configFilePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source taking precedence
 */
function deepMerge<T extends object>(target: T, source: unknown): T {
  if (!isPlainObject(source)) {
    return target;
  }
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result as T;
}

function requirePositiveInteger(name: string, value: unknown): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer`, {
      [name]: value,
    });
  }
}

function requireNonNegative(name: string, value: unknown): void {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number`, {
      [name]: value,
    });
  }
}

/**
 * Check a merged configuration; throws ConfigurationError on bad values
 */
export function validateConfig(config: ResearchConfig): ResearchConfig {
  const { research, tools, supervisor, planning, search, report } = config;

  if (!Array.isArray(research.domains) || research.domains.length === 0) {
    throw new ConfigurationError("research.domains must list at least one domain");
  }
  for (const domain of research.domains) {
    if (!isResearchDomain(domain)) {
      throw new ConfigurationError(`Unknown research domain: ${String(domain)}`);
    }
  }
  if (new Set(research.domains).size !== research.domains.length) {
    throw new ConfigurationError("research.domains must not repeat a domain");
  }

  requirePositiveInteger("research.iterationBudget", research.iterationBudget);
  for (const [domain, budget] of Object.entries(research.domainBudgets)) {
    if (!isResearchDomain(domain)) {
      throw new ConfigurationError(`Unknown research domain: ${domain}`);
    }
    requirePositiveInteger(`research.domainBudgets.${domain}`, budget);
  }
  requirePositiveInteger("research.minFindings", research.minFindings);
  if (
    typeof research.failedRatio !== "number" ||
    research.failedRatio <= 0 ||
    research.failedRatio > 1
  ) {
    throw new ConfigurationError("research.failedRatio must be in (0, 1]", {
      failedRatio: research.failedRatio,
    });
  }

  requirePositiveInteger("tools.timeoutMs", tools.timeoutMs);
  requireNonNegative("tools.retryDelayMs", tools.retryDelayMs);
  requireNonNegative("tools.maxRetryDelayMs", tools.maxRetryDelayMs);
  if (supervisor.deadlineMs !== null) {
    requirePositiveInteger("supervisor.deadlineMs", supervisor.deadlineMs);
  }
  requireNonNegative("supervisor.deadlineGraceMs", supervisor.deadlineGraceMs);
  requirePositiveInteger("planning.timeoutMs", planning.timeoutMs);
  requirePositiveInteger("report.timeoutMs", report.timeoutMs);
  requirePositiveInteger("search.resultsPerQuery", search.resultsPerQuery);
  requireNonNegative("search.minRequestIntervalMs", search.minRequestIntervalMs);

  return config;
}

/**
 * Build a validated configuration from defaults plus overrides
 */
export function resolveConfig(overrides?: ConfigOverrides): ResearchConfig {
  return validateConfig(deepMerge(DEFAULT_CONFIG, overrides));
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(customPath?: string): ResearchConfig {
  // Return cached config if available and no custom path specified
  if (cachedConfig && !customPath) {
    return cachedConfig;
  }

  // Find config file
  const filePath =
    customPath || process.env.RESEARCH_CONFIG_PATH || findConfigFile();

  if (!filePath) {
    logger.warn("research-config.yaml not found, using default configuration");
    cachedConfig = DEFAULT_CONFIG;
    return DEFAULT_CONFIG;
  }

  let rawConfig: unknown;
  try {
    const fileContents = fs.readFileSync(filePath, "utf8");
    rawConfig = yaml.load(fileContents);
  } catch (error) {
    throw new ConfigurationError(
      `Error loading config from ${filePath}: ${errorMessage(error)}`,
      { path: filePath }
    );
  }

  // Merge with defaults to ensure all fields are present
  const config = validateConfig(deepMerge(DEFAULT_CONFIG, rawConfig));

  // Cache the config
  cachedConfig = config;
  configPath = filePath;

  logger.info({ path: filePath }, "Loaded research config");
  return config;
}

/**
 * Get the currently loaded configuration
 * Loads from file if not yet loaded
 */
export function getConfig(): ResearchConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear the cached configuration (useful for testing or reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Get the path to the loaded config file
 */
export function getConfigPath(): string | null {
  return configPath;
}

/**
 * Override specific configuration values at runtime
 * Useful for testing or per-request customization
 */
export function withConfigOverrides(overrides: ConfigOverrides): ResearchConfig {
  return mergeConfig(getConfig(), overrides);
}

/**
 * Apply overrides on top of an explicit base configuration
 */
export function mergeConfig(
  base: ResearchConfig,
  overrides?: ConfigOverrides
): ResearchConfig {
  return validateConfig(deepMerge(base, overrides));
}

// =============================================================================
// Convenience Getters
// =============================================================================

/**
 * Get model configuration for a specific step
 */
export function getModelConfig(
  step: keyof LLMConfig["models"],
  config: ResearchConfig = getConfig()
): ModelConfig {
  return config.llm.models[step];
}

/**
 * Iteration budget for one domain
 */
export function getDomainBudget(
  domain: ResearchDomain,
  config: ResearchConfig = getConfig()
): number {
  return config.research.domainBudgets[domain] ?? config.research.iterationBudget;
}

/**
 * Global deadline for one run.
 *
 * Workers run in parallel, so the derived default covers the largest
 * single budget, not the sum of all budgets.
 */
export function getDeadlineMs(config: ResearchConfig = getConfig()): number {
  if (config.supervisor.deadlineMs !== null) {
    return config.supervisor.deadlineMs;
  }
  const largestBudget = Math.max(
    ...config.research.domains.map((domain) => getDomainBudget(domain, config))
  );
  return (
    largestBudget * (config.tools.timeoutMs + config.tools.maxRetryDelayMs) +
    config.supervisor.deadlineGraceMs
  );
}
