/**
 * Type definitions for research engine
 */

import type { Logger } from "../../logger";
import type { ResearchDomain } from "../../models/research-domain";
import type { ResearchRequest } from "../../models/research-request";
import type { DecisionPolicy } from "../../interfaces/decision-policy";
import type { RenderingPolicy } from "../../interfaces/rendering-policy";
import type { ToolProvider } from "../../interfaces/tool-provider";
import type { ConfigOverrides, ResearchConfig } from "./config";

/**
 * What one worker is asked to do
 */
export interface WorkerSpec {
  domain: ResearchDomain;
  request: ResearchRequest;
  iterationBudget: number;
  focus: string; // Research focus from the plan
}

/**
 * Research plan: one focus statement per domain
 */
export interface ResearchPlan {
  brief: string;
  focus: Record<ResearchDomain, string>;
}

export interface ResearchPlanner {
  plan(request: ResearchRequest, signal?: AbortSignal): Promise<ResearchPlan>;
  getName(): string;
}

/**
 * Supervisor construction options
 */
export interface SupervisorOptions {
  // === Provider Injection ===
  toolProvider: ToolProvider;
  policies?: Partial<Record<ResearchDomain, DecisionPolicy>>; // Default: search decision policy per domain
  renderingPolicy?: RenderingPolicy; // Default: Markdown rendering
  planner?: ResearchPlanner; // Default: template planner

  // === Configuration ===
  // A complete config, or overrides merged over the loaded one
  config?: ResearchConfig;
  overrides?: ConfigOverrides;

  logger?: Logger;
  now?: () => number;
}
