/**
 * Tool Provider Interface
 *
 * The external capability a worker calls once per task unit.
 * Wraps a search API, a scraper, or a test stub.
 */

import type { ToolError } from "../errors";
import type { SourceCitation } from "../models/finding";

/**
 * One structured instruction produced by a decision policy
 */
export interface Instruction {
  query: string;
  focus?: string; // Research focus the query serves
}

/**
 * Content returned by a successful invocation
 */
export interface ToolContent {
  text: string;
  source?: SourceCitation;
}

export type ToolResult =
  | { ok: true; content: ToolContent }
  | { ok: false; error: ToolError };

export interface ToolInvokeOptions {
  signal?: AbortSignal; // Aborted on tool timeout or deadline
}

/**
 * Tool Provider interface
 * Providers may return a failed ToolResult or throw; both are classified
 * by the task unit.
 */
export interface ToolProvider {
  invoke(
    instruction: Instruction,
    options?: ToolInvokeOptions
  ): Promise<ToolResult>;

  /**
   * Get the provider name
   */
  getName(): string;
}
