/**
 * Rendering Policy Interface
 *
 * Turns the aggregate state into report text. Used by the synthesizer.
 */

import type { ResearchRequest } from "../models/research-request";
import type { AggregateState } from "../models/worker-result";

export interface RenderContext {
  brief?: string; // Research brief from the plan
  signal?: AbortSignal; // Aborted when rendering runs out of time
}

export interface RenderingPolicy {
  render(
    aggregate: AggregateState,
    request: ResearchRequest,
    context?: RenderContext
  ): string | Promise<string>;

  getName(): string;
}
