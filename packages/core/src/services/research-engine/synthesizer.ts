/**
 * Synthesizer
 *
 * Renders the aggregate state into the final report. Always returns a
 * report: total failure yields a minimal one, and a renderer that fails or
 * runs past its time limit is replaced by the Markdown renderer.
 */

import { ResearchError, errorMessage } from "../../errors";
import { createLogger, type Logger } from "../../logger";
import { DOMAIN_LABELS } from "../../models/research-domain";
import type { ResearchRequest } from "../../models/research-request";
import type { DomainSummary, Report } from "../../models/report";
import type {
  AggregateState,
  WorkerResult,
  WorkerStatus,
} from "../../models/worker-result";
import type { RenderingPolicy } from "../../interfaces/rendering-policy";
import {
  MarkdownRenderingPolicy,
  reportTitle,
} from "./policies/markdown-rendering";

const DEFAULT_RENDER_TIMEOUT_MS = 30000;

export const TOTAL_FAILURE_TEXT =
  "Research could not be completed: every research area failed, so no findings are available.";

const STATUS_TEXT: Record<WorkerStatus, string> = {
  completed: "completed",
  partially_completed: "partially completed",
  failed: "failed",
};

export interface SynthesizerOptions {
  renderingPolicy?: RenderingPolicy;
  renderTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface SynthesizeOptions {
  brief?: string; // Research brief from the plan
}

/**
 * One line describing an incomplete domain
 */
export function formatResearchNote(result: WorkerResult): string {
  const count = result.findings.length;
  const code = result.error?.code ?? "Unknown";
  const message = result.error?.message ?? "no details";
  return (
    `- ${DOMAIN_LABELS[result.domain]}: ${STATUS_TEXT[result.status]} ` +
    `(${code}): ${message}; ${count} ${count === 1 ? "finding" : "findings"} kept`
  );
}

export function summarize(aggregate: AggregateState): DomainSummary[] {
  return [...aggregate.values()].map((result) => ({
    domain: result.domain,
    status: result.status,
    findingsCount: result.findings.length,
    errorCode: result.error?.code,
  }));
}

export class Synthesizer {
  private readonly renderingPolicy: RenderingPolicy;
  private readonly fallbackPolicy = new MarkdownRenderingPolicy();
  private readonly renderTimeoutMs: number;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(options: SynthesizerOptions = {}) {
    this.renderingPolicy = options.renderingPolicy ?? this.fallbackPolicy;
    this.renderTimeoutMs = options.renderTimeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS;
    this.log = createLogger({ component: "synthesizer" }, options.logger);
    this.now = options.now ?? Date.now;
  }

  async synthesize(
    aggregate: AggregateState,
    request: ResearchRequest,
    options: SynthesizeOptions = {}
  ): Promise<Report> {
    const results = [...aggregate.values()];
    const incomplete = results.filter((result) => result.status !== "completed");
    const notes = incomplete.map(formatResearchNote);
    const allFailed =
      results.length > 0 && results.every((result) => result.status === "failed");

    let body: string;
    if (allFailed) {
      body = [`# ${reportTitle(request)}`, TOTAL_FAILURE_TEXT].join("\n\n");
    } else {
      body = await this.renderBody(aggregate, request, options.brief);
    }

    if (notes.length > 0) {
      body = `${body}\n\n## Research notes\n\n${notes.join("\n")}`;
    }

    const report: Report = Object.freeze({
      title: reportTitle(request),
      markdown: body,
      request,
      summary: Object.freeze(summarize(aggregate)),
      complete: incomplete.length === 0,
      generatedAt: this.now(),
    });
    return report;
  }

  /**
   * Render under the time limit; the renderer's signal aborts when it runs out
   */
  private async renderBody(
    aggregate: AggregateState,
    request: ResearchRequest,
    brief?: string
  ): Promise<string> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new ResearchError(
            "RenderTimeout",
            `timed out after ${this.renderTimeoutMs}ms`
          )
        );
      }, this.renderTimeoutMs);
    });

    try {
      const rendered = this.renderingPolicy.render(aggregate, request, {
        brief,
        signal: controller.signal,
      });
      return await Promise.race([Promise.resolve(rendered), timedOut]);
    } catch (error) {
      const message = errorMessage(error);
      this.log.error(
        { renderer: this.renderingPolicy.getName(), error: message },
        "Renderer failed, falling back to markdown"
      );
      const fallback = this.fallbackPolicy.render(aggregate, request, { brief });
      return `${fallback}\n\n_Note: report generation with ${this.renderingPolicy.getName()} failed (${message}); showing collected findings instead._`;
    } finally {
      clearTimeout(timer);
    }
  }
}
