/**
 * LLM rendering policy
 *
 * Asks the LLM provider to write the report from the collected findings.
 * Errors propagate; the synthesizer falls back to Markdown.
 */

import { ResearchError } from "../../../errors";
import type { ResearchRequest } from "../../../models/research-request";
import type { AggregateState } from "../../../models/worker-result";
import type { LLMProvider } from "../../../interfaces/llm-provider";
import type {
  RenderContext,
  RenderingPolicy,
} from "../../../interfaces/rendering-policy";
import { REPORT_PROMPTS, formatPromptDate, renderPrompt } from "../../llm/prompts";
import type { ModelConfig } from "../config";
import { MarkdownRenderingPolicy } from "./markdown-rendering";

export class LlmRenderingPolicy implements RenderingPolicy {
  private readonly findingsRenderer = new MarkdownRenderingPolicy();

  constructor(
    private readonly llm: LLMProvider,
    private readonly model?: ModelConfig
  ) {}

  async render(
    aggregate: AggregateState,
    request: ResearchRequest,
    context?: RenderContext
  ): Promise<string> {
    const user = renderPrompt(REPORT_PROMPTS.user, {
      subject: request.subject,
      roleTitle: request.roleTitle ?? "not specified",
      context: request.context ?? "none",
      brief: context?.brief ?? "none",
      findings: this.findingsRenderer.render(aggregate, request),
      date: formatPromptDate(),
    });

    const text = await this.llm.complete(
      [
        { role: "system", content: REPORT_PROMPTS.system },
        { role: "user", content: user },
      ],
      {
        model: this.model?.model,
        temperature: this.model?.temperature,
        signal: context?.signal,
      }
    );

    if (!text.trim()) {
      throw new ResearchError(
        "ProviderError",
        `${this.llm.getName()} returned an empty report`
      );
    }
    return text.trim();
  }

  getName(): string {
    return `llm:${this.llm.getName()}`;
  }
}
