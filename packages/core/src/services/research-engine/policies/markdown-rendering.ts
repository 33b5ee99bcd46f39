/**
 * Markdown rendering policy
 *
 * Lists every finding under its domain heading with its citation.
 * Also the fallback when another renderer fails.
 */

import type { Finding } from "../../../models/finding";
import { DOMAIN_LABELS } from "../../../models/research-domain";
import type { ResearchRequest } from "../../../models/research-request";
import type { AggregateState } from "../../../models/worker-result";
import type {
  RenderContext,
  RenderingPolicy,
} from "../../../interfaces/rendering-policy";

export const EMPTY_SECTION_TEXT = "_No findings were collected for this area._";

export function reportTitle(request: ResearchRequest): string {
  return `Company Research Report: ${request.subject}`;
}

export function formatFinding(finding: Finding): string {
  const content = finding.content.replace(/\s+/g, " ").trim();
  if (!finding.source) {
    return `- ${content}`;
  }
  const label = finding.source.title || finding.source.url;
  return `- ${content} ([${label}](${finding.source.url}))`;
}

export class MarkdownRenderingPolicy implements RenderingPolicy {
  render(
    aggregate: AggregateState,
    request: ResearchRequest,
    context?: RenderContext
  ): string {
    const blocks = [`# ${reportTitle(request)}`];
    if (request.roleTitle) {
      blocks.push(`**Role:** ${request.roleTitle}`);
    }
    if (context?.brief) {
      blocks.push(`**Research brief:** ${context.brief}`);
    }

    for (const [domain, result] of aggregate) {
      const body =
        result.findings.length > 0
          ? result.findings.map(formatFinding).join("\n")
          : EMPTY_SECTION_TEXT;
      blocks.push(`## ${DOMAIN_LABELS[domain]}\n\n${body}`);
    }

    return blocks.join("\n\n");
  }

  getName(): string {
    return "markdown";
  }
}
