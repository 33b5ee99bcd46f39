/**
 * Default decision policy
 *
 * Cycles through a fixed list of search angles per domain and calls the
 * domain done once enough distinct sources have been found.
 */

import type { Finding } from "../../../models/finding";
import type { ResearchDomain } from "../../../models/research-domain";
import type { ResearchRequest } from "../../../models/research-request";
import type {
  DecisionContext,
  DecisionPolicy,
} from "../../../interfaces/decision-policy";
import type { Instruction } from "../../../interfaces/tool-provider";
import { normalizeUrl } from "../../brave-search/deduplication";

export const QUERY_ANGLES: Record<ResearchDomain, readonly string[]> = {
  past: [
    "company history",
    "founding story and founders",
    "key milestones",
    "acquisitions and mergers",
    "leadership changes",
  ],
  future: [
    "strategic plans",
    "growth prospects",
    "product roadmap",
    "funding and investments",
    "market expansion",
  ],
  culture: [
    "company culture and values",
    "employee reviews work environment",
    "benefits and work-life balance",
    "diversity and inclusion",
    "management style",
  ],
};

// Domains where the target role narrows the search
const ROLE_AWARE_DOMAINS: ReadonlySet<ResearchDomain> = new Set([
  "future",
  "culture",
]);

export class SearchDecisionPolicy implements DecisionPolicy {
  constructor(
    private readonly domain: ResearchDomain,
    private readonly minFindings: number
  ) {}

  nextInstruction(
    findings: readonly Finding[],
    request: ResearchRequest,
    context?: DecisionContext
  ): Instruction {
    const angles = QUERY_ANGLES[this.domain];
    const iteration = context?.iteration ?? findings.length + 1;
    const angle = angles[(iteration - 1) % angles.length];

    let query = `"${request.subject}" ${angle}`;
    if (request.roleTitle && ROLE_AWARE_DOMAINS.has(this.domain)) {
      query = `${query} ${request.roleTitle}`;
    }

    return { query, focus: context?.focus };
  }

  isSufficient(findings: readonly Finding[]): boolean {
    const sources = new Set(
      findings.map((finding) =>
        finding.source ? normalizeUrl(finding.source.url) : finding.content
      )
    );
    return sources.size >= this.minFindings;
  }
}

/**
 * One search decision policy per domain
 */
export function createDefaultPolicies(
  domains: readonly ResearchDomain[],
  minFindings: number
): Partial<Record<ResearchDomain, DecisionPolicy>> {
  const policies: Partial<Record<ResearchDomain, DecisionPolicy>> = {};
  for (const domain of domains) {
    policies[domain] = new SearchDecisionPolicy(domain, minFindings);
  }
  return policies;
}
