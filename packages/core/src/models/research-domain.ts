/**
 * Research domains
 *
 * The fixed set of areas a company is researched along. Not extensible per
 * request; configuration may only narrow it.
 */

export const RESEARCH_DOMAINS = ["past", "future", "culture"] as const;

export type ResearchDomain = (typeof RESEARCH_DOMAINS)[number];

/**
 * Section headings used when rendering a domain
 */
export const DOMAIN_LABELS: Record<ResearchDomain, string> = {
  past: "Company History and Background",
  future: "Future Prospects and Strategy",
  culture: "Company Culture and Work Environment",
};

export function isResearchDomain(value: unknown): value is ResearchDomain {
  return (
    typeof value === "string" &&
    (RESEARCH_DOMAINS as readonly string[]).includes(value)
  );
}
