/**
 * AI Prompt Configuration
 *
 * Centralized location for the prompts used by the planner and the
 * LLM report renderer.
 *
 * Template syntax: {{placeholder}} - will be replaced with actual values
 */

export interface PromptTemplate {
  system: string;
  user: string;
}

/**
 * Research planning: one focus statement per domain
 */
export const PLANNING_PROMPTS: PromptTemplate = {
  system:
    "You are an expert research planner specializing in company analysis for job seekers.",
  user: `Create a company research plan for a job seeker.

Company: {{subject}}
Role: {{roleTitle}}
Additional context:
{{context}}

Plan the focus of three research areas:
1. past: company history and background
2. future: strategic plans and growth prospects
3. culture: values, work environment, employee satisfaction

Return ONLY a JSON object with this structure:
{
  "brief": "one sentence research brief",
  "pastFocus": "what to research about the company's history",
  "futureFocus": "what to research about the company's future",
  "cultureFocus": "what to research about the company's culture"
}`,
};

/**
 * Final report compilation
 */
export const REPORT_PROMPTS: PromptTemplate = {
  system:
    "You are an expert at synthesizing company research into clear reports for job seekers.",
  user: `Today is {{date}}.

Write a company research report on {{subject}} for a candidate.
Role: {{roleTitle}}
Additional context:
{{context}}
Research brief: {{brief}}

Use only the findings below. Keep the three section headings, cite sources
inline as markdown links, and say plainly when an area has no findings.

{{findings}}`,
};

/**
 * Helper function to replace template placeholders
 */
export function renderPrompt(
  template: string,
  variables: Record<string, string | number>
): string {
  let rendered = template;
  for (const [key, value] of Object.entries(variables)) {
    const placeholder = `{{${key}}}`;
    rendered = rendered.split(placeholder).join(String(value));
  }
  return rendered;
}

/**
 * Format today's date for prompts
 */
export function formatPromptDate(date: Date = new Date()): string {
  return date.toLocaleDateString("en-US", {
    weekday: "long",
    month: "long",
    day: "numeric",
    year: "numeric",
  });
}
