/**
 * Research planning
 *
 * Decides the focus of each domain before workers launch. Planning never
 * fails a run: any planner error or timeout falls back to the template plan.
 */

import { errorMessage } from "../../errors";
import type { Logger } from "../../logger";
import { RESEARCH_DOMAINS, type ResearchDomain } from "../../models/research-domain";
import type { ResearchRequest } from "../../models/research-request";
import type { LLMProvider } from "../../interfaces/llm-provider";
import { PLANNING_PROMPTS, renderPrompt } from "../llm/prompts";
import type { ModelConfig } from "./config";
import type { ResearchPlan, ResearchPlanner } from "./types";

/**
 * Deterministic plan built from the subject and role
 */
export function buildTemplatePlan(request: ResearchRequest): ResearchPlan {
  const { subject, roleTitle } = request;
  return {
    brief:
      `Comprehensive company research for ${subject}` +
      (roleTitle ? ` - ${roleTitle} position` : ""),
    focus: {
      past: `Research ${subject} history, founding, key milestones, and evolution up to present`,
      future: `Research ${subject} future prospects, strategic plans, and growth opportunities`,
      culture:
        `Research ${subject} company culture, values, work environment, and employee satisfaction` +
        (roleTitle ? `, as experienced in a ${roleTitle} role` : ""),
    },
  };
}

export class TemplatePlanner implements ResearchPlanner {
  async plan(request: ResearchRequest): Promise<ResearchPlan> {
    return buildTemplatePlan(request);
  }

  getName(): string {
    return "template";
  }
}

const FOCUS_KEYS: Record<ResearchDomain, string> = {
  past: "pastFocus",
  future: "futureFocus",
  culture: "cultureFocus",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readText(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/**
 * Plans with the LLM; fields it leaves out come from the template plan
 */
export class LlmPlanner implements ResearchPlanner {
  constructor(
    private readonly llm: LLMProvider,
    private readonly model?: ModelConfig
  ) {}

  async plan(request: ResearchRequest, signal?: AbortSignal): Promise<ResearchPlan> {
    const fallback = buildTemplatePlan(request);
    const response = await this.llm.query(
      [
        { role: "system", content: PLANNING_PROMPTS.system },
        {
          role: "user",
          content: renderPrompt(PLANNING_PROMPTS.user, {
            subject: request.subject,
            roleTitle: request.roleTitle ?? "not specified",
            context: request.context ?? "none",
          }),
        },
      ],
      {
        model: this.model?.model,
        temperature: this.model?.temperature,
        signal,
      }
    );

    if (!isRecord(response)) {
      return fallback;
    }

    const focus = { ...fallback.focus };
    for (const domain of RESEARCH_DOMAINS) {
      focus[domain] = readText(response, FOCUS_KEYS[domain]) ?? fallback.focus[domain];
    }
    return {
      brief: readText(response, "brief") ?? fallback.brief,
      focus,
    };
  }

  getName(): string {
    return `llm:${this.llm.getName()}`;
  }
}

/**
 * Run a planner under a timeout, falling back to the template plan
 */
export async function planWithFallback(
  planner: ResearchPlanner,
  request: ResearchRequest,
  timeoutMs: number,
  log: Logger
): Promise<ResearchPlan> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timedOut = new Promise<null>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(null);
    }, timeoutMs);
  });

  try {
    const plan = await Promise.race([
      planner.plan(request, controller.signal),
      timedOut,
    ]);
    if (plan) {
      return plan;
    }
    log.warn({ planner: planner.getName(), timeoutMs }, "Planning timed out, using template plan");
  } catch (error) {
    log.warn(
      { planner: planner.getName(), error: errorMessage(error) },
      "Planning failed, using template plan"
    );
  } finally {
    clearTimeout(timer);
  }
  return buildTemplatePlan(request);
}
