import { describe, it, expect } from "vitest";
import { ResearchError } from "../errors";
import { createResearchRequest } from "../models/research-request";
import type { ResearchDomain } from "../models/research-domain";
import type { WorkerResult } from "../models/worker-result";
import type { LLMProvider, LlmMessage } from "../interfaces/llm-provider";
import {
  LlmRenderingPolicy,
  MarkdownRenderingPolicy,
  SearchDecisionPolicy,
  createDefaultPolicies,
  formatFinding,
} from "../services/research-engine/policies";
import { finding, workerResult } from "./helpers";

const request = createResearchRequest({ subject: "Acme Corp", roleTitle: "Data Engineer" });

function context(domain: ResearchDomain, iteration: number) {
  return { domain, iteration, focus: "focus" };
}

describe("SearchDecisionPolicy", () => {
  it("builds history queries without the role", () => {
    const policy = new SearchDecisionPolicy("past", 3);

    expect(policy.nextInstruction([], request, context("past", 1))).toEqual({
      query: '"Acme Corp" company history',
      focus: "focus",
    });
  });

  it("adds the role to culture and future queries", () => {
    const culture = new SearchDecisionPolicy("culture", 3);
    const future = new SearchDecisionPolicy("future", 3);

    expect(culture.nextInstruction([], request, context("culture", 2)).query).toBe(
      '"Acme Corp" employee reviews work environment Data Engineer'
    );
    expect(future.nextInstruction([], request, context("future", 1)).query).toBe(
      '"Acme Corp" strategic plans Data Engineer'
    );
  });

  it("cycles through angles", () => {
    const policy = new SearchDecisionPolicy("past", 3);
    expect(policy.nextInstruction([], request, context("past", 6)).query).toBe(
      '"Acme Corp" company history'
    );
  });

  it("counts distinct sources toward sufficiency", () => {
    const policy = new SearchDecisionPolicy("past", 2);

    expect(
      policy.isSufficient([
        finding("a", 1, "https://www.acme.example/about/"),
        finding("b", 2, "https://acme.example/about?ref=x"),
      ])
    ).toBe(false);
    expect(
      policy.isSufficient([
        finding("a", 1, "https://acme.example/about"),
        finding("b", 2, "https://acme.example/careers"),
      ])
    ).toBe(true);
  });

  it("creates one policy per domain", () => {
    expect(Object.keys(createDefaultPolicies(["past", "culture"], 3))).toEqual([
      "past",
      "culture",
    ]);
  });
});

describe("MarkdownRenderingPolicy", () => {
  it("renders the role line and cited findings", () => {
    const aggregate = new Map<ResearchDomain, WorkerResult>([
      [
        "past",
        workerResult("past", "completed", [
          finding("Founded\n in 1990", 1, "https://acme.example/about"),
        ]),
      ],
    ]);

    expect(new MarkdownRenderingPolicy().render(aggregate, request)).toBe(
      "# Company Research Report: Acme Corp\n\n" +
        "**Role:** Data Engineer\n\n" +
        "## Company History and Background\n\n" +
        "- Founded in 1990 ([https://acme.example/about](https://acme.example/about))"
    );
  });

  it("shows the research brief under the title", () => {
    const aggregate = new Map<ResearchDomain, WorkerResult>([
      ["past", workerResult("past", "completed", [finding("Founded in 1990", 1)])],
    ]);

    expect(
      new MarkdownRenderingPolicy().render(aggregate, request, {
        brief: "Assess Acme Corp for a data role",
      })
    ).toBe(
      "# Company Research Report: Acme Corp\n\n" +
        "**Role:** Data Engineer\n\n" +
        "**Research brief:** Assess Acme Corp for a data role\n\n" +
        "## Company History and Background\n\n" +
        "- Founded in 1990"
    );
  });

  it("prefers the source title as link text", () => {
    expect(formatFinding(finding("Text", 1, "https://acme.example", "Acme"))).toBe(
      "- Text ([Acme](https://acme.example))"
    );
  });
});

describe("LlmRenderingPolicy", () => {
  function llmReturning(text: string) {
    const calls: LlmMessage[][] = [];
    const signals: (AbortSignal | undefined)[] = [];
    const llm: LLMProvider = {
      query: async () => ({}),
      complete: async (messages, options) => {
        calls.push(messages);
        signals.push(options?.signal);
        return text;
      },
      getName: () => "fake",
    };
    return { llm, calls, signals };
  }

  const aggregate = new Map<ResearchDomain, WorkerResult>([
    ["past", workerResult("past", "completed", [finding("Founded in 1990", 1)])],
  ]);

  it("sends the findings and returns trimmed text", async () => {
    const { llm, calls } = llmReturning("  # Acme report  ");

    const text = await new LlmRenderingPolicy(llm).render(aggregate, request);

    expect(text).toBe("# Acme report");
    expect(calls).toHaveLength(1);
    expect(calls[0][1].content).toContain("- Founded in 1990");
    expect(calls[0][1].content).toContain("Role: Data Engineer");
    expect(calls[0][1].content).toContain("Research brief: none");
  });

  it("passes the brief and the abort signal to the provider", async () => {
    const { llm, calls, signals } = llmReturning("# Acme report");
    const controller = new AbortController();

    await new LlmRenderingPolicy(llm).render(aggregate, request, {
      brief: "Assess Acme Corp for a data role",
      signal: controller.signal,
    });

    expect(calls[0][1].content).toContain("Research brief: Assess Acme Corp for a data role");
    expect(signals[0]).toBe(controller.signal);
  });

  it("rejects an empty completion", async () => {
    const { llm } = llmReturning("   ");

    await expect(new LlmRenderingPolicy(llm).render(aggregate, request)).rejects.toThrow(
      ResearchError
    );
  });
});
