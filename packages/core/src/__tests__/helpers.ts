import { vi } from "vitest";
import { ToolError, type ToolErrorKind } from "../errors";
import type { Finding } from "../models/finding";
import type { ResearchDomain } from "../models/research-domain";
import type { ResearchRequest } from "../models/research-request";
import type {
  WorkerErrorDescriptor,
  WorkerResult,
  WorkerStatus,
} from "../models/worker-result";
import type {
  DecisionContext,
  DecisionPolicy,
} from "../interfaces/decision-policy";
import type {
  Instruction,
  ToolInvokeOptions,
  ToolProvider,
  ToolResult,
} from "../interfaces/tool-provider";
import { resolveConfig, type ConfigOverrides } from "../services/research-engine/config";

export type ToolScript = (
  instruction: Instruction,
  call: number,
  options?: ToolInvokeOptions
) => ToolResult | Promise<ToolResult>;

/**
 * Tool provider driven by a script; `call` counts from 1
 */
export function scriptedTool(script: ToolScript, name = "stub") {
  let calls = 0;
  const invoke = vi.fn(
    async (instruction: Instruction, options?: ToolInvokeOptions): Promise<ToolResult> => {
      calls++;
      return script(instruction, calls, options);
    }
  );
  const provider = {
    invoke,
    getName: () => name,
  } satisfies ToolProvider;
  return provider;
}

export function ok(text: string, url?: string): ToolResult {
  return { ok: true, content: { text, source: url ? { url } : undefined } };
}

export function fail(
  kind: ToolErrorKind = "ToolUnavailable",
  message = "upstream unavailable",
  fatal = false
): ToolResult {
  return { ok: false, error: new ToolError(kind, message, { fatal }) };
}

/**
 * Never settles on its own; resolves with a timeout failure once aborted
 */
export function hang(options?: ToolInvokeOptions): Promise<ToolResult> {
  return new Promise((resolve) => {
    options?.signal?.addEventListener("abort", () => resolve(fail("ToolTimeout", "aborted")), {
      once: true,
    });
  });
}

/**
 * Decision policy whose queries name the domain and iteration,
 * sufficient once `enough` findings exist (never by default)
 */
export class StubPolicy implements DecisionPolicy {
  constructor(
    private readonly domain: ResearchDomain,
    private readonly enough = Number.POSITIVE_INFINITY
  ) {}

  nextInstruction(
    findings: readonly Finding[],
    _request: ResearchRequest,
    context?: DecisionContext
  ): Instruction {
    return {
      query: `${this.domain} ${context?.iteration ?? findings.length + 1}`,
      focus: context?.focus,
    };
  }

  isSufficient(findings: readonly Finding[]): boolean {
    return findings.length >= this.enough;
  }
}

export function stubPolicies(enough?: number): Record<ResearchDomain, DecisionPolicy> {
  return {
    past: new StubPolicy("past", enough),
    future: new StubPolicy("future", enough),
    culture: new StubPolicy("culture", enough),
  };
}

/**
 * Defaults with no retry delay and template planning
 */
export function testConfig(overrides: ConfigOverrides = {}) {
  return resolveConfig({
    ...overrides,
    tools: { retryDelayMs: 0, maxRetryDelayMs: 0, ...overrides.tools },
    planning: { enabled: false, ...overrides.planning },
  });
}

export function finding(content: string, iteration: number, url?: string, title?: string): Finding {
  return {
    content,
    source: url ? { url, title } : undefined,
    timestamp: 1000 + iteration,
    iteration,
  };
}

export function workerResult(
  domain: ResearchDomain,
  status: WorkerStatus,
  findings: Finding[] = [],
  error?: WorkerErrorDescriptor
): WorkerResult {
  return {
    domain,
    status,
    findings,
    error,
    attempts: findings.length,
    failures: 0,
    startedAt: 0,
    completedAt: 1,
  };
}
