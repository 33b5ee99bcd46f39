import { describe, it, expect, vi } from "vitest";
import { createResearchRequest } from "../models/research-request";
import type { DecisionPolicy } from "../interfaces/decision-policy";
import type { ToolProvider } from "../interfaces/tool-provider";
import { ResearchWorker } from "../services/research-engine/worker";
import { StubPolicy, fail, hang, ok, scriptedTool } from "./helpers";

const request = createResearchRequest({ subject: "Acme Corp" });

function createWorker(
  toolProvider: ToolProvider,
  options: { budget?: number; policy?: DecisionPolicy; failedRatio?: number } = {}
) {
  return new ResearchWorker({
    spec: {
      domain: "past",
      request,
      iterationBudget: options.budget ?? 3,
      focus: "history",
    },
    toolProvider,
    policy: options.policy ?? new StubPolicy("past"),
    toolTimeoutMs: 1000,
    retryDelayMs: 0,
    maxRetryDelayMs: 0,
    failedRatio: options.failedRatio ?? 1,
  });
}

describe("ResearchWorker", () => {
  it("never exceeds its iteration budget", async () => {
    const tool = scriptedTool((_instruction, call) => ok(`finding ${call}`));
    const worker = createWorker(tool, { budget: 3 });

    const result = await worker.run();

    expect(tool.invoke).toHaveBeenCalledTimes(3);
    expect(result.status).toBe("partially_completed");
    expect(result.error).toEqual({
      code: "BudgetExhausted",
      message: "Iteration budget of 3 exhausted before findings were sufficient",
    });
    expect(result.findings.map((f) => f.content)).toEqual([
      "finding 1",
      "finding 2",
      "finding 3",
    ]);
    expect(result.findings.map((f) => f.iteration)).toEqual([1, 2, 3]);
    expect(worker.invocations).toBe(3);
  });

  it("passes the iteration and focus to the policy", async () => {
    const tool = scriptedTool(() => ok("x"));
    const policy = new StubPolicy("past", 2);
    const spy = vi.spyOn(policy, "nextInstruction");

    await createWorker(tool, { policy }).run();

    expect(spy.mock.calls.map((call) => call[2])).toEqual([
      { domain: "past", iteration: 1, focus: "history" },
      { domain: "past", iteration: 2, focus: "history" },
    ]);
    expect(tool.invoke.mock.calls[1][0]).toEqual({ query: "past 2", focus: "history" });
  });

  it("completes as soon as the policy is satisfied", async () => {
    const tool = scriptedTool((_instruction, call) =>
      call === 1 ? fail() : ok(`finding ${call}`)
    );
    const worker = createWorker(tool, { policy: new StubPolicy("past", 1) });

    const result = await worker.run();

    expect(result.status).toBe("completed");
    expect(result.error).toBeUndefined();
    expect(result.attempts).toBe(2);
    expect(result.failures).toBe(1);
    expect(worker.getState()).toBe("completed");
  });

  it("reports partial failure when some attempts fail", async () => {
    const tool = scriptedTool((_instruction, call) => (call === 2 ? fail() : ok(`f${call}`)));

    const result = await createWorker(tool).run();

    expect(result.status).toBe("partially_completed");
    expect(result.error).toEqual({ code: "PartialFailure", message: "1 of 3 attempts failed" });
    expect(result.findings).toHaveLength(2);
  });

  it("fails when the failure rate reaches the threshold", async () => {
    const tool = scriptedTool((_instruction, call) => (call === 3 ? ok("late") : fail()));

    const result = await createWorker(tool, { failedRatio: 0.5 }).run();

    expect(result.status).toBe("failed");
    expect(result.error).toEqual({
      code: "FailureRateExceeded",
      message: "2 of 3 attempts failed",
    });
    expect(result.findings).toHaveLength(1);
  });

  it("fails when every attempt fails", async () => {
    const tool = scriptedTool(() => fail());

    const result = await createWorker(tool, { budget: 2 }).run();

    expect(result.status).toBe("failed");
    expect(result.error).toEqual({ code: "AllAttemptsFailed", message: "All 2 attempts failed" });
    expect(tool.invoke).toHaveBeenCalledTimes(2);
  });

  it("stops on a fatal tool failure", async () => {
    const tool = scriptedTool(() => fail("ToolRejected", "invalid subscription token", true));

    const result = await createWorker(tool).run();

    expect(result.status).toBe("failed");
    expect(result.error).toEqual({
      code: "ToolRejected",
      message: "invalid subscription token",
    });
    expect(tool.invoke).toHaveBeenCalledTimes(1);
  });

  it("fails with PolicyError when the policy throws", async () => {
    const policy: DecisionPolicy = {
      nextInstruction: () => {
        throw new Error("no more angles");
      },
      isSufficient: () => false,
    };

    const result = await createWorker(scriptedTool(() => ok("x")), { policy }).run();

    expect(result.status).toBe("failed");
    expect(result.error).toEqual({ code: "PolicyError", message: "no more angles" });
    expect(result.attempts).toBe(0);
  });

  it("returns the same promise from repeated run calls", () => {
    const worker = createWorker(scriptedTool(() => ok("x")));
    expect(worker.run()).toBe(worker.run());
  });

  it("keeps findings when cancelled mid-call", async () => {
    const tool = scriptedTool((_instruction, call, options) =>
      call === 1 ? ok("Founded in 1990") : hang(options)
    );
    const worker = createWorker(tool);
    const running = worker.run();

    await vi.waitFor(() => expect(tool.invoke).toHaveBeenCalledTimes(2));
    const cancelled = worker.cancel({
      code: "DeadlineExceeded",
      message: "Deadline of 50ms exceeded",
    });

    expect(cancelled.status).toBe("failed");
    expect(cancelled.error?.code).toBe("DeadlineExceeded");
    expect(cancelled.findings.map((f) => f.content)).toEqual(["Founded in 1990"]);
    expect(cancelled.attempts).toBe(2);
    expect(cancelled.failures).toBe(1);
    expect(Object.isFrozen(cancelled)).toBe(true);
    expect(await running).toBe(cancelled);
  });

  it("ignores cancel once terminal", async () => {
    const worker = createWorker(scriptedTool(() => ok("x")), {
      policy: new StubPolicy("past", 1),
    });
    const result = await worker.run();

    const again = worker.cancel({ code: "DeadlineExceeded", message: "too late" });

    expect(again).toBe(result);
    expect(again.status).toBe("completed");
  });
});
