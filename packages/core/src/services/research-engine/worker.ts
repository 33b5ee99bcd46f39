/**
 * Research worker
 *
 * Runs the bounded task-unit loop for one domain and owns that domain's
 * state slice. States: idle -> iterating -> completed | partially_completed
 * | failed. Terminal states are absorbing and freeze the result.
 */

import { errorMessage } from "../../errors";
import { createLogger, type Logger } from "../../logger";
import type { Finding } from "../../models/finding";
import type { ResearchDomain } from "../../models/research-domain";
import {
  isTerminalState,
  type WorkerErrorDescriptor,
  type WorkerResult,
  type WorkerState,
  type WorkerStatus,
} from "../../models/worker-result";
import type { DecisionPolicy } from "../../interfaces/decision-policy";
import type { ToolProvider } from "../../interfaces/tool-provider";
import { IterationBudget } from "./budget";
import { executeTaskUnit } from "./task-unit";
import type { WorkerSpec } from "./types";

export interface WorkerOptions {
  spec: WorkerSpec;
  toolProvider: ToolProvider;
  policy: DecisionPolicy;
  toolTimeoutMs: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  failedRatio: number;
  logger?: Logger;
  now?: () => number;
}

interface TerminalOutcome {
  status: WorkerStatus;
  error?: WorkerErrorDescriptor;
}

export class ResearchWorker {
  private state: WorkerState = "idle";
  private readonly findings: Finding[] = [];
  private readonly budget: IterationBudget;
  private readonly controller = new AbortController();
  private readonly log: Logger;
  private readonly now: () => number;
  private failures = 0;
  private inFlight = false;
  private startedAt = 0;
  private result: WorkerResult | null = null;
  private running: Promise<WorkerResult> | null = null;

  constructor(private readonly options: WorkerOptions) {
    this.budget = new IterationBudget(options.spec.iterationBudget);
    this.now = options.now ?? Date.now;
    this.log = createLogger({ domain: options.spec.domain }, options.logger);
  }

  get domain(): ResearchDomain {
    return this.options.spec.domain;
  }

  /**
   * Task units invoked so far
   */
  get invocations(): number {
    return this.budget.used;
  }

  getState(): WorkerState {
    return this.state;
  }

  isTerminal(): boolean {
    return isTerminalState(this.state);
  }

  /**
   * Frozen result once terminal, null before
   */
  getResult(): WorkerResult | null {
    return this.result;
  }

  /**
   * Launch the loop. Never rejects; calling twice returns the same promise.
   */
  run(): Promise<WorkerResult> {
    if (!this.running) {
      this.running = this.iterate();
    }
    return this.running;
  }

  /**
   * Force a terminal failure (deadline). Findings already appended are kept
   * and an attempt still in flight is counted as failed. No-op once terminal.
   */
  cancel(error: WorkerErrorDescriptor): WorkerResult {
    if (this.result) {
      return this.result;
    }
    if (this.inFlight) {
      this.failures++;
    }
    if (this.state === "idle") {
      this.startedAt = this.now();
    }
    this.controller.abort();
    this.log.warn(
      { code: error.code, findings: this.findings.length },
      "Worker cancelled"
    );
    return this.finish({ status: "failed", error });
  }

  private async iterate(): Promise<WorkerResult> {
    const { spec, policy, toolProvider } = this.options;
    this.state = "iterating";
    this.startedAt = this.now();
    this.log.info(
      { budget: spec.iterationBudget, provider: toolProvider.getName() },
      "Worker started"
    );

    try {
      while (!this.isTerminal()) {
        if (this.budget.exhausted) {
          return this.finish(this.exhaustedOutcome());
        }

        const instruction = policy.nextInstruction(this.snapshot(), spec.request, {
          domain: spec.domain,
          iteration: this.budget.used + 1,
          focus: spec.focus,
        });

        this.inFlight = true;
        const outcome = await executeTaskUnit(
          toolProvider,
          instruction,
          this.budget,
          {
            timeoutMs: this.options.toolTimeoutMs,
            signal: this.controller.signal,
            now: this.now,
          }
        );
        this.inFlight = false;

        // Cancelled while the call was in flight; the late outcome is dropped
        if (this.isTerminal()) {
          break;
        }

        if (outcome.ok) {
          this.findings.push(outcome.finding);
          this.log.debug(
            { iteration: this.budget.used, query: instruction.query },
            "Task unit succeeded"
          );
          if (policy.isSufficient(this.snapshot())) {
            return this.finish({ status: "completed" });
          }
          continue;
        }

        this.failures++;
        this.log.warn(
          {
            iteration: this.budget.used,
            kind: outcome.error.kind,
            fatal: outcome.error.fatal,
            error: outcome.error.message,
          },
          "Task unit failed"
        );

        if (outcome.error.fatal) {
          return this.finish({
            status: "failed",
            error: { code: outcome.error.kind, message: outcome.error.message },
          });
        }

        if (!this.budget.exhausted) {
          await this.backoff();
        }
      }
    } catch (error) {
      this.inFlight = false;
      return this.finish({
        status: "failed",
        error: { code: "PolicyError", message: errorMessage(error) },
      });
    }

    return this.cancelledResult();
  }

  /**
   * Outcome once the budget is spent without the policy signalling sufficiency
   */
  private exhaustedOutcome(): TerminalOutcome {
    const attempts = this.budget.used;

    if (this.findings.length === 0) {
      return {
        status: "failed",
        error: {
          code: "AllAttemptsFailed",
          message: `All ${attempts} attempts failed`,
        },
      };
    }

    if (this.failures / attempts >= this.options.failedRatio) {
      return {
        status: "failed",
        error: {
          code: "FailureRateExceeded",
          message: `${this.failures} of ${attempts} attempts failed`,
        },
      };
    }

    if (this.failures > 0) {
      return {
        status: "partially_completed",
        error: {
          code: "PartialFailure",
          message: `${this.failures} of ${attempts} attempts failed`,
        },
      };
    }

    return {
      status: "partially_completed",
      error: {
        code: "BudgetExhausted",
        message: `Iteration budget of ${attempts} exhausted before findings were sufficient`,
      },
    };
  }

  /**
   * Exponential backoff between failed attempts, cut short by cancellation
   */
  private async backoff(): Promise<void> {
    const { retryDelayMs, maxRetryDelayMs } = this.options;
    const delay = Math.min(
      retryDelayMs * Math.pow(2, this.failures - 1),
      maxRetryDelayMs
    );
    if (delay <= 0 || this.controller.signal.aborted) {
      return;
    }

    await new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.controller.signal.removeEventListener("abort", done);
        resolve();
      };
      const timer = setTimeout(done, delay);
      this.controller.signal.addEventListener("abort", done, { once: true });
    });
  }

  private snapshot(): readonly Finding[] {
    return this.findings.slice();
  }

  private cancelledResult(): WorkerResult {
    if (this.result) {
      return this.result;
    }
    // Only reachable if the loop exits without a terminal transition
    return this.finish({
      status: "failed",
      error: { code: "PolicyError", message: "Worker loop ended unexpectedly" },
    });
  }

  private finish(outcome: TerminalOutcome): WorkerResult {
    if (this.result) {
      return this.result;
    }

    const result: WorkerResult = Object.freeze({
      domain: this.domain,
      status: outcome.status,
      findings: Object.freeze(this.findings.slice()),
      error: outcome.error ? Object.freeze({ ...outcome.error }) : undefined,
      attempts: this.budget.used,
      failures: this.failures,
      startedAt: this.startedAt,
      completedAt: this.now(),
    });

    this.state = outcome.status;
    this.result = result;

    this.log.info(
      {
        status: result.status,
        findings: result.findings.length,
        attempts: result.attempts,
        failures: result.failures,
        code: result.error?.code,
      },
      "Worker finished"
    );
    return result;
  }
}
