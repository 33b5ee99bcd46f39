/**
 * Research supervisor
 *
 * Core logic for executing one research run:
 * 1. Validate the request (the only step allowed to throw)
 * 2. Plan a focus per domain
 * 3. Launch one worker per domain, concurrently
 * 4. Wait for every worker or the deadline, whichever comes first
 * 5. Cancel stragglers and fill their slots with DeadlineExceeded results
 * 6. Assemble the state store and synthesize the report, with rendering
 *    bounded by report.timeoutMs
 */

import { ConfigurationError } from "../../errors";
import { createLogger, type Logger } from "../../logger";
import type { DomainStatuses, ResearchOutcome } from "../../models/report";
import type { ResearchDomain } from "../../models/research-domain";
import {
  createResearchRequest,
  type NewResearchRequest,
  type ResearchRequest,
} from "../../models/research-request";
import type { AggregateState } from "../../models/worker-result";
import type { DecisionPolicy } from "../../interfaces/decision-policy";
import type { ToolProvider } from "../../interfaces/tool-provider";
import {
  getConfig,
  getDeadlineMs,
  getDomainBudget,
  mergeConfig,
  type ResearchConfig,
} from "./config";
import { TemplatePlanner, buildTemplatePlan, planWithFallback } from "./planner";
import { createDefaultPolicies } from "./policies/search-decision";
import { ResearchStateStore } from "./state-store";
import { Synthesizer } from "./synthesizer";
import type {
  ResearchPlan,
  ResearchPlanner,
  SupervisorOptions,
  WorkerSpec,
} from "./types";
import { ResearchWorker } from "./worker";

/**
 * Anything that can run research; what outer surfaces depend on
 */
export interface ResearchRunner {
  run(input: NewResearchRequest | ResearchRequest): Promise<ResearchOutcome>;
}

/**
 * Resolve once every promise settles or the deadline passes
 */
async function joinWithDeadline(
  work: Promise<unknown>,
  deadlineMs: number
): Promise<"settled" | "deadline"> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<"deadline">((resolve) => {
    timer = setTimeout(() => resolve("deadline"), deadlineMs);
  });
  try {
    return await Promise.race([work.then(() => "settled" as const), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export class ResearchSupervisor implements ResearchRunner {
  private readonly config: ResearchConfig;
  private readonly toolProvider: ToolProvider;
  private readonly policies: Partial<Record<ResearchDomain, DecisionPolicy>>;
  private readonly planner: ResearchPlanner;
  private readonly synthesizer: Synthesizer;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(options: SupervisorOptions) {
    this.config = mergeConfig(options.config ?? getConfig(), options.overrides);

    this.toolProvider = options.toolProvider;
    this.policies = {
      ...createDefaultPolicies(
        this.config.research.domains,
        this.config.research.minFindings
      ),
      ...options.policies,
    };
    for (const domain of this.config.research.domains) {
      if (!this.policies[domain]) {
        throw new ConfigurationError(`No decision policy for domain ${domain}`);
      }
    }
    this.planner = options.planner ?? new TemplatePlanner();
    this.log = createLogger({ component: "supervisor" }, options.logger);
    this.now = options.now ?? Date.now;
    this.synthesizer = new Synthesizer({
      renderingPolicy: options.renderingPolicy,
      renderTimeoutMs: this.config.report.timeoutMs,
      logger: options.logger,
      now: this.now,
    });
  }

  /**
   * Domains this supervisor researches, in launch order
   */
  getDomains(): ResearchDomain[] {
    return [...this.config.research.domains];
  }

  getConfig(): ResearchConfig {
    return this.config;
  }

  /**
   * Deadline applied to each run
   */
  getDeadlineMs(): number {
    return getDeadlineMs(this.config);
  }

  /**
   * Run research for one request.
   * Throws InvalidRequestError before launching anything; never throws after.
   */
  async run(input: NewResearchRequest | ResearchRequest): Promise<ResearchOutcome> {
    const request = createResearchRequest(input);
    const startedAt = this.now();
    const log = this.log.child({ subject: request.subject });

    const plan = await this.plan(request, log);
    const specs = this.buildWorkerSpecs(request, plan);

    const store = new ResearchStateStore();
    const workers = specs.map((spec) => {
      store.register(spec.domain);
      return this.createWorker(spec, log);
    });

    const deadlineMs = this.getDeadlineMs();
    log.info(
      {
        domains: specs.map((spec) => spec.domain),
        deadlineMs,
        provider: this.toolProvider.getName(),
      },
      "Launching research workers"
    );

    const join = await joinWithDeadline(
      Promise.all(workers.map((worker) => worker.run())),
      deadlineMs
    );

    // Single synchronization point: every slot is written here, in launch order
    for (const worker of workers) {
      const result =
        worker.getResult() ??
        worker.cancel({
          code: "DeadlineExceeded",
          message: `Deadline of ${deadlineMs}ms exceeded`,
        });
      store.commit(worker.domain, result);
    }

    const aggregate = store.assemble();
    const statuses = this.collectStatuses(aggregate);

    if ([...aggregate.values()].every((result) => result.status === "failed")) {
      log.error({ code: "AllWorkersFailed", statuses }, "All research workers failed");
    }

    const report = await this.synthesizer.synthesize(aggregate, request, {
      brief: plan.brief,
    });
    const durationMs = this.now() - startedAt;
    const invocations = workers.reduce((sum, worker) => sum + worker.invocations, 0);

    log.info(
      { join, statuses, invocations, durationMs, complete: report.complete },
      "Research run finished"
    );

    return { report, statuses, invocations, durationMs };
  }

  private async plan(request: ResearchRequest, log: Logger): Promise<ResearchPlan> {
    if (!this.config.planning.enabled) {
      return buildTemplatePlan(request);
    }
    return planWithFallback(
      this.planner,
      request,
      this.config.planning.timeoutMs,
      log
    );
  }

  private buildWorkerSpecs(request: ResearchRequest, plan: ResearchPlan): WorkerSpec[] {
    return this.config.research.domains.map((domain) => ({
      domain,
      request,
      iterationBudget: getDomainBudget(domain, this.config),
      focus: plan.focus[domain],
    }));
  }

  private createWorker(spec: WorkerSpec, log: Logger): ResearchWorker {
    const policy = this.policies[spec.domain];
    if (!policy) {
      // Checked for every configured domain at construction
      throw new ConfigurationError(`No decision policy for domain ${spec.domain}`);
    }
    return new ResearchWorker({
      spec,
      policy,
      toolProvider: this.toolProvider,
      toolTimeoutMs: this.config.tools.timeoutMs,
      retryDelayMs: this.config.tools.retryDelayMs,
      maxRetryDelayMs: this.config.tools.maxRetryDelayMs,
      failedRatio: this.config.research.failedRatio,
      logger: log,
      now: this.now,
    });
  }

  private collectStatuses(aggregate: AggregateState): DomainStatuses {
    const statuses: DomainStatuses = {};
    for (const [domain, result] of aggregate) {
      statuses[domain] = result.status;
    }
    return statuses;
  }
}

/**
 * Run research once with a throwaway supervisor
 */
export async function runResearch(
  input: NewResearchRequest,
  options: SupervisorOptions
): Promise<ResearchOutcome> {
  return new ResearchSupervisor(options).run(input);
}
