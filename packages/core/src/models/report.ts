/**
 * Report models
 */

import type { ResearchDomain } from "./research-domain";
import type { ResearchRequest } from "./research-request";
import type { WorkerErrorCode, WorkerStatus } from "./worker-result";

export interface DomainSummary {
  domain: ResearchDomain;
  status: WorkerStatus;
  findingsCount: number;
  errorCode?: WorkerErrorCode;
}

/**
 * Terminal artifact of a research run. Frozen once built.
 */
export interface Report {
  readonly title: string;
  readonly markdown: string;
  readonly request: ResearchRequest;
  readonly summary: readonly DomainSummary[];
  readonly complete: boolean; // true only if every domain completed
  readonly generatedAt: number;
}

/**
 * Side-channel status map for observability
 */
export type DomainStatuses = Partial<Record<ResearchDomain, WorkerStatus>>;

/**
 * What `ResearchSupervisor.run` returns
 */
export interface ResearchOutcome {
  report: Report;
  statuses: DomainStatuses;
  invocations: number; // Task units invoked across all workers
  durationMs: number;
}
