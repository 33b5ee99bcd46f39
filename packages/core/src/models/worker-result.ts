/**
 * Worker result and aggregate state models
 */

import type { ToolErrorKind } from "../errors";
import type { Finding } from "./finding";
import type { ResearchDomain } from "./research-domain";

/**
 * Terminal worker statuses
 */
export type WorkerStatus = "completed" | "partially_completed" | "failed";

/**
 * Full worker lifecycle; terminal states are absorbing
 */
export type WorkerState = "idle" | "iterating" | WorkerStatus;

export type WorkerErrorCode =
  | ToolErrorKind
  | "DeadlineExceeded"
  | "AllAttemptsFailed"
  | "FailureRateExceeded"
  | "PartialFailure"
  | "BudgetExhausted"
  | "PolicyError";

export interface WorkerErrorDescriptor {
  code: WorkerErrorCode;
  message: string;
}

/**
 * Frozen outcome of one worker.
 * `error` is always present unless the status is "completed".
 */
export interface WorkerResult {
  readonly domain: ResearchDomain;
  readonly status: WorkerStatus;
  readonly findings: readonly Finding[];
  readonly error?: WorkerErrorDescriptor;
  readonly attempts: number; // Task units invoked
  readonly failures: number; // Task units that failed
  readonly startedAt: number;
  readonly completedAt: number;
}

/**
 * Fully populated per-domain map of terminal worker results,
 * in launch order
 */
export type AggregateState = ReadonlyMap<ResearchDomain, WorkerResult>;

export function isTerminalState(state: WorkerState): state is WorkerStatus {
  return (
    state === "completed" ||
    state === "partially_completed" ||
    state === "failed"
  );
}
