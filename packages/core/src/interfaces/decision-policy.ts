/**
 * Decision Policy Interface
 *
 * Per-domain logic that decides what a worker asks next and when it has
 * found enough. Invoked synchronously between task units.
 */

import type { Finding } from "../models/finding";
import type { ResearchDomain } from "../models/research-domain";
import type { ResearchRequest } from "../models/research-request";
import type { Instruction } from "./tool-provider";

/**
 * Extra context the worker passes along with the findings
 */
export interface DecisionContext {
  domain: ResearchDomain;
  iteration: number; // 1-based number of the task unit about to run
  focus: string;
}

export interface DecisionPolicy {
  nextInstruction(
    findings: readonly Finding[],
    request: ResearchRequest,
    context?: DecisionContext
  ): Instruction;

  isSufficient(findings: readonly Finding[]): boolean;
}
