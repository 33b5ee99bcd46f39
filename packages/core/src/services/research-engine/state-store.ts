/**
 * Shared state store
 *
 * One write-once slot per launched worker, keyed by domain and kept in
 * launch order. The supervisor fills every slot, then assembles the
 * aggregate in one step.
 */

import { StateStoreError } from "../../errors";
import type { ResearchDomain } from "../../models/research-domain";
import type {
  AggregateState,
  WorkerResult,
} from "../../models/worker-result";

export class ResearchStateStore {
  private readonly slots = new Map<ResearchDomain, WorkerResult | null>();
  private assembled = false;

  /**
   * Open a slot for a worker about to launch
   */
  register(domain: ResearchDomain): void {
    this.ensureOpen();
    if (this.slots.has(domain)) {
      throw new StateStoreError(`Domain ${domain} is already registered`, {
        domain,
      });
    }
    this.slots.set(domain, null);
  }

  /**
   * Write a worker's terminal result into its slot, exactly once
   */
  commit(domain: ResearchDomain, result: WorkerResult): void {
    this.ensureOpen();
    if (!this.slots.has(domain)) {
      throw new StateStoreError(`Domain ${domain} was never registered`, {
        domain,
      });
    }
    if (this.slots.get(domain)) {
      throw new StateStoreError(`Domain ${domain} already has a result`, {
        domain,
      });
    }
    if (result.domain !== domain) {
      throw new StateStoreError(
        `Result for ${result.domain} cannot be stored under ${domain}`,
        { domain, resultDomain: result.domain }
      );
    }
    this.slots.set(domain, result);
  }

  has(domain: ResearchDomain): boolean {
    return Boolean(this.slots.get(domain));
  }

  /**
   * Registered domains still waiting for a result, in launch order
   */
  pending(): ResearchDomain[] {
    return [...this.slots.entries()]
      .filter(([, result]) => result === null)
      .map(([domain]) => domain);
  }

  domains(): ResearchDomain[] {
    return [...this.slots.keys()];
  }

  /**
   * Freeze the store into the aggregate state.
   * Refuses while any slot is empty.
   */
  assemble(): AggregateState {
    const missing = this.pending();
    if (missing.length > 0) {
      throw new StateStoreError(
        `Cannot assemble: no result for ${missing.join(", ")}`,
        { missing }
      );
    }

    const aggregate = new Map<ResearchDomain, WorkerResult>();
    for (const [domain, result] of this.slots) {
      if (result) {
        aggregate.set(domain, result);
      }
    }
    this.assembled = true;
    return aggregate;
  }

  private ensureOpen(): void {
    if (this.assembled) {
      throw new StateStoreError("State store has already been assembled");
    }
  }
}
