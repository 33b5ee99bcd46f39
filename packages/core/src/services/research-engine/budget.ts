/**
 * Iteration budget owned by one worker
 */

import { ResearchError } from "../../errors";

export class IterationBudget {
  private consumed = 0;

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ResearchError(
        "ConfigurationError",
        `Iteration budget must be a positive integer, got ${limit}`
      );
    }
  }

  get used(): number {
    return this.consumed;
  }

  get remaining(): number {
    return this.limit - this.consumed;
  }

  get exhausted(): boolean {
    return this.consumed >= this.limit;
  }

  /**
   * Take one unit. Calling on an exhausted budget is a caller bug.
   */
  consume(): void {
    if (this.exhausted) {
      throw new ResearchError(
        "BudgetExhausted",
        `Iteration budget of ${this.limit} already used`
      );
    }
    this.consumed++;
  }
}
