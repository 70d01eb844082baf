import { FreshNameSupply } from "./freshNames.js";

export interface ReductionOptions {
  /**
   * Largest number of beta-contractions allowed before the run is abandoned
   * with a StepLimitExceededError. Unbounded when omitted.
   */
  maxSteps?: number;
}

/**
 * Raised when a reduction run uses up its step budget. Terms without a
 * normal form always end this way when a budget is set.
 */
export class StepLimitExceededError extends Error {
  constructor(public readonly limit: number) {
    super(`reduction did not reach a normal form within ${limit} steps`);
    this.name = "StepLimitExceededError";
  }
}

/**
 * State owned by a single reduction run: the fresh-name supply used when
 * substitution must rename a binder, and the count of contractions so far.
 */
export class ReductionContext {
  readonly names = new FreshNameSupply();
  private stepCount = 0;

  constructor(private readonly options: ReductionOptions = {}) {
    const { maxSteps } = options;
    if (maxSteps !== undefined && (!Number.isInteger(maxSteps) || maxSteps < 0)) {
      throw new RangeError(`maxSteps must be a non-negative integer, got ${maxSteps}`);
    }
  }

  /** Number of beta-contractions performed in this run. */
  get steps(): number {
    return this.stepCount;
  }

  /**
   * Accounts for one contraction.
   * @throws StepLimitExceededError if the budget is already spent.
   */
  recordStep(): void {
    const { maxSteps } = this.options;
    if (maxSteps !== undefined && this.stepCount >= maxSteps) {
      throw new StepLimitExceededError(maxSteps);
    }
    this.stepCount++;
  }
}
