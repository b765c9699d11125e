/**
 * Domain errors raised by the simulation engine.
 * Each carries a stable code and the validation issues that caused it.
 */

export type SimulationErrorCode =
  | "InvalidProductSpec"
  | "InvalidContributionPlan"
  | "InvalidEconomicScenario";

export class SimulationInputError extends Error {
  readonly code: SimulationErrorCode;
  readonly issues: string[];

  constructor(code: SimulationErrorCode, message: string, issues: string[] = []) {
    super(message);
    this.name = code;
    this.code = code;
    this.issues = issues;
  }
}

/**
 * Indexer kind outside the supported set, or a rate parameter outside its domain.
 * Aborts the affected product only.
 */
export class InvalidProductSpecError extends SimulationInputError {
  constructor(message: string, issues: string[] = []) {
    super("InvalidProductSpec", message, issues);
  }
}

/**
 * Horizon below one month, or negative deposit/contribution.
 * Aborts the whole batch, since every product shares the plan.
 */
export class InvalidContributionPlanError extends SimulationInputError {
  constructor(message: string, issues: string[] = []) {
    super("InvalidContributionPlan", message, issues);
  }
}

export class InvalidEconomicScenarioError extends SimulationInputError {
  constructor(message: string, issues: string[] = []) {
    super("InvalidEconomicScenario", message, issues);
  }
}
