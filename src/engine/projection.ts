import { ContributionPlan, getTotalInvested } from "../models/ContributionPlan";
import { EconomicScenario } from "../models/EconomicScenario";
import { ProductSpecInput } from "../models/ProductSpec";
import {
  ProjectionFailure,
  ProjectionResult,
  SimulationSummary,
} from "../models/ProjectionResult";
import { InvalidProductSpecError } from "../utils/errors";
import {
  parseContributionPlan,
  parseEconomicScenario,
  parseProductSpec,
} from "../utils/validation";
import { resolveMonthlyRate } from "./rateResolver";
import { holdingPeriodDays, incomeTaxRate } from "./taxation";

/**
 * Build the month-by-month balance series.
 * Each month compounds the previous balance, then adds the contribution at month end.
 *
 * @returns Balances for months 0..horizonMonths (length horizonMonths + 1)
 */
export function buildTrajectory(plan: ContributionPlan, monthlyRate: number): number[] {
  let balance = plan.initialDeposit;
  const trajectory = [balance];

  for (let month = 1; month <= plan.horizonMonths; month++) {
    balance = balance * (1 + monthlyRate) + plan.monthlyContribution;
    trajectory.push(balance);
  }

  return trajectory;
}

function projectValidated(
  specInput: ProductSpecInput,
  plan: ContributionPlan,
  scenario: EconomicScenario
): ProjectionResult {
  const spec = parseProductSpec(specInput);
  const monthlyRate = resolveMonthlyRate(spec.indexerKind, spec.rateParameter, scenario);
  const trajectory = buildTrajectory(plan, monthlyRate);

  const balance = trajectory[trajectory.length - 1];
  const totalInvested = getTotalInvested(plan);
  const grossGain = balance - totalInvested;

  const taxRate = spec.taxExempt ? 0 : incomeTaxRate(holdingPeriodDays(plan.horizonMonths));
  const taxWithheld = spec.taxExempt ? 0 : grossGain * taxRate;

  return {
    productName: spec.name,
    indexerKind: spec.indexerKind,
    taxExempt: spec.taxExempt,
    effectiveMonthlyRate: monthlyRate,
    trajectory,
    totalInvested,
    grossGain,
    taxRate,
    taxWithheld,
    netGain: grossGain - taxWithheld,
    finalBalance: balance - taxWithheld,
  };
}

/**
 * Project a single product over the plan horizon and net out income tax.
 *
 * @throws InvalidContributionPlanError, InvalidEconomicScenarioError, InvalidProductSpecError
 */
export function project(
  spec: ProductSpecInput,
  plan: ContributionPlan,
  scenario: EconomicScenario
): ProjectionResult {
  return projectValidated(spec, parseContributionPlan(plan), parseEconomicScenario(scenario));
}

/**
 * Order results by final balance, highest first.
 * Equal balances keep their input order.
 */
export function rankResults(results: ProjectionResult[]): ProjectionResult[] {
  return results
    .map((result, index) => ({ result, index }))
    .sort((a, b) => b.result.finalBalance - a.result.finalBalance || a.index - b.index)
    .map(({ result }) => result);
}

/**
 * Result with the highest final balance; the first one wins a tie.
 */
export function selectBest(results: ProjectionResult[]): ProjectionResult | null {
  let best: ProjectionResult | null = null;
  for (const result of results) {
    if (best === null || result.finalBalance > best.finalBalance) {
      best = result;
    }
  }
  return best;
}

/**
 * Project every product against the same plan and scenario.
 * The plan and scenario are validated once, before any product work; an invalid
 * product is reported in `failures` and the remaining products still run.
 */
export function projectAll(
  specs: readonly ProductSpecInput[],
  plan: ContributionPlan,
  scenario: EconomicScenario
): SimulationSummary {
  const validPlan = parseContributionPlan(plan);
  const validScenario = parseEconomicScenario(scenario);

  const results: ProjectionResult[] = [];
  const failures: ProjectionFailure[] = [];

  specs.forEach((spec, index) => {
    try {
      results.push(projectValidated(spec, validPlan, validScenario));
    } catch (error) {
      if (!(error instanceof InvalidProductSpecError)) {
        throw error;
      }
      failures.push({
        productName: spec.name,
        index,
        error: error.code,
        message: error.message,
        issues: error.issues,
      });
    }
  });

  const ranking = rankResults(results);

  return {
    results,
    failures,
    best: selectBest(results),
    runnerUp: ranking.length > 1 ? ranking[1] : null,
  };
}
