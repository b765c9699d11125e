import { ContributionPlan } from "../models/ContributionPlan";
import { EconomicScenario } from "../models/EconomicScenario";
import { ProductSpec } from "../models/ProductSpec";

/**
 * Shared constants for fixed-income simulation.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Days counted per month when selecting the income-tax bracket (not calendar-accurate). */
export const DAYS_PER_MONTH = 30;

/** Scenario used when a request omits CDI or IPCA. */
export const DEFAULT_SCENARIO: EconomicScenario = {
  cdiAnnual: 0.1375,
  ipcaAnnual: 0.045,
};

export const DEFAULT_PLAN: ContributionPlan = {
  initialDeposit: 1000,
  monthlyContribution: 500,
  horizonMonths: 36,
};

/** Products simulated when a request does not supply its own list. */
export const DEFAULT_PRODUCTS: ProductSpec[] = [
  { name: "CDB - Prefixada", indexerKind: "fixed", rateParameter: 0.1175, taxExempt: false },
  { name: "LCI - Pós CDI", indexerKind: "cdi", rateParameter: 0.94, taxExempt: true },
  { name: "LCA - IPCA +", indexerKind: "ipca", rateParameter: 0.058, taxExempt: true },
];
