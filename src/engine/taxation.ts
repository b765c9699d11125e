import { monthsToDays } from "../utils/time";

/**
 * Regressive income tax on fixed-income gains.
 * The rate drops as the holding period grows.
 */

export interface TaxBracket {
  maxDays: number | null; // Inclusive upper bound, null for the open-ended last bracket
  rate: number;
}

export const REGRESSIVE_TAX_BRACKETS: readonly TaxBracket[] = [
  { maxDays: 180, rate: 0.225 },
  { maxDays: 360, rate: 0.2 },
  { maxDays: 720, rate: 0.175 },
  { maxDays: null, rate: 0.15 },
];

/**
 * Get the income-tax rate for a holding period.
 * 
 * @param days - Holding period in days
 * @returns Tax rate as a decimal (0.225, 0.20, 0.175 or 0.15)
 */
export function incomeTaxRate(days: number): number {
  for (const bracket of REGRESSIVE_TAX_BRACKETS) {
    if (bracket.maxDays === null || days <= bracket.maxDays) {
      return bracket.rate;
    }
  }
  return REGRESSIVE_TAX_BRACKETS[REGRESSIVE_TAX_BRACKETS.length - 1].rate;
}

/**
 * Holding period used for tax purposes, counting 30 days per month.
 */
export function holdingPeriodDays(horizonMonths: number): number {
  return monthsToDays(horizonMonths);
}
