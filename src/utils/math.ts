/**
 * Financial calculation utilities for balance projections.
 * All calculations use monthly compounding periods.
 */

/**
 * Converts an annual effective rate to the equivalent monthly compounding rate.
 * Formula: r_m = (1 + r_a)^(1/12) - 1
 * 
 * @param annualRate - Annual rate as a decimal (e.g., 0.1268 for 12.68%)
 * @returns Monthly rate as a decimal
 * 
 * @example
 * ```ts
 * annualToMonthlyRate(0.126825) // returns ~0.01 (1% per month)
 * ```
 */
export function annualToMonthlyRate(annualRate: number): number {
  return Math.pow(1 + annualRate, 1 / 12) - 1;
}

/**
 * Calculates the future value of a single sum with compound interest.
 * Formula: FV = PV × (1 + r)^n
 * 
 * @param presentValue - Initial deposit
 * @param monthlyRate - Monthly rate as a decimal
 * @param periods - Number of monthly periods
 */
export function futureValue(
  presentValue: number,
  monthlyRate: number,
  periods: number
): number {
  return presentValue * Math.pow(1 + monthlyRate, periods);
}

/**
 * Calculates the future value of end-of-month contributions.
 * Formula: FV = PMT × [(1 + r)^n - 1] / r
 */
export function futureValueOfAnnuity(
  monthlyPayment: number,
  monthlyRate: number,
  periods: number
): number {
  if (monthlyRate === 0) {
    return monthlyPayment * periods;
  }
  return monthlyPayment * ((Math.pow(1 + monthlyRate, periods) - 1) / monthlyRate);
}

/**
 * Closed form of the month-by-month balance recurrence.
 * Formula: B(T) = B₀(1+r)^T + C·[(1+r)^T - 1]/r
 * 
 * @param initialDeposit - Balance at month 0
 * @param monthlyContribution - Amount added at the end of every month
 * @param monthlyRate - Monthly rate as a decimal
 * @param months - Number of months until target time
 */
export function balanceAtMonth(
  initialDeposit: number,
  monthlyContribution: number,
  monthlyRate: number,
  months: number
): number {
  const depositGrowth = futureValue(initialDeposit, monthlyRate, months);
  const contributionGrowth = futureValueOfAnnuity(monthlyContribution, monthlyRate, months);
  return depositGrowth + contributionGrowth;
}

/**
 * Rounds a monetary amount to cents.
 * 
 * @example
 * ```ts
 * roundToCents(1509.3008) // returns 1509.3
 * ```
 */
export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}
