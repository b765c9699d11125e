/**
 * Contribution plan data structure
 */

export interface ContributionPlan {
  initialDeposit: number;
  monthlyContribution: number;
  horizonMonths: number;
}

/**
 * Get the total amount contributed over the plan horizon (initial deposit plus every monthly contribution)
 */
export function getTotalInvested(plan: ContributionPlan): number {
  return plan.initialDeposit + plan.monthlyContribution * plan.horizonMonths;
}
