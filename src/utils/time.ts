import { DAYS_PER_MONTH } from "./constants";

/**
 * Time conversion and horizon utilities for tax and projection calculations.
 */

/**
 * Converts a horizon in months to holding days using the fixed 30-day-month convention.
 * 
 * @param months - Number of months
 * @returns Number of days
 */
export function monthsToDays(months: number): number {
  return months * DAYS_PER_MONTH;
}

/**
 * Formats a month index as a short label, e.g. "Month 5" or "2Y 3M".
 */
export function formatMonthLabel(month: number): string {
  const years = Math.floor(month / 12);
  const months = month % 12;
  if (years === 0) {
    return `Month ${months}`;
  }
  return `${years}Y ${months}M`;
}
