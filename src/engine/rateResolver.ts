import { EconomicScenario } from "../models/EconomicScenario";
import { IndexerKind } from "../models/ProductSpec";
import { InvalidProductSpecError } from "../utils/errors";
import { annualToMonthlyRate } from "../utils/math";

/**
 * Resolve the effective monthly compounding rate for a product's indexer.
 *
 * - fixed: rateParameter is the stated annual rate
 * - ipca: inflation composed with the real spread, then converted to monthly
 * - cdi: monthly CDI factor minus rateParameter. The multiplier binds to the
 *   subtracted 1 only, so rateParameter is not applied as a fraction of CDI.
 *   Kept as is until the product owner confirms the intended formula.
 */
export function resolveMonthlyRate(
  indexerKind: IndexerKind,
  rateParameter: number,
  scenario: EconomicScenario
): number {
  switch (indexerKind) {
    case "fixed":
      return annualToMonthlyRate(rateParameter);
    case "cdi":
      return Math.pow(1 + scenario.cdiAnnual, 1 / 12) - 1 * rateParameter;
    case "ipca":
      return Math.pow((1 + scenario.ipcaAnnual) * (1 + rateParameter), 1 / 12) - 1;
    default: {
      const unknownKind: never = indexerKind;
      throw new InvalidProductSpecError(`Unknown indexer kind: ${String(unknownKind)}`, [
        `indexerKind: expected one of fixed, cdi, ipca`,
      ]);
    }
  }
}
