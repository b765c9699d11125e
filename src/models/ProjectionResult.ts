import { IndexerKind } from "./ProductSpec";

/**
 * Projection result data structures
 */

export interface ProjectionResult {
  productName: string;
  indexerKind: IndexerKind;
  taxExempt: boolean;
  effectiveMonthlyRate: number;
  trajectory: number[]; // Balance at month 0..horizonMonths, index 0 = initial deposit
  totalInvested: number;
  grossGain: number; // Before tax
  taxRate: number;
  taxWithheld: number;
  netGain: number; // grossGain - taxWithheld
  finalBalance: number; // Net of tax
}

export interface ProjectionFailure {
  productName: string;
  index: number; // Position in the input product list
  error: string;
  message: string;
  issues: string[];
}

export interface SimulationSummary {
  results: ProjectionResult[];
  failures: ProjectionFailure[];
  best: ProjectionResult | null;
  runnerUp: ProjectionResult | null;
}
