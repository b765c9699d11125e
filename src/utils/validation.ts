import { z } from "zod";
import { ContributionPlan } from "../models/ContributionPlan";
import { EconomicScenario } from "../models/EconomicScenario";
import { INDEXER_KINDS, ProductSpec, ProductSpecInput } from "../models/ProductSpec";
import {
  InvalidContributionPlanError,
  InvalidEconomicScenarioError,
  InvalidProductSpecError,
} from "./errors";

/**
 * Zod validation schemas for input data validation.
 * All rates are decimals (e.g., 0.1375 means 13.75%).
 */

/**
 * Schema for the economic scenario. CDI and IPCA are constant over the horizon.
 */
export const EconomicScenarioSchema = z.object({
  cdiAnnual: z.number().finite().min(0),
  ipcaAnnual: z.number().finite().min(0),
});

/**
 * Schema for the contribution plan.
 */
export const ContributionPlanSchema = z.object({
  initialDeposit: z.number().finite().min(0),
  monthlyContribution: z.number().finite().min(0),
  horizonMonths: z.number().int().min(1),
});

/**
 * Schema for a product whose indexer kind has not been checked yet.
 */
export const ProductSpecInputSchema = z.object({
  name: z.string().min(1),
  indexerKind: z.string(),
  rateParameter: z.number(),
  taxExempt: z.boolean(),
});

/**
 * Schema for a fully valid product specification.
 */
export const ProductSpecSchema = z.object({
  name: z.string().min(1),
  indexerKind: z.enum(INDEXER_KINDS),
  rateParameter: z.number().finite().min(0),
  taxExempt: z.boolean(),
});

/**
 * Schema for a simulation request (HTTP body or CLI input file).
 * Numeric ranges of the plan and scenario are checked by the engine, not here.
 */
export const SimulationRequestSchema = z.object({
  initialDeposit: z.number(),
  monthlyContribution: z.number(),
  horizonMonths: z.number(),
  cdiAnnual: z.number().optional(),
  ipcaAnnual: z.number().optional(),
  products: z.array(ProductSpecInputSchema).optional(),
});

export type SimulationRequest = z.infer<typeof SimulationRequestSchema>;

/**
 * Flattens zod issues into "path: message" strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

export function parseContributionPlan(input: ContributionPlan): ContributionPlan {
  const result = ContributionPlanSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidContributionPlanError("Invalid contribution plan", formatIssues(result.error));
  }
  return result.data;
}

export function parseEconomicScenario(input: EconomicScenario): EconomicScenario {
  const result = EconomicScenarioSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidEconomicScenarioError("Invalid economic scenario", formatIssues(result.error));
  }
  return result.data;
}

export function parseProductSpec(input: ProductSpecInput): ProductSpec {
  const result = ProductSpecSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidProductSpecError(
      `Invalid product specification "${input.name}"`,
      formatIssues(result.error)
    );
  }
  return result.data;
}
