import { Router, Request, Response } from "express";
import { projectAll } from "../engine/projection";
import { REGRESSIVE_TAX_BRACKETS } from "../engine/taxation";
import { ContributionPlan } from "../models/ContributionPlan";
import { EconomicScenario } from "../models/EconomicScenario";
import { DEFAULT_PRODUCTS, DEFAULT_SCENARIO } from "../utils/constants";
import { SimulationInputError } from "../utils/errors";
import { formatIssues, SimulationRequestSchema } from "../utils/validation";

const router = Router();

/**
 * GET /api/simulate
 * Get information about the simulation endpoint
 */
router.get("/simulate", (req: Request, res: Response) => {
  res.json({
    method: "POST",
    description: "Project fixed-income products month by month and pick the highest net balance",
    endpoint: "/api/simulate",
    requiredFields: [
      "initialDeposit",
      "monthlyContribution",
      "horizonMonths",
      "cdiAnnual (optional, default 0.1375)",
      "ipcaAnnual (optional, default 0.045)",
      "products (optional, default GET /api/products)",
    ],
    note: "Rates are decimals: 0.1375 means 13.75% a year.",
  });
});

/**
 * POST /api/simulate
 * Run the projection for every product and rank them by final balance
 */
router.post("/simulate", (req: Request, res: Response) => {
  const parsed = SimulationRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Invalid request body",
      message: "Required fields: initialDeposit, monthlyContribution, horizonMonths",
      issues: formatIssues(parsed.error),
    });
  }

  const body = parsed.data;
  const plan: ContributionPlan = {
    initialDeposit: body.initialDeposit,
    monthlyContribution: body.monthlyContribution,
    horizonMonths: body.horizonMonths,
  };
  const scenario: EconomicScenario = {
    cdiAnnual: body.cdiAnnual ?? DEFAULT_SCENARIO.cdiAnnual,
    ipcaAnnual: body.ipcaAnnual ?? DEFAULT_SCENARIO.ipcaAnnual,
  };

  try {
    const summary = projectAll(body.products ?? DEFAULT_PRODUCTS, plan, scenario);
    return res.json(summary);
  } catch (error) {
    if (error instanceof SimulationInputError) {
      return res.status(400).json({
        error: error.code,
        message: error.message,
        issues: error.issues,
      });
    }
    console.error("Error in simulation:", error);
    return res.status(500).json({
      error: "Internal server error",
      message: error instanceof Error ? error.message : String(error),
    });
  }
});

/**
 * GET /api/products
 * Default product catalogue
 */
router.get("/products", (req: Request, res: Response) => {
  res.json({ products: DEFAULT_PRODUCTS });
});

/**
 * GET /api/tax-brackets
 * Regressive income-tax table applied to taxed products
 */
router.get("/tax-brackets", (req: Request, res: Response) => {
  res.json({ brackets: REGRESSIVE_TAX_BRACKETS });
});

/**
 * GET /api
 * API information endpoint
 */
router.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Fixed-Income Simulator API",
    version: "1.0.0",
    endpoints: {
      simulate: "POST /api/simulate - Project products and rank by net final balance",
      products: "GET /api/products - Default product catalogue",
      taxBrackets: "GET /api/tax-brackets - Regressive income-tax table",
      health: "GET /api/health - Health check",
    },
  });
});

/**
 * GET /api/health
 * Health check endpoint
 */
router.get("/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

export default router;
