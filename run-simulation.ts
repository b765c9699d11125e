import * as fs from "fs";
import * as path from "path";
import { projectAll } from "./src/engine/projection";
import { ContributionPlan } from "./src/models/ContributionPlan";
import { EconomicScenario } from "./src/models/EconomicScenario";
import { DEFAULT_PRODUCTS, DEFAULT_SCENARIO } from "./src/utils/constants";
import { SimulationInputError } from "./src/utils/errors";
import { roundToCents } from "./src/utils/math";
import { formatMonthLabel } from "./src/utils/time";
import { formatIssues, SimulationRequestSchema } from "./src/utils/validation";

/**
 * Run the simulation for every product and write the summary to simulation-output.json.
 * Usage: npx ts-node run-simulation.ts [input-file] [output-file]
 * Default input: example-request.json
 */
const inputPath = process.argv[2] ?? "example-request.json";
const outputPath = process.argv[3] ?? "simulation-output.json";

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

const parsed = SimulationRequestSchema.safeParse(inputData);
if (!parsed.success) {
  console.error("Input file must contain initialDeposit, monthlyContribution and horizonMonths.");
  for (const issue of formatIssues(parsed.error)) {
    console.error(`  - ${issue}`);
  }
  process.exit(1);
}

const request = parsed.data;
const plan: ContributionPlan = {
  initialDeposit: request.initialDeposit,
  monthlyContribution: request.monthlyContribution,
  horizonMonths: request.horizonMonths,
};
const scenario: EconomicScenario = {
  cdiAnnual: request.cdiAnnual ?? DEFAULT_SCENARIO.cdiAnnual,
  ipcaAnnual: request.ipcaAnnual ?? DEFAULT_SCENARIO.ipcaAnnual,
};

try {
  const summary = projectAll(request.products ?? DEFAULT_PRODUCTS, plan, scenario);
  fs.writeFileSync(outputPath, JSON.stringify(summary, null, 2));

  console.log(`Horizon: ${formatMonthLabel(plan.horizonMonths)}`);
  for (const result of summary.results) {
    console.log(
      `  ${result.productName}: final ${roundToCents(result.finalBalance)} ` +
        `(gross gain ${roundToCents(result.grossGain)}, tax ${roundToCents(result.taxWithheld)})`
    );
  }
  for (const failure of summary.failures) {
    console.error(`  ${failure.productName}: ${failure.message} [${failure.issues.join("; ")}]`);
  }
  if (summary.best) {
    console.log(`\nBest option: ${summary.best.productName} - final balance ${roundToCents(summary.best.finalBalance)}`);
  }
  console.log(`Simulation output saved to ${outputPath}`);
} catch (err) {
  if (err instanceof SimulationInputError) {
    console.error(`${err.code}: ${err.message}`);
    for (const issue of err.issues) {
      console.error(`  - ${issue}`);
    }
    process.exit(1);
  }
  throw err;
}
