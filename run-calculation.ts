import * as fs from "fs";
import * as path from "path";
import { calculate } from "./src/engine/calculator";
import { findPreconditionViolations } from "./src/engine/preconditions";
import { CalculationRequest } from "./src/models/CalculationRequest";
import { finalValue } from "./src/models/GrowthPoint";
import { CalculationRequestSchema, toCalculationRequest } from "./src/utils/validation";

/**
 * Run one calculation and write the result to calculation-output.json
 * (generated in project root).
 * Usage: npx ts-node run-calculation.ts [input-file]
 * Default input: example-request.json
 */
const inputPath = process.argv[2] ?? "example-request.json";

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

const parsed = CalculationRequestSchema.safeParse(inputData);
if (!parsed.success) {
  console.error("Input file is not a valid calculation request:");
  for (const issue of parsed.error.issues) {
    console.error(`  ${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }
  process.exit(1);
}

let request: CalculationRequest;
try {
  request = toCalculationRequest(parsed.data);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Invalid calculation request: ${message}`);
  process.exit(1);
}

for (const violation of findPreconditionViolations(request)) {
  console.log(`Warning: ${violation.message}`);
}

console.log(`Running ${request.mode} calculation...`);
const result = calculate(request);
fs.writeFileSync("calculation-output.json", JSON.stringify(result, null, 2));
console.log(`Result: ${result.result}`);
console.log(`Final projected value: ${finalValue(result.growthPoints)}`);
console.log("Output saved to calculation-output.json");
