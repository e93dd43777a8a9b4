import { CalculationRequest, PortfolioUnitTerms } from "../models/CalculationRequest";
import { PortfolioUnitBatch } from "../models/PortfolioUnitBatch";
import { isValidPercentage } from "./portfolioUnit";

/**
 * The engine answers 0 for inputs outside a formula's domain. These checks use
 * the same predicates so that callers can report invalid input before (or
 * instead of) showing a zero result.
 */

export interface PreconditionViolation {
  field: string;
  message: string;
}

function requirePositive(violations: PreconditionViolation[], field: string, value: number): void {
  if (!(value > 0)) {
    violations.push({ field, message: `${field} must be greater than 0` });
  }
}

function requireNonNegative(violations: PreconditionViolation[], field: string, value: number): void {
  if (!(value >= 0)) {
    violations.push({ field, message: `${field} must not be negative` });
  }
}

// Below -100% the compounding base is negative and fractional periods have no real value.
function requireRateFloor(violations: PreconditionViolation[], field: string, value: number): void {
  if (!(value >= -1)) {
    violations.push({ field, message: `${field} must not be below -1 (-100%)` });
  }
}

function checkTerms(violations: PreconditionViolation[], terms: PortfolioUnitTerms): void {
  const percentages: Array<[keyof PortfolioUnitTerms, number]> = [
    ["successRate", terms.successRate],
    ["investorShare", terms.investorShare],
    ["feePercentage", terms.feePercentage],
  ];
  for (const [field, value] of percentages) {
    if (!isValidPercentage(value)) {
      violations.push({ field, message: `${field} must be between 0 and 100` });
    }
  }
}

function checkBatch(violations: PreconditionViolation[], prefix: string, batch: PortfolioUnitBatch): void {
  requirePositive(violations, `${prefix}.investmentAmount`, batch.investmentAmount);
  requirePositive(violations, `${prefix}.unitPrice`, batch.unitPrice);
}

/**
 * List every input that would make the engine fall back to 0.
 * An empty list means the result is a genuine calculation.
 */
export function findPreconditionViolations(request: CalculationRequest): PreconditionViolation[] {
  const violations: PreconditionViolation[] = [];

  switch (request.mode) {
    case "irr":
      requirePositive(violations, "initial", request.initial);
      requirePositive(violations, "outcome", request.outcome);
      requirePositive(violations, "years", request.years);
      break;

    case "outcome":
      requirePositive(violations, "initial", request.initial);
      requireNonNegative(violations, "years", request.years);
      requireRateFloor(violations, "irr", request.irr);
      break;

    case "initialInvestment":
      requirePositive(violations, "outcome", request.outcome);
      requireNonNegative(violations, "years", request.years);
      requireRateFloor(violations, "irr", request.irr);
      if (request.irr === -1 && request.years > 0) {
        violations.push({ field: "irr", message: "irr of -100% leaves nothing to discount" });
      }
      break;

    case "blendedIRR":
      requirePositive(violations, "initial", request.initial);
      // Follow-on sells can still produce a positive final outcome from a zero base outcome
      if (request.followOns.length === 0) {
        requirePositive(violations, "outcome", request.outcome);
      } else {
        requireNonNegative(violations, "outcome", request.outcome);
      }
      requirePositive(violations, "years", request.years);
      request.followOns.forEach((followOn, index) => {
        requirePositive(violations, `followOns[${index}].amount`, followOn.amount);
        if (followOn.valuationMode === "custom" && followOn.valuationType === "computed") {
          requireRateFloor(violations, `followOns[${index}].valuationIrr`, followOn.valuationIrr);
        }
        if (followOn.investmentDate.getTime() < request.initialDate.getTime()) {
          violations.push({
            field: `followOns[${index}].investmentDate`,
            message: "follow-on investment must not precede the initial investment",
          });
        }
      });
      break;

    case "portfolioUnit":
      requirePositive(violations, "investmentAmount", request.investmentAmount);
      requirePositive(violations, "unitPrice", request.unitPrice);
      requirePositive(violations, "years", request.years);
      checkTerms(violations, request);
      break;

    case "portfolioUnitBlended":
      checkBatch(violations, "initialBatch", request.initialBatch);
      request.followOnBatches.forEach((batch, index) => {
        checkBatch(violations, `followOnBatches[${index}]`, batch);
      });
      requirePositive(violations, "years", request.years);
      checkTerms(violations, request);
      break;
  }

  return violations;
}
