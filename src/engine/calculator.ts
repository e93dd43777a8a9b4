import { CalculationRequest, CalculationResult } from "../models/CalculationRequest";
import { blendedIRR } from "./blended";
import {
  growthPoints,
  growthPointsWithFollowOn,
  portfolioUnitBlendedGrowthPoints,
  portfolioUnitGrowthPoints,
} from "./growth";
import { portfolioUnitBlendedIRR, portfolioUnitIRR } from "./portfolioUnit";
import { futureValue, irr, presentValue } from "./rate";

/**
 * Run one calculation and pair its result with the growth series to chart.
 */
export function calculate(request: CalculationRequest): CalculationResult {
  switch (request.mode) {
    case "irr": {
      const rate = irr(request.initial, request.outcome, request.years);
      return {
        mode: request.mode,
        result: rate,
        growthPoints: growthPoints(request.initial, rate, request.years),
      };
    }

    case "outcome": {
      return {
        mode: request.mode,
        result: futureValue(request.initial, request.irr, request.years),
        growthPoints: growthPoints(request.initial, request.irr, request.years),
      };
    }

    case "initialInvestment": {
      const initial = presentValue(request.outcome, request.irr, request.years);
      return {
        mode: request.mode,
        result: initial,
        growthPoints: growthPoints(initial, request.irr, request.years),
      };
    }

    case "blendedIRR": {
      const { initial, outcome, years, followOns, initialDate } = request;
      const rate = blendedIRR(initial, outcome, years, followOns, initialDate);
      return {
        mode: request.mode,
        result: rate,
        growthPoints:
          followOns.length === 0
            ? growthPoints(initial, rate, years)
            : growthPointsWithFollowOn(initial, rate, years, followOns, initialDate),
      };
    }

    case "portfolioUnit": {
      const { investmentAmount, unitPrice, years } = request;
      return {
        mode: request.mode,
        result: portfolioUnitIRR(investmentAmount, unitPrice, request, years),
        growthPoints: portfolioUnitGrowthPoints(investmentAmount, unitPrice, request, years),
      };
    }

    case "portfolioUnitBlended": {
      const { initialBatch, followOnBatches, years, initialDate } = request;
      const rate = portfolioUnitBlendedIRR(initialBatch, followOnBatches, request, years);
      return {
        mode: request.mode,
        result: rate,
        growthPoints: portfolioUnitBlendedGrowthPoints(initialBatch, followOnBatches, rate, years, initialDate),
      };
    }
  }
}
