import { FollowOnInvestment } from "./FollowOnInvestment";
import { GrowthPoint } from "./GrowthPoint";
import { PortfolioUnitBatch } from "./PortfolioUnitBatch";

/**
 * Calculation request and result data structures.
 * Rates are decimals (0.15 for 15%); portfolio percentages are in percent (0-100).
 */

export interface IRRRequest {
  mode: "irr";
  initial: number;
  outcome: number;
  years: number;
}

export interface OutcomeRequest {
  mode: "outcome";
  initial: number;
  irr: number;
  years: number;
}

export interface InitialInvestmentRequest {
  mode: "initialInvestment";
  outcome: number;
  irr: number;
  years: number;
}

export interface BlendedIRRRequest {
  mode: "blendedIRR";
  initial: number;
  outcome: number;
  years: number;
  followOns: FollowOnInvestment[];
  initialDate: Date;
}

export interface PortfolioUnitTerms {
  successRate: number;
  outcomePerUnit: number;
  investorShare: number;
  feePercentage: number;
}

export interface PortfolioUnitRequest extends PortfolioUnitTerms {
  mode: "portfolioUnit";
  investmentAmount: number;
  unitPrice: number;
  years: number;
}

export interface PortfolioUnitBlendedRequest extends PortfolioUnitTerms {
  mode: "portfolioUnitBlended";
  initialBatch: PortfolioUnitBatch;
  years: number;
  followOnBatches: PortfolioUnitBatch[];
  initialDate: Date;
}

export type CalculationRequest =
  | IRRRequest
  | OutcomeRequest
  | InitialInvestmentRequest
  | BlendedIRRRequest
  | PortfolioUnitRequest
  | PortfolioUnitBlendedRequest;

export type CalculationMode = CalculationRequest["mode"];

export interface CalculationResult {
  mode: CalculationMode;
  /** A rate for the IRR modes, a monetary amount for outcome and initialInvestment. */
  result: number;
  growthPoints: GrowthPoint[];
}
