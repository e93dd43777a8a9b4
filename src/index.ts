export { irr, futureValue, presentValue, growthFactor } from "./engine/rate";
export { blendedIRR, aggregateCashFlows } from "./engine/blended";
export type { BlendedCashFlows } from "./engine/blended";
export {
  portfolioUnitIRR,
  portfolioUnitBlendedIRR,
  portfolioUnitOutcome,
  isValidPercentage,
} from "./engine/portfolioUnit";
export {
  growthPoints,
  growthPointsWithFollowOn,
  portfolioUnitGrowthPoints,
  portfolioUnitBlendedGrowthPoints,
} from "./engine/growth";
export { calculate } from "./engine/calculator";
export { findPreconditionViolations } from "./engine/preconditions";
export type { PreconditionViolation } from "./engine/preconditions";
export * from "./models/CalculationRequest";
export * from "./models/FollowOnInvestment";
export * from "./models/PortfolioUnitBatch";
export * from "./models/GrowthPoint";
export { CalculationRequestSchema, toCalculationRequest } from "./utils/validation";
export type { CalculationRequestInput } from "./utils/validation";
