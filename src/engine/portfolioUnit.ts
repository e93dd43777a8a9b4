import { PortfolioUnitTerms } from "../models/CalculationRequest";
import { PortfolioUnitBatch, batchUnits } from "../models/PortfolioUnitBatch";
import { MAX_PERCENTAGE } from "../utils/constants";
import { irr } from "./rate";

/**
 * Portfolio unit investments: capital buys units (leads, royalties, claims),
 * a share of which succeed and pay out per unit, net of fees and the
 * investor's share.
 */

/**
 * True when a percentage input lies in [0, 100].
 */
export function isValidPercentage(value: number): boolean {
  return value >= 0 && value <= MAX_PERCENTAGE;
}

/**
 * True when success rate, investor share and fee percentage are all in range.
 */
export function hasValidTerms(terms: PortfolioUnitTerms): boolean {
  return (
    isValidPercentage(terms.successRate) &&
    isValidPercentage(terms.investorShare) &&
    isValidPercentage(terms.feePercentage)
  );
}

/**
 * Total payout to the investor from a pool of units.
 *
 * successfulUnits = units × successRate / 100
 * netPerUnit = outcomePerUnit × investorShare / 100 × (1 - feePercentage / 100)
 */
export function portfolioUnitOutcome(units: number, terms: PortfolioUnitTerms): number {
  const successfulUnits = units * (terms.successRate / 100);
  const grossOutcomePerUnit = terms.outcomePerUnit * (terms.investorShare / 100);
  const netOutcomePerUnit = grossOutcomePerUnit * (1 - terms.feePercentage / 100);
  return successfulUnits * netOutcomePerUnit;
}

/**
 * IRR of a single batch of units.
 *
 * @returns Rate as a decimal, or 0 when the amount, unit price or horizon is
 *   not positive or any percentage falls outside [0, 100]
 */
export function portfolioUnitIRR(
  investmentAmount: number,
  unitPrice: number,
  terms: PortfolioUnitTerms,
  years: number
): number {
  if (!(investmentAmount > 0) || !(unitPrice > 0) || !(years > 0)) {
    return 0;
  }
  if (!hasValidTerms(terms)) {
    return 0;
  }

  const totalOutcome = portfolioUnitOutcome(investmentAmount / unitPrice, terms);
  return irr(investmentAmount, totalOutcome, years);
}

/**
 * Combined amount and units across the initial batch and all follow-on batches.
 */
export function poolBatches(
  initialBatch: PortfolioUnitBatch,
  followOnBatches: readonly PortfolioUnitBatch[]
): { totalInvestment: number; totalUnits: number } {
  let totalInvestment = initialBatch.investmentAmount;
  let totalUnits = batchUnits(initialBatch);

  for (const batch of followOnBatches) {
    totalInvestment += batch.investmentAmount;
    totalUnits += batchUnits(batch);
  }

  return { totalInvestment, totalUnits };
}

/**
 * IRR of several batches bought at possibly different unit prices.
 *
 * The success/share/fee pipeline runs once over the pooled units. Batch dates
 * do not weight the result: every batch is treated as held for `years`.
 *
 * @returns Rate as a decimal, or 0 when any batch has a non-positive amount or
 *   unit price, the horizon is not positive, or a percentage is out of range
 */
export function portfolioUnitBlendedIRR(
  initialBatch: PortfolioUnitBatch,
  followOnBatches: readonly PortfolioUnitBatch[],
  terms: PortfolioUnitTerms,
  years: number
): number {
  const batches = [initialBatch, ...followOnBatches];
  if (batches.some((batch) => !(batch.investmentAmount > 0) || !(batch.unitPrice > 0))) {
    return 0;
  }
  if (!(years > 0) || !hasValidTerms(terms)) {
    return 0;
  }

  const { totalInvestment, totalUnits } = poolBatches(initialBatch, followOnBatches);
  return irr(totalInvestment, portfolioUnitOutcome(totalUnits, terms), years);
}
