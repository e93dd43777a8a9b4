import { PortfolioUnitTerms } from "../models/CalculationRequest";
import { FollowOnInvestment, addsCapital, sortByInvestmentDate } from "../models/FollowOnInvestment";
import { GrowthPoint } from "../models/GrowthPoint";
import { PortfolioUnitBatch } from "../models/PortfolioUnitBatch";
import { isOnOrAfter, monthDate, monthsToYears, yearsBetween, yearsToMonths } from "../utils/time";
import { computedValuation, followOnElapsedYears } from "./blended";
import { portfolioUnitIRR } from "./portfolioUnit";
import { growthFactor, irr } from "./rate";

/**
 * Monthly valuation trajectories for charting.
 * Every series runs from month 0 to floor(years × 12) inclusive.
 */

/**
 * A follow-on event prepared for projection: its offset from the start and
 * the annual rate its own position compounds at.
 */
interface ProjectedFollowOn {
  followOn: FollowOnInvestment;
  elapsedYears: number;
  positionRate: number;
}

/**
 * Value of `initial` compounding at `rate`, sampled monthly.
 *
 * @example
 * ```ts
 * growthPoints(100, 0.1, 1) // 13 points, month 0 = 100, month 12 = 110
 * ```
 */
export function growthPoints(initial: number, rate: number, years: number): GrowthPoint[] {
  const totalMonths = yearsToMonths(years);
  const points: GrowthPoint[] = [];

  for (let month = 0; month <= totalMonths; month++) {
    points.push({ month, value: initial * growthFactor(rate, monthsToYears(month)) });
  }

  return points;
}

/**
 * Annual rate a bought position compounds at.
 * tagAlong follows `rate`; custom/computed uses its own IRR; custom/specified
 * uses the rate that carries `amount` to `valuation` by the end of the horizon.
 */
export function followOnPositionRate(
  followOn: FollowOnInvestment,
  rate: number,
  years: number,
  elapsedYears: number
): number {
  if (followOn.valuationMode === "tagAlong") {
    return rate;
  }
  if (followOn.valuationType === "computed") {
    return followOn.valuationIrr;
  }
  const remainingYears = years - elapsedYears;
  if (followOn.valuation > 0 && remainingYears > 0) {
    return irr(followOn.amount, followOn.valuation, remainingYears);
  }
  return rate;
}

/**
 * Signed contribution of one follow-on to the portfolio value, `yearsSince`
 * years after the event. Buys add; sells subtract what was taken out.
 */
function followOnContribution(projected: ProjectedFollowOn, rate: number, yearsSince: number): number {
  const { followOn, elapsedYears, positionRate } = projected;

  if (addsCapital(followOn)) {
    return followOn.amount * growthFactor(positionRate, yearsSince);
  }

  if (followOn.valuationMode === "tagAlong") {
    return -followOn.amount * growthFactor(rate, yearsSince);
  }
  if (followOn.valuationType === "specified") {
    return -followOn.amount;
  }
  return -computedValuation(followOn, elapsedYears) * growthFactor(rate, yearsSince);
}

/**
 * Base trajectory plus the cumulative effect of each follow-on from the month
 * its date is reached.
 *
 * @param initial - Base investment amount
 * @param rate - Rate the base position compounds at (usually the blended IRR)
 * @param years - Horizon in years
 * @param followOns - Follow-on events with resolved dates
 * @param initialDate - Date of the base investment
 */
export function growthPointsWithFollowOn(
  initial: number,
  rate: number,
  years: number,
  followOns: readonly FollowOnInvestment[],
  initialDate: Date
): GrowthPoint[] {
  const projected: ProjectedFollowOn[] = sortByInvestmentDate(followOns).map((followOn) => {
    const elapsedYears = followOnElapsedYears(followOn, initialDate);
    return {
      followOn,
      elapsedYears,
      positionRate: followOnPositionRate(followOn, rate, years, elapsedYears),
    };
  });

  return growthPoints(initial, rate, years).map(({ month, value }) => {
    const date = monthDate(initialDate, month);
    const yearFraction = monthsToYears(month);
    let total = value;

    for (const entry of projected) {
      if (isOnOrAfter(date, entry.followOn.investmentDate)) {
        const yearsSince = Math.max(0, yearFraction - entry.elapsedYears);
        total += followOnContribution(entry, rate, yearsSince);
      }
    }

    return { month, value: total };
  });
}

/**
 * Trajectory of a single batch of units growing at its portfolio IRR.
 */
export function portfolioUnitGrowthPoints(
  investmentAmount: number,
  unitPrice: number,
  terms: PortfolioUnitTerms,
  years: number
): GrowthPoint[] {
  const rate = portfolioUnitIRR(investmentAmount, unitPrice, terms, years);
  return growthPoints(investmentAmount, rate, years);
}

/**
 * Trajectory of several unit batches, each compounding at `rate` from the month
 * its purchase date is reached.
 */
export function portfolioUnitBlendedGrowthPoints(
  initialBatch: PortfolioUnitBatch,
  followOnBatches: readonly PortfolioUnitBatch[],
  rate: number,
  years: number,
  initialDate: Date
): GrowthPoint[] {
  const batches = [...followOnBatches]
    .sort((a, b) => a.investmentDate.getTime() - b.investmentDate.getTime())
    .map((batch) => ({
      batch,
      elapsedYears: Math.max(0, yearsBetween(initialDate, batch.investmentDate)),
    }));

  return growthPoints(initialBatch.investmentAmount, rate, years).map(({ month, value }) => {
    const date = monthDate(initialDate, month);
    const yearFraction = monthsToYears(month);
    let total = value;

    for (const { batch, elapsedYears } of batches) {
      if (isOnOrAfter(date, batch.investmentDate)) {
        total += batch.investmentAmount * growthFactor(rate, Math.max(0, yearFraction - elapsedYears));
      }
    }

    return { month, value: total };
  });
}
