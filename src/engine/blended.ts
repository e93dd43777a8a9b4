import { FollowOnInvestment, sortByInvestmentDate } from "../models/FollowOnInvestment";
import { yearsBetween } from "../utils/time";
import { futureValue, growthFactor, irr } from "./rate";

/**
 * Blended IRR over a base investment and its follow-on buy/sell events.
 *
 * Follow-ons only change how cash flows are aggregated; the rate itself is
 * always `irr` over total capital in and total value out.
 */

/**
 * Running totals after follow-on events have been applied.
 */
export interface BlendedCashFlows {
  baseRate: number;
  totalInvested: number;
  totalProceeds: number;
  finalOutcome: number;
}

/**
 * Years from the initial investment to a follow-on event, never negative.
 */
export function followOnElapsedYears(followOn: FollowOnInvestment, initialDate: Date): number {
  return Math.max(0, yearsBetween(initialDate, followOn.investmentDate));
}

/**
 * Value at the event date of a custom/computed follow-on: `amount` compounded at
 * `valuationIrr` over the elapsed time. Falls back to `amount` itself (i.e. a
 * tag-along valuation) when no positive value can be derived.
 */
export function computedValuation(followOn: FollowOnInvestment, elapsedYears: number): number {
  const valuation = futureValue(followOn.amount, followOn.valuationIrr, elapsedYears);
  return valuation > 0 ? valuation : followOn.amount;
}

/**
 * Multiple by which the base investment grows from `elapsedYears` to the end
 * of the horizon: outcome / (initial × (1 + baseRate)^elapsedYears).
 */
export function remainingGrowthRatio(
  initial: number,
  outcome: number,
  baseRate: number,
  elapsedYears: number
): number {
  const currentValue = initial * growthFactor(baseRate, elapsedYears);
  if (!(currentValue > 0)) {
    return 0;
  }
  return outcome / currentValue;
}

/**
 * End-of-horizon proceeds realised by a sell event.
 */
export function sellProceeds(followOn: FollowOnInvestment, elapsedYears: number, growthRatio: number): number {
  if (followOn.valuationMode === "tagAlong") {
    return followOn.amount * growthRatio;
  }
  if (followOn.valuationType === "specified") {
    return followOn.amount;
  }
  return computedValuation(followOn, elapsedYears) * growthRatio;
}

/**
 * Aggregate capital and proceeds across follow-on events, processed in date order.
 * The caller is responsible for checking that the base inputs are valid.
 */
export function aggregateCashFlows(
  initial: number,
  outcome: number,
  years: number,
  followOns: readonly FollowOnInvestment[],
  initialDate: Date
): BlendedCashFlows {
  const baseRate = irr(initial, outcome, years);
  let totalInvested = initial;
  let totalProceeds = 0;

  for (const followOn of sortByInvestmentDate(followOns)) {
    const elapsedYears = followOnElapsedYears(followOn, initialDate);
    const growthRatio = remainingGrowthRatio(initial, outcome, baseRate, elapsedYears);

    switch (followOn.investmentType) {
      case "buy":
        totalInvested += followOn.amount;
        break;
      case "sell":
        totalProceeds += sellProceeds(followOn, elapsedYears, growthRatio);
        break;
      case "buySell":
        // Contributes capital and realises pro-rata proceeds at the base rate
        totalInvested += followOn.amount;
        totalProceeds += followOn.amount * growthRatio;
        break;
    }
  }

  return {
    baseRate,
    totalInvested,
    totalProceeds,
    finalOutcome: outcome + totalProceeds,
  };
}

/**
 * Blended IRR of a base investment plus follow-on events.
 *
 * @param initial - Base investment amount
 * @param outcome - Value of the base position at the end of the horizon
 * @param years - Horizon in years
 * @param followOns - Follow-on events with resolved dates, in any order
 * @param initialDate - Date of the base investment
 * @returns Rate as a decimal; equals `irr(initial, outcome, years)` when there
 *   are no follow-ons, and 0 when `initial` or `years` is not positive. A zero
 *   base outcome still yields a rate when follow-on sells return capital.
 */
export function blendedIRR(
  initial: number,
  outcome: number,
  years: number,
  followOns: readonly FollowOnInvestment[],
  initialDate: Date
): number {
  if (followOns.length === 0) {
    return irr(initial, outcome, years);
  }
  if (!(initial > 0) || !(years > 0)) {
    return 0;
  }

  const flows = aggregateCashFlows(initial, outcome, years, followOns, initialDate);
  return irr(flows.totalInvested, flows.finalOutcome, years);
}
