import { randomUUID } from "crypto";
import { RelativeTimeUnit, resolveRelativeDate } from "../utils/time";

/**
 * Follow-on investment data structures
 */

export type InvestmentType = "buy" | "sell" | "buySell";

/**
 * tagAlong: the event grows at the same rate as the base investment.
 * custom: the event follows its own valuation (see ValuationType).
 */
export type ValuationMode = "tagAlong" | "custom";

/**
 * Only meaningful for custom valuations.
 * computed: valuation derived from `valuationIrr` and elapsed time.
 * specified: `valuation` is used as given.
 */
export type ValuationType = "computed" | "specified";

export type FollowOnTiming =
  | { type: "absolute"; date: Date }
  | { type: "relative"; amount: number; unit: RelativeTimeUnit };

export interface FollowOnInvestmentInput {
  id?: string;
  timing: FollowOnTiming;
  investmentType: InvestmentType;
  amount: number;
  valuationMode: ValuationMode;
  valuationType?: ValuationType;
  valuation?: number;
  valuationIrr?: number; // decimal, e.g. 0.2 for 20%
}

export interface FollowOnInvestment {
  readonly id: string;
  readonly timing: FollowOnTiming;
  readonly investmentDate: Date; // resolved once, at construction
  readonly investmentType: InvestmentType;
  readonly amount: number;
  readonly valuationMode: ValuationMode;
  readonly valuationType: ValuationType;
  readonly valuation: number;
  readonly valuationIrr: number;
}

/**
 * Resolve the absolute date of a follow-on event.
 */
export function resolveInvestmentDate(timing: FollowOnTiming, initialInvestmentDate: Date): Date {
  if (timing.type === "absolute") {
    return new Date(timing.date.getTime());
  }
  return resolveRelativeDate(initialInvestmentDate, timing.amount, timing.unit);
}

/**
 * Build an immutable follow-on investment, resolving relative timing against
 * the initial investment date.
 *
 * @throws Error when the amount is not positive, a relative offset is negative,
 *   or the event falls before the initial investment
 */
export function createFollowOnInvestment(
  input: FollowOnInvestmentInput,
  initialInvestmentDate: Date
): FollowOnInvestment {
  if (!(input.amount > 0) || !Number.isFinite(input.amount)) {
    throw new Error(`Follow-on investment amount must be a positive number, got ${input.amount}`);
  }
  if (input.timing.type === "relative" && !(input.timing.amount >= 0)) {
    throw new Error(`Relative time amount must not be negative, got ${input.timing.amount}`);
  }

  const investmentDate = resolveInvestmentDate(input.timing, initialInvestmentDate);
  if (investmentDate.getTime() < initialInvestmentDate.getTime()) {
    throw new Error("Follow-on investment date must not precede the initial investment date");
  }

  return Object.freeze({
    id: input.id ?? randomUUID(),
    timing: input.timing,
    investmentDate,
    investmentType: input.investmentType,
    amount: input.amount,
    valuationMode: input.valuationMode,
    valuationType: input.valuationType ?? "computed",
    valuation: input.valuation ?? 0,
    valuationIrr: input.valuationIrr ?? 0,
  });
}

/**
 * Sort follow-ons by resolved date, oldest first. Events on the same date keep
 * their input order.
 */
export function sortByInvestmentDate(followOns: readonly FollowOnInvestment[]): FollowOnInvestment[] {
  return [...followOns].sort(
    (a, b) => a.investmentDate.getTime() - b.investmentDate.getTime()
  );
}

export function addsCapital(followOn: FollowOnInvestment): boolean {
  return followOn.investmentType === "buy" || followOn.investmentType === "buySell";
}
