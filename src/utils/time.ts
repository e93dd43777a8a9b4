import { addDays, addMonths, differenceInCalendarDays, isBefore } from "date-fns";
import { DAYS_PER_YEAR, MONTHS_PER_YEAR } from "./constants";

/**
 * Date and horizon utilities for return calculations.
 */

export type RelativeTimeUnit = "days" | "months" | "years";

/**
 * Converts a horizon in years to the number of whole months it spans.
 * Partial months are dropped, so 1.99 years gives 23 months.
 *
 * @param years - Horizon in years (may be fractional)
 * @returns Whole months, or 0 for a non-positive horizon
 */
export function yearsToMonths(years: number): number {
  if (!(years > 0)) {
    return 0;
  }
  return Math.floor(years * MONTHS_PER_YEAR);
}

/**
 * Converts months to years as a decimal.
 */
export function monthsToYears(months: number): number {
  return months / MONTHS_PER_YEAR;
}

/**
 * Resolves a relative offset against a reference date.
 *
 * Days and months are truncated to whole units before being added. Years are
 * converted to days at 365.25 days per year so that fractional years
 * (e.g. 1.5) land on a concrete calendar day.
 *
 * @example
 * ```ts
 * resolveRelativeDate(new Date(2024, 0, 31), 1, "months") // 2024-02-29
 * resolveRelativeDate(new Date(2024, 0, 1), 1, "years")   // 2024-12-31 (365 days)
 * ```
 */
export function resolveRelativeDate(
  reference: Date,
  amount: number,
  unit: RelativeTimeUnit
): Date {
  switch (unit) {
    case "days":
      return addDays(reference, Math.trunc(amount));
    case "months":
      return addMonths(reference, Math.trunc(amount));
    case "years":
      return addDays(reference, Math.trunc(amount * DAYS_PER_YEAR));
  }
}

/**
 * Fractional years between two dates, measured in calendar days.
 * Negative when `to` precedes `from`.
 */
export function yearsBetween(from: Date, to: Date): number {
  return differenceInCalendarDays(to, from) / DAYS_PER_YEAR;
}

/**
 * Calendar date reached after a number of whole months from the start date.
 */
export function monthDate(start: Date, month: number): Date {
  return addMonths(start, month);
}

/**
 * True when `date` is the same instant as `reference` or later.
 */
export function isOnOrAfter(date: Date, reference: Date): boolean {
  return !isBefore(date, reference);
}
