/**
 * Closed-form rate formulas.
 *
 * Rates are decimal fractions (0.15 for 15%). Inputs outside a formula's
 * domain produce 0 rather than an error; callers that need to tell invalid
 * input apart from a zero result use `findPreconditionViolations`.
 */

/**
 * Annualised rate that grows `initial` into `outcome` over `years`.
 * Formula: IRR = (outcome / initial)^(1 / years) - 1
 *
 * @param initial - Amount invested
 * @param outcome - Amount received at the end of the horizon
 * @param years - Holding period (may be fractional)
 * @returns Rate as a decimal, or 0 unless all three inputs are positive
 *
 * @example
 * ```ts
 * irr(100, 150, 2) // 0.2247448714
 * ```
 */
export function irr(initial: number, outcome: number, years: number): number {
  if (!(initial > 0) || !(outcome > 0) || !(years > 0)) {
    return 0;
  }
  const rate = Math.pow(outcome / initial, 1 / years) - 1;
  return Number.isFinite(rate) ? rate : 0;
}

/**
 * Compounding multiple (1 + rate)^years, or 0 when it is not a finite number
 * (a rate below -100% over a fractional period, or overflow).
 */
export function growthFactor(rate: number, years: number): number {
  const factor = Math.pow(1 + rate, years);
  return Number.isFinite(factor) ? factor : 0;
}

/**
 * Value of `initial` compounded annually at `rate` for `years`.
 * Formula: FV = initial × (1 + rate)^years
 *
 * @returns Future value, or 0 when `initial` is not positive, `years` is
 *   negative, or the growth factor is undefined
 */
export function futureValue(initial: number, rate: number, years: number): number {
  if (!(initial > 0) || !(years >= 0)) {
    return 0;
  }
  return initial * growthFactor(rate, years);
}

/**
 * Amount that must be invested today to reach `outcome` at `rate` after `years`.
 * Formula: PV = outcome / (1 + rate)^years
 *
 * @returns Present value, or 0 when `outcome` is not positive, `years` is
 *   negative, or the discount factor is zero or undefined
 */
export function presentValue(outcome: number, rate: number, years: number): number {
  if (!(outcome > 0) || !(years >= 0)) {
    return 0;
  }
  const discountFactor = growthFactor(rate, years);
  if (discountFactor === 0) {
    return 0;
  }
  return outcome / discountFactor;
}
