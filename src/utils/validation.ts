import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import { CalculationRequest } from "../models/CalculationRequest";
import { createFollowOnInvestment } from "../models/FollowOnInvestment";
import { createPortfolioUnitBatch } from "../models/PortfolioUnitBatch";

/**
 * Zod validation schemas for calculation requests arriving as JSON.
 * These check shape and number finiteness only; domain limits (positive
 * amounts, percentages in range) are left to the models and the engine.
 */

const FiniteNumber = z.number().finite();

/**
 * Calendar date as "YYYY-MM-DD", parsed to local midnight.
 */
export const DateStringSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date in YYYY-MM-DD format")
  .transform((value) => parseISO(value))
  .refine((date) => isValid(date), "Invalid calendar date");

export const FollowOnTimingSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("absolute"),
    date: DateStringSchema,
  }),
  z.object({
    type: z.literal("relative"),
    amount: FiniteNumber,
    unit: z.enum(["days", "months", "years"]),
  }),
]);

/**
 * Schema for a follow-on investment. `valuationIrr` is a decimal (0.2 for 20%).
 */
export const FollowOnInvestmentSchema = z.object({
  id: z.string().optional(),
  timing: FollowOnTimingSchema,
  investmentType: z.enum(["buy", "sell", "buySell"]),
  amount: FiniteNumber,
  valuationMode: z.enum(["tagAlong", "custom"]),
  valuationType: z.enum(["computed", "specified"]).optional(),
  valuation: FiniteNumber.min(0).optional(),
  valuationIrr: FiniteNumber.optional(),
});

export const PortfolioUnitBatchSchema = z.object({
  investmentAmount: FiniteNumber,
  unitPrice: FiniteNumber,
  investmentDate: DateStringSchema,
});

const PortfolioUnitTermsShape = {
  successRate: FiniteNumber,
  outcomePerUnit: FiniteNumber,
  investorShare: FiniteNumber,
  feePercentage: FiniteNumber.default(0),
};

/**
 * Schema for any calculation request, keyed on `mode`.
 */
export const CalculationRequestSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("irr"),
    initial: FiniteNumber,
    outcome: FiniteNumber,
    years: FiniteNumber,
  }),
  z.object({
    mode: z.literal("outcome"),
    initial: FiniteNumber,
    irr: FiniteNumber,
    years: FiniteNumber,
  }),
  z.object({
    mode: z.literal("initialInvestment"),
    outcome: FiniteNumber,
    irr: FiniteNumber,
    years: FiniteNumber,
  }),
  z.object({
    mode: z.literal("blendedIRR"),
    initial: FiniteNumber,
    outcome: FiniteNumber,
    years: FiniteNumber,
    followOns: z.array(FollowOnInvestmentSchema).default([]),
    initialDate: DateStringSchema,
  }),
  z.object({
    mode: z.literal("portfolioUnit"),
    investmentAmount: FiniteNumber,
    unitPrice: FiniteNumber,
    years: FiniteNumber,
    ...PortfolioUnitTermsShape,
  }),
  z.object({
    mode: z.literal("portfolioUnitBlended"),
    initialBatch: PortfolioUnitBatchSchema,
    years: FiniteNumber,
    followOnBatches: z.array(PortfolioUnitBatchSchema).default([]),
    initialDate: DateStringSchema,
    ...PortfolioUnitTermsShape,
  }),
]);

export type CalculationRequestInput = z.infer<typeof CalculationRequestSchema>;

/**
 * Turn a schema-validated request into an engine request, constructing
 * follow-on investments and unit batches. Relative follow-on timing is
 * resolved here against the request's initial date.
 *
 * @throws Error when a follow-on or batch violates its model invariants
 */
export function toCalculationRequest(input: CalculationRequestInput): CalculationRequest {
  switch (input.mode) {
    case "blendedIRR":
      return {
        ...input,
        followOns: input.followOns.map((followOn) =>
          createFollowOnInvestment(followOn, input.initialDate)
        ),
      };
    case "portfolioUnitBlended":
      return {
        ...input,
        initialBatch: createPortfolioUnitBatch(
          input.initialBatch.investmentAmount,
          input.initialBatch.unitPrice,
          input.initialBatch.investmentDate
        ),
        followOnBatches: input.followOnBatches.map((batch) =>
          createPortfolioUnitBatch(batch.investmentAmount, batch.unitPrice, batch.investmentDate)
        ),
      };
    default:
      return input;
  }
}
