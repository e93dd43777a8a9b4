/**
 * One purchase of units (leads, royalties, claims) at a point in time.
 */
export interface PortfolioUnitBatch {
  readonly investmentAmount: number;
  readonly unitPrice: number;
  readonly investmentDate: Date;
}

/**
 * @throws Error when the amount or unit price is not positive
 */
export function createPortfolioUnitBatch(
  investmentAmount: number,
  unitPrice: number,
  investmentDate: Date
): PortfolioUnitBatch {
  if (!(investmentAmount > 0)) {
    throw new Error(`Batch investment amount must be positive, got ${investmentAmount}`);
  }
  if (!(unitPrice > 0)) {
    throw new Error(`Batch unit price must be positive, got ${unitPrice}`);
  }
  return Object.freeze({ investmentAmount, unitPrice, investmentDate: new Date(investmentDate.getTime()) });
}

/**
 * Number of units a batch buys. Unit price may differ between batches.
 */
export function batchUnits(batch: PortfolioUnitBatch): number {
  return batch.investmentAmount / batch.unitPrice;
}
