import {
  followOnPositionRate,
  growthPoints,
  growthPointsWithFollowOn,
  portfolioUnitBlendedGrowthPoints,
  portfolioUnitGrowthPoints,
} from '../../engine/growth';
import { portfolioUnitIRR } from '../../engine/portfolioUnit';
import { PortfolioUnitBatch } from '../../models/PortfolioUnitBatch';
import { followOnAfterMonths, initialDate, ONE_YEAR_ELAPSED } from '../fixtures/followOns';

describe('growthPoints', () => {
  it('should produce one point per month plus month 0', () => {
    const points = growthPoints(100, 0.1, 1);
    expect(points).toHaveLength(13);
    expect(points[0]).toEqual({ month: 0, value: 100 });
    expect(points[12].value).toBeCloseTo(110, 10);
  });

  it('should drop partial months from the horizon', () => {
    expect(growthPoints(100, 0.1, 2.5)).toHaveLength(31);
    expect(growthPoints(100, 0.1, 1.99)).toHaveLength(24);
  });

  it('should return a single point for a zero horizon', () => {
    expect(growthPoints(100, 0.1, 0)).toEqual([{ month: 0, value: 100 }]);
  });

  it('should index months in ascending order', () => {
    const points = growthPoints(100, 0.1, 3);
    points.forEach((point, index) => {
      expect(point.month).toBe(index);
    });
  });

  it('should compound monthly samples at the annual rate', () => {
    const points = growthPoints(1000, 0.2, 1);
    expect(points[6].value).toBeCloseTo(1000 * Math.pow(1.2, 0.5), 10);
  });

  it('should zero the months a rate below -100% cannot reach', () => {
    expect(growthPoints(100, -1.5, 0.5).map((point) => point.value)).toEqual([100, 0, 0, 0, 0, 0, 0]);
  });
});

describe('followOnPositionRate', () => {
  it('should follow the base rate for tag-along events', () => {
    expect(followOnPositionRate(followOnAfterMonths(12), 0.1, 2, ONE_YEAR_ELAPSED)).toBe(0.1);
  });

  it('should use its own IRR for computed events', () => {
    const followOn = followOnAfterMonths(12, { valuationMode: 'custom', valuationIrr: 0.5 });
    expect(followOnPositionRate(followOn, 0.1, 2, ONE_YEAR_ELAPSED)).toBe(0.5);
  });

  it('should fall back to the base rate when a specified valuation cannot be reached', () => {
    const followOn = followOnAfterMonths(12, { valuationMode: 'custom', valuationType: 'specified', valuation: 0 });
    expect(followOnPositionRate(followOn, 0.1, 2, ONE_YEAR_ELAPSED)).toBe(0.1);

    const valued = followOnAfterMonths(12, { valuationMode: 'custom', valuationType: 'specified', valuation: 80 });
    expect(followOnPositionRate(valued, 0.1, 1, ONE_YEAR_ELAPSED)).toBe(0.1);
  });
});

describe('growthPointsWithFollowOn', () => {
  it('should match the plain series before any follow-on date', () => {
    const points = growthPointsWithFollowOn(100, 0.1, 2, [followOnAfterMonths(12)], initialDate);
    expect(points).toHaveLength(25);
    expect(points[0].value).toBe(100);
    expect(points[11].value).toBeCloseTo(100 * Math.pow(1.1, 11 / 12), 10);
  });

  it('should add a tag-along buy from its month onward', () => {
    const points = growthPointsWithFollowOn(100, 0.1, 2, [followOnAfterMonths(12)], initialDate);
    expect(points[12].value).toBeCloseTo(160, 10);
    expect(points[24].value).toBeCloseTo(175.9892370699, 8);
  });

  it('should subtract a tag-along sell', () => {
    const points = growthPointsWithFollowOn(
      100, 0.1, 2,
      [followOnAfterMonths(12, { investmentType: 'sell', amount: 30 })],
      initialDate
    );
    expect(points[12].value).toBeCloseTo(80, 10);
    expect(points[24].value).toBeCloseTo(88.0064577581, 8);
  });

  it('should subtract a specified sell as a flat amount', () => {
    const points = growthPointsWithFollowOn(
      100, 0.1, 2,
      [followOnAfterMonths(12, { investmentType: 'sell', amount: 30, valuationMode: 'custom', valuationType: 'specified' })],
      initialDate
    );
    expect(points[24].value).toBeCloseTo(121 - 30, 10);
  });

  it('should carry a specified buy to its valuation at the horizon', () => {
    const points = growthPointsWithFollowOn(
      100, 0.1, 2,
      [followOnAfterMonths(12, { valuationMode: 'custom', valuationType: 'specified', valuation: 80 })],
      initialDate
    );
    expect(points[24].value).toBeCloseTo(201, 8);
  });

  it('should grow a computed buy at its own IRR', () => {
    const points = growthPointsWithFollowOn(
      100, 0.1, 2,
      [followOnAfterMonths(12, { valuationMode: 'custom', valuationType: 'computed', valuationIrr: 0.5 })],
      initialDate
    );
    expect(points[24].value).toBeCloseTo(195.9375826954, 8);
  });

  it('should add a buy-sell like a buy at the base rate', () => {
    const points = growthPointsWithFollowOn(
      100, 0.1, 2,
      [followOnAfterMonths(12, { investmentType: 'buySell', amount: 40 })],
      initialDate
    );
    expect(points[11].value).toBeCloseTo(100 * Math.pow(1.1, 11 / 12), 10);
    expect(points[12].value).toBeCloseTo(150, 10);
    expect(points[24].value).toBeCloseTo(164.9913896559, 8);
  });

  it('should subtract a computed sell at its own valuation, then grow it at the base rate', () => {
    const points = growthPointsWithFollowOn(
      100, 0.1, 2,
      [followOnAfterMonths(12, { investmentType: 'sell', amount: 30, valuationMode: 'custom', valuationIrr: 0.2 })],
      initialDate
    );
    // 30 * 1.2^(366 / 365.25) = 36.0134800920
    expect(points[12].value).toBeCloseTo(73.986519908, 8);
    expect(points[24].value).toBeCloseTo(81.3929241101, 8);
  });

  it('should keep every point finite when a position rate is below -100%', () => {
    const points = growthPointsWithFollowOn(
      100, 0.1, 2,
      [followOnAfterMonths(12, { valuationMode: 'custom', valuationType: 'computed', valuationIrr: -2 })],
      initialDate
    );
    points.forEach((point) => {
      expect(Number.isFinite(point.value)).toBe(true);
    });
    expect(points[12].value).toBeCloseTo(160, 10);
    expect(points[18].value).toBeCloseTo(100 * Math.pow(1.1, 1.5), 10);
  });

  it('should return the plain series for an empty follow-on list', () => {
    expect(growthPointsWithFollowOn(100, 0.1, 2, [], initialDate)).toEqual(growthPoints(100, 0.1, 2));
  });
});

describe('portfolioUnitGrowthPoints', () => {
  it('should grow the investment at the portfolio IRR', () => {
    const terms = { successRate: 50, outcomePerUnit: 1000, investorShare: 40, feePercentage: 10 };
    const points = portfolioUnitGrowthPoints(10000, 100, terms, 2);
    const rate = portfolioUnitIRR(10000, 100, terms, 2);

    expect(points).toHaveLength(25);
    expect(points[0].value).toBe(10000);
    expect(points[24].value).toBeCloseTo(10000 * Math.pow(1 + rate, 2), 6);
    expect(points[24].value).toBeCloseTo(18000, 6);
  });
});

describe('portfolioUnitBlendedGrowthPoints', () => {
  const initialBatch: PortfolioUnitBatch = { investmentAmount: 1000, unitPrice: 10, investmentDate: initialDate };
  const julyBatch: PortfolioUnitBatch = { investmentAmount: 500, unitPrice: 5, investmentDate: new Date(2024, 6, 1) };

  it('should leave out a batch before its purchase month', () => {
    const points = portfolioUnitBlendedGrowthPoints(initialBatch, [julyBatch], 0.2, 1, initialDate);
    expect(points[5].value).toBeCloseTo(1000 * Math.pow(1.2, 5 / 12), 10);
  });

  it('should add each batch from its purchase month', () => {
    const points = portfolioUnitBlendedGrowthPoints(initialBatch, [julyBatch], 0.2, 1, initialDate);
    expect(points[6].value).toBeCloseTo(1595.6011297264, 8);
    expect(points[12].value).toBeCloseTo(1747.8934630638, 8);
  });
});
