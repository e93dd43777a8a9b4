import {
  addsCapital,
  createFollowOnInvestment,
  resolveInvestmentDate,
  sortByInvestmentDate,
} from '../../models/FollowOnInvestment';
import { createPortfolioUnitBatch, batchUnits } from '../../models/PortfolioUnitBatch';
import { finalValue } from '../../models/GrowthPoint';
import { followOnAfterMonths, initialDate } from '../fixtures/followOns';

describe('resolveInvestmentDate', () => {
  it('should return a copy of an absolute date', () => {
    const date = new Date(2024, 5, 15);
    const resolved = resolveInvestmentDate({ type: 'absolute', date }, initialDate);
    expect(resolved).toEqual(date);
    expect(resolved).not.toBe(date);
  });

  it('should resolve relative days, months and years', () => {
    expect(resolveInvestmentDate({ type: 'relative', amount: 10, unit: 'days' }, initialDate)).toEqual(new Date(2024, 0, 11));
    expect(resolveInvestmentDate({ type: 'relative', amount: 6, unit: 'months' }, initialDate)).toEqual(new Date(2024, 6, 1));
    expect(resolveInvestmentDate({ type: 'relative', amount: 1, unit: 'years' }, initialDate)).toEqual(new Date(2024, 11, 31));
  });
});

describe('createFollowOnInvestment', () => {
  it('should fill in defaults for custom valuation fields', () => {
    const followOn = createFollowOnInvestment(
      {
        timing: { type: 'relative', amount: 1, unit: 'years' },
        investmentType: 'buy',
        amount: 500,
        valuationMode: 'tagAlong',
      },
      initialDate
    );

    expect(followOn.valuationType).toBe('computed');
    expect(followOn.valuation).toBe(0);
    expect(followOn.valuationIrr).toBe(0);
    expect(followOn.id).toEqual(expect.any(String));
    expect(followOn.id.length).toBeGreaterThan(0);
  });

  it('should keep a supplied id', () => {
    const followOn = followOnAfterMonths(3, { id: 'follow-on-1' });
    expect(followOn.id).toBe('follow-on-1');
  });

  it('should resolve the date once at construction', () => {
    const followOn = followOnAfterMonths(3);
    expect(followOn.investmentDate).toEqual(new Date(2024, 3, 1));
    expect(followOn.timing).toEqual({ type: 'relative', amount: 3, unit: 'months' });
  });

  it('should return a frozen value', () => {
    expect(Object.isFrozen(followOnAfterMonths(3))).toBe(true);
  });

  it('should reject a non-positive amount', () => {
    expect(() => followOnAfterMonths(3, { amount: 0 })).toThrow(
      'Follow-on investment amount must be a positive number, got 0'
    );
  });

  it('should reject a negative relative offset', () => {
    expect(() => followOnAfterMonths(-2)).toThrow('Relative time amount must not be negative, got -2');
  });

  it('should reject a date before the initial investment', () => {
    expect(() =>
      createFollowOnInvestment(
        {
          timing: { type: 'absolute', date: new Date(2023, 11, 31) },
          investmentType: 'sell',
          amount: 10,
          valuationMode: 'tagAlong',
        },
        initialDate
      )
    ).toThrow('Follow-on investment date must not precede the initial investment date');
  });
});

describe('sortByInvestmentDate', () => {
  it('should order by date and keep input order for ties', () => {
    const a = followOnAfterMonths(12, { id: 'a' });
    const b = followOnAfterMonths(3, { id: 'b' });
    const c = followOnAfterMonths(12, { id: 'c' });

    expect(sortByInvestmentDate([a, b, c]).map((f) => f.id)).toEqual(['b', 'a', 'c']);
  });

  it('should not modify the input list', () => {
    const list = [followOnAfterMonths(12, { id: 'a' }), followOnAfterMonths(3, { id: 'b' })];
    sortByInvestmentDate(list);
    expect(list.map((f) => f.id)).toEqual(['a', 'b']);
  });
});

describe('addsCapital', () => {
  it('should be true for buy and buy/sell only', () => {
    expect(addsCapital(followOnAfterMonths(1, { investmentType: 'buy' }))).toBe(true);
    expect(addsCapital(followOnAfterMonths(1, { investmentType: 'buySell' }))).toBe(true);
    expect(addsCapital(followOnAfterMonths(1, { investmentType: 'sell' }))).toBe(false);
  });
});

describe('createPortfolioUnitBatch', () => {
  it('should build a batch and count its units', () => {
    const batch = createPortfolioUnitBatch(2500, 12.5, initialDate);
    expect(batchUnits(batch)).toBe(200);
  });

  it('should reject non-positive amounts and prices', () => {
    expect(() => createPortfolioUnitBatch(0, 10, initialDate)).toThrow('Batch investment amount must be positive, got 0');
    expect(() => createPortfolioUnitBatch(100, -1, initialDate)).toThrow('Batch unit price must be positive, got -1');
  });
});

describe('finalValue', () => {
  it('should return the last value or 0 for an empty series', () => {
    expect(finalValue([{ month: 0, value: 1 }, { month: 1, value: 2 }])).toBe(2);
    expect(finalValue([])).toBe(0);
  });
});
