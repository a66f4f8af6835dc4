import { Money } from '../common/money/money';
import { Holding } from '../ledger/entities/holding.entity';
import { summarizePortfolio } from './portfolio-aggregator';
import { valueHolding } from './valuation';

describe('summarizePortfolio', () => {
  const asOf = new Date('2024-02-01T10:00:00Z');

  const createTestHolding = (symbol: string, quantity: number, cost: string): Holding => ({
    symbol,
    totalQuantity: quantity,
    totalCost: Money.fromMajorUnits(cost),
    averageCost: Money.fromMajorUnits(cost).divide(quantity),
    realizedPnL: Money.ZERO,
    openLots: 1,
  });

  it('should total priced holdings and count unpriced ones', () => {
    const valuations = [
      valueHolding(createTestHolding('NABIL', 100, '20000'), { price: Money.fromMajorUnits('250'), asOf }),
      valueHolding(createTestHolding('NICA', 50, '10000'), { price: Money.fromMajorUnits('180'), asOf }),
      valueHolding(createTestHolding('ADBL', 40, '12000'), null),
    ];

    const summary = summarizePortfolio(valuations, Money.fromMajorUnits('1500'));

    expect(summary.totalInvestment.toMajorUnits()).toBe('42000.00');
    expect(summary.currentValue.toMajorUnits()).toBe('34000.00');
    // (25000 - 20000) + (9000 - 10000) over 30000 of priced cost
    expect(summary.totalUnrealizedPnL.toMajorUnits()).toBe('4000.00');
    expect(summary.totalUnrealizedPnLPercent).toBe(13.33);
    expect(summary.totalRealizedPnL.toMajorUnits()).toBe('1500.00');
    expect(summary.holdingsCount).toBe(3);
    expect(summary.unpricedHoldingsCount).toBe(1);
  });

  it('should return zeros and a null percentage for an empty portfolio', () => {
    const summary = summarizePortfolio([], Money.ZERO);

    expect(summary.totalInvestment.isZero()).toBe(true);
    expect(summary.currentValue.isZero()).toBe(true);
    expect(summary.totalUnrealizedPnLPercent).toBeNull();
    expect(summary.holdingsCount).toBe(0);
  });

  it('should guard the percentage when priced holdings cost nothing', () => {
    const bonusOnly = createTestHolding('NABIL', 10, '0');
    const summary = summarizePortfolio(
      [valueHolding(bonusOnly, { price: Money.fromMajorUnits('300'), asOf })],
      Money.ZERO,
    );

    expect(summary.totalUnrealizedPnL.toMajorUnits()).toBe('3000.00');
    expect(summary.totalUnrealizedPnLPercent).toBeNull();
  });

  it('should leave value at zero when nothing is priced', () => {
    const summary = summarizePortfolio([valueHolding(createTestHolding('ADBL', 40, '12000'))], Money.ZERO);

    expect(summary.totalInvestment.toMajorUnits()).toBe('12000.00');
    expect(summary.currentValue.isZero()).toBe(true);
    expect(summary.totalUnrealizedPnLPercent).toBeNull();
    expect(summary.unpricedHoldingsCount).toBe(1);
  });
});
