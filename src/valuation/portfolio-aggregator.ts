import { Money } from '../common/money/money';
import { HoldingValuation } from './valuation';

export interface PortfolioSummary {
  totalInvestment: Money;          // cost of every open holding
  currentValue: Money;             // priced holdings only
  totalUnrealizedPnL: Money;       // priced holdings only
  totalUnrealizedPnLPercent: number | null;
  totalRealizedPnL: Money;
  holdingsCount: number;
  unpricedHoldingsCount: number;
}

/**
 * Rolls holding valuations up to portfolio totals.
 *
 * Unpriced holdings count toward the investment but not toward value or
 * unrealized P&L, and the percentage is taken over the cost of the priced
 * holdings so a missing quote does not read as a loss.
 *
 * @param realizedPnL realized P&L across every symbol, closed ones included
 */
export function summarizePortfolio(valuations: readonly HoldingValuation[], realizedPnL: Money): PortfolioSummary {
  const priced = valuations.filter((valuation) => valuation.priceStatus === 'LIVE');
  const pricedCost = Money.sum(priced.map((valuation) => valuation.totalCost));
  const totalUnrealizedPnL = Money.sum(priced.map((valuation) => valuation.unrealizedPnL ?? Money.ZERO));

  return {
    totalInvestment: Money.sum(valuations.map((valuation) => valuation.totalCost)),
    currentValue: Money.sum(priced.map((valuation) => valuation.currentValue ?? Money.ZERO)),
    totalUnrealizedPnL,
    totalUnrealizedPnLPercent: totalUnrealizedPnL.percentOf(pricedCost),
    totalRealizedPnL: realizedPnL,
    holdingsCount: valuations.length,
    unpricedHoldingsCount: valuations.length - priced.length,
  };
}
