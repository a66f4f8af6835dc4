import { Money } from '../common/money/money';
import { Holding } from '../ledger/entities/holding.entity';
import { ProviderQuote } from '../market-price/quote.interface';

export type PriceStatus = 'LIVE' | 'UNAVAILABLE';

export interface HoldingValuation extends Holding {
  marketPrice?: Money;
  quoteAsOf?: Date;
  currentValue?: Money;
  unrealizedPnL?: Money;
  unrealizedPnLPercent: number | null;
  priceStatus: PriceStatus;
}

/**
 * Values a holding against a market quote.
 *
 * Without a quote the holding is reported as `UNAVAILABLE` and carries no
 * value or P&L; it is never valued at cost. The percentage is null when the
 * holding has no cost, as with a position made only of bonus shares.
 */
export function valueHolding(holding: Holding, quote?: ProviderQuote | null): HoldingValuation {
  if (!quote) {
    return { ...holding, unrealizedPnLPercent: null, priceStatus: 'UNAVAILABLE' };
  }

  const currentValue = quote.price.multiply(holding.totalQuantity);
  const unrealizedPnL = currentValue.subtract(holding.totalCost);

  return {
    ...holding,
    marketPrice: quote.price,
    quoteAsOf: quote.asOf,
    currentValue,
    unrealizedPnL,
    unrealizedPnLPercent: unrealizedPnL.percentOf(holding.totalCost),
    priceStatus: 'LIVE',
  };
}
