import { BadRequestException, Injectable } from '@nestjs/common';
import { Money } from '../common/money/money';
import { Quote, QuoteSource } from './quote.interface';

/**
 * Committed quote cache used for valuation.
 * Filled by manual updates and by quote sync; holds no default prices.
 */
@Injectable()
export class MarketPriceService {
  private latestQuotes: Map<string, Quote> = new Map();
  private lastQuoteUpdate?: Date;

  /** O(1) lookup - undefined if symbol not quoted */
  getQuote(symbol: string): Quote | undefined {
    return this.latestQuotes.get(symbol);
  }

  /** Snapshot of every quote, by symbol */
  getAllQuotes(): Quote[] {
    return Array.from(this.latestQuotes.values()).sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  /**
   * Sets one symbol's quote.
   * @throws BadRequestException if price <= 0
   */
  updateQuote(symbol: string, price: Money, asOf: Date = new Date(), source: QuoteSource = 'manual'): Quote {
    const [quote] = this.updateQuotes([{ symbol, price, asOf, source }]);
    return quote;
  }

  /**
   * Batch update - validates all before applying, so a bad entry leaves the
   * cache untouched.
   * @throws BadRequestException on the first non-positive price
   */
  updateQuotes(quotes: readonly Quote[]): Quote[] {
    for (const quote of quotes) {
      if (!quote.price.isPositive()) {
        throw new BadRequestException(`Price must be positive, got ${quote.price.toMajorUnits()} for ${quote.symbol}`);
      }
    }

    const committed = quotes.map((quote) => ({ ...quote, symbol: quote.symbol.toUpperCase() }));
    committed.forEach((quote) => this.latestQuotes.set(quote.symbol, quote));
    if (committed.length > 0) {
      this.lastQuoteUpdate = new Date();
    }
    return committed;
  }

  /** Timestamp of most recent cache write, undefined before the first */
  getLastUpdateTime(): Date | undefined {
    return this.lastQuoteUpdate;
  }

  hasQuote(symbol: string): boolean {
    return this.latestQuotes.has(symbol);
  }

  /** Empties the cache - test harness only */
  clearAllQuotes(): void {
    this.latestQuotes.clear();
    this.lastQuoteUpdate = undefined;
  }
}
