import { Money } from '../common/money/money';

export const QUOTE_PROVIDER = Symbol('QUOTE_PROVIDER');

// What a provider returns for one symbol.
export interface ProviderQuote {
  price: Money;
  asOf: Date;
}

export type QuoteSource = 'provider' | 'manual';

// A committed entry of the quote cache.
export interface Quote extends ProviderQuote {
  symbol: string;
  source: QuoteSource;
}

/**
 * Source of current market prices.
 *
 * Resolves to `null` when the provider does not know the symbol; rejects on
 * transport or server failure.
 */
export interface QuoteProvider {
  getQuote(symbol: string): Promise<ProviderQuote | null>;
}
