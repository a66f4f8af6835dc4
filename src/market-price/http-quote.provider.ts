import axios, { AxiosInstance, isAxiosError } from 'axios';
import { Money } from '../common/money/money';
import { ProviderQuote, QuoteProvider } from './quote.interface';

export class QuoteFormatError extends Error {
  constructor(symbol: string, detail: string) {
    super(`Quote for ${symbol} is malformed: ${detail}`);
    this.name = 'QuoteFormatError';
  }
}

/**
 * Reads quotes from an HTTP endpoint:
 *
 *   GET {baseUrl}/quotes/{symbol}  ->  { "price": "412.50", "asOf": "2024-02-01T10:00:00Z" }
 *
 * A 404 means the symbol is unknown to the provider.
 */
export class HttpQuoteProvider implements QuoteProvider {
  constructor(private readonly http: AxiosInstance) {}

  static create(baseURL: string, timeoutMs: number): HttpQuoteProvider {
    return new HttpQuoteProvider(axios.create({ baseURL, timeout: timeoutMs }));
  }

  async getQuote(symbol: string): Promise<ProviderQuote | null> {
    try {
      const response = await this.http.get<unknown>(`/quotes/${encodeURIComponent(symbol)}`);
      return parseQuoteBody(symbol, response.data);
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw error;
    }
  }
}

function parseQuoteBody(symbol: string, body: unknown): ProviderQuote {
  if (typeof body !== 'object' || body === null || !('price' in body)) {
    throw new QuoteFormatError(symbol, 'missing price');
  }

  const { price } = body;
  if (typeof price !== 'string' && typeof price !== 'number') {
    throw new QuoteFormatError(symbol, 'price is not a number');
  }
  const amount = Money.fromMajorUnits(price);
  if (!amount.isPositive()) {
    throw new QuoteFormatError(symbol, `price must be positive, got ${amount.toMajorUnits()}`);
  }

  let asOf = new Date();
  if ('asOf' in body && typeof body.asOf === 'string') {
    asOf = new Date(body.asOf);
    if (Number.isNaN(asOf.getTime())) {
      throw new QuoteFormatError(symbol, `unreadable asOf "${body.asOf}"`);
    }
  }

  return { price: amount, asOf };
}
