import { Inject, Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import pLimit from 'p-limit';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { MarketPriceService } from './market-price.service';
import { ProviderQuote, Quote, QUOTE_PROVIDER, QuoteProvider } from './quote.interface';

export type QuoteFailureCode = 'NOT_FOUND' | 'PROVIDER_ERROR' | 'INVALID_QUOTE' | 'TIMEOUT';

export interface QuoteFailure {
  symbol: string;
  code: QuoteFailureCode;
  message: string;
}

export interface QuoteSyncResult {
  requested: number;
  updated: string[];
  failed: string[];
  errors: QuoteFailure[];
  timedOut: boolean;
}

type FetchOutcome = { symbol: string; quote: ProviderQuote } | { symbol: string; failure: QuoteFailure };

/**
 * Pulls current quotes from the configured provider into the quote cache.
 *
 * Fetches run through a bounded pool. A failing symbol is reported and
 * skipped; the others still update. When the batch deadline passes, symbols
 * not yet answered are reported as TIMEOUT. Results are committed to the
 * cache in one call after every fetch has settled or timed out.
 */
@Injectable()
export class QuoteSyncService {
  private readonly logger = new Logger(QuoteSyncService.name);

  constructor(
    private readonly marketPriceService: MarketPriceService,
    @Inject(QUOTE_PROVIDER) private readonly provider: QuoteProvider | null,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  isConfigured(): boolean {
    return this.provider !== null;
  }

  async syncQuotes(symbols: readonly string[]): Promise<QuoteSyncResult> {
    const provider = this.provider;
    if (!provider) {
      throw new ServiceUnavailableException('No quote provider is configured');
    }

    const unique = [...new Set(symbols.map((symbol) => symbol.trim().toUpperCase()).filter((s) => s !== ''))].sort();
    if (unique.length === 0) {
      return { requested: 0, updated: [], failed: [], errors: [], timedOut: false };
    }

    const limit = pLimit(this.config.quoteSyncConcurrency);
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        timedOut = true;
        resolve();
      }, this.config.quoteSyncTimeoutMs);
    });

    const timeout = (symbol: string): FetchOutcome => ({
      symbol,
      failure: { symbol, code: 'TIMEOUT', message: `No answer within ${this.config.quoteSyncTimeoutMs}ms` },
    });

    const fetchOne = async (symbol: string): Promise<FetchOutcome> => {
      if (timedOut) {
        return timeout(symbol);
      }
      try {
        const quote = await provider.getQuote(symbol);
        if (!quote) {
          return { symbol, failure: { symbol, code: 'NOT_FOUND', message: 'Provider has no quote for symbol' } };
        }
        if (!quote.price.isPositive()) {
          return {
            symbol,
            failure: { symbol, code: 'INVALID_QUOTE', message: `Non-positive price ${quote.price.toMajorUnits()}` },
          };
        }
        return { symbol, quote };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { symbol, failure: { symbol, code: 'PROVIDER_ERROR', message } };
      }
    };

    let outcomes: FetchOutcome[];
    try {
      outcomes = await Promise.all(
        unique.map((symbol) =>
          Promise.race([limit(() => fetchOne(symbol)), deadline.then(() => timeout(symbol))]),
        ),
      );
    } finally {
      clearTimeout(timer);
    }

    const fetched: Quote[] = [];
    const errors: QuoteFailure[] = [];
    for (const outcome of outcomes) {
      if ('quote' in outcome) {
        fetched.push({ symbol: outcome.symbol, ...outcome.quote, source: 'provider' });
      } else {
        errors.push(outcome.failure);
        this.logger.warn(`Quote for ${outcome.symbol} unavailable (${outcome.failure.code}): ${outcome.failure.message}`);
      }
    }

    this.marketPriceService.updateQuotes(fetched);

    const result: QuoteSyncResult = {
      requested: unique.length,
      updated: fetched.map((quote) => quote.symbol),
      failed: errors.map((failure) => failure.symbol),
      errors,
      timedOut,
    };
    this.logger.log(
      `Quote sync finished: ${result.updated.length} updated, ${result.failed.length} failed` +
        (timedOut ? ' (deadline reached)' : ''),
    );
    return result;
  }
}
