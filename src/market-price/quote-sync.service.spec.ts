import { ServiceUnavailableException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { Money } from '../common/money/money';
import { APP_CONFIG, AppConfig, loadAppConfig } from '../config/app.config';
import { MarketPriceService } from './market-price.service';
import { ProviderQuote, QUOTE_PROVIDER, QuoteProvider } from './quote.interface';
import { QuoteSyncService } from './quote-sync.service';

// In-process provider: answers from a table, after an optional delay.
class FakeQuoteProvider implements QuoteProvider {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly answers: Record<string, ProviderQuote | null | Error | 'hang'>,
    private readonly delayMs = 0,
  ) {}

  async getQuote(symbol: string): Promise<ProviderQuote | null> {
    this.calls.push(symbol);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const answer = this.answers[symbol] ?? null;
      if (answer === 'hang') {
        return await new Promise<never>(() => undefined);
      }
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      if (answer instanceof Error) {
        throw answer;
      }
      return answer;
    } finally {
      this.inFlight -= 1;
    }
  }
}

describe('QuoteSyncService', () => {
  const asOf = new Date('2024-02-01T10:00:00Z');
  const quote = (price: string): ProviderQuote => ({ price: Money.fromMajorUnits(price), asOf });

  const createTestService = async (
    provider: QuoteProvider | null,
    overrides: Partial<AppConfig> = {},
  ): Promise<{ service: QuoteSyncService; prices: MarketPriceService }> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        QuoteSyncService,
        MarketPriceService,
        { provide: QUOTE_PROVIDER, useValue: provider },
        { provide: APP_CONFIG, useValue: { ...loadAppConfig({}), ...overrides } },
      ],
    }).compile();

    return {
      service: module.get<QuoteSyncService>(QuoteSyncService),
      prices: module.get<MarketPriceService>(MarketPriceService),
    };
  };

  it('should update quotes and report each failing symbol', async () => {
    const provider = new FakeQuoteProvider({
      NABIL: quote('412.50'),
      NICA: quote('180.00'),
      ADBL: new Error('connect ECONNREFUSED'),
    });
    const { service, prices } = await createTestService(provider);

    const result = await service.syncQuotes(['NABIL', 'NICA', 'ADBL', 'ZZZ']);

    expect(result.requested).toBe(4);
    expect(result.updated).toEqual(['NABIL', 'NICA']);
    expect(result.failed).toEqual(['ADBL', 'ZZZ']);
    expect(result.errors).toEqual([
      { symbol: 'ADBL', code: 'PROVIDER_ERROR', message: 'connect ECONNREFUSED' },
      { symbol: 'ZZZ', code: 'NOT_FOUND', message: 'Provider has no quote for symbol' },
    ]);
    expect(result.timedOut).toBe(false);

    expect(prices.getQuote('NABIL')?.price.toMajorUnits()).toBe('412.50');
    expect(prices.getQuote('NABIL')?.source).toBe('provider');
    expect(prices.getQuote('ADBL')).toBeUndefined();
  });

  it('should keep the previous quote when a refresh fails', async () => {
    const { service, prices } = await createTestService(new FakeQuoteProvider({ NABIL: new Error('boom') }));
    prices.updateQuote('NABIL', Money.fromMajorUnits('400'), asOf);

    await service.syncQuotes(['NABIL']);

    expect(prices.getQuote('NABIL')?.price.toMajorUnits()).toBe('400.00');
  });

  it('should never run more fetches at once than the pool allows', async () => {
    const answers = Object.fromEntries(['A', 'B', 'C', 'D', 'E', 'F'].map((s) => [s, quote('10')]));
    const provider = new FakeQuoteProvider(answers, 5);
    const { service } = await createTestService(provider, { quoteSyncConcurrency: 2 });

    const result = await service.syncQuotes(Object.keys(answers));

    expect(result.updated).toHaveLength(6);
    expect(provider.maxInFlight).toBe(2);
  });

  it('should report unanswered symbols once the batch deadline passes', async () => {
    const provider = new FakeQuoteProvider({ NABIL: quote('412.50'), SLOW: 'hang' });
    const { service, prices } = await createTestService(provider, { quoteSyncTimeoutMs: 20 });

    const result = await service.syncQuotes(['SLOW', 'NABIL']);

    expect(result.timedOut).toBe(true);
    expect(result.updated).toEqual(['NABIL']);
    expect(result.errors).toEqual([{ symbol: 'SLOW', code: 'TIMEOUT', message: 'No answer within 20ms' }]);
    expect(prices.getQuote('NABIL')).toBeDefined();
  });

  it('should reject non-positive quotes without touching the cache', async () => {
    const { service, prices } = await createTestService(
      new FakeQuoteProvider({ NABIL: { price: Money.ZERO, asOf } }),
    );

    const result = await service.syncQuotes(['NABIL']);

    expect(result.errors[0].code).toBe('INVALID_QUOTE');
    expect(prices.hasQuote('NABIL')).toBe(false);
  });

  it('should normalise and de-duplicate symbols', async () => {
    const provider = new FakeQuoteProvider({ NABIL: quote('1') });
    const { service } = await createTestService(provider);

    await service.syncQuotes([' nabil', 'NABIL', '']);

    expect(provider.calls).toEqual(['NABIL']);
  });

  it('should do nothing for an empty request', async () => {
    const provider = new FakeQuoteProvider({});
    const { service } = await createTestService(provider);

    await expect(service.syncQuotes([])).resolves.toEqual({
      requested: 0,
      updated: [],
      failed: [],
      errors: [],
      timedOut: false,
    });
    expect(provider.calls).toEqual([]);
  });

  it('should be unavailable without a provider', async () => {
    const { service } = await createTestService(null);

    expect(service.isConfigured()).toBe(false);
    await expect(service.syncQuotes(['NABIL'])).rejects.toThrow(ServiceUnavailableException);
  });
});
