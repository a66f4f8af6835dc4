import { loadAppConfig } from './app.config';

describe('loadAppConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadAppConfig({})).toEqual({
      port: 3000,
      quoteProviderUrl: undefined,
      quoteRequestTimeoutMs: 5000,
      quoteSyncConcurrency: 5,
      quoteSyncTimeoutMs: 30000,
      longTermHoldingDays: 365,
      importRowOrder: 'oldest-first',
    });
  });

  it('should read overrides', () => {
    const config = loadAppConfig({
      PORT: '8080',
      QUOTE_PROVIDER_URL: 'http://quotes.test/api/',
      QUOTE_SYNC_CONCURRENCY: '2',
      LONG_TERM_HOLDING_DAYS: '730',
      IMPORT_ROW_ORDER: 'newest-first',
    });

    expect(config.port).toBe(8080);
    expect(config.quoteProviderUrl).toBe('http://quotes.test/api');
    expect(config.quoteSyncConcurrency).toBe(2);
    expect(config.longTermHoldingDays).toBe(730);
    expect(config.importRowOrder).toBe('newest-first');
  });

  it('should treat blank values as unset', () => {
    const config = loadAppConfig({ PORT: ' ', QUOTE_PROVIDER_URL: '' });
    expect(config.port).toBe(3000);
    expect(config.quoteProviderUrl).toBeUndefined();
  });

  it('should reject malformed numbers', () => {
    expect(() => loadAppConfig({ QUOTE_SYNC_CONCURRENCY: '0' })).toThrow(
      'Environment variable QUOTE_SYNC_CONCURRENCY must be a positive integer, got "0"',
    );
    expect(() => loadAppConfig({ PORT: 'eighty' })).toThrow(/PORT/);
  });

  it('should reject an unknown row order', () => {
    expect(() => loadAppConfig({ IMPORT_ROW_ORDER: 'random' })).toThrow(/IMPORT_ROW_ORDER/);
  });
});
