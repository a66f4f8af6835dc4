import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { Money } from '../common/money/money';
import { MarketPriceService } from './market-price.service';

describe('MarketPriceService', () => {
  let service: MarketPriceService;
  const asOf = new Date('2024-02-01T10:00:00Z');

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [MarketPriceService],
    }).compile();

    service = module.get<MarketPriceService>(MarketPriceService);
  });

  afterEach(() => {
    service.clearAllQuotes();
  });

  describe('Initialization', () => {
    it('should start with an empty cache', () => {
      expect(service.getAllQuotes()).toEqual([]);
      expect(service.getLastUpdateTime()).toBeUndefined();
    });
  });

  describe('updateQuote', () => {
    it('should store a manual quote', () => {
      service.updateQuote('nabil', Money.fromMajorUnits('412.50'), asOf);

      const quote = service.getQuote('NABIL');
      expect(quote?.price.toMajorUnits()).toBe('412.50');
      expect(quote?.asOf).toBe(asOf);
      expect(quote?.source).toBe('manual');
      expect(service.hasQuote('NABIL')).toBe(true);
      expect(service.getLastUpdateTime()).toBeInstanceOf(Date);
    });

    it('should replace an older quote', () => {
      service.updateQuote('NABIL', Money.fromMajorUnits('400'), asOf);
      service.updateQuote('NABIL', Money.fromMajorUnits('410'), asOf);
      expect(service.getQuote('NABIL')?.price.toMajorUnits()).toBe('410.00');
    });

    it('should reject non-positive prices', () => {
      expect(() => service.updateQuote('NABIL', Money.ZERO)).toThrow(BadRequestException);
      expect(() => service.updateQuote('NABIL', Money.fromMajorUnits('-5'))).toThrow(
        'Price must be positive, got -5.00 for NABIL',
      );
    });
  });

  describe('updateQuotes', () => {
    it('should apply every quote of a batch', () => {
      service.updateQuotes([
        { symbol: 'NICA', price: Money.fromMajorUnits('180'), asOf, source: 'provider' },
        { symbol: 'ADBL', price: Money.fromMajorUnits('300'), asOf, source: 'provider' },
      ]);

      expect(service.getAllQuotes().map((quote) => quote.symbol)).toEqual(['ADBL', 'NICA']);
    });

    it('should leave the cache untouched when one entry is invalid', () => {
      expect(() =>
        service.updateQuotes([
          { symbol: 'NICA', price: Money.fromMajorUnits('180'), asOf, source: 'provider' },
          { symbol: 'ADBL', price: Money.ZERO, asOf, source: 'provider' },
        ]),
      ).toThrow(BadRequestException);

      expect(service.getQuote('NICA')).toBeUndefined();
    });
  });
});
