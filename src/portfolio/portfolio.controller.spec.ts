import { ServiceUnavailableException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { APP_CONFIG, loadAppConfig } from '../config/app.config';
import { MarketPriceService } from '../market-price/market-price.service';
import { QUOTE_PROVIDER } from '../market-price/quote.interface';
import { QuoteSyncService } from '../market-price/quote-sync.service';
import { ImportExportDto } from './dto/import-export.dto';
import { PortfolioController } from './portfolio.controller';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioStorageService } from './portfolio-storage.service';
import { PortfolioService } from './portfolio.service';

describe('PortfolioController', () => {
  let controller: PortfolioController;
  let service: PortfolioService;

  const createTestImportDto = (...rows: string[]): ImportExportDto => ({
    csv: ['Date,Symbol,Description,Quantity,Price,Fees', ...rows].join('\n'),
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [PortfolioController],
      providers: [
        PortfolioStorageService,
        MarketPriceService,
        QuoteSyncService,
        PortfolioService,
        PortfolioQueryService,
        { provide: QUOTE_PROVIDER, useValue: null },
        { provide: APP_CONFIG, useValue: loadAppConfig({}) },
      ],
    }).compile();

    controller = module.get<PortfolioController>(PortfolioController);
    service = module.get<PortfolioService>(PortfolioService);
  });

  afterEach(() => {
    service.clearAll();
  });

  describe('importExport', () => {
    it('should import rows and report the outcome', () => {
      const result = controller.importExport(
        createTestImportDto('2024-01-10,NABIL,Buy,100,295.50,', '2024-01-11,NICA,Buy,10,,'),
      );

      expect(result.imported).toBe(2);
      expect(result.symbolsRebuilt).toEqual(['NABIL']);
      expect(result.awaitingPrice).toEqual(['NICA']);
    });

    it('should honour a newest-first row order', () => {
      const result = controller.importExport({
        ...createTestImportDto('2024-01-10,NABIL,Sell,40,300.00,', '2024-01-10,NABIL,Buy,100,295.50,'),
        rowOrder: 'newest-first',
      });

      expect(result.errors).toEqual([]);
      expect(controller.getLots('NABIL')[0].remainingQuantity).toBe(60);
    });
  });

  describe('backfillPrices', () => {
    it('should convert decimal prices and fees to money', () => {
      controller.importExport(createTestImportDto('2024-01-10,NABIL,Buy,100,,', '2024-02-10,NABIL,Sell,40,,'));

      const result = controller.backfillPrices({
        entries: [
          { symbol: 'NABIL', date: '2024-01-10', quantity: 100, unitPrice: 295.5 },
          { symbol: 'NABIL', date: '2024-02-10', quantity: 40, unitPrice: 310, fees: 12.4 },
        ],
      });

      expect(result.updated).toHaveLength(2);
      const [disposal] = controller.getDisposals('NABIL');
      expect(disposal.fees.toMajorUnits()).toBe('12.40');
      expect(disposal.proceeds.toMajorUnits()).toBe('12387.60');
      expect(disposal.gain.toMajorUnits()).toBe('567.60');
    });
  });

  describe('getHoldings', () => {
    it('should value holdings unless asked not to', () => {
      controller.importExport(createTestImportDto('2024-01-10,NABIL,Buy,100,295.50,'));
      controller.updateQuote({ symbol: 'NABIL', price: 300 });

      const live = controller.getHoldings({});
      const atCost = controller.getHoldings({ valuation: 'none' });

      expect(live.holdings[0]).toMatchObject({ symbol: 'NABIL', priceStatus: 'LIVE' });
      expect(atCost.holdings[0]).not.toHaveProperty('priceStatus');
    });
  });

  describe('quotes', () => {
    it('should return the stored quote after a manual update', () => {
      const response = controller.updateQuote({ symbol: 'nabil', price: 412.5, asOf: '2024-05-01T09:00:00.000Z' });

      expect(response.message).toBe('Quote updated for NABIL');
      expect(response.price.toMajorUnits()).toBe('412.50');
      expect(controller.getQuotes().quotes[0].asOf.toISOString()).toBe('2024-05-01T09:00:00.000Z');
    });

    it('should answer 503 when no provider is configured', async () => {
      await expect(controller.syncQuotes({})).rejects.toThrow(ServiceUnavailableException);
    });
  });

  describe('reset', () => {
    it('should clear transactions and quotes', () => {
      controller.importExport(createTestImportDto('2024-01-10,NABIL,Buy,100,295.50,'));
      controller.updateQuote({ symbol: 'NABIL', price: 300 });

      expect(controller.reset()).toEqual({ message: 'Portfolio reset successfully' });
      expect(controller.getTransactions({}).total).toBe(0);
      expect(controller.getQuotes().quotes).toEqual([]);
    });
  });
});
