import { Module } from '@nestjs/common';
import { PortfolioController } from './portfolio.controller';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioStorageService } from './portfolio-storage.service';
import { MarketPriceModule } from '../market-price/market-price.module';

@Module({
  imports: [MarketPriceModule], // MarketPriceService and QuoteSyncService
  controllers: [PortfolioController],
  providers: [
    PortfolioStorageService,
    PortfolioService,      // Mutations: importExport, backfillPrices, rebuildLedger, quotes
    PortfolioQueryService, // Queries: holdings, lots, disposals, summary, transactions
  ],
})
export class PortfolioModule {}
