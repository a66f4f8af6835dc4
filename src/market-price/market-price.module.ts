import { Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { HttpQuoteProvider } from './http-quote.provider';
import { MarketPriceService } from './market-price.service';
import { QUOTE_PROVIDER, QuoteProvider } from './quote.interface';
import { QuoteSyncService } from './quote-sync.service';

@Module({
  providers: [
    MarketPriceService,
    QuoteSyncService,
    {
      provide: QUOTE_PROVIDER,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): QuoteProvider | null =>
        config.quoteProviderUrl
          ? HttpQuoteProvider.create(config.quoteProviderUrl, config.quoteRequestTimeoutMs)
          : null,
    },
  ],
  exports: [MarketPriceService, QuoteSyncService],
})
export class MarketPriceModule {}
