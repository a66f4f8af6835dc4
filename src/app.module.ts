import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { MarketPriceModule } from './market-price/market-price.module';
import { PortfolioModule } from './portfolio/portfolio.module';

@Module({
  imports: [ConfigModule, MarketPriceModule, PortfolioModule],
  controllers: [AppController],
})
export class AppModule {}
