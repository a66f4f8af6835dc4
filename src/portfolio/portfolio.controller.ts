import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { Money } from '../common/money/money';
import { Holding } from '../ledger/entities/holding.entity';
import { Lot } from '../ledger/entities/lot.entity';
import { RealizedDisposal } from '../ledger/entities/realized-disposal.entity';
import { QuoteSyncResult } from '../market-price/quote-sync.service';
import { PortfolioSummary } from '../valuation/portfolio-aggregator';
import { BackfillPricesDto } from './dto/backfill-prices.dto';
import { ImportExportDto } from './dto/import-export.dto';
import {
  BackfillResult,
  HoldingsResponse,
  ImportResult,
  PendingPriceRow,
  QuotesResponse,
  QuoteUpdateResponse,
  TransactionPage,
} from './dto/portfolio-response.dto';
import { HoldingsQueryDto, TransactionQueryDto } from './dto/transaction-query.dto';
import { SyncQuotesDto, UpdateQuoteDto } from './dto/update-quote.dto';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioService } from './portfolio.service';

@Controller('portfolio')
export class PortfolioController {
  constructor(
    private readonly portfolioService: PortfolioService,
    private readonly queryService: PortfolioQueryService,
  ) {}

  /**
   * Imports a broker export and rebuilds the ledger.
   * Re-posting the same file adds nothing; its rows come back as DUPLICATE.
   *
   * POST /portfolio/imports
   * @returns 201 with row errors, warnings and symbols awaiting a price
   */
  @Post('imports')
  @HttpCode(HttpStatus.CREATED)
  importExport(@Body() dto: ImportExportDto): ImportResult {
    return this.portfolioService.importExport(dto.csv, { rowOrder: dto.rowOrder });
  }

  /**
   * Supplies prices for rows imported without one.
   *
   * POST /portfolio/prices
   */
  @Post('prices')
  @HttpCode(HttpStatus.OK)
  backfillPrices(@Body() dto: BackfillPricesDto): BackfillResult {
    return this.portfolioService.backfillPrices(
      dto.entries.map((entry) => ({
        transactionId: entry.transactionId,
        symbol: entry.symbol,
        date: entry.date,
        quantity: entry.quantity,
        unitPrice: Money.fromMajorUnits(entry.unitPrice),
        fees: entry.fees !== undefined ? Money.fromMajorUnits(entry.fees) : undefined,
      })),
    );
  }

  /**
   * GET /portfolio/prices/pending
   */
  @Get('prices/pending')
  @HttpCode(HttpStatus.OK)
  getPendingPrices(): PendingPriceRow[] {
    return this.queryService.getPendingPrices();
  }

  /**
   * Returns open holdings, valued against cached quotes unless valuation=none.
   *
   * GET /portfolio/holdings?valuation=live
   */
  @Get('holdings')
  @HttpCode(HttpStatus.OK)
  getHoldings(@Query() query: HoldingsQueryDto): HoldingsResponse<Holding> {
    if (query.valuation === 'none') {
      return this.queryService.getHoldings();
    }
    return this.queryService.getValuedHoldings();
  }

  /**
   * GET /portfolio/holdings/NABIL/lots
   */
  @Get('holdings/:symbol/lots')
  @HttpCode(HttpStatus.OK)
  getLots(@Param('symbol') symbol: string): Lot[] {
    return this.queryService.getLots(symbol);
  }

  /**
   * Realized disposals, one per lot drawn.
   *
   * GET /portfolio/disposals?symbol=NABIL
   */
  @Get('disposals')
  @HttpCode(HttpStatus.OK)
  getDisposals(@Query('symbol') symbol?: string): RealizedDisposal[] {
    return this.queryService.getDisposals(symbol);
  }

  /**
   * GET /portfolio/summary
   */
  @Get('summary')
  @HttpCode(HttpStatus.OK)
  getSummary(): PortfolioSummary {
    return this.queryService.getSummary();
  }

  /**
   * GET /portfolio/transactions?symbol=NABIL&kind=SELL&from=2024-01-01&limit=20
   */
  @Get('transactions')
  @HttpCode(HttpStatus.OK)
  getTransactions(@Query() query: TransactionQueryDto): TransactionPage {
    return this.queryService.getTransactions(query);
  }

  /**
   * GET /portfolio/quotes
   */
  @Get('quotes')
  @HttpCode(HttpStatus.OK)
  getQuotes(): QuotesResponse {
    return this.queryService.getQuotes();
  }

  /**
   * Sets a manual quote for one symbol.
   *
   * POST /portfolio/quotes
   */
  @Post('quotes')
  @HttpCode(HttpStatus.OK)
  updateQuote(@Body() dto: UpdateQuoteDto): QuoteUpdateResponse {
    const asOf = dto.asOf !== undefined ? new Date(dto.asOf) : undefined;
    const quote = this.portfolioService.updateQuote(dto.symbol, Money.fromMajorUnits(dto.price), asOf);
    return {
      message: `Quote updated for ${quote.symbol}`,
      symbol: quote.symbol,
      price: quote.price,
    };
  }

  /**
   * Pulls quotes from the provider for the given or all held symbols.
   *
   * POST /portfolio/quotes/sync
   * @returns 503 when no provider is configured
   */
  @Post('quotes/sync')
  @HttpCode(HttpStatus.OK)
  syncQuotes(@Body() dto: SyncQuotesDto): Promise<QuoteSyncResult> {
    return this.portfolioService.syncQuotes(dto.symbols);
  }

  /**
   * Clears all state - test harness only.
   *
   * POST /portfolio/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    this.portfolioService.clearAll();
    return { message: 'Portfolio reset successfully' };
  }
}
