import { Injectable, NotFoundException } from '@nestjs/common';
import { Money } from '../common/money/money';
import { Holding } from '../ledger/entities/holding.entity';
import { compareEvents, EventKind, IsoDate } from '../ledger/entities/ledger-event.entity';
import { Lot } from '../ledger/entities/lot.entity';
import { RealizedDisposal } from '../ledger/entities/realized-disposal.entity';
import { MarketPriceService } from '../market-price/market-price.service';
import { QuoteSyncService } from '../market-price/quote-sync.service';
import { PortfolioSummary, summarizePortfolio } from '../valuation/portfolio-aggregator';
import { HoldingValuation, valueHolding } from '../valuation/valuation';
import { HoldingsResponse, PendingPriceRow, QuotesResponse, TransactionPage } from './dto/portfolio-response.dto';
import { PortfolioStorageService } from './portfolio-storage.service';

export interface TransactionFilter {
  symbol?: string;
  kind?: EventKind;
  from?: IsoDate;      // inclusive
  to?: IsoDate;        // inclusive
  limit?: number;
  offset?: number;
}

export const DEFAULT_PAGE_SIZE = 50;

// Read-only operations for portfolio data.
// CQRS pattern - queries separated from mutations.
@Injectable()
export class PortfolioQueryService {
  constructor(
    private readonly storage: PortfolioStorageService,
    private readonly marketPriceService: MarketPriceService,
    private readonly quoteSyncService: QuoteSyncService,
  ) {}

  /** Holdings with shares remaining, at cost only */
  getHoldings(): HoldingsResponse<Holding> {
    return {
      holdings: this.openHoldings(),
      lastRebuild: this.storage.getLastRebuildTime(),
    };
  }

  /**
   * Holdings with shares remaining, valued against the quote cache.
   * Symbols without a quote come back UNAVAILABLE, never valued at cost.
   */
  getValuedHoldings(): HoldingsResponse<HoldingValuation> {
    return {
      holdings: this.valuations(),
      lastRebuild: this.storage.getLastRebuildTime(),
    };
  }

  /**
   * Every lot ever opened for a symbol in FIFO order, drained ones included.
   * @throws NotFoundException if the symbol was never replayed
   */
  getLots(symbol: string): Lot[] {
    const normalized = symbol.trim().toUpperCase();
    if (!this.storage.getHolding(normalized)) {
      throw new NotFoundException(`No lots recorded for ${normalized}`);
    }
    return this.storage.getLots(normalized);
  }

  getDisposals(symbol?: string): RealizedDisposal[] {
    return this.storage.getDisposals(symbol?.trim().toUpperCase());
  }

  getSummary(): PortfolioSummary {
    const realized = Money.sum(this.storage.getAllHoldings().map((holding) => holding.realizedPnL));
    return summarizePortfolio(this.valuations(), realized);
  }

  /** Stored rows in replay order, filtered and paged */
  getTransactions(filter: TransactionFilter = {}): TransactionPage {
    const symbol = filter.symbol?.trim().toUpperCase();
    const limit = filter.limit ?? DEFAULT_PAGE_SIZE;
    const offset = filter.offset ?? 0;

    const matches = this.storage
      .getAllTransactions()
      .filter((row) => symbol === undefined || row.symbol === symbol)
      .filter((row) => filter.kind === undefined || row.kind === filter.kind)
      .filter((row) => filter.from === undefined || row.date >= filter.from)
      .filter((row) => filter.to === undefined || row.date <= filter.to)
      .sort((a, b) => compareEvents(a, b) || a.symbol.localeCompare(b.symbol));

    return {
      items: matches.slice(offset, offset + limit),
      total: matches.length,
      limit,
      offset,
    };
  }

  /** Rows holding their symbol back from replay, by symbol then date */
  getPendingPrices(): PendingPriceRow[] {
    return this.storage
      .getAllSymbolStates()
      .filter((state) => state.status === 'AWAITING_PRICE')
      .flatMap((state) =>
        state.pendingTransactionIds.flatMap((id) => {
          const row = this.storage.getTransaction(id);
          if (!row) {
            return [];
          }
          return [
            {
              transactionId: row.id,
              symbol: row.symbol,
              date: row.date,
              kind: row.kind,
              quantity: row.quantity,
              memo: row.memo,
              reasons: [...state.reasons],
            },
          ];
        }),
      )
      .sort((a, b) => a.symbol.localeCompare(b.symbol) || a.date.localeCompare(b.date));
  }

  getQuotes(): QuotesResponse {
    return {
      quotes: this.marketPriceService.getAllQuotes(),
      lastUpdated: this.marketPriceService.getLastUpdateTime(),
      providerConfigured: this.quoteSyncService.isConfigured(),
    };
  }

  private openHoldings(): Holding[] {
    return this.storage.getAllHoldings().filter((holding) => holding.totalQuantity > 0);
  }

  private valuations(): HoldingValuation[] {
    return this.openHoldings().map((holding) => valueHolding(holding, this.marketPriceService.getQuote(holding.symbol)));
  }
}
