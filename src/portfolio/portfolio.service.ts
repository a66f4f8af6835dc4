import { BadRequestException, ConflictException, Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Money } from '../common/money/money';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { MarketPriceService } from '../market-price/market-price.service';
import { Quote } from '../market-price/quote.interface';
import { QuoteSyncResult, QuoteSyncService } from '../market-price/quote-sync.service';
import { HeaderError } from '../ledger/classifier/column-map';
import { awaitingPrice, ClassificationResult, classifyExport, RowError, RowOrder } from '../ledger/classifier/event-classifier';
import { mergerUnitCost, transferredCostBasis } from '../ledger/corporate-actions';
import { EventKind, LedgerEvent, sortEvents } from '../ledger/entities/ledger-event.entity';
import { LedgerInvariantError } from '../ledger/errors/ledger.errors';
import { LotLedger } from '../ledger/lot-ledger';
import { BackfillError, BackfillResult, ImportResult, LedgerViolation, RebuildResult } from './dto/portfolio-response.dto';
import { StoredTransaction } from './entities/stored-transaction.entity';
import { PendingReason, SymbolState } from './entities/symbol-state.entity';
import { duplicateKey, PortfolioStorageService } from './portfolio-storage.service';

export interface ImportOptions {
  rowOrder?: RowOrder;
}

// One price for one stored row, addressed by id or by (symbol, date, quantity).
export interface PriceEntry {
  transactionId?: string;
  symbol?: string;
  date?: string;
  quantity?: number;
  unitPrice: Money;
  fees?: Money;
}

// Kinds whose price may be supplied after import.
const BACKFILLABLE_KINDS: ReadonlySet<EventKind> = new Set([
  EventKind.BUY,
  EventKind.SELL,
  EventKind.IPO,
  EventKind.MERGER_IN,
]);

interface MergerLink {
  target: StoredTransaction;   // MERGER_IN without a cost
  source: StoredTransaction;   // same-date MERGER_OUT of another symbol
}

// Ingestion and ledger rebuilds.
// Every mutation commits atomically through the storage transaction.
@Injectable()
export class PortfolioService {
  private readonly logger = new Logger(PortfolioService.name);

  constructor(
    private readonly storage: PortfolioStorageService,
    private readonly marketPriceService: MarketPriceService,
    private readonly quoteSyncService: QuoteSyncService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Imports a broker export and rebuilds the ledger.
   * Rows already stored are reported as DUPLICATE and add nothing.
   *
   * @throws BadRequestException if the header is unusable
   * @throws ConflictException if the replay breaks a ledger invariant; nothing is saved
   */
  importExport(csv: string, options: ImportOptions = {}): ImportResult {
    const classified = this.classify(csv, options.rowOrder ?? this.config.importRowOrder);

    for (const warning of classified.warnings) {
      this.logger.warn(`Row ${warning.rowNumber}: unrecognised description "${warning.description}", imported as regular trade`);
    }

    const importId = uuidv4();
    const result = this.storage.runInTransaction(() => {
      const errors: RowError[] = [...classified.errors];
      let imported = 0;

      for (const event of classified.events) {
        // rows saved earlier in this same file are distinct events, not re-imports
        const existing = this.storage.findDuplicate(duplicateKey(event));
        if (existing && existing.importId !== importId) {
          errors.push({
            rowNumber: event.rowNumber,
            code: 'DUPLICATE',
            message: `Row already imported as transaction ${existing.id}`,
            record: event.record,
          });
          continue;
        }

        this.storage.saveTransaction({
          importId,
          rowNumber: event.rowNumber,
          symbol: event.symbol,
          date: event.date,
          kind: event.kind,
          quantity: event.quantity,
          unitPrice: event.unitPrice,
          fees: event.fees,
          memo: event.memo,
          details: event.details,
        });
        imported += 1;
      }

      errors.sort((a, b) => a.rowNumber - b.rowNumber);
      const rebuild = this.rebuildLedger();

      return {
        importId,
        totalRows: classified.totalRows,
        imported,
        skipped: errors.length,
        errors,
        warnings: classified.warnings,
        ...rebuild,
      };
    });

    this.logger.log(
      `Import ${importId}: ${result.imported} imported, ${result.skipped} skipped, ` +
        `${result.errors.length} errors, ${result.awaitingPrice.length} symbols awaiting price`,
    );
    return result;
  }

  /**
   * Supplies prices for rows imported without one, then rebuilds.
   * Only BUY, SELL, IPO and MERGER_IN rows still missing a price are touched;
   * within one batch the last entry for a row wins.
   *
   * @throws ConflictException if the replay breaks a ledger invariant; nothing is saved
   */
  backfillPrices(entries: readonly PriceEntry[]): BackfillResult {
    const errors: BackfillError[] = [];
    const alreadyPriced = new Set<string>();
    const accepted = new Map<string, PriceEntry>();

    entries.forEach((entry, index) => {
      const found = this.resolvePriceEntry(entry);
      if ('code' in found) {
        errors.push({ index, ...found });
        return;
      }
      if (found.unitPrice) {
        alreadyPriced.add(found.id);
        return;
      }
      if (entry.fees && found.kind !== EventKind.SELL) {
        errors.push({ index, code: 'FEES_NOT_APPLICABLE', message: `Fees apply to SELL rows only, not ${found.kind}` });
        return;
      }
      accepted.set(found.id, entry);
    });

    const result = this.storage.runInTransaction(() => {
      for (const [id, entry] of accepted) {
        this.storage.updateTransactionPrice(id, entry.unitPrice, entry.fees);
      }
      return {
        updated: [...accepted.keys()],
        alreadyPriced: [...alreadyPriced],
        errors,
        ...this.rebuildLedger(),
      };
    });

    this.logger.log(`Backfilled ${result.updated.length} prices, ${errors.length} entries rejected`);
    return result;
  }

  /**
   * Replays every symbol from stored transactions with a fresh ledger and
   * saves the resulting lots, disposals and holdings.
   *
   * Symbols with unpriced rows are left out and marked AWAITING_PRICE. A
   * MERGER_IN without a cost takes the cost basis drawn by the one same-date
   * MERGER_OUT of another symbol, which is therefore replayed first. Links
   * are one-to-one; a MERGER_OUT matched by several credits needs their
   * costs supplied by hand.
   *
   * @throws ConflictException listing every violation; storage is not changed
   */
  rebuildLedger(): RebuildResult {
    const ledger = new LotLedger({ longTermHoldingDays: this.config.longTermHoldingDays });
    const transactions = this.storage.getAllTransactions();
    const bySymbol = groupBySymbol(transactions);
    const states = new Map<string, SymbolState>();
    const pending = (symbol: string, reason: PendingReason, ids: string[]): void => {
      const state: SymbolState = states.get(symbol) ?? { symbol, status: 'AWAITING_PRICE', reasons: [], pendingTransactionIds: [] };
      if (!state.reasons.includes(reason)) state.reasons.push(reason);
      state.pendingTransactionIds.push(...ids.filter((id) => !state.pendingTransactionIds.includes(id)));
      states.set(symbol, state);
    };

    for (const [symbol, rows] of bySymbol) {
      const unpriced = rows.filter(awaitingPrice).map((row) => row.id);
      if (unpriced.length > 0) {
        pending(symbol, 'UNPRICED_ROWS', unpriced);
      }
    }

    // Link cost-less merger credits to the debit they replace. A debit
    // claimed by more than one credit links to none of them.
    const candidates: MergerLink[] = [];
    for (const target of transactions) {
      if (target.kind !== EventKind.MERGER_IN || target.unitPrice) continue;
      const sources = transactions.filter(
        (row) => row.kind === EventKind.MERGER_OUT && row.date === target.date && row.symbol !== target.symbol,
      );
      if (sources.length !== 1) {
        pending(target.symbol, 'UNLINKED_MERGER', [target.id]);
        continue;
      }
      candidates.push({ target, source: sources[0] });
    }

    const claims = new Map<string, number>();
    for (const { source } of candidates) {
      claims.set(source.id, (claims.get(source.id) ?? 0) + 1);
    }

    const links = new Map<string, MergerLink>();
    const dependsOn = new Map<string, Set<string>>();
    for (const link of candidates) {
      if ((claims.get(link.source.id) ?? 0) > 1) {
        pending(link.target.symbol, 'UNLINKED_MERGER', [link.target.id]);
        continue;
      }
      links.set(link.target.id, link);
      const deps = dependsOn.get(link.target.symbol) ?? new Set<string>();
      deps.add(link.source.symbol);
      dependsOn.set(link.target.symbol, deps);
    }

    const violations: LedgerViolation[] = [];
    const replayed = new Set<string>();
    const failed = new Set<string>();

    for (const symbol of replayOrder([...bySymbol.keys()], dependsOn)) {
      if (states.has(symbol)) continue;

      const blockers = [...(dependsOn.get(symbol) ?? [])].filter((dep) => !replayed.has(dep));
      if (blockers.length > 0) {
        if (blockers.every((dep) => !failed.has(dep))) {
          const waiting = [...links.values()].filter((link) => link.target.symbol === symbol).map((link) => link.target.id);
          pending(symbol, 'MERGER_SOURCE_PENDING', waiting);
        }
        continue;
      }

      const events = sortEvents((bySymbol.get(symbol) ?? []).map((row) => this.toLedgerEvent(row, links, ledger)));
      try {
        ledger.applyEvents(events);
        replayed.add(symbol);
        states.set(symbol, { symbol, status: 'REPLAYED', reasons: [], pendingTransactionIds: [] });
      } catch (error) {
        if (!(error instanceof LedgerInvariantError)) throw error;
        failed.add(symbol);
        violations.push({
          symbol: error.symbol,
          sequence: error.sequence,
          transactionId: error.transactionId,
          date: error.date,
          kind: error.kind,
          code: error.code,
          message: error.message,
        });
      }
    }

    if (violations.length > 0) {
      this.logger.error(`Ledger rebuild rejected: ${violations.map((v) => `${v.symbol}#${v.sequence} ${v.code}`).join(', ')}`);
      throw new ConflictException({
        statusCode: 409,
        error: 'Conflict',
        message: 'Ledger replay failed; no changes were saved',
        violations,
      });
    }

    const replayedSymbols = [...replayed].sort();
    this.storage.saveLedgerSnapshot({
      lots: new Map(replayedSymbols.map((symbol) => [symbol, ledger.lots(symbol)])),
      disposals: ledger.disposals(),
      holdings: replayedSymbols.flatMap((symbol) => ledger.holding(symbol) ?? []),
      symbolStates: [...states.values()],
    });

    return {
      symbolsRebuilt: replayedSymbols,
      awaitingPrice: [...states.values()]
        .filter((state) => state.status === 'AWAITING_PRICE')
        .map((state) => state.symbol)
        .sort(),
    };
  }

  /** Manual quote for one symbol. Valuation picks it up on the next read. */
  updateQuote(symbol: string, price: Money, asOf?: Date): Quote {
    return this.marketPriceService.updateQuote(symbol.trim().toUpperCase(), price, asOf);
  }

  /**
   * Syncs quotes from the provider, for the given symbols or else for every
   * symbol with shares held.
   */
  syncQuotes(symbols?: readonly string[]): Promise<QuoteSyncResult> {
    const targets =
      symbols && symbols.length > 0
        ? symbols
        : this.storage
            .getAllHoldings()
            .filter((holding) => holding.totalQuantity > 0)
            .map((holding) => holding.symbol);
    return this.quoteSyncService.syncQuotes(targets);
  }

  /** Nukes all state - test harness only */
  clearAll(): void {
    this.storage.clearAllData();
    this.marketPriceService.clearAllQuotes();
  }

  private classify(csv: string, rowOrder: RowOrder): ClassificationResult {
    try {
      return classifyExport(csv, { rowOrder });
    } catch (error) {
      if (error instanceof HeaderError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  private toLedgerEvent(row: StoredTransaction, links: Map<string, MergerLink>, ledger: LotLedger): LedgerEvent {
    const event: LedgerEvent = {
      symbol: row.symbol,
      date: row.date,
      kind: row.kind,
      quantity: row.quantity,
      unitPrice: row.unitPrice,
      fees: row.fees,
      sequence: row.sequence,
      memo: row.memo,
      details: row.details,
      transactionId: row.id,
    };

    const link = links.get(row.id);
    if (link) {
      const drawn = ledger.disposalsOf(link.source.symbol, link.source.sequence);
      event.unitPrice = mergerUnitCost(transferredCostBasis(drawn), row.quantity);
    }
    return event;
  }

  private resolvePriceEntry(entry: PriceEntry): StoredTransaction | Omit<BackfillError, 'index'> {
    if (!entry.unitPrice.isPositive()) {
      return { code: 'INVALID_PRICE', message: `Price must be positive, got ${entry.unitPrice.toMajorUnits()}` };
    }

    if (entry.transactionId !== undefined) {
      const row = this.storage.getTransaction(entry.transactionId);
      if (!row) {
        return { code: 'NOT_FOUND', message: `No transaction ${entry.transactionId}` };
      }
      if (!BACKFILLABLE_KINDS.has(row.kind)) {
        return { code: 'NOT_PRICEABLE', message: `${row.kind} rows do not take a price` };
      }
      return row;
    }

    const { symbol, date, quantity } = entry;
    if (symbol === undefined || date === undefined || quantity === undefined) {
      return { code: 'NOT_FOUND', message: 'Entry needs a transactionId or symbol, date and quantity' };
    }
    const candidates = this.storage
      .getAllTransactions()
      .filter(
        (row) =>
          row.symbol === symbol.toUpperCase() &&
          row.date === date &&
          row.quantity === quantity &&
          BACKFILLABLE_KINDS.has(row.kind),
      );
    const unpriced = candidates.filter((row) => !row.unitPrice);

    if (unpriced.length > 1) {
      return { code: 'AMBIGUOUS', message: `${unpriced.length} unpriced rows match ${symbol} ${date} ${quantity}` };
    }
    if (unpriced.length === 1) {
      return unpriced[0];
    }
    if (candidates.length > 0) {
      return candidates[0];
    }
    return { code: 'NOT_FOUND', message: `No priceable row matches ${symbol} ${date} ${quantity}` };
  }
}

function groupBySymbol(transactions: readonly StoredTransaction[]): Map<string, StoredTransaction[]> {
  const groups = new Map<string, StoredTransaction[]>();
  for (const transaction of transactions) {
    const group = groups.get(transaction.symbol) ?? [];
    group.push(transaction);
    groups.set(transaction.symbol, group);
  }
  return groups;
}

// Symbols sorted so merger sources come before their targets. Symbols caught
// in a cycle are appended last; their blockers are never replayed.
function replayOrder(symbols: string[], dependsOn: Map<string, Set<string>>): string[] {
  const remaining = new Set(symbols);
  const order: string[] = [];

  while (remaining.size > 0) {
    const ready = [...remaining]
      .filter((symbol) => [...(dependsOn.get(symbol) ?? [])].every((dep) => !remaining.has(dep)))
      .sort();
    if (ready.length === 0) {
      order.push(...[...remaining].sort());
      break;
    }
    for (const symbol of ready) {
      order.push(symbol);
      remaining.delete(symbol);
    }
  }
  return order;
}
