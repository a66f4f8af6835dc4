import { differenceInCalendarDays, parseISO } from 'date-fns';
import { Money } from '../common/money/money';
import { corporateActionLotTerms } from './corporate-actions';
import { Holding } from './entities/holding.entity';
import { compareEvents, EventKind, IsoDate, LedgerEvent, shareDelta } from './entities/ledger-event.entity';
import { Lot } from './entities/lot.entity';
import { RealizedDisposal } from './entities/realized-disposal.entity';
import {
  ForeignSymbolError,
  InsufficientSharesError,
  MissingCostInputError,
  UnorderedEventsError,
} from './errors/ledger.errors';

export interface LedgerOptions {
  longTermHoldingDays: number;
}

export const DEFAULT_LEDGER_OPTIONS: LedgerOptions = {
  longTermHoldingDays: 365,
};

type Position = { date: IsoDate; sequence: number };

function compareLots(a: Lot, b: Lot): number {
  if (a.openedDate !== b.openedDate) {
    return a.openedDate < b.openedDate ? -1 : 1;
  }
  return a.sequence - b.sequence;
}

// The FIFO lot queue of a single symbol.
export class SymbolLedger {
  private readonly queue: Lot[] = [];          // (openedDate, sequence), oldest first
  private readonly disposalLog: RealizedDisposal[] = [];
  private last?: Position;
  private shares = 0;                          // net shares of applied events

  constructor(
    readonly symbol: string,
    private readonly options: LedgerOptions = DEFAULT_LEDGER_OPTIONS,
  ) {}

  /** Throws if the event may not be applied next. Does not change state. */
  assertApplicable(event: LedgerEvent, after: Position | undefined = this.last): void {
    if (event.symbol !== this.symbol) {
      throw new ForeignSymbolError(event, this.symbol);
    }
    if (!Number.isSafeInteger(event.quantity) || event.quantity <= 0) {
      throw new RangeError(`Quantity must be a positive whole number, got ${event.quantity}`);
    }
    if (after && compareEvents(event, after) <= 0) {
      throw new UnorderedEventsError(event, after);
    }
  }

  /**
   * Applies one event. Either the whole event takes effect or, when it
   * throws, the queue is left exactly as it was.
   *
   * @returns the disposals the event produced (empty for acquisitions)
   */
  apply(event: LedgerEvent): RealizedDisposal[] {
    this.assertApplicable(event);

    let emitted: RealizedDisposal[] = [];
    switch (event.kind) {
      case EventKind.BUY:
      case EventKind.IPO:
      case EventKind.MERGER_IN:
        this.open(event, this.requirePrice(event), event.date);
        break;
      case EventKind.BONUS:
      case EventKind.RIGHTS:
      case EventKind.REARRANGEMENT: {
        const terms = corporateActionLotTerms(event);
        this.open(event, terms.unitCost, terms.openedDate);
        break;
      }
      case EventKind.SELL:
        emitted = this.drain(event, this.requirePrice(event));
        break;
      case EventKind.MERGER_OUT:
      case EventKind.DEMAT:
        emitted = this.drain(event);
        break;
    }

    this.shares += shareDelta(event);
    this.last = { date: event.date, sequence: event.sequence };
    return emitted;
  }

  lastApplied(): Position | undefined {
    return this.last;
  }

  netShares(): number {
    return this.shares;
  }

  /** Copies of every lot, drained ones included. */
  lots(): Lot[] {
    return this.queue.map((lot) => ({ ...lot }));
  }

  openLots(): Lot[] {
    return this.lots().filter((lot) => lot.remainingQuantity > 0);
  }

  disposals(): RealizedDisposal[] {
    return [...this.disposalLog];
  }

  holding(): Holding {
    const open = this.queue.filter((lot) => lot.remainingQuantity > 0);
    const totalQuantity = open.reduce((sum, lot) => sum + lot.remainingQuantity, 0);
    const totalCost = Money.sum(open.map((lot) => lot.unitCost.multiply(lot.remainingQuantity)));

    return {
      symbol: this.symbol,
      totalQuantity,
      totalCost,
      averageCost: totalQuantity > 0 ? totalCost.divide(totalQuantity) : Money.ZERO,
      realizedPnL: Money.sum(this.disposalLog.map((disposal) => disposal.gain)),
      openLots: open.length,
    };
  }

  private requirePrice(event: LedgerEvent): Money {
    if (!event.unitPrice) {
      throw new MissingCostInputError(event);
    }
    return event.unitPrice;
  }

  private open(event: LedgerEvent, unitCost: Money, openedDate: IsoDate): void {
    const lot: Lot = {
      id: `${event.symbol}#${event.sequence}`,
      symbol: event.symbol,
      openedQuantity: event.quantity,
      remainingQuantity: event.quantity,
      unitCost,
      openedDate,
      sequence: event.sequence,
      sourceKind: event.kind,
    };

    // Appends in the common case; a rearrangement carrying an older purchase
    // date lands in its FIFO position instead.
    const index = this.queue.findIndex((existing) => compareLots(lot, existing) < 0);
    if (index === -1) {
      this.queue.push(lot);
    } else {
      this.queue.splice(index, 0, lot);
    }
  }

  // Consumes lots oldest first. Availability is checked before any lot is
  // touched so a rejected event leaves the queue unchanged.
  private drain(event: LedgerEvent, unitProceeds?: Money): RealizedDisposal[] {
    const available = this.queue.reduce((sum, lot) => sum + lot.remainingQuantity, 0);
    if (available < event.quantity) {
      throw new InsufficientSharesError(event, available);
    }

    const fees = unitProceeds ? (event.fees ?? Money.ZERO) : Money.ZERO;
    const emitted: RealizedDisposal[] = [];
    let remaining = event.quantity;
    let taken = 0;
    let feesAllocated = Money.ZERO;

    for (const lot of this.queue) {
      if (remaining === 0) break;
      if (lot.remainingQuantity === 0) continue;

      const quantity = Math.min(remaining, lot.remainingQuantity);
      taken += quantity;

      // cumulative allocation keeps the shares summing exactly to the fee
      const feeShare = fees.multiply(taken).divide(event.quantity).subtract(feesAllocated);
      feesAllocated = feesAllocated.add(feeShare);

      const costBasis = lot.unitCost.multiply(quantity);
      const proceeds = unitProceeds ? unitProceeds.multiply(quantity).subtract(feeShare) : costBasis;
      const holdingDays = differenceInCalendarDays(parseISO(event.date), parseISO(lot.openedDate));

      emitted.push({
        id: `${event.sequence}:${lot.id}`,
        symbol: this.symbol,
        eventSequence: event.sequence,
        eventKind: event.kind,
        transactionId: event.transactionId,
        disposalDate: event.date,
        lotId: lot.id,
        lotOpenedDate: lot.openedDate,
        quantity,
        unitCost: lot.unitCost,
        unitProceeds,
        proceeds,
        fees: feeShare,
        costBasis,
        gain: proceeds.subtract(costBasis),
        holdingDays,
        longTerm: holdingDays > this.options.longTermHoldingDays,
      });

      lot.remainingQuantity -= quantity;
      remaining -= quantity;
    }

    this.disposalLog.push(...emitted);
    return emitted;
  }
}

/**
 * Lot queues for every symbol touched by one replay run.
 *
 * Constructed per run and handed to callers; each event reaches only its own
 * symbol's queue.
 */
export class LotLedger {
  private readonly books = new Map<string, SymbolLedger>();

  constructor(private readonly options: LedgerOptions = DEFAULT_LEDGER_OPTIONS) {}

  /**
   * Applies a batch of events.
   *
   * Precondition: for each symbol the events are in (date, sequence) order
   * and come after whatever that symbol has already applied. The whole batch
   * is checked before the first event is applied; see `sortEvents`.
   */
  applyEvents(events: readonly LedgerEvent[]): RealizedDisposal[] {
    const cursor = new Map<string, Position>();
    for (const event of events) {
      const after = cursor.get(event.symbol) ?? this.books.get(event.symbol)?.lastApplied();
      if (after && compareEvents(event, after) <= 0) {
        throw new UnorderedEventsError(event, after);
      }
      cursor.set(event.symbol, { date: event.date, sequence: event.sequence });
    }

    return events.flatMap((event) => this.book(event.symbol).apply(event));
  }

  apply(event: LedgerEvent): RealizedDisposal[] {
    return this.book(event.symbol).apply(event);
  }

  symbols(): string[] {
    return [...this.books.keys()].sort();
  }

  holding(symbol: string): Holding | undefined {
    return this.books.get(symbol)?.holding();
  }

  /** Holdings with shares remaining, by symbol. */
  holdings(): Holding[] {
    return this.symbols()
      .map((symbol) => this.book(symbol).holding())
      .filter((holding) => holding.totalQuantity > 0);
  }

  lots(symbol: string): Lot[] {
    return this.books.get(symbol)?.lots() ?? [];
  }

  disposals(symbol?: string): RealizedDisposal[] {
    if (symbol !== undefined) {
      return this.books.get(symbol)?.disposals() ?? [];
    }
    return this.symbols().flatMap((s) => this.book(s).disposals());
  }

  disposalsOf(symbol: string, eventSequence: number): RealizedDisposal[] {
    return this.disposals(symbol).filter((disposal) => disposal.eventSequence === eventSequence);
  }

  netShares(symbol: string): number {
    return this.books.get(symbol)?.netShares() ?? 0;
  }

  private book(symbol: string): SymbolLedger {
    let book = this.books.get(symbol);
    if (!book) {
      book = new SymbolLedger(symbol, this.options);
      this.books.set(symbol, book);
    }
    return book;
  }
}
