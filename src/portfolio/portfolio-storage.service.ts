import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Holding } from '../ledger/entities/holding.entity';
import { EventKind, IsoDate } from '../ledger/entities/ledger-event.entity';
import { Lot } from '../ledger/entities/lot.entity';
import { RealizedDisposal } from '../ledger/entities/realized-disposal.entity';
import { Money } from '../common/money/money';
import { NewTransaction, StoredTransaction } from './entities/stored-transaction.entity';
import { SymbolState } from './entities/symbol-state.entity';

// Derived ledger state written by one rebuild.
export interface LedgerSnapshot {
  lots: Map<string, Lot[]>;
  disposals: RealizedDisposal[];
  holdings: Holding[];              // every replayed symbol, closed ones included
  symbolStates: SymbolState[];
}

interface StoreState {
  transactions: StoredTransaction[];
  duplicateIndex: Map<string, StoredTransaction>;
  nextSequence: number;
  lots: Map<string, Lot[]>;
  disposals: RealizedDisposal[];
  holdings: Map<string, Holding>;
  symbolStates: Map<string, SymbolState>;
  lastRebuild?: Date;
}

/** Key under which re-imported rows are recognised. */
export function duplicateKey(row: {
  symbol: string;
  date: IsoDate;
  kind: EventKind;
  memo: string;
  quantity: number;
}): string {
  return [row.symbol, row.date, row.kind, row.memo, row.quantity].join('|');
}

// In-memory storage with O(1) lookups.
// Transactions are the source of truth; lots, disposals and holdings are
// replaced wholesale by each rebuild.
@Injectable()
export class PortfolioStorageService {
  private state: StoreState = PortfolioStorageService.emptyState();

  private static emptyState(): StoreState {
    return {
      transactions: [],
      duplicateIndex: new Map(),
      nextSequence: 1,
      lots: new Map(),
      disposals: [],
      holdings: new Map(),
      symbolStates: new Map(),
    };
  }

  /**
   * Runs `work` against the store. If it throws, every change it made is
   * discarded and the error is rethrown.
   */
  runInTransaction<T>(work: () => T): T {
    const snapshot = this.copyState();
    try {
      return work();
    } catch (error) {
      this.state = snapshot;
      throw error;
    }
  }

  /** Persists an imported row, assigning id and sequence */
  saveTransaction(input: NewTransaction): StoredTransaction {
    const transaction: StoredTransaction = {
      ...input,
      id: uuidv4(),
      sequence: this.state.nextSequence++,
      createdAt: new Date(),
    };
    this.state.transactions.push(transaction);
    this.state.duplicateIndex.set(duplicateKey(transaction), transaction);
    return transaction;
  }

  findDuplicate(key: string): StoredTransaction | undefined {
    return this.state.duplicateIndex.get(key);
  }

  getTransaction(id: string): StoredTransaction | undefined {
    return this.state.transactions.find((transaction) => transaction.id === id);
  }

  /** Copy of every stored transaction in storage order */
  getAllTransactions(): StoredTransaction[] {
    return [...this.state.transactions];
  }

  getTransactionCount(): number {
    return this.state.transactions.length;
  }

  /** Replaces the row rather than mutating it, so snapshots stay intact */
  updateTransactionPrice(id: string, unitPrice: Money, fees?: Money): StoredTransaction | undefined {
    const index = this.state.transactions.findIndex((transaction) => transaction.id === id);
    if (index === -1) {
      return undefined;
    }

    const updated: StoredTransaction = {
      ...this.state.transactions[index],
      unitPrice,
      priceUpdatedAt: new Date(),
    };
    if (fees) {
      updated.fees = fees;
    }
    this.state.transactions[index] = updated;
    this.state.duplicateIndex.set(duplicateKey(updated), updated);
    return updated;
  }

  saveLedgerSnapshot(snapshot: LedgerSnapshot): void {
    this.state.lots = new Map(snapshot.lots);
    this.state.disposals = [...snapshot.disposals];
    this.state.holdings = new Map(snapshot.holdings.map((holding) => [holding.symbol, holding]));
    this.state.symbolStates = new Map(snapshot.symbolStates.map((state) => [state.symbol, state]));
    this.state.lastRebuild = new Date();
  }

  getLots(symbol: string): Lot[] {
    return [...(this.state.lots.get(symbol) ?? [])];
  }

  getDisposals(symbol?: string): RealizedDisposal[] {
    if (symbol !== undefined) {
      return this.state.disposals.filter((disposal) => disposal.symbol === symbol);
    }
    return [...this.state.disposals];
  }

  getHolding(symbol: string): Holding | undefined {
    return this.state.holdings.get(symbol);
  }

  /** Holdings of every replayed symbol, by symbol, closed ones included */
  getAllHoldings(): Holding[] {
    return Array.from(this.state.holdings.values()).sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  getSymbolState(symbol: string): SymbolState | undefined {
    return this.state.symbolStates.get(symbol);
  }

  getAllSymbolStates(): SymbolState[] {
    return Array.from(this.state.symbolStates.values()).sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  getLastRebuildTime(): Date | undefined {
    return this.state.lastRebuild;
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.state = PortfolioStorageService.emptyState();
  }

  private copyState(): StoreState {
    return {
      ...this.state,
      transactions: [...this.state.transactions],
      duplicateIndex: new Map(this.state.duplicateIndex),
      lots: new Map(this.state.lots),
      disposals: [...this.state.disposals],
      holdings: new Map(this.state.holdings),
      symbolStates: new Map(this.state.symbolStates),
    };
  }
}
