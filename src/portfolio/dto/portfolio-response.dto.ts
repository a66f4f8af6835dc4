import { Money } from '../../common/money/money';
import { RowError, RowWarning } from '../../ledger/classifier/event-classifier';
import { Holding } from '../../ledger/entities/holding.entity';
import { EventKind, IsoDate } from '../../ledger/entities/ledger-event.entity';
import { LedgerErrorCode } from '../../ledger/errors/ledger.errors';
import { Quote } from '../../market-price/quote.interface';
import { HoldingValuation } from '../../valuation/valuation';
import { PendingReason } from '../entities/symbol-state.entity';
import { StoredTransaction } from '../entities/stored-transaction.entity';

// Money fields serialize as major-unit strings ("1234.50") through Money.toJSON.

// Outcome of one ledger rebuild
export interface RebuildResult {
  symbolsRebuilt: string[];
  awaitingPrice: string[];         // symbols left out until prices arrive
}

// One ledger invariant broken during replay
export interface LedgerViolation {
  symbol: string;
  sequence: number;
  transactionId?: string;
  date: IsoDate;
  kind: EventKind;
  code: LedgerErrorCode;
  message: string;
}

export interface ImportResult extends RebuildResult {
  importId: string;
  totalRows: number;               // data rows in the file
  imported: number;
  skipped: number;                 // rows with an error, duplicates included
  errors: RowError[];
  warnings: RowWarning[];
}

export type BackfillErrorCode = 'NOT_FOUND' | 'AMBIGUOUS' | 'NOT_PRICEABLE' | 'FEES_NOT_APPLICABLE' | 'INVALID_PRICE';

export interface BackfillError {
  index: number;                   // position of the entry in the request
  code: BackfillErrorCode;
  message: string;
}

export interface BackfillResult extends RebuildResult {
  updated: string[];               // transaction ids priced by this call
  alreadyPriced: string[];         // left untouched
  errors: BackfillError[];
}

export interface HoldingsResponse<T extends Holding = HoldingValuation> {
  holdings: T[];
  lastRebuild?: Date;
}

export interface TransactionPage {
  items: StoredTransaction[];
  total: number;                   // matches before pagination
  limit: number;
  offset: number;
}

// A stored row the ledger cannot replay yet
export interface PendingPriceRow {
  transactionId: string;
  symbol: string;
  date: IsoDate;
  kind: EventKind;
  quantity: number;
  memo: string;
  reasons: PendingReason[];        // why its symbol is held back
}

export interface QuotesResponse {
  quotes: Quote[];
  lastUpdated?: Date;
  providerConfigured: boolean;
}

export interface QuoteUpdateResponse {
  message: string;
  symbol: string;
  price: Money;
}
