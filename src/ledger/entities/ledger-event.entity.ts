import { Money } from '../../common/money/money';

/** Calendar date, `YYYY-MM-DD`. Lexical order equals chronological order. */
export type IsoDate = string;

export enum EventKind {
  BUY = 'BUY',
  SELL = 'SELL',
  BONUS = 'BONUS',
  RIGHTS = 'RIGHTS',
  MERGER_IN = 'MERGER_IN',
  MERGER_OUT = 'MERGER_OUT',
  DEMAT = 'DEMAT',
  REARRANGEMENT = 'REARRANGEMENT',
  IPO = 'IPO',
}

// Kinds that drain lots FIFO.
export const REDUCTION_KINDS: ReadonlySet<EventKind> = new Set([
  EventKind.SELL,
  EventKind.MERGER_OUT,
  EventKind.DEMAT,
]);

// Kinds whose rows carry a cash price once backfilled.
export const PRICED_KINDS: ReadonlySet<EventKind> = new Set([
  EventKind.BUY,
  EventKind.SELL,
  EventKind.IPO,
]);

// Fields parsed out of the broker's free-text description.
export interface EventDetails {
  referenceId?: string;
  tradeId?: string;
  transactionId?: string;
  settlementCode?: string;
  bonusRate?: string;
  rightsRate?: string;
  purchaseDate?: IsoDate;
  dematId?: string;
}

// One normalized economic event for one symbol.
// quantity is always a positive share count; direction comes from kind.
export interface LedgerEvent {
  symbol: string;
  date: IsoDate;
  kind: EventKind;
  quantity: number;
  unitPrice?: Money;       // BUY/SELL/IPO cash price, or MERGER_IN transferred cost
  fees?: Money;            // SELL only, pro-rated across drawn lots
  sequence: number;        // tie-breaker within a date
  memo: string;
  details: EventDetails;
  transactionId?: string;  // stored row this event was replayed from
}

export function isReduction(kind: EventKind): boolean {
  return REDUCTION_KINDS.has(kind);
}

/** Signed share delta of an event, for conservation checks. */
export function shareDelta(event: Pick<LedgerEvent, 'kind' | 'quantity'>): number {
  return isReduction(event.kind) ? -event.quantity : event.quantity;
}

/** (date, sequence) ordering used for replay. */
export function compareEvents(
  a: Pick<LedgerEvent, 'date' | 'sequence'>,
  b: Pick<LedgerEvent, 'date' | 'sequence'>,
): number {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  return a.sequence - b.sequence;
}

export function sortEvents<T extends Pick<LedgerEvent, 'date' | 'sequence'>>(events: readonly T[]): T[] {
  return [...events].sort(compareEvents);
}
