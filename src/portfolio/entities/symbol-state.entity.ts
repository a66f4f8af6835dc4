// Outcome of the last rebuild for one symbol.
export type SymbolStatus = 'REPLAYED' | 'AWAITING_PRICE';

export type PendingReason = 'UNPRICED_ROWS' | 'UNLINKED_MERGER' | 'MERGER_SOURCE_PENDING';

export interface SymbolState {
  symbol: string;
  status: SymbolStatus;
  reasons: PendingReason[];
  pendingTransactionIds: string[];   // rows a price would unblock
}
