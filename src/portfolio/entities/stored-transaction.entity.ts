import { LedgerEvent } from '../../ledger/entities/ledger-event.entity';

// Persisted form of one imported event.
// sequence is assigned by storage and increases across imports.
export interface StoredTransaction extends Omit<LedgerEvent, 'transactionId'> {
  id: string;
  importId: string;
  rowNumber: number;         // data row within its export
  createdAt: Date;
  priceUpdatedAt?: Date;     // set when a price is backfilled
}

export type NewTransaction = Omit<StoredTransaction, 'id' | 'sequence' | 'createdAt'>;
