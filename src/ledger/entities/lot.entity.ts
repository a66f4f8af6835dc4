import { Money } from '../../common/money/money';
import { EventKind, IsoDate } from './ledger-event.entity';

// A batch of shares of one symbol acquired at one cost basis.
// Drained to zero by disposals, never removed.
export interface Lot {
  id: string;                 // `${symbol}#${sequence}`
  symbol: string;
  openedQuantity: number;
  remainingQuantity: number;  // 0 <= remaining <= opened
  unitCost: Money;            // 0 for bonus/rights/rearrangement lots
  openedDate: IsoDate;        // FIFO key, with sequence
  sequence: number;
  sourceKind: EventKind;
}
