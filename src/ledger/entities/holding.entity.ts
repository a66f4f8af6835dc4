import { Money } from '../../common/money/money';

// Aggregate of one symbol's remaining lots. Derived, never stored on its own.
export interface Holding {
  symbol: string;
  totalQuantity: number;
  totalCost: Money;
  averageCost: Money;     // totalCost / totalQuantity, rounded half away from zero
  realizedPnL: Money;     // sum of disposal gains
  openLots: number;
}
