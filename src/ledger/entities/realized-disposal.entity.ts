import { Money } from '../../common/money/money';
import { EventKind, IsoDate } from './ledger-event.entity';

// One draw of a disposal event against one lot.
// Non-cash reductions (merger out, demat) carry proceeds = costBasis and zero gain.
export interface RealizedDisposal {
  id: string;
  symbol: string;
  eventSequence: number;
  eventKind: EventKind;
  transactionId?: string;
  disposalDate: IsoDate;
  lotId: string;
  lotOpenedDate: IsoDate;
  quantity: number;
  unitCost: Money;
  unitProceeds?: Money;   // absent for non-cash reductions
  proceeds: Money;        // net of fees
  fees: Money;
  costBasis: Money;       // quantity × unitCost
  gain: Money;            // proceeds − costBasis
  holdingDays: number;
  longTerm: boolean;
}
