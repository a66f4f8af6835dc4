import { Money } from '../common/money/money';
import { EventKind, IsoDate, LedgerEvent } from './entities/ledger-event.entity';
import { RealizedDisposal } from './entities/realized-disposal.entity';

// Share-count-increasing actions that bring no new cash.
export const NON_CASH_ACQUISITIONS: ReadonlySet<EventKind> = new Set([
  EventKind.BONUS,
  EventKind.RIGHTS,
  EventKind.REARRANGEMENT,
]);

export interface LotTerms {
  unitCost: Money;
  openedDate: IsoDate;
}

/**
 * Terms of the lot opened by a bonus, rights or rearrangement event.
 *
 * The lot carries zero unit cost, so the holding's total cost basis is
 * unchanged while its share count rises and its average cost falls. Once
 * opened it is an ordinary lot for FIFO purposes.
 *
 * A rearrangement keeps the original purchase date from its memo, when the
 * broker supplies one, so FIFO order follows the original acquisition.
 */
export function corporateActionLotTerms(event: LedgerEvent): LotTerms {
  if (!NON_CASH_ACQUISITIONS.has(event.kind)) {
    throw new Error(`${event.kind} is not a non-cash corporate action`);
  }
  const purchaseDate = event.kind === EventKind.REARRANGEMENT ? event.details.purchaseDate : undefined;
  return {
    unitCost: Money.ZERO,
    openedDate: purchaseDate ?? event.date,
  };
}

/** Cost basis that left a symbol through the disposals of one merger-out event. */
export function transferredCostBasis(disposals: readonly RealizedDisposal[]): Money {
  return Money.sum(disposals.map((disposal) => disposal.costBasis));
}

/**
 * Unit cost for the lot a merger-in opens: the replaced symbol's cost basis
 * spread over the new share count.
 */
export function mergerUnitCost(transferredCost: Money, quantity: number): Money {
  if (quantity <= 0) {
    throw new Error(`Merger quantity must be positive, got ${quantity}`);
  }
  return transferredCost.divide(quantity);
}
