import { Money } from '../common/money/money';
import { corporateActionLotTerms, mergerUnitCost, transferredCostBasis } from './corporate-actions';
import { EventKind, LedgerEvent } from './entities/ledger-event.entity';
import { LotLedger } from './lot-ledger';

describe('corporate actions', () => {
  const createTestEvent = (overrides: Partial<LedgerEvent> = {}): LedgerEvent => ({
    symbol: 'NABIL',
    date: '2024-05-01',
    kind: EventKind.BONUS,
    quantity: 10,
    sequence: 1,
    memo: '',
    details: {},
    ...overrides,
  });

  describe('corporateActionLotTerms', () => {
    it('should open bonus and rights lots at zero cost on the event date', () => {
      for (const kind of [EventKind.BONUS, EventKind.RIGHTS]) {
        const terms = corporateActionLotTerms(createTestEvent({ kind }));
        expect(terms.unitCost.isZero()).toBe(true);
        expect(terms.openedDate).toBe('2024-05-01');
      }
    });

    it('should date a rearrangement lot by its original purchase date', () => {
      const terms = corporateActionLotTerms(
        createTestEvent({ kind: EventKind.REARRANGEMENT, details: { purchaseDate: '2021-09-30' } }),
      );
      expect(terms.openedDate).toBe('2021-09-30');
    });

    it('should fall back to the event date when no purchase date was given', () => {
      const terms = corporateActionLotTerms(createTestEvent({ kind: EventKind.REARRANGEMENT }));
      expect(terms.openedDate).toBe('2024-05-01');
    });

    it('should ignore a purchase date on bonus rows', () => {
      const terms = corporateActionLotTerms(createTestEvent({ details: { purchaseDate: '2021-09-30' } }));
      expect(terms.openedDate).toBe('2024-05-01');
    });

    it('should reject cash events', () => {
      expect(() => corporateActionLotTerms(createTestEvent({ kind: EventKind.BUY }))).toThrow(
        'BUY is not a non-cash corporate action',
      );
    });
  });

  describe('merger cost transfer', () => {
    it('should carry the drawn cost basis into the new symbol', () => {
      const ledger = new LotLedger();
      ledger.applyEvents([
        createTestEvent({ kind: EventKind.BUY, quantity: 100, unitPrice: Money.fromMajorUnits('200'), date: '2024-01-01', sequence: 1 }),
        createTestEvent({ kind: EventKind.BUY, quantity: 50, unitPrice: Money.fromMajorUnits('260'), date: '2024-02-01', sequence: 2 }),
      ]);
      const drawn = ledger.apply(
        createTestEvent({ kind: EventKind.MERGER_OUT, quantity: 150, date: '2024-06-01', sequence: 3 }),
      );

      const transferred = transferredCostBasis(drawn);
      expect(transferred.toMajorUnits()).toBe('33000.00');

      // 150 old shares swapped for 120 new ones
      const unitCost = mergerUnitCost(transferred, 120);
      expect(unitCost.toMajorUnits()).toBe('275.00');

      ledger.apply(
        createTestEvent({
          symbol: 'NEWCO',
          kind: EventKind.MERGER_IN,
          quantity: 120,
          unitPrice: unitCost,
          date: '2024-06-01',
          sequence: 4,
        }),
      );
      expect(ledger.holding('NEWCO')?.totalCost.toMajorUnits()).toBe('33000.00');
      expect(ledger.holding('NABIL')?.realizedPnL.isZero()).toBe(true);
    });

    it('should round a non-terminating unit cost half away from zero', () => {
      expect(mergerUnitCost(Money.fromMinorUnits(1000), 3).toMinorUnits()).toBe(333);
      expect(mergerUnitCost(Money.fromMinorUnits(1000), 6).toMinorUnits()).toBe(167);
    });

    it('should reject a non-positive share count', () => {
      expect(() => mergerUnitCost(Money.fromMinorUnits(1000), 0)).toThrow('Merger quantity must be positive, got 0');
    });
  });
});
