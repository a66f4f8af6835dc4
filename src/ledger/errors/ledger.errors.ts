import { EventKind, IsoDate } from '../entities/ledger-event.entity';

export type LedgerErrorCode =
  | 'INSUFFICIENT_SHARES'
  | 'UNORDERED_EVENTS'
  | 'MISSING_COST_INPUT'
  | 'FOREIGN_SYMBOL';

interface EventRef {
  symbol: string;
  sequence: number;
  date: IsoDate;
  kind: EventKind;
  transactionId?: string;
}

/**
 * Base for ledger invariant violations. These abort the replay of the symbol
 * that raised them and are reported apart from row-level parse errors.
 */
export abstract class LedgerInvariantError extends Error {
  abstract readonly code: LedgerErrorCode;
  readonly symbol: string;
  readonly sequence: number;
  readonly date: IsoDate;
  readonly kind: EventKind;
  readonly transactionId?: string;

  protected constructor(event: EventRef, message: string) {
    super(message);
    this.name = new.target.name;
    this.symbol = event.symbol;
    this.sequence = event.sequence;
    this.date = event.date;
    this.kind = event.kind;
    this.transactionId = event.transactionId;
  }
}

export class InsufficientSharesError extends LedgerInvariantError {
  readonly code = 'INSUFFICIENT_SHARES';

  constructor(event: EventRef & { quantity: number }, readonly available: number) {
    super(
      event,
      `Insufficient shares for ${event.symbol}: ${event.kind} of ${event.quantity} on ${event.date} ` +
        `(sequence ${event.sequence}) but only ${available} held`,
    );
  }
}

export class UnorderedEventsError extends LedgerInvariantError {
  readonly code = 'UNORDERED_EVENTS';

  constructor(event: EventRef, previous: { date: IsoDate; sequence: number }) {
    super(
      event,
      `Events for ${event.symbol} are not in (date, sequence) order: ` +
        `${event.date}#${event.sequence} follows ${previous.date}#${previous.sequence}`,
    );
  }
}

export class MissingCostInputError extends LedgerInvariantError {
  readonly code = 'MISSING_COST_INPUT';

  constructor(event: EventRef) {
    super(event, `${event.kind} for ${event.symbol} on ${event.date} (sequence ${event.sequence}) has no unit price`);
  }
}

export class ForeignSymbolError extends LedgerInvariantError {
  readonly code = 'FOREIGN_SYMBOL';

  constructor(event: EventRef, expected: string) {
    super(event, `Event for ${event.symbol} cannot be applied to the ${expected} lot queue`);
  }
}
