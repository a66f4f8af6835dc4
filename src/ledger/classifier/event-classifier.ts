import { InvalidMoneyError, Money } from '../../common/money/money';
import { EventKind, LedgerEvent, PRICED_KINDS } from '../entities/ledger-event.entity';
import { ColumnMap, HeaderError, resolveColumns } from './column-map';
import { readCsv } from './csv-reader';
import { parseExportDate } from './dates';
import { Direction, matchDescription, parseDescriptionDetails, statedDirection } from './description-rules';

export type RowErrorCode =
  | 'MALFORMED_DATE'
  | 'MISSING_SYMBOL'
  | 'AMBIGUOUS_QUANTITY'
  | 'INVALID_QUANTITY'
  | 'INVALID_PRICE'
  | 'UNSUPPORTED_DIRECTION'
  | 'DUPLICATE';

export interface RowError {
  rowNumber: number;
  code: RowErrorCode;
  message: string;
  record: string[];
}

export interface RowWarning {
  rowNumber: number;
  code: 'UNCLASSIFIED_DESCRIPTION';
  message: string;
  description: string;
}

// An event as read from one export row. Sequences follow replay order.
export interface ClassifiedEvent extends LedgerEvent {
  rowNumber: number;
  record: string[];
}

export type RowResult =
  | { status: 'ok'; event: Omit<ClassifiedEvent, 'sequence'>; warning?: RowWarning }
  | { status: 'error'; error: RowError };

export type RowOrder = 'oldest-first' | 'newest-first';

export interface ClassifyOptions {
  rowOrder?: RowOrder;
}

export interface ClassificationResult {
  events: ClassifiedEvent[];
  errors: RowError[];
  warnings: RowWarning[];
  totalRows: number;
}

type QuantityCell = { status: 'empty' } | { status: 'value'; value: number } | { status: 'invalid'; text: string };

function isBlank(text: string): boolean {
  return text === '' || text === '-';
}

// Exports write zero or "-" for the side of a row that did not move.
function readQuantity(cell: string | undefined): QuantityCell {
  const text = (cell ?? '').trim().replace(/,/g, '');
  if (isBlank(text)) {
    return { status: 'empty' };
  }
  if (!/^[+-]?\d+(\.\d+)?$/.test(text)) {
    return { status: 'invalid', text };
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    return { status: 'invalid', text };
  }
  return value === 0 ? { status: 'empty' } : { status: 'value', value };
}

function readMoney(cell: string | undefined): Money | undefined {
  const text = (cell ?? '').trim();
  if (isBlank(text)) {
    return undefined;
  }
  const amount = Money.fromMajorUnits(text);
  return amount.isZero() ? undefined : amount;
}

interface SignedQuantity {
  quantity: number;
  direction: Direction;
}

function resolveQuantity(
  record: readonly string[],
  columns: ColumnMap,
  description: string,
): SignedQuantity | { code: RowErrorCode; message: string } {
  const cells: Array<[Direction, QuantityCell]> = [];
  if (columns.credit !== undefined && columns.debit !== undefined) {
    cells.push(['credit', readQuantity(record[columns.credit])], ['debit', readQuantity(record[columns.debit])]);
  }

  for (const [, cell] of cells) {
    if (cell.status === 'invalid') {
      return { code: 'INVALID_QUANTITY', message: `Quantity "${cell.text}" is not a whole number` };
    }
    if (cell.status === 'value' && cell.value < 0) {
      return { code: 'INVALID_QUANTITY', message: `Credit and debit quantities must be positive, got ${cell.value}` };
    }
  }

  const populated = cells.filter(([, cell]) => cell.status === 'value');
  if (populated.length === 2) {
    return { code: 'AMBIGUOUS_QUANTITY', message: 'Both credit and debit quantities are populated' };
  }
  if (populated.length === 1) {
    const [direction, cell] = populated[0];
    if (cell.status === 'value') {
      return { quantity: cell.value, direction };
    }
  }

  if (columns.quantity !== undefined) {
    const cell = readQuantity(record[columns.quantity]);
    if (cell.status === 'invalid') {
      return { code: 'INVALID_QUANTITY', message: `Quantity "${cell.text}" is not a whole number` };
    }
    if (cell.status === 'value') {
      if (cell.value < 0) {
        return { quantity: -cell.value, direction: 'debit' };
      }
      return { quantity: cell.value, direction: statedDirection(description) ?? 'credit' };
    }
  }

  return { code: 'AMBIGUOUS_QUANTITY', message: 'Row has no non-zero quantity' };
}

/**
 * Turns one export row into an event, or explains why it cannot.
 *
 * Pure: the same row always yields the same result. `rowNumber` counts data
 * rows from 1 in file order.
 */
export function classifyRow(record: readonly string[], columns: ColumnMap, rowNumber: number): RowResult {
  const fail = (code: RowErrorCode, message: string): RowResult => ({
    status: 'error',
    error: { rowNumber, code, message, record: [...record] },
  });

  const rawDate = (record[columns.date] ?? '').trim();
  const date = parseExportDate(rawDate);
  if (!date) {
    return fail('MALFORMED_DATE', `Unrecognised date "${rawDate}"`);
  }

  const symbol = (record[columns.symbol] ?? '').trim().toUpperCase();
  if (symbol === '') {
    return fail('MISSING_SYMBOL', 'Symbol is empty');
  }

  const memo = (record[columns.description] ?? '').trim();
  const signed = resolveQuantity(record, columns, memo);
  if ('code' in signed) {
    return fail(signed.code, signed.message);
  }

  const { rule, matched } = matchDescription(memo);
  const kind = rule[signed.direction];
  if (!kind) {
    return fail('UNSUPPORTED_DIRECTION', `A ${signed.direction} is not valid for a ${rule.category} row`);
  }

  let unitPrice: Money | undefined;
  let fees: Money | undefined;
  try {
    unitPrice = PRICED_KINDS.has(kind) && columns.price !== undefined ? readMoney(record[columns.price]) : undefined;
    fees = kind === EventKind.SELL && columns.fees !== undefined ? readMoney(record[columns.fees]) : undefined;
  } catch (error) {
    if (error instanceof InvalidMoneyError) {
      return fail('INVALID_PRICE', error.message);
    }
    throw error;
  }
  if (unitPrice?.isNegative() || fees?.isNegative()) {
    return fail('INVALID_PRICE', 'Price and fees must not be negative');
  }

  const event: Omit<ClassifiedEvent, 'sequence'> = {
    symbol,
    date,
    kind,
    quantity: signed.quantity,
    memo,
    details: parseDescriptionDetails(memo, rule.category),
    rowNumber,
    record: [...record],
  };
  if (unitPrice) event.unitPrice = unitPrice;
  if (fees) event.fees = fees;

  if (matched) {
    return { status: 'ok', event };
  }
  return {
    status: 'ok',
    event,
    warning: {
      rowNumber,
      code: 'UNCLASSIFIED_DESCRIPTION',
      message: `Description not recognised; imported as ${kind}`,
      description: memo,
    },
  };
}

/**
 * Classifies a whole export. Row errors are collected, never thrown; only a
 * header the classifier cannot use fails the file.
 *
 * With `rowOrder: 'newest-first'` rows are read bottom-up, so sequences
 * still increase with time within a date.
 *
 * @throws HeaderError
 */
export function classifyExport(content: string, options: ClassifyOptions = {}): ClassificationResult {
  const [header, ...rows] = readCsv(content);
  if (!header) {
    throw new HeaderError('Export is empty');
  }
  const columns = resolveColumns(header);

  const numbered = rows.map((record, index) => ({ record, rowNumber: index + 1 }));
  if (options.rowOrder === 'newest-first') {
    numbered.reverse();
  }

  const result: ClassificationResult = { events: [], errors: [], warnings: [], totalRows: rows.length };
  for (const { record, rowNumber } of numbered) {
    const outcome = classifyRow(record, columns, rowNumber);
    if (outcome.status === 'error') {
      result.errors.push(outcome.error);
      continue;
    }
    result.events.push({ ...outcome.event, sequence: result.events.length + 1 });
    if (outcome.warning) {
      result.warnings.push(outcome.warning);
    }
  }

  result.errors.sort((a, b) => a.rowNumber - b.rowNumber);
  result.warnings.sort((a, b) => a.rowNumber - b.rowNumber);
  return result;
}

/** Whether the event's kind needs a cash price before it can be replayed. */
export function requiresPrice(event: Pick<LedgerEvent, 'kind'>): boolean {
  return PRICED_KINDS.has(event.kind);
}

/** A priced kind still waiting for its price. */
export function awaitingPrice(event: Pick<LedgerEvent, 'kind' | 'unitPrice'>): boolean {
  return requiresPrice(event) && !event.unitPrice;
}
