export class HeaderError extends Error {
  readonly code = 'INVALID_HEADER';

  constructor(message: string, readonly missing: string[] = []) {
    super(message);
    this.name = 'HeaderError';
  }
}

// Cell positions of the columns the classifier reads.
export interface ColumnMap {
  date: number;
  symbol: number;
  description: number;
  credit?: number;
  debit?: number;
  quantity?: number;     // signed: negative is a debit
  price?: number;
  fees?: number;
}

type ColumnKey = keyof ColumnMap;

// Header aliases, compared after lower-casing and collapsing whitespace.
// Depository history exports (S.N, Scrip, Credit/Debit Quantity, History
// Description) list the latest row first; import them with rowOrder
// 'newest-first' or IMPORT_ROW_ORDER=newest-first.
const COLUMN_ALIASES: Record<ColumnKey, readonly string[]> = {
  date: ['transaction date', 'date', 'trade date'],
  symbol: ['scrip', 'symbol', 'script', 'stock symbol'],
  description: ['history description', 'description', 'remarks', 'narration', 'transaction type'],
  credit: ['credit quantity', 'credit qty', 'credit'],
  debit: ['debit quantity', 'debit qty', 'debit'],
  quantity: ['quantity', 'units', 'qty'],
  price: ['rate', 'price', 'unit price'],
  fees: ['fees', 'fee', 'commission'],
};

function normalizeHeader(cell: string): string {
  return cell.trim().toLowerCase().replace(/\s+/g, ' ');
}

function findColumn(headers: readonly string[], aliases: readonly string[]): number | undefined {
  for (const alias of aliases) {
    const index = headers.indexOf(alias);
    if (index !== -1) {
      return index;
    }
  }
  return undefined;
}

/**
 * Maps an export header to cell positions. Matching is case-insensitive and
 * independent of column order; unknown columns are ignored.
 *
 * @throws HeaderError when the date, symbol or description column is missing,
 * or when neither a credit/debit pair nor a signed quantity column is present
 */
export function resolveColumns(header: readonly string[]): ColumnMap {
  const headers = header.map(normalizeHeader);
  const find = (key: ColumnKey): number | undefined => findColumn(headers, COLUMN_ALIASES[key]);

  const date = find('date');
  const symbol = find('symbol');
  const description = find('description');
  const credit = find('credit');
  const debit = find('debit');
  const quantity = find('quantity');

  const missing: string[] = [];
  if (date === undefined) missing.push('date');
  if (symbol === undefined) missing.push('symbol');
  if (description === undefined) missing.push('description');

  const hasPair = credit !== undefined && debit !== undefined;
  if (!hasPair && quantity === undefined) {
    missing.push('quantity');
  }

  if (date === undefined || symbol === undefined || description === undefined || missing.length > 0) {
    throw new HeaderError(`Export header is missing required columns: ${missing.join(', ')}`, missing);
  }

  return {
    date,
    symbol,
    description,
    credit: hasPair ? credit : undefined,
    debit: hasPair ? debit : undefined,
    quantity,
    price: find('price'),
    fees: find('fees'),
  };
}
