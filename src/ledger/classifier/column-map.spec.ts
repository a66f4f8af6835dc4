import { HeaderError, resolveColumns } from './column-map';

describe('resolveColumns', () => {
  it('should map a broker history header', () => {
    const columns = resolveColumns([
      'S.N',
      'Scrip',
      'Transaction Date',
      'Credit Quantity',
      'Debit Quantity',
      'Balance After Transaction',
      'History Description',
    ]);

    expect(columns).toEqual({
      date: 2,
      symbol: 1,
      description: 6,
      credit: 3,
      debit: 4,
      quantity: undefined,
      price: undefined,
      fees: undefined,
    });
  });

  it('should match case-insensitively and in any order', () => {
    const columns = resolveColumns(['  RATE ', 'units', 'SYMBOL', 'Transaction   Type', 'DATE']);

    expect(columns.date).toBe(4);
    expect(columns.symbol).toBe(2);
    expect(columns.description).toBe(3);
    expect(columns.quantity).toBe(1);
    expect(columns.price).toBe(0);
    expect(columns.credit).toBeUndefined();
  });

  it('should prefer the more specific alias when both are present', () => {
    const columns = resolveColumns(['Date', 'Transaction Date', 'Symbol', 'Description', 'Quantity']);
    expect(columns.date).toBe(1);
  });

  it('should list every missing column', () => {
    let caught: unknown;
    try {
      resolveColumns(['Scrip', 'Notes']);
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof HeaderError)) {
      throw new Error('expected HeaderError');
    }
    expect(caught.missing).toEqual(['date', 'description', 'quantity']);
    expect(caught.message).toBe('Export header is missing required columns: date, description, quantity');
  });

  it('should require both halves of a credit/debit pair', () => {
    expect(() => resolveColumns(['Date', 'Scrip', 'Description', 'Credit Quantity'])).toThrow(HeaderError);
  });
});
