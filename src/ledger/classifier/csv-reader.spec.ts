import { readCsv } from './csv-reader';

describe('readCsv', () => {
  it('should split rows and cells', () => {
    expect(readCsv('a,b,c\n1,2,3')).toEqual([
      ['a', 'b', 'c'],
      ['1', '2', '3'],
    ]);
  });

  it('should accept CRLF line endings and a trailing newline', () => {
    expect(readCsv('a,b\r\n1,2\r\n')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('should keep commas, newlines and escaped quotes inside quoted fields', () => {
    expect(readCsv('name,memo\n"NABIL","CA-Bonus, ""B-10%""\nCREDIT"')).toEqual([
      ['name', 'memo'],
      ['NABIL', 'CA-Bonus, "B-10%"\nCREDIT'],
    ]);
  });

  it('should strip a byte-order mark', () => {
    expect(readCsv('\ufeffScrip,Date\nNABIL,2024-01-01')[0]).toEqual(['Scrip', 'Date']);
  });

  it('should drop blank and whitespace-only rows', () => {
    expect(readCsv('a,b\n\n1,2\n , \n3,4')).toEqual([
      ['a', 'b'],
      ['1', '2'],
      ['3', '4'],
    ]);
  });

  it('should return nothing for empty input', () => {
    expect(readCsv('')).toEqual([]);
  });
});
