import { format, isValid, parse } from 'date-fns';
import { IsoDate } from '../entities/ledger-event.entity';

// Layouts accepted in an export's date column, tried in order.
export const EXPORT_DATE_LAYOUTS: readonly string[] = [
  'yyyy-MM-dd',
  'yyyy/MM/dd',
  'MM/dd/yyyy',
  'dd-MMM-yyyy',
  'yyyyMMdd',
];

// Purchase dates inside rearrangement memos are written day first.
export const PURCHASE_DATE_LAYOUTS: readonly string[] = ['yyyy-MM-dd', 'dd-MM-yyyy'];

const REFERENCE_DATE = new Date(2000, 0, 1);

/** Returns the date as `YYYY-MM-DD`, or undefined when no layout fits. */
export function parseExportDate(value: string, layouts: readonly string[] = EXPORT_DATE_LAYOUTS): IsoDate | undefined {
  const text = value.trim();
  if (text === '') {
    return undefined;
  }

  for (const layout of layouts) {
    // the length check keeps yyyyMMdd from reading a partial prefix
    if (text.length !== layout.length && !layout.includes('MMM')) continue;
    const parsed = parse(text, layout, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return undefined;
}
