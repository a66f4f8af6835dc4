function normalizeNewlines(content: string): string {
  return content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Splits CSV text into rows of raw cells.
 *
 * Handles quoted fields with embedded commas, newlines and doubled quotes.
 * A byte-order mark is stripped and rows with no content are dropped.
 */
export function readCsv(content: string): string[][] {
  const text = normalizeNewlines(content);
  const rows: string[][] = [];
  let currentField = '';
  let currentRow: string[] = [];
  let inQuotes = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (char === '"') {
      if (inQuotes && text[i + 1] === '"') {
        currentField += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === ',' && !inQuotes) {
      currentRow.push(currentField);
      currentField = '';
      continue;
    }

    if (char === '\n' && !inQuotes) {
      currentRow.push(currentField);
      rows.push(currentRow);
      currentField = '';
      currentRow = [];
      continue;
    }

    currentField += char;
  }

  // an unterminated quote keeps what was read
  if (inQuotes || currentField.length > 0 || currentRow.length > 0) {
    currentRow.push(currentField);
    rows.push(currentRow);
  }

  return rows
    .map((row) => row.map((cell) => cell.replace(/\ufeff/g, '')))
    .filter((row) => row.some((cell) => cell.trim() !== ''));
}
