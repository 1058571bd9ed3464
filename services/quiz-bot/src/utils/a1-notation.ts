/**
 * Helpers for spreadsheet A1 ranges such as `Progress!A2:K` or `Words!A7:F7`.
 */

export interface A1Range {
  sheet: string;
  startColumn: number;    // zero-based
  startRow?: number;      // one-based, open when absent
  endColumn: number;
  endRow?: number;
}

const RANGE_PATTERN = /^(?:'((?:[^']|'')+)'|([^!]+))!([A-Z]+)(\d+)?(?::([A-Z]+)(\d+)?)?$/;

export function columnLetter(index: number): string {
  let letters = '';
  let n = index + 1;
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function columnIndex(letters: string): number {
  let n = 0;
  for (const ch of letters) {
    n = n * 26 + (ch.charCodeAt(0) - 64);
  }
  return n - 1;
}

function quoteSheet(sheet: string): string {
  return /^[A-Za-z0-9_]+$/.test(sheet) ? sheet : `'${sheet.replace(/'/g, "''")}'`;
}

/**
 * Range covering `width` columns from column A, starting at `fromRow`
 * and running to the end of the sheet unless `toRow` is given
 */
export function rowsRange(sheet: string, width: number, fromRow?: number, toRow?: number): string {
  const last = columnLetter(width - 1);
  const start = fromRow !== undefined ? `A${fromRow}` : 'A';
  const end = toRow !== undefined ? `${last}${toRow}` : last;
  return `${quoteSheet(sheet)}!${start}:${end}`;
}

export function rowRange(sheet: string, width: number, row: number): string {
  return rowsRange(sheet, width, row, row);
}

export function parseA1Range(range: string): A1Range | null {
  const match = RANGE_PATTERN.exec(range.trim());
  if (!match) {
    return null;
  }

  const sheet = match[1] !== undefined ? match[1].replace(/''/g, "'") : match[2];
  const startColumn = columnIndex(match[3]);
  const startRow = match[4] !== undefined ? parseInt(match[4], 10) : undefined;
  const endColumn = match[5] !== undefined ? columnIndex(match[5]) : startColumn;
  const endRow = match[6] !== undefined
    ? parseInt(match[6], 10)
    : match[5] === undefined ? startRow : undefined;

  return { sheet, startColumn, startRow, endColumn, endRow };
}
