export const SPREADSHEET_CLIENT = Symbol('SPREADSHEET_CLIENT');

export type CellValue = string | number;

/**
 * The few spreadsheet calls the balance oracle needs. Rows come back as
 * text, header row first; row numbers are 1-based as in the sheet UI.
 */
export interface SpreadsheetClient {
  readRows(sheet: string): Promise<string[][]>;
  updateCell(
    sheet: string,
    rowNumber: number,
    columnIndex: number,
    value: CellValue,
  ): Promise<void>;
  appendRow(sheet: string, values: CellValue[]): Promise<void>;
}

/** 0 → A, 25 → Z, 26 → AA */
export function columnLetter(columnIndex: number): string {
  let n = columnIndex + 1;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}
