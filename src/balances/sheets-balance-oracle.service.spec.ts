import { ConfigService } from '@nestjs/config';
import {
  formatCompletedAt,
  parseBalanceCell,
  SheetsBalanceOracle,
} from './sheets-balance-oracle.service';
import {
  columnLetter,
  type CellValue,
  type SpreadsheetClient,
} from './spreadsheet-client';

class InMemorySpreadsheet implements SpreadsheetClient {
  readonly sheets = new Map<string, string[][]>();
  readonly updates: Array<{ sheet: string; row: number; col: number; value: CellValue }> = [];

  async readRows(sheet: string): Promise<string[][]> {
    return (this.sheets.get(sheet) ?? []).map((row) => [...row]);
  }

  async updateCell(
    sheet: string,
    rowNumber: number,
    columnIndex: number,
    value: CellValue,
  ): Promise<void> {
    this.updates.push({ sheet, row: rowNumber, col: columnIndex, value });
    const rows = this.sheets.get(sheet) ?? [];
    const row = rows[rowNumber - 1];
    if (row) row[columnIndex] = String(value);
  }

  async appendRow(sheet: string, values: CellValue[]): Promise<void> {
    const rows = this.sheets.get(sheet) ?? [];
    rows.push(values.map(String));
    this.sheets.set(sheet, rows);
  }
}

describe('SheetsBalanceOracle', () => {
  let sheet: InMemorySpreadsheet;
  let oracle: SheetsBalanceOracle;

  beforeEach(() => {
    sheet = new InMemorySpreadsheet();
    sheet.sheets.set('POM Balance', [
      ['Name', 'ID', 'POM Balance'],
      ['Alice', '111', '500'],
      ['Bob', ' 222 ', 'n/a'],
      ['Carol', '333', '75.9'],
    ]);
    oracle = new SheetsBalanceOracle(sheet, new ConfigService());
  });

  it('looks up a balance by trimmed participant id', async () => {
    expect(await oracle.getBalance('111')).toBe(500);
    expect(await oracle.getBalance('222')).toBe(0);
    expect(await oracle.getBalance('333')).toBe(75);
  });

  it('returns null for participants not on the sheet', async () => {
    expect(await oracle.getBalance('999')).toBeNull();
  });

  it('returns null when the sheet lacks the id column', async () => {
    sheet.sheets.set('POM Balance', [['Name', 'Balance'], ['Alice', '5']]);
    expect(await oracle.getBalance('111')).toBeNull();
    expect(await oracle.listAllBalances()).toEqual([]);
  });

  it('lists every row with an id', async () => {
    expect(await oracle.listAllBalances()).toEqual([
      { participantId: '111', name: 'Alice', balance: 500 },
      { participantId: '222', name: 'Bob', balance: 0 },
      { participantId: '333', name: 'Carol', balance: 75 },
    ]);
  });

  it('debits the balance cell of the matching row', async () => {
    expect(await oracle.debit('111', 120)).toBe(true);
    expect(sheet.updates).toEqual([
      { sheet: 'POM Balance', row: 2, col: 2, value: 380 },
    ]);
    expect(await oracle.getBalance('111')).toBe(380);
  });

  it('refuses a debit larger than the balance', async () => {
    expect(await oracle.debit('333', 100)).toBe(false);
    expect(sheet.updates).toEqual([]);
  });

  it('refuses a debit for an unknown participant', async () => {
    expect(await oracle.debit('999', 1)).toBe(false);
  });

  it('appends completed auctions to the history sheet', async () => {
    await oracle.appendHistory({
      playerName: 'Prospect A',
      winnerId: '111',
      winnerName: 'Alice',
      amount: 150,
      completedAt: new Date('2026-03-04T05:06:07.000Z'),
    });
    await oracle.appendHistory({
      playerName: 'Prospect B',
      winnerId: null,
      winnerName: null,
      amount: 10,
      completedAt: new Date('2026-03-04T05:06:07.000Z'),
    });
    expect(sheet.sheets.get('Completed Auctions')).toEqual([
      ['Prospect A', '111', 'Alice', '150', '2026-03-04 05:06'],
      ['Prospect B', '', 'Unknown', '10', '2026-03-04 05:06'],
    ]);
  });

  it('reads sheet and column names from config', async () => {
    sheet.sheets.set('Wallets', [['user', 'coins'], ['42', '9']]);
    const custom = new SheetsBalanceOracle(
      sheet,
      new ConfigService({
        sheets: { balanceSheet: 'Wallets', idColumn: 'user', balanceColumn: 'coins' },
      }),
    );
    expect(await custom.getBalance('42')).toBe(9);
    expect(await custom.listAllBalances()).toEqual([
      { participantId: '42', name: '', balance: 9 },
    ]);
  });
});

describe('sheet helpers', () => {
  it('maps column indexes to letters', () => {
    expect(columnLetter(0)).toBe('A');
    expect(columnLetter(25)).toBe('Z');
    expect(columnLetter(26)).toBe('AA');
    expect(columnLetter(27)).toBe('AB');
  });

  it('parses balance cells', () => {
    expect(parseBalanceCell('')).toBe(0);
    expect(parseBalanceCell(undefined)).toBe(0);
    expect(parseBalanceCell('-3')).toBe(-3);
  });

  it('formats completion time in UTC to the minute', () => {
    expect(formatCompletedAt(new Date('2026-12-31T23:59:59.000Z'))).toBe(
      '2026-12-31 23:59',
    );
  });
});
