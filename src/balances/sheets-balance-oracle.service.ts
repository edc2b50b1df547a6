import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  BalanceOracle,
  BalanceRecord,
  HistoryEntry,
} from './balance-oracle';
import {
  SPREADSHEET_CLIENT,
  type SpreadsheetClient,
} from './spreadsheet-client';

interface SheetLayout {
  balanceSheet: string;
  historySheet: string;
  idColumn: string;
  nameColumn: string;
  balanceColumn: string;
}

interface BalanceTable {
  idIndex: number;
  nameIndex: number;
  balanceIndex: number;
  /** Data rows only; `rows[i]` lives on sheet row `i + 2` */
  rows: string[][];
}

/** Non-numeric cells count as zero; fractions are cut off. */
export function parseBalanceCell(cell: string | undefined): number {
  const text = (cell ?? '').trim();
  if (text === '') return 0;
  const n = Number(text);
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

/** `YYYY-MM-DD HH:mm` in UTC */
export function formatCompletedAt(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/**
 * Balance oracle backed by a spreadsheet: one sheet of balances keyed by
 * participant id, one append-only sheet of completed auctions.
 */
@Injectable()
export class SheetsBalanceOracle implements BalanceOracle {
  private readonly logger = new Logger(SheetsBalanceOracle.name);
  private readonly layout: SheetLayout;

  constructor(
    @Inject(SPREADSHEET_CLIENT) private readonly sheets: SpreadsheetClient,
    config: ConfigService,
  ) {
    this.layout = {
      balanceSheet: config.get<string>('sheets.balanceSheet') ?? 'POM Balance',
      historySheet:
        config.get<string>('sheets.historySheet') ?? 'Completed Auctions',
      idColumn: config.get<string>('sheets.idColumn') ?? 'ID',
      nameColumn: config.get<string>('sheets.nameColumn') ?? 'Name',
      balanceColumn:
        config.get<string>('sheets.balanceColumn') ?? 'POM Balance',
    };
  }

  async getBalance(participantId: string): Promise<number | null> {
    const table = await this.readBalanceTable();
    const row = table ? this.findRow(table, participantId) : null;
    if (!table || !row) {
      this.logger.log(`Participant ${participantId} not found in balance sheet`);
      return null;
    }
    return parseBalanceCell(row[table.balanceIndex]);
  }

  async listAllBalances(): Promise<BalanceRecord[]> {
    const table = await this.readBalanceTable();
    if (!table) return [];
    return table.rows
      .filter((row) => (row[table.idIndex] ?? '').trim() !== '')
      .map((row) => ({
        participantId: (row[table.idIndex] ?? '').trim(),
        name: table.nameIndex >= 0 ? (row[table.nameIndex] ?? '').trim() : '',
        balance: parseBalanceCell(row[table.balanceIndex]),
      }));
  }

  async debit(participantId: string, amount: number): Promise<boolean> {
    const table = await this.readBalanceTable();
    if (!table) return false;
    const index = table.rows.findIndex(
      (row) => (row[table.idIndex] ?? '').trim() === participantId,
    );
    const row = table.rows[index];
    if (!row) {
      this.logger.log(`Debit: participant ${participantId} not found`);
      return false;
    }
    const current = parseBalanceCell(row[table.balanceIndex]);
    if (current < amount) {
      this.logger.warn(
        `Insufficient balance for ${participantId}: has ${current}, need ${amount}`,
      );
      return false;
    }
    const rowNumber = index + 2;
    this.logger.log(
      `Debit ${participantId} on row ${rowNumber}: ${current} -> ${current - amount}`,
    );
    await this.sheets.updateCell(
      this.layout.balanceSheet,
      rowNumber,
      table.balanceIndex,
      current - amount,
    );
    return true;
  }

  async appendHistory(entry: HistoryEntry): Promise<void> {
    const row = [
      entry.playerName,
      entry.winnerId ?? '',
      entry.winnerName ?? 'Unknown',
      entry.amount,
      formatCompletedAt(entry.completedAt),
    ];
    this.logger.log(`Appending to ${this.layout.historySheet}: ${JSON.stringify(row)}`);
    await this.sheets.appendRow(this.layout.historySheet, row);
  }

  private async readBalanceTable(): Promise<BalanceTable | null> {
    const [header, ...rows] = await this.sheets.readRows(
      this.layout.balanceSheet,
    );
    if (!header) {
      this.logger.log(`${this.layout.balanceSheet} is empty`);
      return null;
    }
    const columns = header.map((name) => name.trim());
    const idIndex = columns.indexOf(this.layout.idColumn);
    const balanceIndex = columns.indexOf(this.layout.balanceColumn);
    if (idIndex < 0 || balanceIndex < 0) {
      this.logger.warn(
        `${this.layout.balanceSheet} is missing the "${this.layout.idColumn}" or "${this.layout.balanceColumn}" column`,
      );
      return null;
    }
    return {
      idIndex,
      nameIndex: columns.indexOf(this.layout.nameColumn),
      balanceIndex,
      rows,
    };
  }

  private findRow(table: BalanceTable, participantId: string): string[] | null {
    return (
      table.rows.find(
        (row) => (row[table.idIndex] ?? '').trim() === participantId,
      ) ?? null
    );
  }
}
