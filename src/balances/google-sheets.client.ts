import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { google, sheets_v4 } from 'googleapis';
import { ExternalServiceError, errorMessage } from '../common/errors';
import {
  columnLetter,
  type CellValue,
  type SpreadsheetClient,
} from './spreadsheet-client';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

function quoteSheet(sheet: string): string {
  return `'${sheet.replace(/'/g, "''")}'`;
}

/**
 * Google Sheets v4 over a service account. The API client is built on first
 * use so the app boots without credentials (balances then report unavailable).
 */
@Injectable()
export class GoogleSheetsClient implements SpreadsheetClient {
  private readonly logger = new Logger(GoogleSheetsClient.name);
  private readonly credentialsPath?: string;
  private readonly spreadsheetId?: string;
  private api: sheets_v4.Sheets | null = null;

  constructor(config: ConfigService) {
    this.credentialsPath = config.get<string>('sheets.credentialsPath');
    this.spreadsheetId = config.get<string>('sheets.spreadsheetId');
  }

  async readRows(sheet: string): Promise<string[][]> {
    return this.call(`read ${sheet}`, async (api, spreadsheetId) => {
      const res = await api.spreadsheets.values.get({
        spreadsheetId,
        range: quoteSheet(sheet),
        valueRenderOption: 'UNFORMATTED_VALUE',
      });
      const values: unknown[][] = res.data.values ?? [];
      this.logger.debug(`Read ${values.length} row(s) from ${sheet}`);
      return values.map((row) =>
        row.map((cell) => (cell == null ? '' : String(cell))),
      );
    });
  }

  async updateCell(
    sheet: string,
    rowNumber: number,
    columnIndex: number,
    value: CellValue,
  ): Promise<void> {
    const range = `${quoteSheet(sheet)}!${columnLetter(columnIndex)}${rowNumber}`;
    await this.call(`update ${range}`, async (api, spreadsheetId) => {
      await api.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values: [[value]] },
      });
    });
  }

  async appendRow(sheet: string, values: CellValue[]): Promise<void> {
    await this.call(`append to ${sheet}`, async (api, spreadsheetId) => {
      await api.spreadsheets.values.append({
        spreadsheetId,
        range: `${quoteSheet(sheet)}!A1`,
        valueInputOption: 'USER_ENTERED',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: [values] },
      });
    });
  }

  private async call<T>(
    label: string,
    fn: (api: sheets_v4.Sheets, spreadsheetId: string) => Promise<T>,
  ): Promise<T> {
    if (!this.credentialsPath || !this.spreadsheetId) {
      throw new ExternalServiceError(
        'balances',
        'GOOGLE_CREDENTIALS_PATH and GOOGLE_SPREADSHEET_ID must be set',
      );
    }
    try {
      return await fn(this.client(this.credentialsPath), this.spreadsheetId);
    } catch (err) {
      if (err instanceof ExternalServiceError) throw err;
      throw new ExternalServiceError(
        'balances',
        `Sheets ${label} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  private client(keyFile: string): sheets_v4.Sheets {
    if (!this.api) {
      const auth = new google.auth.GoogleAuth({ keyFile, scopes: SCOPES });
      this.api = google.sheets({ version: 'v4', auth });
    }
    return this.api;
  }
}
