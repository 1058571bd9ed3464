import { google, sheets_v4 } from 'googleapis';
import { StoreUnavailableError, errorMessage } from '../utils/errors';
import { parseA1Range } from '../utils/a1-notation';
import { logger } from '../utils/logger';

export type Cells = string[][];

export interface RangeUpdate {
  range: string;
  values: Cells;
}

/**
 * The subset of a row-oriented spreadsheet API the store adapter needs.
 * Every method rejects with StoreUnavailableError when the backend cannot be reached.
 */
export interface SheetsClient {
  readRange(range: string): Promise<Cells>;
  batchRead(ranges: string[]): Promise<Cells[]>;
  batchWrite(updates: RangeUpdate[]): Promise<void>;
  /** Appends rows after the last used row and returns the first appended row number */
  append(range: string, values: Cells): Promise<number>;
}

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

function toCells(values: unknown[][] | null | undefined): Cells {
  if (!values) {
    return [];
  }
  return values.map(row => row.map(cell => (cell === null || cell === undefined ? '' : String(cell))));
}

/**
 * Google Sheets API v4 client authenticated with a service-account key file
 */
export class GoogleSheetsClient implements SheetsClient {
  private sheets: sheets_v4.Sheets;
  private spreadsheetId: string;

  constructor(spreadsheetId: string, credentialsPath: string) {
    this.spreadsheetId = spreadsheetId;
    const auth = new google.auth.GoogleAuth({
      keyFile: credentialsPath,
      scopes: SCOPES
    });
    this.sheets = google.sheets({ version: 'v4', auth });
  }

  async readRange(range: string): Promise<Cells> {
    return this.call('values.get', async () => {
      const res = await this.sheets.spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range,
        valueRenderOption: 'UNFORMATTED_VALUE'
      });
      return toCells(res.data.values);
    });
  }

  async batchRead(ranges: string[]): Promise<Cells[]> {
    if (ranges.length === 0) {
      return [];
    }
    return this.call('values.batchGet', async () => {
      const res = await this.sheets.spreadsheets.values.batchGet({
        spreadsheetId: this.spreadsheetId,
        ranges,
        valueRenderOption: 'UNFORMATTED_VALUE'
      });
      const valueRanges = res.data.valueRanges ?? [];
      return ranges.map((_, i) => toCells(valueRanges[i]?.values));
    });
  }

  async batchWrite(updates: RangeUpdate[]): Promise<void> {
    if (updates.length === 0) {
      return;
    }
    await this.call('values.batchUpdate', async () => {
      await this.sheets.spreadsheets.values.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          valueInputOption: 'RAW',
          data: updates.map(update => ({ range: update.range, values: update.values }))
        }
      });
    });
  }

  async append(range: string, values: Cells): Promise<number> {
    return this.call('values.append', async () => {
      const res = await this.sheets.spreadsheets.values.append({
        spreadsheetId: this.spreadsheetId,
        range,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values }
      });

      const updatedRange = res.data.updates?.updatedRange;
      const parsed = updatedRange ? parseA1Range(updatedRange) : null;
      if (!parsed || parsed.startRow === undefined) {
        throw new Error(`Append returned no usable range (${updatedRange ?? 'none'})`);
      }
      return parsed.startRow;
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      logger.error(`Sheets ${operation} failed`, { error: errorMessage(error) });
      throw new StoreUnavailableError(`Spreadsheet ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
