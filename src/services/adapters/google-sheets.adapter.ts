/**
 * Google Sheets adapter
 *
 * Mirrors leave into the tracking spreadsheet, one row per recorded event:
 *
 *   A recorded at | B request | C employee | D type | E start | F end | G days | H state | I key
 *
 * A key already present in column I is not appended again.
 *
 * @module services/adapters/google-sheets
 */

import { google, type sheets_v4 } from 'googleapis';

import type { GoogleSheetsConfig } from '../../config/integrations.js';
import { classifyFailure } from './failures.js';
import { bearerTokenAuth } from './google-auth.js';
import type { LeaveSheetRow, SpreadsheetAdapter } from './types.js';

export interface GoogleSheetsAdapterOptions {
  readonly timeoutMs: number;
}

export class GoogleSheetsAdapter implements SpreadsheetAdapter {
  private readonly sheets: sheets_v4.Sheets;

  constructor(
    private readonly config: GoogleSheetsConfig,
    private readonly options: GoogleSheetsAdapterOptions
  ) {
    this.sheets = google.sheets({ version: 'v4', auth: bearerTokenAuth(config.accessToken) });
  }

  async recordLeave(row: LeaveSheetRow, idempotencyKey: string): Promise<string> {
    const existing = await this.findKeyRow(idempotencyKey);
    if (existing !== null) {
      const range = `${this.config.sheetName}!A${existing}:I${existing}`;
      console.log('[SHEETS] Row already recorded:', { requestId: row.requestId, range });
      return range;
    }

    const range = `${this.config.sheetName}!A:I`;
    let updatedRange: string;
    try {
      const response = await this.sheets.spreadsheets.values.append(
        {
          spreadsheetId: this.config.spreadsheetId,
          range,
          valueInputOption: 'RAW',
          insertDataOption: 'INSERT_ROWS',
          requestBody: {
            values: [
              [
                row.recordedAt,
                row.requestId,
                row.employeeName,
                row.leaveType,
                row.start,
                row.end,
                row.days,
                row.state,
                idempotencyKey,
              ],
            ],
          },
        },
        { timeout: this.options.timeoutMs }
      );
      updatedRange = response.data.updates?.updatedRange ?? range;
    } catch (error) {
      throw classifyFailure(error, 'Sheet append');
    }

    console.log('[SHEETS] Row appended:', {
      requestId: row.requestId,
      state: row.state,
      range: updatedRange,
    });

    return updatedRange;
  }

  /**
   * 1-based row number holding the key, or null
   */
  private async findKeyRow(idempotencyKey: string): Promise<number | null> {
    let values: readonly unknown[][];
    try {
      const response = await this.sheets.spreadsheets.values.get(
        { spreadsheetId: this.config.spreadsheetId, range: `${this.config.sheetName}!I:I` },
        { timeout: this.options.timeoutMs }
      );
      values = response.data.values ?? [];
    } catch (error) {
      throw classifyFailure(error, 'Sheet key lookup');
    }

    const index = values.findIndex((cells) => cells[0] === idempotencyKey);
    return index === -1 ? null : index + 1;
  }
}
