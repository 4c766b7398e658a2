import { setTimeout as wait } from 'node:timers/promises';
import type { sheets_v4 } from 'googleapis';
import { SinkConflictError, SinkUnavailableError, errorMessage } from '../leyning/errors';
import { silentLogger, type Logger } from '../../shared/logger';
import { parseA1Range, type SheetInfo, type SheetSink, type StyleSpec } from './sink';

const NEW_SHEET_ROWS = 1000;
const NEW_SHEET_COLUMNS = 26;

export interface GoogleSheetSinkOptions {
  sheets: sheets_v4.Sheets;
  spreadsheetId: string;
  /** Pause after every API call to stay under the per-minute write quota. */
  delayMs: number;
  logger?: Logger;
}

function quoteTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function isAlreadyExists(err: unknown): boolean {
  return /already exists/i.test(errorMessage(err));
}

export function buildCellFormat(style: StyleSpec): { format: sheets_v4.Schema$CellFormat; fields: string[] } {
  const format: sheets_v4.Schema$CellFormat = {};
  const fields: string[] = [];
  const textFormat: sheets_v4.Schema$TextFormat = {};

  if (style.backgroundColor) {
    format.backgroundColor = { ...style.backgroundColor };
    fields.push('userEnteredFormat.backgroundColor');
  }
  if (style.bold !== undefined) {
    textFormat.bold = style.bold;
    fields.push('userEnteredFormat.textFormat.bold');
  }
  if (style.fontSize !== undefined) {
    textFormat.fontSize = style.fontSize;
    fields.push('userEnteredFormat.textFormat.fontSize');
  }
  if (style.fontFamily) {
    textFormat.fontFamily = style.fontFamily;
    fields.push('userEnteredFormat.textFormat.fontFamily');
  }
  if (Object.keys(textFormat).length) format.textFormat = textFormat;
  if (style.horizontalAlignment) {
    format.horizontalAlignment = style.horizontalAlignment;
    fields.push('userEnteredFormat.horizontalAlignment');
  }
  if (style.wrapStrategy) {
    format.wrapStrategy = style.wrapStrategy;
    fields.push('userEnteredFormat.wrapStrategy');
  }
  return { format, fields };
}

export class GoogleSheetSink implements SheetSink {
  private readonly sheets: sheets_v4.Sheets;
  private readonly spreadsheetId: string;
  private readonly delayMs: number;
  private readonly logger: Logger;
  private readonly titles = new Map<number, string>();

  constructor(opts: GoogleSheetSinkOptions) {
    this.sheets = opts.sheets;
    this.spreadsheetId = opts.spreadsheetId;
    this.delayMs = opts.delayMs;
    this.logger = opts.logger ?? silentLogger;
  }

  private async pace(): Promise<void> {
    if (this.delayMs > 0) await wait(this.delayMs);
  }

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new SinkUnavailableError(`Sheets ${what} failed: ${errorMessage(err)}`, err);
    } finally {
      await this.pace();
    }
  }

  private async batch(what: string, requests: sheets_v4.Schema$Request[]) {
    return this.call(what, async () => {
      const res = await this.sheets.spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: { requests },
      });
      return res.data;
    });
  }

  private async titleOf(sheetId: number): Promise<string> {
    const known = this.titles.get(sheetId);
    if (known !== undefined) return known;
    await this.listSheets();
    const title = this.titles.get(sheetId);
    if (title === undefined) throw new SinkUnavailableError(`Sheet ${sheetId} not found`);
    return title;
  }

  async listSheets(): Promise<SheetInfo[]> {
    const data = await this.call('list', async () => {
      const res = await this.sheets.spreadsheets.get({
        spreadsheetId: this.spreadsheetId,
        fields: 'sheets.properties(sheetId,title,index)',
      });
      return res.data;
    });
    const out: SheetInfo[] = [];
    for (const sheet of data.sheets ?? []) {
      const id = sheet.properties?.sheetId;
      if (typeof id !== 'number') continue;
      const info = { id, title: sheet.properties?.title ?? '', index: sheet.properties?.index ?? out.length };
      this.titles.set(info.id, info.title);
      out.push(info);
    }
    return out.sort((a, b) => a.index - b.index);
  }

  async createSheet(name: string): Promise<SheetInfo> {
    let data: sheets_v4.Schema$BatchUpdateSpreadsheetResponse;
    try {
      data = await this.batch('create', [
        {
          addSheet: {
            properties: { title: name, gridProperties: { rowCount: NEW_SHEET_ROWS, columnCount: NEW_SHEET_COLUMNS } },
          },
        },
      ]);
    } catch (err) {
      const cause = err instanceof SinkUnavailableError ? err.cause : err;
      if (isAlreadyExists(cause)) throw new SinkConflictError(name, cause);
      throw err;
    }
    const props = data.replies?.[0]?.addSheet?.properties;
    const id = props?.sheetId;
    if (typeof id !== 'number') {
      throw new SinkUnavailableError(`Sheets create returned no sheet id for "${name}"`);
    }
    const info = { id, title: props?.title ?? name, index: props?.index ?? 0 };
    this.titles.set(info.id, info.title);
    this.logger.debug(`Created sheet "${info.title}" (${info.id})`);
    return info;
  }

  async deleteSheet(sheetId: number): Promise<void> {
    await this.batch('delete', [{ deleteSheet: { sheetId } }]);
    this.titles.delete(sheetId);
  }

  async renameSheet(sheetId: number, name: string): Promise<void> {
    await this.batch('rename', [
      { updateSheetProperties: { properties: { sheetId, title: name }, fields: 'title' } },
    ]);
    this.titles.set(sheetId, name);
  }

  async reorderSheets(order: number[]): Promise<void> {
    if (!order.length) return;
    await this.batch(
      'reorder',
      order.map((sheetId, index) => ({
        updateSheetProperties: { properties: { sheetId, index }, fields: 'index' },
      })),
    );
  }

  async clearSheet(sheetId: number): Promise<void> {
    const title = await this.titleOf(sheetId);
    await this.call('clear', () =>
      this.sheets.spreadsheets.values.clear({ spreadsheetId: this.spreadsheetId, range: quoteTitle(title) }),
    );
  }

  async writeRange(sheetId: number, rangeRef: string, rows: string[][]): Promise<void> {
    const title = await this.titleOf(sheetId);
    await this.call('write', () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: `${quoteTitle(title)}!${rangeRef}`,
        valueInputOption: 'RAW',
        requestBody: { values: rows },
      }),
    );
  }

  async formatRange(sheetId: number, rangeRef: string, style: StyleSpec): Promise<void> {
    const { format, fields } = buildCellFormat(style);
    if (!fields.length) return;
    await this.batch('format', [
      {
        repeatCell: {
          range: { sheetId, ...parseA1Range(rangeRef) },
          cell: { userEnteredFormat: format },
          fields: fields.join(','),
        },
      },
    ]);
  }

  async setColumnWidths(sheetId: number, widths: readonly number[]): Promise<void> {
    if (!widths.length) return;
    await this.batch(
      'column widths',
      widths.map((pixelSize, index) => ({
        updateDimensionProperties: {
          range: { sheetId, dimension: 'COLUMNS', startIndex: index, endIndex: index + 1 },
          properties: { pixelSize },
          fields: 'pixelSize',
        },
      })),
    );
  }
}
