import type { RgbColor } from '../leyning/layout';
import type { HorizontalAlign } from '../leyning/types';

export interface SheetInfo {
  id: number;
  title: string;
  index: number;
}

export interface StyleSpec {
  backgroundColor?: RgbColor;
  bold?: boolean;
  fontSize?: number;
  fontFamily?: string;
  horizontalAlignment?: HorizontalAlign;
  wrapStrategy?: 'OVERFLOW_CELL' | 'WRAP' | 'CLIP';
}

/**
 * Everything the renderer and orchestrator need from a spreadsheet. Ranges are
 * A1 notation without the sheet name (`A1:F14`). Implementations pace their own
 * calls against the backend's rate limits.
 */
export interface SheetSink {
  listSheets(): Promise<SheetInfo[]>;
  createSheet(name: string): Promise<SheetInfo>;
  deleteSheet(sheetId: number): Promise<void>;
  renameSheet(sheetId: number, name: string): Promise<void>;
  reorderSheets(order: number[]): Promise<void>;
  clearSheet(sheetId: number): Promise<void>;
  writeRange(sheetId: number, rangeRef: string, rows: string[][]): Promise<void>;
  formatRange(sheetId: number, rangeRef: string, style: StyleSpec): Promise<void>;
  setColumnWidths(sheetId: number, widths: readonly number[]): Promise<void>;
}

export function columnLetter(index: number): string {
  let n = index + 1;
  let out = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}

export function columnIndex(letters: string): number {
  let n = 0;
  for (const ch of letters.toUpperCase()) n = n * 26 + (ch.charCodeAt(0) - 64);
  return n - 1;
}

/** Zero-based, end-exclusive, matching the Sheets API GridRange. */
export interface GridBounds {
  startRowIndex: number;
  endRowIndex: number;
  startColumnIndex: number;
  endColumnIndex: number;
}

const CELL_REF = /^([A-Za-z]+)(\d+)$/;

export function parseA1Range(rangeRef: string): GridBounds {
  const [from, to = from] = rangeRef.split(':');
  const start = CELL_REF.exec(from.trim());
  const end = CELL_REF.exec(to.trim());
  if (!start || !end) throw new Error(`Unsupported range reference: ${rangeRef}`);
  const startCol = columnIndex(start[1]);
  const endCol = columnIndex(end[1]);
  const startRow = Number(start[2]) - 1;
  const endRow = Number(end[2]) - 1;
  return {
    startRowIndex: Math.min(startRow, endRow),
    endRowIndex: Math.max(startRow, endRow) + 1,
    startColumnIndex: Math.min(startCol, endCol),
    endColumnIndex: Math.max(startCol, endCol) + 1,
  };
}

export function a1Range(row: number, fromColumn: number, toColumn: number, toRow = row): string {
  const start = `${columnLetter(fromColumn)}${row}`;
  const end = `${columnLetter(toColumn)}${toRow}`;
  return start === end ? start : `${start}:${end}`;
}
