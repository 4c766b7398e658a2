import { COLUMN_WIDTHS, GLOBAL_FORMAT, HIGHLIGHT_COLORS, REPORT_COLUMNS } from '../leyning/layout';
import type { CellFormat, ReportModel } from '../leyning/types';
import { a1Range, type SheetSink, type StyleSpec } from './sink';

export function toStyleSpec(format: CellFormat): StyleSpec {
  const style: StyleSpec = {};
  if (format.background) style.backgroundColor = HIGHLIGHT_COLORS[format.background];
  if (format.bold !== undefined) style.bold = format.bold;
  if (format.fontSize !== undefined) style.fontSize = format.fontSize;
  if (format.align) style.horizontalAlignment = format.align;
  return style;
}

export interface RangeFormat {
  range: string;
  style: StyleSpec;
}

/** Sheet rows are 1-based; row i of the model lands on sheet row i + 1. */
export function planFormats(model: ReportModel): RangeFormat[] {
  const out: RangeFormat[] = [];
  model.rows.forEach((row, index) => {
    for (const format of row.formats) {
      out.push({ range: a1Range(index + 1, format.fromColumn, format.toColumn), style: toStyleSpec(format) });
    }
  });
  return out;
}

export async function prepareSheet(sink: SheetSink, sheetId: number): Promise<void> {
  await sink.formatRange(sheetId, GLOBAL_FORMAT.range, {
    fontFamily: GLOBAL_FORMAT.fontFamily,
    fontSize: GLOBAL_FORMAT.fontSize,
    wrapStrategy: GLOBAL_FORMAT.wrapStrategy,
  });
  await sink.setColumnWidths(sheetId, COLUMN_WIDTHS);
}

export async function renderReport(sink: SheetSink, sheetId: number, model: ReportModel): Promise<void> {
  if (!model.rows.length) return;
  const values = model.rows.map((row) => [...row.cells]);
  await sink.writeRange(sheetId, a1Range(1, 0, REPORT_COLUMNS - 1, values.length), values);
  for (const { range, style } of planFormats(model)) {
    await sink.formatRange(sheetId, range, style);
  }
}
