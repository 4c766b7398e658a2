import {
  ALIYAH_HIGHLIGHTS,
  DEFAULT_OFFICIANT,
  FOOTER_ROWS,
  HAFTARAH_PAGE_PLACEHOLDER,
  SERVICE_ROWS,
  SUBTITLE_FONT_SIZE,
  TITLE_FONT_SIZE,
  TORAH_PAGE_PLACEHOLDER,
  type TemplateRow,
} from './layout';
import { hebrewMonthDay, longDisplayDate, previousDisplayDate } from './dates';
import {
  MAFTIR_KEY,
  VERSE_RANGE_ERROR,
  aliyahLabel,
  formatMultiPartVerseRange,
  formatVerseRange,
  readVerseSpan,
  sortAliyahKeys,
} from './verses';
import type {
  CellFormat,
  LeyningItem,
  PageNumberRecord,
  ReadingMap,
  ReportModel,
  ReportRow,
  RowCells,
  RowKind,
} from './types';

export interface ParshaReportOptions {
  pages?: PageNumberRecord;
  officiant?: string;
}

export interface VerseTotals {
  total: number;
  parsha: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) return undefined;
  const field = value[key];
  return typeof field === 'string' && field.trim() ? field : undefined;
}

/**
 * Special-Shabbat annotation: top-level `reason.haftara`, else `haft.reason`,
 * else the first `reason` in a multi-part haftarah.
 */
export function resolveSpecialShabbat(item: Pick<LeyningItem, 'reason' | 'haft'>): string | undefined {
  const topLevel = stringField(item.reason, 'haftara');
  if (topLevel) return topLevel;
  if (Array.isArray(item.haft)) {
    for (const part of item.haft) {
      const nested = stringField(part, 'reason');
      if (nested) return nested;
    }
    return undefined;
  }
  return stringField(item.haft, 'reason');
}

function verseCount(raw: unknown): number {
  if (!isRecord(raw)) return 0;
  const v = raw.v;
  return typeof v === 'number' && Number.isFinite(v) ? v : 0;
}

export function computeVerseTotals(readings: ReadingMap | undefined): VerseTotals {
  let total = 0;
  let parsha = 0;
  for (const [key, raw] of Object.entries(readings ?? {})) {
    const count = verseCount(raw);
    total += count;
    if (key !== MAFTIR_KEY) parsha += count;
  }
  return { total, parsha };
}

function cloneCells(cells: RowCells): RowCells {
  const [label, text, assignee, aliyah, name, notes] = cells;
  return [label, text, assignee, aliyah, name, notes];
}

function fromTemplate(kind: RowKind, template: TemplateRow): ReportRow {
  return { kind, cells: cloneCells(template.cells), formats: template.formats.map((f) => ({ ...f })) };
}

function row(kind: RowKind, cells: RowCells, formats: CellFormat[] = []): ReportRow {
  return { kind, cells, formats };
}

function buildHeader(item: LeyningItem, opts: ParshaReportOptions, warnings: string[]): ReportRow[] {
  const name = item.name.en;
  const gregorian = longDisplayDate(item.date);
  const previous = previousDisplayDate(item.date);
  const hebrew = hebrewMonthDay(item.hdate);
  if (!gregorian) warnings.push(`${name}: unreadable date "${item.date}"`);
  if (!hebrew) warnings.push(`${name}: unreadable Hebrew date "${item.hdate}"`);

  const special = resolveSpecialShabbat(item) ?? '';
  const totals = computeVerseTotals(item.fullkriyah);
  const officiant = opts.officiant ?? DEFAULT_OFFICIANT;

  return [
    row('header', ['', name, '', gregorian ?? item.date, hebrew ?? item.hdate, ''], [
      { fromColumn: 0, toColumn: 5, fontSize: TITLE_FONT_SIZE },
    ]),
    row('header', [officiant, '', '', special, '', ''], [
      { fromColumn: 0, toColumn: 5, fontSize: SUBTITLE_FONT_SIZE },
    ]),
    row('header', ['Service leaders', previous ? `Kabbalat Shabbat ${previous}` : 'Kabbalat Shabbat', '', '', '', ''], [
      { fromColumn: 0, toColumn: 0, background: 'neutral' },
    ]),
    ...SERVICE_ROWS.map((template) => fromTemplate('header', template)),
    row(
      'divider',
      ['', `Full kriyah - ${totals.total} verses (parsha=${totals.parsha})`, 'Reader', 'Aliyah', 'Hebrew Name(s)', 'Notes'],
      [{ fromColumn: 0, toColumn: 5, background: 'neutral' }],
    ),
  ];
}

function readingRow(kind: RowKind, label: string, text: string, index: number): ReportRow {
  return row(kind, [label, text, '', '', '', ''], [
    { fromColumn: 0, toColumn: 2, background: ALIYAH_HIGHLIGHTS[index % ALIYAH_HIGHLIGHTS.length] },
    { fromColumn: 0, toColumn: 0, align: 'CENTER' },
  ]);
}

function buildAliyot(item: LeyningItem, warnings: string[]): ReportRow[] {
  const readings = item.fullkriyah;
  if (!readings) return [];
  return sortAliyahKeys(Object.keys(readings)).map((key, index) => {
    const text = formatVerseRange(readVerseSpan(readings[key.raw]));
    if (text === VERSE_RANGE_ERROR) warnings.push(`${item.name.en}: malformed reading for aliyah ${key.raw}`);
    return readingRow(key.kind === 'maftir' ? 'maftir' : 'aliyah', aliyahLabel(key), text, index);
  });
}

/** Override from the page-number record, else the computed haftarah; undefined when neither exists. */
export function resolveHaftarah(
  item: Pick<LeyningItem, 'haft'>,
  pages?: PageNumberRecord,
): string | undefined {
  const override = pages?.haftarahVerses?.trim();
  if (override) return override;
  if (item.haft === undefined || item.haft === null) return undefined;
  if (Array.isArray(item.haft)) return formatMultiPartVerseRange(item.haft.map(readVerseSpan));
  return formatVerseRange(readVerseSpan(item.haft));
}

function buildFooter(pages?: PageNumberRecord): ReportRow[] {
  const torahPage = pages?.torahPage !== undefined ? `${TORAH_PAGE_PLACEHOLDER} ${pages.torahPage}` : TORAH_PAGE_PLACEHOLDER;
  const haftarahPage =
    pages?.haftarahPage !== undefined ? `${HAFTARAH_PAGE_PLACEHOLDER} ${pages.haftarahPage}` : HAFTARAH_PAGE_PLACEHOLDER;

  const fill = (cell: string) => {
    if (cell === TORAH_PAGE_PLACEHOLDER) return torahPage;
    if (cell === HAFTARAH_PAGE_PLACEHOLDER) return haftarahPage;
    return cell;
  };

  return FOOTER_ROWS.map((template): ReportRow => {
    const [label, text, assignee, aliyah, name, notes] = template.cells;
    return {
      ...fromTemplate('footer', template),
      cells: [fill(label), fill(text), fill(assignee), fill(aliyah), fill(name), fill(notes)],
    };
  });
}

export function buildParshaReport(item: LeyningItem, opts: ParshaReportOptions = {}): ReportModel {
  const warnings: string[] = [];
  const rows: ReportRow[] = [...buildHeader(item, opts, warnings)];

  const aliyot = buildAliyot(item, warnings);
  rows.push(...aliyot);

  const haftarah = resolveHaftarah(item, opts.pages);
  if (haftarah !== undefined) {
    if (haftarah === VERSE_RANGE_ERROR) warnings.push(`${item.name.en}: malformed haftarah`);
    rows.push(readingRow('haftarah', 'Haf', haftarah, aliyot.length));
  }

  rows.push(...buildFooter(opts.pages));
  return { title: item.name.en, rows, warnings };
}
