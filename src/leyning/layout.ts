import type { CellFormat, Highlight, ReadingType, RowCells } from './types';

export interface RgbColor {
  red: number;
  green: number;
  blue: number;
}

export const HIGHLIGHT_COLORS: Record<Highlight, RgbColor> = {
  aliyahYellow: { red: 1.0, green: 1.0, blue: 0.8 },
  aliyahPink: { red: 1.0, green: 0.8, blue: 1.0 },
  aliyahCyan: { red: 0.8, green: 1.0, blue: 1.0 },
  neutral: { red: 0.9, green: 0.9, blue: 0.9 },
  warning: { red: 1.0, green: 0.8, blue: 0.8 },
  success: { red: 0.8, green: 1.0, blue: 0.8 },
  accent: { red: 1.0, green: 0.8, blue: 0.6 },
};

/** Aliyah rows rotate through these in key order. */
export const ALIYAH_HIGHLIGHTS: readonly Highlight[] = ['aliyahYellow', 'aliyahPink', 'aliyahCyan'];

export const READING_TYPE_HIGHLIGHTS: Record<ReadingType, Highlight> = {
  fast_day: 'warning',
  rosh_chodesh: 'success',
  chol_hamoed: 'success',
  regular: 'neutral',
};

export const REPORT_COLUMNS = 6;

/** Pixel widths for columns A–F. */
export const COLUMN_WIDTHS: readonly number[] = [113, 233, 184, 184, 184, 442];

export const GLOBAL_FORMAT = {
  range: 'A1:F1000',
  fontFamily: 'Arial',
  fontSize: 11,
  wrapStrategy: 'OVERFLOW_CELL',
} as const;

export const MINYAN_SHEET_TITLE = 'Minyan';

/** Row 2 label on each occasion tab unless configured otherwise. */
export const DEFAULT_OFFICIANT = 'Rabbi';

export interface TemplateRow {
  cells: RowCells;
  formats: CellFormat[];
}

export const TITLE_FONT_SIZE = 24;
export const SUBTITLE_FONT_SIZE = 14;

/** Header rows 4–13; row 3 carries the Kabbalat Shabbat date and is built per occasion. */
export const SERVICE_ROWS: readonly TemplateRow[] = [
  { cells: ['', "P'sukei D'zimrah", '', '', '', ''], formats: [] },
  { cells: ['', 'Shacharit', '', '', '', ''], formats: [] },
  { cells: ['', 'Musaf', '', '', '', ''], formats: [] },
  { cells: ['', 'Torah Service', '', '', '', ''], formats: [] },
  { cells: ['', 'Gabbai', 'Gabbai (default)', '', '', ''], formats: [] },
  { cells: ['', 'Distribute honors', 'Honors (default)', '', '', ''], formats: [] },
  { cells: ['', 'Read announcements', 'Announcements (default)', '', '', ''], formats: [] },
  { cells: ['Board hosts', '', '', '', '', ''], formats: [{ fromColumn: 0, toColumn: 0, background: 'neutral' }] },
  { cells: ['', '', '', '', '', ''], formats: [] },
  {
    cells: ['Torah(s) Scroll', 'Neuhas', '', '', '', ''],
    formats: [{ fromColumn: 0, toColumn: 1, background: 'accent' }],
  },
];

export const TORAH_PAGE_PLACEHOLDER = 'Torah page';
export const HAFTARAH_PAGE_PLACEHOLDER = 'Haftarah page';

/** Ceremonial honours after the readings. Page cells are filled per occasion. */
export const FOOTER_ROWS: readonly TemplateRow[] = [
  { cells: ['', '', '', '', '', ''], formats: [] },
  {
    cells: ['', 'Honors', '', 'Etz Hayyim', '', ''],
    formats: [
      { fromColumn: 0, toColumn: 0, background: 'neutral' },
      { fromColumn: 1, toColumn: 1, background: 'neutral' },
      { fromColumn: 3, toColumn: 3, background: 'neutral' },
    ],
  },
  { cells: ["P'ticha 1", '', '', TORAH_PAGE_PLACEHOLDER, '', ''], formats: [] },
  { cells: ["P'ticha 2", '', '', HAFTARAH_PAGE_PLACEHOLDER, '', ''], formats: [] },
  { cells: ['Hagbah', '', '', '', '', ''], formats: [] },
  { cells: ["G'lilah", '', '', '', '', ''], formats: [] },
  { cells: ['Prayer for Country', '', '', '', '', ''], formats: [] },
  { cells: ['Prayer for Israel', '', '', '', '', ''], formats: [] },
  { cells: ['Prayer for Peace', '', '', '', '', ''], formats: [] },
  { cells: ['Anim Zmerot', '', '', '', '', ''], formats: [] },
  { cells: ['Adon Olam', '', '', '', '', ''], formats: [] },
];

export function emptyCells(): RowCells {
  return ['', '', '', '', '', ''];
}
