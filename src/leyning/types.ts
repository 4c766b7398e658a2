import { z } from 'zod';

/**
 * Raw Hebcal leyning records. Only the fields every item needs are enforced;
 * readings and annotations stay loosely typed so one bad record degrades to a
 * placeholder cell instead of rejecting the whole fetch.
 */
export const RawVerseSpanSchema = z
  .object({
    k: z.string(),
    b: z.string(),
    e: z.string(),
    // a bad count only loses the count, not the range
    v: z.number().optional().catch(undefined),
  })
  .passthrough();

export const ReadingMapSchema = z.record(z.string(), z.unknown());

export type ReadingMap = z.infer<typeof ReadingMapSchema>;

export const LeyningItemSchema = z
  .object({
    name: z.object({ en: z.string(), he: z.string().optional() }).passthrough(),
    date: z.string(),
    hdate: z.string(),
    fullkriyah: ReadingMapSchema.optional(),
    weekday: ReadingMapSchema.optional(),
    haft: z.unknown().optional(),
    reason: z.unknown().optional(),
  })
  .passthrough();

export type LeyningItem = z.infer<typeof LeyningItemSchema>;

export interface ReadingSet {
  items: LeyningItem[];
}

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates must be in YYYY-MM-DD format')
  .refine((value) => {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
  }, 'Dates must be in YYYY-MM-DD format');

export interface VerseSpan {
  book: string;
  start: string;
  end: string;
  count?: number;
}

/** Numeric aliyah position, Maftir, or any other key Hebcal hands back. */
export type AliyahKey =
  | { kind: 'ordinal'; raw: string; ordinal: number }
  | { kind: 'maftir'; raw: string }
  | { kind: 'other'; raw: string };

export interface PageNumberRecord {
  torahPage?: number;
  haftarahPage?: number;
  haftarahVerses?: string;
}

export interface PageNumberLookup {
  lookup(occasionName: string): PageNumberRecord | undefined;
}

export type ReadingType = 'regular' | 'fast_day' | 'rosh_chodesh' | 'chol_hamoed';

export type Highlight =
  | 'aliyahYellow'
  | 'aliyahPink'
  | 'aliyahCyan'
  | 'neutral'
  | 'warning'
  | 'success'
  | 'accent';

export type HorizontalAlign = 'LEFT' | 'CENTER' | 'RIGHT';

export interface CellFormat {
  /** zero-based, inclusive */
  fromColumn: number;
  toColumn: number;
  background?: Highlight;
  bold?: boolean;
  fontSize?: number;
  align?: HorizontalAlign;
}

export type RowCells = [
  label: string,
  text: string,
  assignee: string,
  aliyah: string,
  name: string,
  notes: string,
];

export type RowKind =
  | 'header'
  | 'divider'
  | 'aliyah'
  | 'maftir'
  | 'haftarah'
  | 'footer'
  | 'reading'
  | 'blank';

export interface ReportRow {
  kind: RowKind;
  cells: RowCells;
  formats: CellFormat[];
}

export interface ReportModel {
  title: string;
  rows: ReportRow[];
  warnings: string[];
}
