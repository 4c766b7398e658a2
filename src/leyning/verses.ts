import { InvalidOrdinalError } from './errors';
import { RawVerseSpanSchema, type AliyahKey, type VerseSpan } from './types';

export const VERSE_RANGE_ERROR = 'Error formatting verse range';

export const MAFTIR_KEY = 'M';

const ROMAN_SYMBOLS: ReadonlyArray<readonly [string, number]> = [
  ['M', 1000],
  ['CM', 900],
  ['D', 500],
  ['CD', 400],
  ['C', 100],
  ['XC', 90],
  ['L', 50],
  ['XL', 40],
  ['X', 10],
  ['IX', 9],
  ['V', 5],
  ['IV', 4],
  ['I', 1],
];

export function toOrdinalLabel(n: number): string {
  if (!Number.isInteger(n) || n <= 0) throw new InvalidOrdinalError(n);
  let rest = n;
  let out = '';
  for (const [symbol, value] of ROMAN_SYMBOLS) {
    while (rest >= value) {
      out += symbol;
      rest -= value;
    }
  }
  return out;
}

/** Reads a Hebcal `{ k, b, e, v }` record; undefined when book or references are missing. */
export function readVerseSpan(raw: unknown): VerseSpan | undefined {
  const parsed = RawVerseSpanSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  const { k, b, e, v } = parsed.data;
  return v === undefined ? { book: k, start: b, end: e } : { book: k, start: b, end: e, count: v };
}

interface Reference {
  chapter: string;
  verse: string;
}

const NUMERIC = /^\d+$/;

function parseReference(ref: string): Reference | undefined {
  const parts = ref.trim().split(':');
  if (parts.length !== 2) return undefined;
  const [chapter, verse] = parts;
  if (!NUMERIC.test(chapter) || !NUMERIC.test(verse)) return undefined;
  return { chapter, verse };
}

export function formatVerseRange(span: VerseSpan | undefined): string {
  if (!span) return VERSE_RANGE_ERROR;
  const start = parseReference(span.start);
  const end = parseReference(span.end);
  if (!start || !end) return VERSE_RANGE_ERROR;

  const range =
    start.chapter === end.chapter
      ? `${start.chapter}:${start.verse}-${end.verse}`
      : `${start.chapter}:${start.verse}-${end.chapter}:${end.verse}`;

  return span.count === undefined ? `${span.book} ${range}` : `${span.book} ${range} (${span.count})`;
}

/**
 * Haftarot stitched from disjoint passages, e.g. `Isaiah 54:1-54:10, 55:1-55:5 (15)`.
 * The book comes from the first part.
 */
export function formatMultiPartVerseRange(parts: ReadonlyArray<VerseSpan | undefined>): string {
  if (!parts.length) return VERSE_RANGE_ERROR;
  const spans: VerseSpan[] = [];
  for (const part of parts) {
    if (!part || !parseReference(part.start) || !parseReference(part.end)) return VERSE_RANGE_ERROR;
    spans.push(part);
  }

  const ranges = spans.map((span) => `${span.start.trim()}-${span.end.trim()}`).join(', ');
  const counted = spans.filter((span) => span.count !== undefined);
  if (!counted.length) return `${spans[0].book} ${ranges}`;
  const total = counted.reduce((sum, span) => sum + (span.count ?? 0), 0);
  return `${spans[0].book} ${ranges} (${total})`;
}

export function parseAliyahKey(raw: string): AliyahKey {
  if (raw === MAFTIR_KEY) return { kind: 'maftir', raw };
  if (NUMERIC.test(raw) && Number(raw) > 0) return { kind: 'ordinal', raw, ordinal: Number(raw) };
  return { kind: 'other', raw };
}

function rank(key: AliyahKey): number {
  switch (key.kind) {
    case 'ordinal':
      return 0;
    case 'other':
      return 1;
    case 'maftir':
      return 2;
  }
}

/**
 * Ordinals ascend numerically, unknown keys keep their input order after them,
 * and Maftir always lands last no matter where the mapping stored it.
 */
export function sortAliyahKeys(keys: Iterable<string>): AliyahKey[] {
  return [...keys].map(parseAliyahKey).sort((a, b) => {
    const byRank = rank(a) - rank(b);
    if (byRank !== 0) return byRank;
    if (a.kind === 'ordinal' && b.kind === 'ordinal') return a.ordinal - b.ordinal;
    return 0;
  });
}

export function aliyahLabel(key: AliyahKey): string {
  switch (key.kind) {
    case 'ordinal':
      return toOrdinalLabel(key.ordinal);
    case 'maftir':
      return 'Maf';
    case 'other':
      return key.raw;
  }
}
