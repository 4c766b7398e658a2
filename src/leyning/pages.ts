import { readFile } from 'fs/promises';
import path from 'path';
import { ConfigError, errorMessage } from './errors';
import type { PageNumberLookup, PageNumberRecord } from './types';

const COLUMN = {
  parsha: 'Parsha',
  torahPage: 'Torah Page',
  haftarahPage: 'Haftarah Page',
  haftarahVerses: 'Haftarah verses',
} as const;

/** Older sheets spelled the column without the h. */
const LEGACY_COLUMNS: Record<string, string> = {
  'Haftara verses': COLUMN.haftarahVerses,
};

/** RFC 4180-ish: quoted fields, doubled quotes, CRLF or LF line ends. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field || row.length) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter((r) => r.some((cell) => cell.trim()));
}

function parsePage(raw: string | undefined): number | undefined {
  const value = String(raw ?? '').trim();
  if (!value) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? Math.trunc(n) : undefined;
}

export class CsvPageNumbers implements PageNumberLookup {
  private readonly records: Map<string, PageNumberRecord>;

  constructor(records: Map<string, PageNumberRecord>) {
    this.records = records;
  }

  static fromText(text: string): CsvPageNumbers {
    const [header, ...body] = parseCsv(text.replace(/^\uFEFF/, ''));
    if (!header) return new CsvPageNumbers(new Map());

    const headers = header.map((h) => {
      const name = h.trim();
      return LEGACY_COLUMNS[name] ?? name;
    });
    const col = (name: string) => headers.indexOf(name);
    const parshaIdx = col(COLUMN.parsha);
    if (parshaIdx < 0) throw new ConfigError(`Page-number CSV is missing the "${COLUMN.parsha}" column`);
    const torahIdx = col(COLUMN.torahPage);
    const haftarahIdx = col(COLUMN.haftarahPage);
    const versesIdx = col(COLUMN.haftarahVerses);

    const records = new Map<string, PageNumberRecord>();
    for (const cells of body) {
      const name = String(cells[parshaIdx] ?? '').trim();
      if (!name) continue;
      const record: PageNumberRecord = {};
      const torahPage = torahIdx >= 0 ? parsePage(cells[torahIdx]) : undefined;
      const haftarahPage = haftarahIdx >= 0 ? parsePage(cells[haftarahIdx]) : undefined;
      const verses = versesIdx >= 0 ? String(cells[versesIdx] ?? '').trim() : '';
      if (torahPage !== undefined) record.torahPage = torahPage;
      if (haftarahPage !== undefined) record.haftarahPage = haftarahPage;
      if (verses) record.haftarahVerses = verses;
      records.set(name, record);
    }
    return new CsvPageNumbers(records);
  }

  static async fromFile(file: string): Promise<CsvPageNumbers> {
    const resolved = path.resolve(process.cwd(), file);
    let raw: string;
    try {
      raw = await readFile(resolved, 'utf8');
    } catch (err) {
      throw new ConfigError(`Unable to read page numbers from ${resolved}: ${errorMessage(err)}`);
    }
    return CsvPageNumbers.fromText(raw);
  }

  lookup(occasionName: string): PageNumberRecord | undefined {
    return this.records.get(occasionName);
  }

  get size(): number {
    return this.records.size;
  }
}
