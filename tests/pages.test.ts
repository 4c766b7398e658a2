import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigError } from '../src/leyning/errors';
import { CsvPageNumbers, parseCsv } from '../src/leyning/pages';

describe('parseCsv', () => {
  it('handles quotes, doubled quotes and CRLF line ends', () => {
    expect(parseCsv('a,"b, c","say ""hi"""\r\n1,2,3\r\n')).toEqual([
      ['a', 'b, c', 'say "hi"'],
      ['1', '2', '3'],
    ]);
  });

  it('drops blank lines and keeps a last line without newline', () => {
    expect(parseCsv('a,b\n\n,\nc,d')).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });
});

describe('CsvPageNumbers.fromText', () => {
  it('reads page numbers and haftarah overrides by occasion name', () => {
    const pages = CsvPageNumbers.fromText(
      '\uFEFFParsha,Torah Page,Haftarah Page,Haftarah verses\n' +
        'Vayikra,410,962,\n' +
        'Tzav,"431.0",,I Samuel 15:1-34\n' +
        ',99,99,ignored\n',
    );
    expect(pages.size).toBe(2);
    expect(pages.lookup('Vayikra')).toEqual({ torahPage: 410, haftarahPage: 962 });
    expect(pages.lookup('Tzav')).toEqual({ torahPage: 431, haftarahVerses: 'I Samuel 15:1-34' });
    expect(pages.lookup('Shemini')).toBeUndefined();
  });

  it('accepts the older spelling of the verses column', () => {
    const pages = CsvPageNumbers.fromText('Parsha,Haftara verses\nNoach,Isaiah 54:1-55:5\n');
    expect(pages.lookup('Noach')).toEqual({ haftarahVerses: 'Isaiah 54:1-55:5' });
  });

  it('ignores page cells that are not numbers', () => {
    const pages = CsvPageNumbers.fromText('Parsha,Torah Page\nNoach,tbd\n');
    expect(pages.lookup('Noach')).toEqual({});
  });

  it('requires the Parsha column', () => {
    expect(() => CsvPageNumbers.fromText('Name,Torah Page\nNoach,30\n')).toThrow(ConfigError);
  });

  it('treats an empty file as no page numbers', () => {
    expect(CsvPageNumbers.fromText('').size).toBe(0);
  });
});

describe('CsvPageNumbers.fromFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'leyning-pages-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a CSV from disk', async () => {
    const file = path.join(dir, 'pages.csv');
    await writeFile(file, 'Parsha,Torah Page,Haftarah Page\nBereshit,2,20\n', 'utf8');
    const pages = await CsvPageNumbers.fromFile(file);
    expect(pages.lookup('Bereshit')).toEqual({ torahPage: 2, haftarahPage: 20 });
  });

  it('raises a configuration error for a missing file', async () => {
    await expect(CsvPageNumbers.fromFile(path.join(dir, 'missing.csv'))).rejects.toBeInstanceOf(ConfigError);
  });
});
