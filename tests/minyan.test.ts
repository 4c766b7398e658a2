import { describe, it, expect } from 'vitest';
import fixture from './fixtures/leyning-march.json';
import { buildMinyanReport, collectWeekdayReadings } from '../src/leyning/minyan';
import { parseReadingSet } from '../src/leyning/source';
import type { LeyningItem } from '../src/leyning/types';

const { items } = parseReadingSet(fixture);

describe('collectWeekdayReadings', () => {
  it('keeps weekday readings and special days in date order', () => {
    const readings = collectWeekdayReadings(items);
    expect(readings.map((r) => [r.date, r.name, r.type])).toEqual([
      ['2024-03-11', 'Rosh Chodesh Adar II', 'rosh_chodesh'],
      ['2024-03-14', 'Vayikra', 'regular'],
      ['2024-03-18', 'Tzav', 'regular'],
      ['2024-03-21', 'Fast of Esther', 'fast_day'],
    ]);
  });

  it('sorts by date even when the source does not', () => {
    const readings = collectWeekdayReadings([...items].reverse());
    expect(readings.map((r) => r.date)).toEqual(['2024-03-11', '2024-03-14', '2024-03-18', '2024-03-21']);
  });
});

describe('buildMinyanReport', () => {
  it('lays out one block per reading followed by a blank row', () => {
    const model = buildMinyanReport(items);
    expect(model.title).toBe('Minyan');
    expect(model.warnings).toEqual([]);
    expect(model.rows).toHaveLength(21);
    expect(model.rows.map((row) => row.kind)).toEqual([
      'header', 'reading', 'reading', 'reading', 'reading', 'blank',
      'header', 'reading', 'reading', 'reading', 'blank',
      'header', 'reading', 'reading', 'reading', 'blank',
      'header', 'reading', 'reading', 'reading', 'blank',
    ]);
  });

  it('writes the date header with a highlight for the reading type', () => {
    const { rows } = buildMinyanReport(items);
    expect(rows[0].cells).toEqual(['Mar 11', '1 Adar II', 'Rosh Chodesh Adar II', 'Monday', '', '']);
    expect(rows[0].formats).toEqual([
      { fromColumn: 0, toColumn: 3, background: 'success', bold: true, align: 'CENTER' },
    ]);
    expect(rows[6].cells).toEqual(['Mar 14', '4 Adar II', 'Vayikra', 'Thursday', '', '']);
    expect(rows[6].formats[0].background).toBe('neutral');
    expect(rows[16].cells).toEqual(['Mar 21', '11 Adar II', 'Fast of Esther', 'Thursday', '', '']);
    expect(rows[16].formats[0].background).toBe('warning');
  });

  it('lists the aliyot with Roman labels', () => {
    const { rows } = buildMinyanReport(items);
    expect(rows.slice(1, 5).map((row) => [row.cells[0], row.cells[1]])).toEqual([
      ['I', 'Numbers 28:1-3 (3)'],
      ['II', 'Numbers 28:3-5 (3)'],
      ['III', 'Numbers 28:6-10 (5)'],
      ['IV', 'Numbers 28:11-15 (5)'],
    ]);
    expect(rows[1].formats).toEqual([{ fromColumn: 0, toColumn: 0, align: 'CENTER' }]);
    expect(rows[5].cells).toEqual(['', '', '', '', '', '']);
  });

  it('never lists Maftir on a weekday', () => {
    const item: LeyningItem = {
      name: { en: 'Rosh Chodesh Elul' },
      date: '2024-09-04',
      hdate: '1 Elul 5784',
      fullkriyah: {
        M: { k: 'Numbers', b: '28:11', e: '28:15', v: 5 },
        '1': { k: 'Numbers', b: '28:1', e: '28:3', v: 3 },
      },
    };
    const { rows } = buildMinyanReport([item]);
    expect(rows.map((row) => row.cells[0])).toEqual(['Sep 04', 'I', '']);
  });

  it('warns about malformed readings and unreadable dates', () => {
    const item: LeyningItem = {
      name: { en: 'Vayera' },
      date: 'someday',
      hdate: 'soon',
      weekday: { '1': { k: 'Genesis', b: '18', e: '18:5' } },
    };
    const model = buildMinyanReport([item]);
    expect(model.rows[0].cells).toEqual(['someday', 'soon', 'Vayera', '', '', '']);
    expect(model.rows[1].cells[1]).toBe('Error formatting verse range');
    expect(model.warnings).toEqual([
      'Vayera: unreadable date "someday"',
      'Vayera: unreadable Hebrew date "soon"',
      'Vayera: malformed reading for aliyah 1',
    ]);
  });

  it('returns no rows when nothing qualifies', () => {
    expect(buildMinyanReport(items.filter((item) => !item.weekday && item.name.en === 'Vayikra')).rows).toEqual([]);
  });
});
