import { belongsInWeekdayReport, classifyReadingType } from './classify';
import { hebrewDayMonth, shortDisplayDate, weekdayName } from './dates';
import { MINYAN_SHEET_TITLE, READING_TYPE_HIGHLIGHTS, emptyCells } from './layout';
import { VERSE_RANGE_ERROR, aliyahLabel, formatVerseRange, readVerseSpan, sortAliyahKeys } from './verses';
import type { LeyningItem, ReadingMap, ReadingType, ReportModel, ReportRow } from './types';

export interface WeekdayReading {
  name: string;
  date: string;
  hdate: string;
  type: ReadingType;
  readings: ReadingMap;
}

/** Weekday excerpts plus special full-reading days, oldest first. */
export function collectWeekdayReadings(items: readonly LeyningItem[]): WeekdayReading[] {
  return items
    .filter(belongsInWeekdayReport)
    .map((item) => ({
      name: item.name.en,
      date: item.date,
      hdate: item.hdate,
      type: classifyReadingType(item.name.en),
      readings: item.weekday ?? item.fullkriyah ?? {},
    }))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

function headerRow(reading: WeekdayReading, warnings: string[]): ReportRow {
  const secular = shortDisplayDate(reading.date);
  const hebrew = hebrewDayMonth(reading.hdate);
  const weekday = weekdayName(reading.date);
  if (!secular || !weekday) warnings.push(`${reading.name}: unreadable date "${reading.date}"`);
  if (!hebrew) warnings.push(`${reading.name}: unreadable Hebrew date "${reading.hdate}"`);

  return {
    kind: 'header',
    cells: [secular ?? reading.date, hebrew ?? reading.hdate, reading.name, weekday ?? '', '', ''],
    formats: [
      { fromColumn: 0, toColumn: 3, background: READING_TYPE_HIGHLIGHTS[reading.type], bold: true, align: 'CENTER' },
    ],
  };
}

function aliyahRows(reading: WeekdayReading, warnings: string[]): ReportRow[] {
  // Maftir is never read on weekdays
  const keys = sortAliyahKeys(Object.keys(reading.readings)).filter((key) => key.kind !== 'maftir');
  return keys.map((key): ReportRow => {
    const text = formatVerseRange(readVerseSpan(reading.readings[key.raw]));
    if (text === VERSE_RANGE_ERROR) warnings.push(`${reading.name}: malformed reading for aliyah ${key.raw}`);
    return {
      kind: 'reading',
      cells: [aliyahLabel(key), text, '', '', '', ''],
      formats: [{ fromColumn: 0, toColumn: 0, align: 'CENTER' }],
    };
  });
}

export function buildMinyanReport(items: readonly LeyningItem[]): ReportModel {
  const warnings: string[] = [];
  const rows: ReportRow[] = [];
  for (const reading of collectWeekdayReadings(items)) {
    rows.push(headerRow(reading, warnings));
    rows.push(...aliyahRows(reading, warnings));
    rows.push({ kind: 'blank', cells: emptyCells(), formats: [] });
  }
  return { title: MINYAN_SHEET_TITLE, rows, warnings };
}
