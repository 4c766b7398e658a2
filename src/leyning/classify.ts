import type { LeyningItem, ReadingType } from './types';

/** Checked top to bottom; the first rule with a matching keyword wins. */
export const READING_TYPE_RULES: ReadonlyArray<{ type: Exclude<ReadingType, 'regular'>; keywords: string[] }> = [
  { type: 'fast_day', keywords: ['fast', 'taanit'] },
  { type: 'rosh_chodesh', keywords: ['rosh chodesh'] },
  { type: 'chol_hamoed', keywords: ['chol ha-moed', 'chol hamoed'] },
];

export function classifyReadingType(name: string): ReadingType {
  const lower = String(name ?? '').toLowerCase();
  for (const rule of READING_TYPE_RULES) {
    if (rule.keywords.some((keyword) => lower.includes(keyword))) return rule.type;
  }
  return 'regular';
}

export function isSpecialDay(name: string): boolean {
  return classifyReadingType(name) !== 'regular';
}

export function belongsInWeekdayReport(item: Pick<LeyningItem, 'name' | 'weekday' | 'fullkriyah'>): boolean {
  if (item.weekday) return true;
  return Boolean(item.fullkriyah) && isSpecialDay(item.name.en);
}
