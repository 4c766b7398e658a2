const DAY_MS = 24 * 60 * 60 * 1000;

function parseIsoDate(iso: string): Date | undefined {
  const date = new Date(`${iso}T00:00:00Z`);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function format(iso: string, opts: Intl.DateTimeFormatOptions, offsetDays = 0): string | undefined {
  const date = parseIsoDate(iso);
  if (!date) return undefined;
  const shifted = new Date(date.getTime() + offsetDays * DAY_MS);
  return shifted.toLocaleDateString('en-US', { timeZone: 'UTC', ...opts });
}

/** `2024-01-06` → `January 6` */
export function longDisplayDate(iso: string): string | undefined {
  return format(iso, { month: 'long', day: 'numeric' });
}

/** The evening before, for Kabbalat Shabbat. */
export function previousDisplayDate(iso: string): string | undefined {
  return format(iso, { month: 'long', day: 'numeric' }, -1);
}

/** `2024-01-06` → `Jan 06` */
export function shortDisplayDate(iso: string): string | undefined {
  return format(iso, { month: 'short', day: '2-digit' });
}

export function weekdayName(iso: string): string | undefined {
  return format(iso, { weekday: 'long' });
}

interface HebrewDateParts {
  day: string;
  month: string;
}

function splitHebrewDate(hdate: string): HebrewDateParts | undefined {
  const tokens = String(hdate ?? '').trim().split(/\s+/).filter(Boolean);
  if (tokens.length < 3) return undefined;
  return { day: tokens[0], month: tokens.slice(1, -1).join(' ') };
}

/** `25 Tevet 5784` → `Tevet 25`; `1 Adar II 5784` → `Adar II 1` */
export function hebrewMonthDay(hdate: string): string | undefined {
  const parts = splitHebrewDate(hdate);
  return parts ? `${parts.month} ${parts.day}` : undefined;
}

/** `25 Tevet 5784` → `25 Tevet` */
export function hebrewDayMonth(hdate: string): string | undefined {
  const parts = splitHebrewDate(hdate);
  return parts ? `${parts.day} ${parts.month}` : undefined;
}
