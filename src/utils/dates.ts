const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/**
 * Parse a strict `YYYY-MM-DD` calendar date.
 * Returns null for anything that is not a real date (2024-02-30, 2024-1-5, "").
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const match = CALENDAR_DATE.exec(value.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const probe = utcDate(year, month, day);
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

/**
 * Days since the Unix epoch, used as a sortable key
 */
export function toEpochDay(date: CalendarDate): number {
  return utcDate(date.year, date.month, date.day).getTime() / 86_400_000;
}

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not
function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

/**
 * Reformat `YYYY-MM-DD` as `MM-DD-YYYY`; unparseable input is returned as-is
 */
export function formatDisplayDate(value: string): string {
  const date = parseCalendarDate(value);
  if (!date) {
    return value;
  }

  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${month}-${day}-${String(date.year).padStart(4, '0')}`;
}
