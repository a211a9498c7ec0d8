/**
 * Date Parsing
 *
 * Calendar dates without a time zone. "Today" is always the UTC date of the
 * injected clock.
 */

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
}

export type DateFormat = 'YYYY-MM-DD' | 'DD-MM-YYYY' | 'MM/DD/YYYY' | 'DD/MM/YYYY';

interface FormatRule {
  format: DateFormat;
  pattern: RegExp;
  /** Capture group index holding year, month and day */
  order: { year: number; month: number; day: number };
}

const FORMAT_RULES: Record<DateFormat, FormatRule> = {
  'YYYY-MM-DD': {
    format: 'YYYY-MM-DD',
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    order: { year: 1, month: 2, day: 3 },
  },
  'DD-MM-YYYY': {
    format: 'DD-MM-YYYY',
    pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/,
    order: { year: 3, month: 2, day: 1 },
  },
  'MM/DD/YYYY': {
    format: 'MM/DD/YYYY',
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    order: { year: 3, month: 1, day: 2 },
  },
  'DD/MM/YYYY': {
    format: 'DD/MM/YYYY',
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    order: { year: 3, month: 2, day: 1 },
  },
};

/**
 * Formats tried when comparing dates across documents. The first format that
 * yields a real calendar date wins, so "03/04/1990" is read as March 4.
 */
export const CONSISTENCY_DATE_FORMATS: readonly DateFormat[] = [
  'YYYY-MM-DD',
  'DD-MM-YYYY',
  'MM/DD/YYYY',
  'DD/MM/YYYY',
];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidCalendarDate(date: CalendarDate): boolean {
  return (
    date.year >= 1 &&
    date.month >= 1 &&
    date.month <= 12 &&
    date.day >= 1 &&
    date.day <= daysInMonth(date.year, date.month)
  );
}

export function parseDateWithFormat(value: string, format: DateFormat): CalendarDate | null {
  const rule = FORMAT_RULES[format];
  const match = rule.pattern.exec(value.trim());
  if (!match) {
    return null;
  }

  const date: CalendarDate = {
    year: Number(match[rule.order.year]),
    month: Number(match[rule.order.month]),
    day: Number(match[rule.order.day]),
  };

  return isValidCalendarDate(date) ? date : null;
}

export function parseIsoDate(value: string | null | undefined): CalendarDate | null {
  if (typeof value !== 'string') {
    return null;
  }
  return parseDateWithFormat(value, 'YYYY-MM-DD');
}

/**
 * Try each format in order and return the first calendar-valid reading.
 */
export function parseFlexibleDate(
  value: string | null | undefined,
  formats: readonly DateFormat[] = CONSISTENCY_DATE_FORMATS
): CalendarDate | null {
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }

  for (const format of formats) {
    const parsed = parseDateWithFormat(value, format);
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

export function sameCalendarDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

/**
 * Zero-padded YYYY-MM-DD; these compare correctly as strings.
 */
export function formatIsoDate(date: CalendarDate): string {
  const pad = (n: number, width: number) => String(n).padStart(width, '0');
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

export function utcCalendarDate(instant: Date): CalendarDate {
  return {
    year: instant.getUTCFullYear(),
    month: instant.getUTCMonth() + 1,
    day: instant.getUTCDate(),
  };
}

function toEpochDay(date: CalendarDate): number {
  return Math.floor(Date.UTC(date.year, date.month - 1, date.day) / 86_400_000);
}

/**
 * Whole calendar years between birth and today; the birthday itself counts.
 */
export function ageInCalendarYears(birth: CalendarDate, today: CalendarDate): number {
  let years = today.year - birth.year;
  if (today.month < birth.month || (today.month === birth.month && today.day < birth.day)) {
    years -= 1;
  }
  return years;
}

/**
 * Days since birth divided by 365, rounded down. Ignores leap days, so it
 * reaches a given age a few days before the real birthday.
 */
export function ageInDays365(birth: CalendarDate, today: CalendarDate): number {
  return Math.floor((toEpochDay(today) - toEpochDay(birth)) / 365);
}
