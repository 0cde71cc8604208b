/**
 * Appointment dates
 *
 * Dates are plain calendar days carried as ISO `YYYY-MM-DD` strings, so
 * ordering is a string comparison and no time zone ever leaks in.
 */

/** Calendar date in `YYYY-MM-DD` form */
export type AppointmentDate = string;

export const WEEKDAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

/**
 * "<Weekday> <Month> <Day>, <Year>", e.g. "Wednesday August 27, 2025".
 * Full names only, matched case-insensitively; runs of whitespace are
 * allowed wherever the format has a space.
 */
const HEADING_DATE_PATTERN = new RegExp(
  `^(?:${WEEKDAY_NAMES.join('|')})\\s+(${MONTH_NAMES.join('|')})\\s+(\\d{1,2}),\\s+(\\d{4})$`,
  'i'
);

const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Build an ISO date from components, or null if they do not name a real
 * Gregorian day.
 */
export function toAppointmentDate(year: number, month: number, day: number): AppointmentDate | null {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return null;
  }
  const probe = new Date(Date.UTC(2000, month - 1, day));
  probe.setUTCFullYear(year);
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Parse a heading such as "Wednesday August 27, 2025".
 *
 * The weekday name must be present and spelled out but is not checked
 * against the date it precedes. Returns null for anything else (abbreviated
 * names, missing comma, impossible days).
 */
export function parseHeadingDate(text: string): AppointmentDate | null {
  const match = HEADING_DATE_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [, monthName, dayText, yearText] = match;
  const monthIndex = MONTH_NAMES.findIndex((name) => name.toLowerCase() === monthName.toLowerCase());

  return toAppointmentDate(Number(yearText), monthIndex + 1, Number(dayText));
}

/**
 * Parse an operator-supplied `YYYY-MM-DD` value. Single-digit month and day
 * are accepted and normalized.
 */
export function parseIsoDate(text: string): AppointmentDate | null {
  const match = ISO_DATE_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  return toAppointmentDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function isValidIsoDate(text: string): boolean {
  return parseIsoDate(text) !== null;
}

function toUtcDate(date: AppointmentDate): Date {
  const [year, month, day] = date.split('-').map(Number);
  const result = new Date(Date.UTC(2000, month - 1, day));
  result.setUTCFullYear(year);
  return result;
}

function fromUtcDate(date: Date): AppointmentDate {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

/**
 * Long form used in logs and emails: "Friday September 05, 2025"
 */
export function formatLongDate(date: AppointmentDate): string {
  const utc = toUtcDate(date);
  const weekday = WEEKDAY_NAMES[utc.getUTCDay()];
  const month = MONTH_NAMES[utc.getUTCMonth()];
  return `${weekday} ${month} ${pad(utc.getUTCDate(), 2)}, ${pad(utc.getUTCFullYear(), 4)}`;
}

export function addDays(date: AppointmentDate, days: number): AppointmentDate {
  const utc = toUtcDate(date);
  utc.setUTCDate(utc.getUTCDate() + days);
  return fromUtcDate(utc);
}

/**
 * Local calendar day of the given instant
 */
export function localDate(now: Date = new Date()): AppointmentDate {
  return `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1, 2)}-${pad(now.getDate(), 2)}`;
}

export function isAfter(date: AppointmentDate, other: AppointmentDate): boolean {
  return date > other;
}
