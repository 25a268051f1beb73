// Day name is optional; seconds are optional; zone is a numeric offset or an
// obsolete alphabetic zone (GMT, UT, EST, Z, ...).
const RFC_2822 =
  /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{2,4})\s+\d{1,2}:\d{2}(?::\d{2})?\s+(?:[+-]\d{4}|[A-Za-z]{1,5})$/;

const RFC_3339 = /^(\d{4})-(\d{2})-(\d{2})[Tt ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:[Zz]|[+-]\d{2}:\d{2})$/;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// Two-digit years: 00-49 are 20xx, 50-99 are 19xx. Three digits add 1900.
function fullYear(digits: string): number {
  const year = Number(digits);
  if (digits.length === 2) return year < 50 ? 2000 + year : 1900 + year;
  if (digits.length === 3) return 1900 + year;
  return year;
}

/**
 * Whether `day` exists in the month (0-based) of `year`. Date.parse rolls
 * 31 Feb over into March instead of rejecting it.
 */
function isCalendarDay(year: number, month: number, day: number): boolean {
  if (month < 0 || month > 11 || day < 1) return false;
  return day <= new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

function toDate(value: string): Date | null {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Parse an RFC-2822 date (RSS `pubDate`, `lastBuildDate`). Returns null when
 * the value does not look like one or names an impossible date.
 */
export function parseRfc2822(raw: string | null): Date | null {
  if (raw === null) return null;
  const value = raw.trim().replace(/\s+/g, ' ');
  const match = RFC_2822.exec(value);
  if (!match) return null;
  const [, day, monthName, year] = match;
  if (!isCalendarDay(fullYear(year), MONTHS.indexOf(monthName.toLowerCase()), Number(day))) return null;
  return toDate(value);
}

/**
 * Parse an RFC-3339 timestamp (Atom `updated`).
 */
export function parseRfc3339(raw: string | null): Date | null {
  if (raw === null) return null;
  const value = raw.trim();
  const match = RFC_3339.exec(value);
  if (!match) return null;
  const [, year, month, day] = match;
  if (!isCalendarDay(Number(year), Number(month) - 1, Number(day))) return null;
  return toDate(value.toUpperCase().replace(' ', 'T'));
}

export function toIsoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function fromIsoOrNull(value: string | null): Date | null {
  return value === null ? null : toDate(value);
}
