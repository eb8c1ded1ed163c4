export const TARGET_OFFSET_MINUTES = 5 * 60 + 30;
export const TARGET_ZONE_LABEL = "UTC+05:30";

const MINUTES_PER_DAY = 24 * 60;
const DIGITS = /^\d+$/;

function digitsAt(value: string, start: number, length: number): number | null {
  const slice = value.slice(start, start + length);
  if (slice.length < length || !DIGITS.test(slice)) {
    return null;
  }
  return Number(slice);
}

/** Time components default to 0 when the string ends before them. */
function optionalDigitsAt(value: string, start: number): number | null {
  if (value.length <= start) {
    return 0;
  }
  return digitsAt(value, start, 2);
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Offset in minutes east of UTC for a suffix such as `+05'30'` or `-08'00'`.
 * Anything unparseable counts as UTC.
 */
export function parseOffsetMinutes(suffix: string): number {
  const sign = suffix.charAt(0);
  if (sign !== "+" && sign !== "-") {
    return 0;
  }

  const hours = suffix.slice(1, 3);
  if (!DIGITS.test(hours)) {
    return 0;
  }

  let minutes = 0;
  if (suffix.length >= 6) {
    const rawMinutes = suffix.slice(4, 6);
    if (!DIGITS.test(rawMinutes)) {
      return 0;
    }
    minutes = Number(rawMinutes);
  }

  const total = Number(hours) * 60 + minutes;
  if (total >= MINUTES_PER_DAY) {
    return 0;
  }
  return sign === "-" ? -total : total;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Convert a PDF date (`D:YYYYMMDDHHmmSSOHH'mm'`) to `YYYY-MM-DD HH:MM:SS UTC+05:30`.
 * Returns the input untouched when it cannot be read as a calendar date.
 */
export function normalizePdfDate(raw: string): string {
  if (!raw) {
    return "";
  }

  const value = raw.startsWith("D:") ? raw.slice(2) : raw;

  const year = digitsAt(value, 0, 4);
  const month = year === null ? null : digitsAt(value, 4, 2);
  const day = month === null ? null : digitsAt(value, 6, 2);
  if (year === null || month === null || day === null) {
    return raw;
  }

  const hour = optionalDigitsAt(value, 8);
  const minute = optionalDigitsAt(value, 10);
  const second = optionalDigitsAt(value, 12);
  if (hour === null || minute === null || second === null) {
    return raw;
  }

  if (
    year < 1 ||
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return raw;
  }

  const offsetMinutes = parseOffsetMinutes(value.slice(14));

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const local = new Date(0);
  local.setUTCFullYear(year, month - 1, day);
  local.setUTCHours(hour, minute, second, 0);

  const shifted = new Date(local.getTime() + (TARGET_OFFSET_MINUTES - offsetMinutes) * 60_000);
  const shiftedYear = shifted.getUTCFullYear();
  if (shiftedYear < 1 || shiftedYear > 9999) {
    return raw;
  }

  return (
    `${pad(shiftedYear, 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())} ` +
    `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())} ` +
    TARGET_ZONE_LABEL
  );
}
