const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/;
const FILENAME_DATE_PATTERN = /^(\d{4}-\d{2}-\d{2})-/;

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const daysInMonth = (year: number, month: number): number =>
  month === 2 && isLeapYear(year) ? 29 : MONTH_LENGTHS[month - 1];

const parseOffsetMinutes = (zone: string | undefined): number | null => {
  if (!zone || zone === "Z") {
    return 0;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = Number.parseInt(digits.slice(2, 4), 10);
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return sign * (hours * 60 + minutes);
};

/**
 * Parses a front-matter date. Accepts the Jekyll form `2021-03-04 10:00:00 +0100`
 * as well as ISO 8601. A value without a zone is read as UTC.
 */
export const parsePostDate = (value: unknown): Date | null => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== "string") {
    return null;
  }

  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fractionText, zone] = match;
  const year = Number.parseInt(yearText, 10);
  const month = Number.parseInt(monthText, 10);
  const day = Number.parseInt(dayText, 10);
  const hour = hourText ? Number.parseInt(hourText, 10) : 0;
  const minute = minuteText ? Number.parseInt(minuteText, 10) : 0;
  const second = secondText ? Number.parseInt(secondText, 10) : 0;
  const millis = fractionText ? Number.parseInt(fractionText.padEnd(3, "0").slice(0, 3), 10) : 0;

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const offset = parseOffsetMinutes(zone);
  if (offset === null) {
    return null;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return new Date(date.getTime() - offset * 60_000);
};

const pad = (value: number, length = 2): string => String(value).padStart(length, "0");

/** Formats a date the way new posts write it: `YYYY-MM-DD HH:MM:SS +0000`. */
export const formatPostDate = (date: Date): string =>
  `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
  `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} +0000`;

export const calendarDateOf = (date: Date): string => date.toISOString().slice(0, 10);

export const dateFromFilename = (fileName: string): string | null => {
  const match = FILENAME_DATE_PATTERN.exec(fileName);
  return match ? match[1] : null;
};
