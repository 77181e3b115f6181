import { MalformedDateError } from '@plenar/shared';
import type { CalendarDate } from '@plenar/contracts';

const DIGITS = /^\d+$/;

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
 * Normalize a `DD.MM.YYYY` date.
 *
 * Splits on `.`, drops empty pieces and reads them as year, month, day.
 * Text without any pieces (`''`, `'..'`) is returned unchanged.
 * The date is at UTC midnight; years below 100 are taken literally.
 *
 * @throws MalformedDateError for non-numeric pieces, a wrong number of
 *   pieces, or a date that does not exist in the calendar
 *
 * @example
 * normalizeDate('01.02.1990') // => 1990-02-01T00:00:00.000Z
 * normalizeDate('')           // => ''
 */
export function normalizeDate(text: string): Date | string {
  const pieces = text.split('.').filter((piece) => piece.length > 0).reverse();
  if (pieces.length === 0) {
    return text;
  }

  if (!pieces.every((piece) => DIGITS.test(piece))) {
    throw new MalformedDateError(text, 'non-numeric component');
  }
  if (pieces.length !== 3) {
    throw new MalformedDateError(text, `expected day, month and year, got ${pieces.length} component(s)`);
  }

  const [yearText = '', monthText = '', dayText = ''] = pieces;
  const year = Number.parseInt(yearText, 10);
  const month = Number.parseInt(monthText, 10);
  const day = Number.parseInt(dayText, 10);

  if (year < 1 || year > 9999) {
    throw new MalformedDateError(text, `year ${year} out of range`);
  }
  if (month < 1 || month > 12) {
    throw new MalformedDateError(text, `month ${month} out of range`);
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new MalformedDateError(text, `day ${day} out of range for month ${month}`);
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

/**
 * {@link normalizeDate} for record fields: text that holds no date becomes null.
 */
export function toCalendarDate(text: string): CalendarDate {
  const normalized = normalizeDate(text);
  return normalized instanceof Date ? normalized : null;
}
