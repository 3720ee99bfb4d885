/**
 * Date and period resolution
 *
 * Dates are carried as UTC-midnight `Date` values; every calendar component
 * is read with the UTC getters so the server time zone never shifts a record
 * into another month or year.
 */

import {
  MONTH_LABELS,
  MONTH_TOKENS,
  UNKNOWN_MONTH,
} from "@shared/constants";
import { INGESTION, MS_PER_DAY } from "../../config/constants";

export interface ResolvedMonth {
  /** Three-letter label, or "Unknown" */
  month: string;
  /** 1–12, or 0 when unknown */
  monthNumber: number;
}

export interface YearResolution {
  year: number;
  /** Occurrences per year, in order of first appearance */
  yearCounts: Map<number, number>;
  /** More than one distinct year in the date column */
  ambiguous: boolean;
  /** No parseable date; the current year was used */
  fallback: boolean;
}

const UNKNOWN: ResolvedMonth = { month: UNKNOWN_MONTH, monthNumber: 0 };

const MONTH_NAME_NUMBERS: ReadonlyMap<string, number> = new Map([
  ["january", 1], ["february", 2], ["march", 3], ["april", 4],
  ["june", 6], ["july", 7], ["august", 8], ["september", 9], ["sept", 9],
  ["october", 10], ["november", 11], ["december", 12],
  ...MONTH_LABELS.map((label, index): [string, number] => [label.toLowerCase(), index + 1]),
]);

function monthFromNumber(monthNumber: number): ResolvedMonth {
  const label = MONTH_LABELS[monthNumber - 1];
  return label ? { month: label, monthNumber } : UNKNOWN;
}

function calendarDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  // Rejects 31/04, 29/02 outside leap years, etc.
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function expandYear(year: string): number {
  const value = Number(year);
  return year.length === 2 ? 2000 + value : value;
}

const ISO_DATE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T\s].*)?$/;
const NUMERIC_DATE = /^(\d{1,2})[/.\-](\d{1,2})[/.\-](\d{2}|\d{4})(?:\s.*)?$/;
const DAY_MONTH_NAME = /^(\d{1,2})(?:st|nd|rd|th)?[\s\-/.]+([a-z]+)\.?,?[\s\-/.]+(\d{2}|\d{4})(?:\s.*)?$/;
const MONTH_NAME_DAY = /^([a-z]+)\.?[\s\-/.]+(\d{1,2})(?:st|nd|rd|th)?,?[\s\-/.]+(\d{2}|\d{4})(?:\s.*)?$/;

/**
 * Day-first parsing of a date string. ISO dates stay year-first; `D/M/Y`
 * readings swap to month-first only when day-first is impossible.
 */
export function parseDateText(raw: string): Date | null {
  const text = raw.trim().toLowerCase();
  if (!text) return null;

  let match = ISO_DATE.exec(text);
  if (match) {
    return calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = NUMERIC_DATE.exec(text);
  if (match) {
    const first = Number(match[1]);
    const second = Number(match[2]);
    const year = expandYear(match[3]);
    return calendarDate(year, second, first) ?? calendarDate(year, first, second);
  }

  match = DAY_MONTH_NAME.exec(text);
  if (match) {
    const month = MONTH_NAME_NUMBERS.get(match[2]);
    return month ? calendarDate(expandYear(match[3]), month, Number(match[1])) : null;
  }

  match = MONTH_NAME_DAY.exec(text);
  if (match) {
    const month = MONTH_NAME_NUMBERS.get(match[1]);
    return month ? calendarDate(expandYear(match[3]), month, Number(match[2])) : null;
  }

  return null;
}

/**
 * Normalize one date cell. Never throws; anything unrecognized is null.
 */
export function parseCellDate(value: unknown): Date | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === "number") {
    if (value >= INGESTION.SERIAL_DATE_MIN && value <= INGESTION.SERIAL_DATE_MAX) {
      return new Date(INGESTION.SERIAL_DATE_EPOCH_MS + value * MS_PER_DAY);
    }
    return parseDateText(String(value));
  }
  if (typeof value === "string") {
    return parseDateText(value);
  }
  return null;
}

/**
 * Sheet-name normal form: diacritics stripped, non-alphanumerics turned into
 * spaces, lower-cased.
 */
export function normalizeSheetName(name: string): string {
  return name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^A-Za-z0-9]+/g, " ")
    .toLowerCase()
    .trim();
}

/**
 * Month encoded in a sheet name: a month-name token anywhere in the name,
 * else a standalone number 1–12.
 */
export function resolveMonthFromSheetName(sheetName: string): ResolvedMonth {
  const normalized = normalizeSheetName(sheetName);

  const named = MONTH_TOKENS.find(({ token }) => normalized.includes(token));
  if (named) {
    return { month: named.label, monthNumber: named.number };
  }

  for (const token of normalized.split(" ")) {
    if (/^\d{1,2}$/.test(token)) {
      const resolved = monthFromNumber(Number(token));
      if (resolved.monthNumber > 0) {
        return resolved;
      }
    }
  }

  return UNKNOWN;
}

/**
 * Most frequent value; ties go to the value seen first.
 */
function mode(counts: Map<number, number>): number | undefined {
  let best: number | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

function countBy(dates: readonly Date[], key: (date: Date) => number): Map<number, number> {
  const counts = new Map<number, number>();
  for (const date of dates) {
    const value = key(date);
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

/**
 * Reporting year of a sheet from its parsed dates.
 */
export function resolveSheetYear(
  dates: readonly (Date | null)[],
  now: Date = new Date()
): YearResolution {
  const parsed = dates.filter((date): date is Date => date !== null);
  const yearCounts = countBy(parsed, date => date.getUTCFullYear());
  const year = mode(yearCounts);

  if (year === undefined) {
    return { year: now.getUTCFullYear(), yearCounts, ambiguous: false, fallback: true };
  }
  return { year, yearCounts, ambiguous: yearCounts.size > 1, fallback: false };
}

/**
 * Dominant month of the parsed dates, used when the sheet name has none.
 */
export function resolveMonthFromDates(dates: readonly (Date | null)[]): ResolvedMonth {
  const parsed = dates.filter((date): date is Date => date !== null);
  const month = mode(countBy(parsed, date => date.getUTCMonth() + 1));
  return month === undefined ? UNKNOWN : monthFromNumber(month);
}
