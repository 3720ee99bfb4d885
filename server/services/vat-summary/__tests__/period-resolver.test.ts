import { describe, it, expect } from 'vitest';
import {
  normalizeSheetName,
  parseCellDate,
  parseDateText,
  resolveMonthFromDates,
  resolveMonthFromSheetName,
  resolveSheetYear,
} from '../period-resolver';

const utc = (year: number, month: number, day: number) => new Date(Date.UTC(year, month - 1, day));

describe('parseCellDate', () => {
  it('reads spreadsheet serial numbers as UTC dates', () => {
    expect(parseCellDate(45366)).toEqual(utc(2024, 3, 15));
    expect(parseCellDate(45292)).toEqual(utc(2024, 1, 1));
  });

  it('passes valid Date values through and rejects invalid ones', () => {
    const date = utc(2023, 12, 31);
    expect(parseCellDate(date)).toBe(date);
    expect(parseCellDate(new Date('nonsense'))).toBeNull();
  });

  it('returns null for empty and unsupported cells', () => {
    expect(parseCellDate(null)).toBeNull();
    expect(parseCellDate(true)).toBeNull();
    expect(parseCellDate('soon')).toBeNull();
  });
});

describe('parseDateText', () => {
  it('reads numeric dates day-first', () => {
    expect(parseDateText('05/03/2024')).toEqual(utc(2024, 3, 5));
    expect(parseDateText('05.03.24')).toEqual(utc(2024, 3, 5));
  });

  it('falls back to month-first when day-first is impossible', () => {
    expect(parseDateText('03/15/2024')).toEqual(utc(2024, 3, 15));
  });

  it('reads ISO and month-name dates', () => {
    expect(parseDateText('2024-03-15')).toEqual(utc(2024, 3, 15));
    expect(parseDateText('15 March 2024')).toEqual(utc(2024, 3, 15));
    expect(parseDateText('Mar 5, 2024')).toEqual(utc(2024, 3, 5));
  });

  it('rejects dates that do not exist', () => {
    expect(parseDateText('31/04/2024')).toBeNull();
    expect(parseDateText('29/02/2023')).toBeNull();
  });
});

describe('resolveMonthFromSheetName', () => {
  it('finds a month name anywhere in the sheet name', () => {
    expect(resolveMonthFromSheetName('March 2024')).toEqual({ month: 'Mar', monthNumber: 3 });
    expect(resolveMonthFromSheetName('VAT_Sept-23')).toEqual({ month: 'Sep', monthNumber: 9 });
    expect(resolveMonthFromSheetName('June')).toEqual({ month: 'Jun', monthNumber: 6 });
  });

  it('accepts a standalone month number', () => {
    expect(resolveMonthFromSheetName('Sheet 7')).toEqual({ month: 'Jul', monthNumber: 7 });
  });

  it('reports Unknown when nothing matches', () => {
    expect(resolveMonthFromSheetName('Sheet 13')).toEqual({ month: 'Unknown', monthNumber: 0 });
    expect(resolveMonthFromSheetName('Totals')).toEqual({ month: 'Unknown', monthNumber: 0 });
  });

  it('normalizes separators and case first', () => {
    expect(normalizeSheetName('  VAT_Sept-23 ')).toBe('vat sept 23');
  });
});

describe('resolveSheetYear', () => {
  it('takes the most frequent year and flags mixed years', () => {
    const result = resolveSheetYear([utc(2023, 1, 5), utc(2023, 1, 9), utc(2024, 1, 2), null]);

    expect(result.year).toBe(2023);
    expect(result.ambiguous).toBe(true);
    expect(result.fallback).toBe(false);
    expect([...result.yearCounts]).toEqual([[2023, 2], [2024, 1]]);
  });

  it('breaks ties in favour of the year seen first', () => {
    expect(resolveSheetYear([utc(2024, 1, 1), utc(2023, 1, 1)]).year).toBe(2024);
  });

  it('falls back to the current year when no date parses', () => {
    const result = resolveSheetYear([null, null], new Date(Date.UTC(2025, 5, 1)));

    expect(result).toEqual({ year: 2025, yearCounts: new Map(), ambiguous: false, fallback: true });
  });
});

describe('resolveMonthFromDates', () => {
  it('uses the dominant month of the parsed dates', () => {
    expect(resolveMonthFromDates([utc(2024, 4, 1), utc(2024, 4, 30), utc(2024, 5, 1)]))
      .toEqual({ month: 'Apr', monthNumber: 4 });
  });

  it('is Unknown without dates', () => {
    expect(resolveMonthFromDates([null])).toEqual({ month: 'Unknown', monthNumber: 0 });
  });
});
