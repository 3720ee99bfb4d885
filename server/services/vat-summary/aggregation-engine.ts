import {
  BOX_DESCRIPTIONS,
  UNKNOWN_MONTH,
  type PeriodGrouping,
  type SummaryBox,
} from "@shared/constants";
import type { NormalizedRecord, PeriodTotals, SummaryRow, SummaryTableRow } from "@shared/schema";
import { roundTo2Decimals } from "./value-parser";

interface PeriodKey {
  label: string;
  year: number;
  monthNumber: number;
}

interface BoxTotals {
  net: number;
  vat: number;
}

function periodOf(record: NormalizedRecord, grouping: PeriodGrouping): PeriodKey {
  const month = record.month || UNKNOWN_MONTH;
  if (grouping === "month") {
    return { label: month, year: 0, monthNumber: record.monthNumber };
  }
  return { label: `${month} ${record.year}`, year: record.year, monthNumber: record.monthNumber };
}

/**
 * Net and VAT totals of the records whose box label contains the letter,
 * case-insensitive. A label like "AB" counts towards both A and B, and so
 * does "Box A", whose "Box" carries a B.
 */
function totalsFor(records: readonly NormalizedRecord[], letter: Exclude<SummaryBox, "D">): BoxTotals {
  return records
    .filter(record => record.box.toUpperCase().includes(letter))
    .reduce<BoxTotals>(
      (totals, record) => ({ net: totals.net + record.netValue, vat: totals.vat + record.vatValue }),
      { net: 0, vat: 0 }
    );
}

function summaryRow(period: string, box: SummaryBox, net: number, vat: number, payable: number): SummaryRow {
  return {
    period,
    box,
    description: BOX_DESCRIPTIONS[box],
    netValue: roundTo2Decimals(net),
    vatValue: roundTo2Decimals(vat),
    netVatPayable: roundTo2Decimals(payable),
  };
}

/**
 * Four rows (A, B, C, D) per period, periods in chronological order.
 * Box D carries VAT(A) − VAT(C) as both its VAT value and the payable amount.
 */
export function calculateSummary(
  records: readonly NormalizedRecord[],
  grouping: PeriodGrouping = "month-year"
): SummaryRow[] {
  const periods = new Map<string, { key: PeriodKey; records: NormalizedRecord[] }>();
  for (const record of records) {
    const key = periodOf(record, grouping);
    const bucket = periods.get(key.label);
    if (bucket) {
      bucket.records.push(record);
    } else {
      periods.set(key.label, { key, records: [record] });
    }
  }

  const ordered = [...periods.values()].sort(
    (a, b) => a.key.year - b.key.year || a.key.monthNumber - b.key.monthNumber
  );

  return ordered.flatMap(({ key, records: periodRecords }) => {
    const a = totalsFor(periodRecords, "A");
    const b = totalsFor(periodRecords, "B");
    const c = totalsFor(periodRecords, "C");
    const payable = a.vat - c.vat;

    return [
      summaryRow(key.label, "A", a.net, a.vat, 0),
      summaryRow(key.label, "B", b.net, b.vat, 0),
      summaryRow(key.label, "C", c.net, c.vat, 0),
      summaryRow(key.label, "D", 0, payable, payable),
    ];
  });
}

/**
 * Per-period totals across boxes A–C, with Box D as the payable amount.
 */
export function calculatePeriodTotals(rows: readonly SummaryRow[]): PeriodTotals[] {
  const totals = new Map<string, PeriodTotals>();
  for (const row of rows) {
    const entry = totals.get(row.period) ?? {
      period: row.period,
      totalNetValue: 0,
      totalVatValue: 0,
      netVatPayable: 0,
    };
    if (row.box === "D") {
      entry.netVatPayable = row.netVatPayable;
    } else {
      entry.totalNetValue = roundTo2Decimals(entry.totalNetValue + row.netValue);
      entry.totalVatValue = roundTo2Decimals(entry.totalVatValue + row.vatValue);
    }
    totals.set(row.period, entry);
  }
  return [...totals.values()];
}

/**
 * Rows keyed by the output column names, for export and persistence.
 */
export function toSummaryTable(rows: readonly SummaryRow[]): SummaryTableRow[] {
  return rows.map(row => ({
    'Period': row.period,
    'FTA Box': `Box ${row.box}`,
    'Description': row.description,
    'Net Value': row.netValue,
    'VAT Value': row.vatValue,
    'Net VAT Payable': row.netVatPayable,
  }));
}
