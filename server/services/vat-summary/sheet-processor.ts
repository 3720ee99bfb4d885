import type { CanonicalField } from "@shared/constants";
import type { NormalizedRecord, RawCell, RawSheet, SheetReport } from "@shared/schema";
import { INGESTION } from "../../config/constants";
import { detectHeaderRow } from "./header-row-detector";
import { mapHeaderRow, type CanonicalColumnMap } from "./header-normalizer";
import { parseAmount } from "./value-parser";
import {
  parseCellDate,
  resolveMonthFromDates,
  resolveMonthFromSheetName,
  resolveSheetYear,
  type ResolvedMonth,
  type YearResolution,
} from "./period-resolver";

export interface ProcessSheetOptions {
  /** Advisory aliases (normalized key → canonical field) */
  extraAliases?: ReadonlyMap<string, CanonicalField>;
  /** Clock for the current-year fallback */
  now?: Date;
}

export interface ProcessedSheet {
  records: NormalizedRecord[];
  report: SheetReport;
  year: YearResolution;
  monthSource: 'sheet-name' | 'dates' | 'unresolved';
}

function isBlank(cell: RawCell | undefined): boolean {
  return cell === null || cell === undefined || (typeof cell === "string" && cell.trim() === "");
}

function readCell(row: readonly RawCell[], columns: CanonicalColumnMap, field: CanonicalField): RawCell {
  const index = columns[field];
  // Synthesized column: the field is missing from this sheet
  if (index === undefined) return null;
  return row[index] ?? null;
}

function readText(row: readonly RawCell[], columns: CanonicalColumnMap, field: CanonicalField): string | undefined {
  const cell = readCell(row, columns, field);
  if (isBlank(cell)) return undefined;
  const text = cell instanceof Date ? cell.toISOString().slice(0, 10) : String(cell).trim();
  return text || undefined;
}

/**
 * Box label and its letter. The letter skips a leading "BOX" word, so
 * "Box C" gives "C".
 */
export function normalizeBox(cell: RawCell): { box: string; boxLetter: string | null } {
  if (isBlank(cell)) {
    return { box: "", boxLetter: null };
  }
  const box = String(cell).toUpperCase().trim();
  const letter = box.replace(/BOX/g, "").match(/[A-Z]/);
  return { box, boxLetter: letter ? letter[0] : null };
}

/**
 * Turn one raw sheet into normalized records.
 *
 * All rows after the detected header row that are not completely blank
 * become records. Every record carries the sheet's month and year.
 */
export function processSheet(sheet: RawSheet, options: ProcessSheetOptions = {}): ProcessedSheet {
  const headerRow = detectHeaderRow(sheet.rows.slice(0, INGESTION.HEADER_SCAN_ROWS));
  const { headers, columns } = mapHeaderRow(sheet.rows[headerRow] ?? [], options.extraAliases);

  const dataRows = sheet.rows
    .slice(headerRow + 1)
    .filter(row => row.some(cell => !isBlank(cell)));

  const dates = dataRows.map(row => parseCellDate(readCell(row, columns, "Date")));
  const year = resolveSheetYear(dates, options.now);

  let period: ResolvedMonth = resolveMonthFromSheetName(sheet.name);
  let monthSource: ProcessedSheet["monthSource"] = "sheet-name";
  if (period.monthNumber === 0) {
    period = resolveMonthFromDates(dates);
    monthSource = period.monthNumber === 0 ? "unresolved" : "dates";
  }

  const records = dataRows.map((row, index): NormalizedRecord => ({
    supplyType: readText(row, columns, "Supply Type"),
    invoiceNumber: readText(row, columns, "Invoice Number"),
    date: dates[index],
    customerOrSupplierName: readText(row, columns, "Customer/supplier Name"),
    netValue: parseAmount(readCell(row, columns, "Supply/Purchase Value")),
    vatValue: parseAmount(readCell(row, columns, "VAT Value")),
    invoiceValue: parseAmount(readCell(row, columns, "Invoice Value")),
    recoverable: readText(row, columns, "Recoverable"),
    ...normalizeBox(readCell(row, columns, "Box")),
    month: period.month,
    monthNumber: period.monthNumber,
    year: year.year,
    sourceSheet: sheet.name,
  }));

  return {
    records,
    report: {
      sheet: sheet.name,
      headerRow,
      columns: headers,
      month: period.month,
      monthNumber: period.monthNumber,
      year: year.year,
      recordCount: records.length,
    },
    year,
    monthSource,
  };
}
