import * as XLSX from "xlsx";
import { SUMMARY_COLUMNS, VAT_SUMMARY_SHEET_NAME } from "@shared/constants";
import type { SummaryTableRow } from "@shared/schema";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * `vat_summary_AtoD_YYYYMMDD_HHMMSS.xlsx`, local time
 */
export function exportFileName(at: Date = new Date()): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `vat_summary_AtoD_${date}_${time}.xlsx`;
}

/**
 * Render the summary table as a single-sheet workbook.
 */
export function renderSummaryWorkbook(rows: readonly SummaryTableRow[]): Buffer {
  const worksheet = XLSX.utils.json_to_sheet([...rows], { header: [...SUMMARY_COLUMNS] });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, VAT_SUMMARY_SHEET_NAME);

  const output: unknown = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(output)) {
    throw new Error("Workbook writer did not return a buffer");
  }
  return output;
}
