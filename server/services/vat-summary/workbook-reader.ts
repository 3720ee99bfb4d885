import * as XLSX from "xlsx";
import { VatSummaryError } from "@shared/errors";

/**
 * A sheet as read from the workbook, before its grid has been validated
 */
export interface WorkbookSheet {
  name: string;
  rows: unknown;
}

/**
 * Read every sheet of a workbook as a grid of raw cells.
 *
 * Dates are left as serial day counts (no `cellDates`); the period resolver
 * converts them in UTC, which keeps the server time zone out of the result.
 */
export function readWorkbook(buffer: Buffer): WorkbookSheet[] {
  if (buffer.length === 0) {
    throw VatSummaryError.unreadableWorkbook("file is empty");
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: "buffer" });
  } catch (error) {
    throw VatSummaryError.unreadableWorkbook(
      error instanceof Error ? error.message : String(error),
      error
    );
  }

  return workbook.SheetNames.map(name => {
    const worksheet = workbook.Sheets[name];
    return {
      name,
      rows: worksheet
        ? XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, defval: null, raw: true, blankrows: true })
        : null,
    };
  });
}
