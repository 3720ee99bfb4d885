import { HEADER_KEYWORDS } from "@shared/constants";
import type { RawCell } from "@shared/schema";
import { INGESTION } from "../../config/constants";

function cellText(cell: RawCell | undefined): string {
  if (cell === null || cell === undefined) return "";
  if (cell instanceof Date) return cell.toISOString();
  return String(cell).toLowerCase();
}

/**
 * Number of distinct header keywords that appear in any cell of the row.
 */
export function scoreHeaderRow(row: readonly RawCell[]): number {
  const cells = row.map(cellText);
  return HEADER_KEYWORDS.filter(keyword => cells.some(cell => cell.includes(keyword))).length;
}

/**
 * Zero-based index of the first row in the scan window that matches at least
 * two header keywords; 0 when none does.
 */
export function detectHeaderRow(
  rows: readonly (readonly RawCell[])[],
  scanRows: number = INGESTION.HEADER_SCAN_ROWS
): number {
  const limit = Math.min(scanRows, rows.length);
  for (let i = 0; i < limit; i++) {
    if (scoreHeaderRow(rows[i]) >= INGESTION.HEADER_MIN_SCORE) {
      return i;
    }
  }
  return 0;
}
