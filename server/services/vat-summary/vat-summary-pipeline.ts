/**
 * VAT Summary Pipeline
 *
 * Workbook → normalized records → box summary.
 *
 * Stages:
 * 1. Read - workbook bytes to raw sheet grids
 * 2. Process - each sheet on its own; a failing sheet is reported and skipped
 * 3. Aggregate - records grouped by period and box
 *
 * Publishing (export + store) is a separate step, see report-publisher.
 */

import { nanoid } from "nanoid";
import type { CanonicalField, PeriodGrouping } from "@shared/constants";
import {
  rawSheetSchema,
  type NormalizedRecord,
  type PeriodTotals,
  type PipelineWarning,
  type RawSheet,
  type SheetReport,
  type SummaryRow,
  type SummaryTableRow,
} from "@shared/schema";
import { VatSummaryError } from "@shared/errors";
import { PIPELINE_CONFIG } from "../../config";
import { INGESTION } from "../../config/constants";
import { logger, type ScopedLogger } from "../logger";
import { calculatePeriodTotals, calculateSummary, toSummaryTable } from "./aggregation-engine";
import { detectHeaderRow } from "./header-row-detector";
import { mapHeaderRow, toAliasLookup, unmappedHeaders } from "./header-normalizer";
import { requestMappingHint, type MappingAdvisor } from "./mapping-advisor";
import { processSheet } from "./sheet-processor";
import { readWorkbook, type WorkbookSheet } from "./workbook-reader";

export interface VatSummaryPipelineOptions {
  advisor?: MappingAdvisor;
  mappingHintTimeoutMs?: number;
}

export interface SummaryRunOptions {
  grouping?: PeriodGrouping;
  signal?: AbortSignal;
  /** Clock for the current-year fallback */
  now?: Date;
}

export interface SummaryRunResult {
  runId: string;
  summary: SummaryRow[];
  table: SummaryTableRow[];
  periodTotals: PeriodTotals[];
  sheets: SheetReport[];
  recordCount: number;
  warnings: PipelineWarning[];
}

export class VatSummaryPipeline {
  private readonly advisor?: MappingAdvisor;
  private readonly mappingHintTimeoutMs: number;

  constructor(options: VatSummaryPipelineOptions = {}) {
    this.advisor = options.advisor;
    this.mappingHintTimeoutMs = options.mappingHintTimeoutMs ?? PIPELINE_CONFIG.mappingHintTimeoutMs;
  }

  async summarizeWorkbook(buffer: Buffer, options: SummaryRunOptions = {}): Promise<SummaryRunResult> {
    return this.run(readWorkbook(buffer), options);
  }

  async run(sheets: readonly WorkbookSheet[], options: SummaryRunOptions = {}): Promise<SummaryRunResult> {
    const runId = nanoid(10);
    const log = logger.forRun(runId);
    const grouping = options.grouping ?? PIPELINE_CONFIG.periodGrouping;
    const warnings: PipelineWarning[] = [];
    const reports: SheetReport[] = [];
    const records: NormalizedRecord[] = [];

    log.info('Detected sheets', { sheets: sheets.map(sheet => sheet.name) });

    for (const [index, candidate] of sheets.entries()) {
      // Let pending events (a client disconnect, a timer) run between sheets
      await new Promise<void>(resolve => setImmediate(resolve));
      if (options.signal?.aborted) {
        log.warn('Run cancelled', { processedSheets: index });
        throw VatSummaryError.cancelled(index);
      }

      const sheetLog = logger.forSheet(runId, candidate.name);
      try {
        const sheet = rawSheetSchema.parse(candidate);
        const extraAliases = await this.adviseAliases(sheet, sheetLog, warnings);
        const processed = processSheet(sheet, { extraAliases, now: options.now });

        sheetLog.info('Detected header row', {
          headerRow: processed.report.headerRow + 1,
          columns: processed.report.columns,
        });

        if (processed.year.ambiguous) {
          const years = Object.fromEntries(processed.year.yearCounts);
          warnings.push({
            code: 'YEAR_AMBIGUOUS',
            sheet: sheet.name,
            message: `Multiple years found in ${sheet.name} (${JSON.stringify(years)}); using ${processed.year.year}`,
          });
          sheetLog.warn('Multiple years in date column', { years, using: processed.year.year });
        }

        if (processed.monthSource === 'unresolved') {
          warnings.push({
            code: 'MONTH_UNRESOLVED',
            sheet: sheet.name,
            message: `No month found in sheet name or dates of ${sheet.name}`,
          });
        }

        if (processed.records.length === 0) {
          warnings.push({ code: 'SHEET_EMPTY', sheet: sheet.name, message: `No rows found in ${sheet.name}` });
        }

        reports.push(processed.report);
        records.push(...processed.records);
        sheetLog.info(`Processed ${processed.records.length} rows`, {
          month: processed.report.month,
          year: processed.report.year,
        });
      } catch (error) {
        const failure = VatSummaryError.sheetProcessing(candidate.name, error);
        warnings.push({ code: 'SHEET_FAILED', sheet: candidate.name, message: failure.message });
        sheetLog.error('Sheet excluded', {}, failure);
      }
    }

    if (reports.length === 0 || records.length === 0) {
      log.error('No usable sheets', { sheets: sheets.length, warnings: warnings.length });
      throw VatSummaryError.noData(sheets.map(sheet => sheet.name));
    }

    const summary = calculateSummary(records, grouping);
    log.info('Summary calculated', {
      periods: summary.length / 4,
      records: records.length,
      warnings: warnings.length,
    });

    return {
      runId,
      summary,
      table: toSummaryTable(summary),
      periodTotals: calculatePeriodTotals(summary),
      sheets: reports,
      recordCount: records.length,
      warnings,
    };
  }

  /**
   * Advisory aliases for the headers the static table does not know.
   * Never fails the sheet.
   */
  private async adviseAliases(
    sheet: RawSheet,
    log: ScopedLogger,
    warnings: PipelineWarning[]
  ): Promise<Map<string, CanonicalField> | undefined> {
    if (!this.advisor) return undefined;

    const headerRow = detectHeaderRow(sheet.rows.slice(0, INGESTION.HEADER_SCAN_ROWS));
    const headers = unmappedHeaders(mapHeaderRow(sheet.rows[headerRow] ?? []));
    if (headers.length === 0) return undefined;

    try {
      const suggestions = await requestMappingHint(this.advisor, sheet.name, headers, this.mappingHintTimeoutMs);
      log.debug('Mapping hint applied', { advisor: this.advisor.name, suggestions });
      return toAliasLookup(suggestions);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      warnings.push({
        code: 'MAPPING_HINT_FAILED',
        sheet: sheet.name,
        message: `Mapping hint unavailable for ${sheet.name}: ${reason}`,
      });
      log.warn('Mapping hint failed', { advisor: this.advisor.name, reason });
      return undefined;
    }
  }
}
