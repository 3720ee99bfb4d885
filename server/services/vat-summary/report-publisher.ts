import { promises as fs } from "fs";
import * as path from "path";
import type { PipelineWarning, SummaryTableRow } from "@shared/schema";
import { VatSummaryError, isVatSummaryError } from "@shared/errors";
import type { IStorage } from "../../storage";
import type { ScopedLogger } from "../logger";
import { exportFileName, renderSummaryWorkbook } from "./summary-exporter";

export interface PublishResult {
  export: { fileName: string } | null;
  persisted: boolean;
  warnings: PipelineWarning[];
}

export interface VatReportPublisherOptions {
  storage: IStorage;
  exportDir: string;
  /** Clock for the export file name */
  clock?: () => Date;
}

/**
 * Sends a finished summary to its sinks: the `.xlsx` export and the store.
 *
 * Each sink is best-effort. A failure becomes a warning and the other sink
 * still runs.
 */
export class VatReportPublisher {
  private readonly storage: IStorage;
  private readonly exportDir: string;
  private readonly clock: () => Date;

  constructor(options: VatReportPublisherOptions) {
    this.storage = options.storage;
    this.exportDir = options.exportDir;
    this.clock = options.clock ?? (() => new Date());
  }

  async publish(table: readonly SummaryTableRow[], log: ScopedLogger): Promise<PublishResult> {
    const warnings: PipelineWarning[] = [];

    let exported: PublishResult["export"] = null;
    try {
      exported = { fileName: await this.writeExport(table) };
      log.info('Saved summary export', { fileName: exported.fileName });
    } catch (error) {
      const failure = VatSummaryError.persistence('export', error);
      warnings.push({ code: 'EXPORT_FAILED', message: failure.message });
      log.error('Export failed', {}, failure);
    }

    let persisted = false;
    try {
      await this.storage.replaceVatSummary(table);
      persisted = true;
      log.info('Saved summary to store', { rows: table.length });
    } catch (error) {
      const failure = isVatSummaryError(error) && error.category === 'persistence'
        ? error
        : VatSummaryError.persistence('store', error);
      warnings.push({ code: 'PERSISTENCE_FAILED', message: failure.message });
      log.error('Store write failed', {}, failure);
    }

    return { export: exported, persisted, warnings };
  }

  /** Absolute path of an export, or null when it does not exist */
  async resolveExport(fileName: string): Promise<string | null> {
    const filePath = path.resolve(this.exportDir, path.basename(fileName));
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile() ? filePath : null;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  private async writeExport(table: readonly SummaryTableRow[]): Promise<string> {
    const fileName = exportFileName(this.clock());
    await fs.mkdir(this.exportDir, { recursive: true });
    await fs.writeFile(path.join(this.exportDir, fileName), renderSummaryWorkbook(table));
    return fileName;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
