import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { SummaryTableRow } from '@shared/schema';
import type { IStorage } from '../../../storage';
import type { ScopedLogger } from '../../logger';
import { VatReportPublisher } from '../report-publisher';

const table: SummaryTableRow[] = [
  { 'Period': 'Mar 2024', 'FTA Box': 'Box A', 'Description': 'Standard Rated Supplies (5%)', 'Net Value': 150, 'VAT Value': 7.5, 'Net VAT Payable': 0 },
];

const log: ScopedLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
const clock = () => new Date(2024, 2, 5, 9, 7, 3);

describe('VatReportPublisher', () => {
  let exportDir: string;
  let storage: IStorage;

  beforeEach(async () => {
    vi.clearAllMocks();
    exportDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vat-summary-'));
    storage = {
      replaceVatSummary: vi.fn().mockResolvedValue(undefined),
      getVatSummary: vi.fn().mockResolvedValue([]),
    };
  });

  afterEach(async () => {
    await fs.rm(exportDir, { recursive: true, force: true });
  });

  it('writes the export and replaces the stored summary', async () => {
    const publisher = new VatReportPublisher({ storage, exportDir: path.join(exportDir, 'out'), clock });

    const result = await publisher.publish(table, log);

    expect(result).toEqual({
      export: { fileName: 'vat_summary_AtoD_20240305_090703.xlsx' },
      persisted: true,
      warnings: [],
    });
    expect(storage.replaceVatSummary).toHaveBeenCalledWith(table);
    const stat = await fs.stat(path.join(exportDir, 'out', 'vat_summary_AtoD_20240305_090703.xlsx'));
    expect(stat.size).toBeGreaterThan(0);
  });

  it('reports a store failure as a warning and keeps the export', async () => {
    vi.mocked(storage.replaceVatSummary).mockRejectedValue(new Error('connection refused'));
    const publisher = new VatReportPublisher({ storage, exportDir, clock });

    const result = await publisher.publish(table, log);

    expect(result.persisted).toBe(false);
    expect(result.export).toEqual({ fileName: 'vat_summary_AtoD_20240305_090703.xlsx' });
    expect(result.warnings).toEqual([
      { code: 'PERSISTENCE_FAILED', message: 'Could not save to store: connection refused' },
    ]);
  });

  it('reports an export failure and still stores the summary', async () => {
    const blocker = path.join(exportDir, 'blocked');
    await fs.writeFile(blocker, 'not a directory');
    const publisher = new VatReportPublisher({ storage, exportDir: blocker, clock });

    const result = await publisher.publish(table, log);

    expect(result.export).toBeNull();
    expect(result.persisted).toBe(true);
    expect(result.warnings.map(warning => warning.code)).toEqual(['EXPORT_FAILED']);
  });

  it('resolves existing exports only', async () => {
    const publisher = new VatReportPublisher({ storage, exportDir, clock });
    await publisher.publish(table, log);

    expect(await publisher.resolveExport('vat_summary_AtoD_20240305_090703.xlsx'))
      .toBe(path.resolve(exportDir, 'vat_summary_AtoD_20240305_090703.xlsx'));
    expect(await publisher.resolveExport('vat_summary_AtoD_20240101_000000.xlsx')).toBeNull();
  });
});
