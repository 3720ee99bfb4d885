/**
 * API contract tests for the VAT summary endpoints
 *
 * Runs the real Express app on an ephemeral port. The store and the
 * database probe are mocked; exports go to a temp directory.
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Server } from 'http';
import * as XLSX from 'xlsx';
import { z } from 'zod';

vi.mock('../db', () => ({
  db: null,
  checkDatabaseConnection: vi.fn().mockResolvedValue(false),
  closeDatabase: vi.fn(),
}));

vi.mock('../storage', () => ({
  storage: {
    replaceVatSummary: vi.fn(),
    getVatSummary: vi.fn(),
  },
}));

import { storage } from '../storage';
import { createApp } from '../app';
import { VatReportPublisher } from '../services/vat-summary/report-publisher';
import {
  VatSummaryPipeline,
  type SummaryRunOptions,
  type SummaryRunResult,
} from '../services/vat-summary/vat-summary-pipeline';

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const apiErrorResponseSchema = z.object({
  success: z.literal(false),
  error: z.object({
    type: z.string(),
    code: z.string(),
    message: z.string(),
    userMessage: z.string(),
    timestamp: z.string(),
  }),
});

const healthResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    status: z.enum(['healthy', 'degraded', 'unhealthy']),
    timestamp: z.string(),
    uptime: z.number(),
  }),
  message: z.string().optional(),
});

const storedSummaryResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({ rows: z.array(z.record(z.string(), z.union([z.string(), z.number()]))) }),
});

async function errorOf(response: Response) {
  return apiErrorResponseSchema.parse(await response.json()).error;
}

const summaryResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    runId: z.string(),
    summary: z.array(z.object({
      'Period': z.string(),
      'FTA Box': z.string(),
      'Description': z.string(),
      'Net Value': z.number(),
      'VAT Value': z.number(),
      'Net VAT Payable': z.number(),
    })),
    periodTotals: z.array(z.object({ period: z.string() })),
    sheets: z.array(z.object({ sheet: z.string() })),
    warnings: z.array(z.object({ code: z.string(), message: z.string() })),
    export: z.object({ fileName: z.string() }).nullable(),
    persisted: z.boolean(),
  }),
  message: z.string().optional(),
});

function workbookBytes(sheets: Record<string, unknown[][]>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
}

const marchWorkbook = workbookBytes({
  'March 2024': [
    ['Date', 'Net', 'Tax', 'Box'],
    ['05/03/2024', 100, 5, 'A'],
    ['06/03/2024', 40, 2, 'C'],
  ],
});

function uploadForm(bytes: Buffer, fileName: string, type: string, fields: Record<string, string> = {}): FormData {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  form.append('workbook', new Blob([new Uint8Array(bytes)], { type }), fileName);
  return form;
}

describe('VAT summary API', () => {
  let server: Server;
  let baseURL: string;
  let exportDir: string;

  beforeAll(async () => {
    exportDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vat-summary-api-'));
    server = createApp({
      publisher: new VatReportPublisher({ storage, exportDir }),
    }).server;

    await new Promise<void>((resolve) => {
      server.listen(0, 'localhost', () => resolve());
    });

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server address is invalid');
    }
    baseURL = `http://localhost:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    await fs.rm(exportDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.mocked(storage.replaceVatSummary).mockReset().mockResolvedValue(undefined);
    vi.mocked(storage.getVatSummary).mockReset().mockResolvedValue([]);
  });

  describe('Health Endpoints', () => {
    it('GET /api/health reports the server as healthy', async () => {
      const response = await fetch(`${baseURL}/api/health`);
      const body = healthResponseSchema.parse(await response.json());

      expect(response.status).toBe(200);
      expect(body.data.status).toBe('healthy');
    });

    it('GET /api/health/database is 503 without a database', async () => {
      const response = await fetch(`${baseURL}/api/health/database`);

      expect(response.status).toBe(503);
      expect((await errorOf(response)).code).toBe('DATABASE_ERROR');
    });
  });

  describe('POST /api/vat-summary', () => {
    it('summarizes an uploaded workbook, exports and stores it', async () => {
      const response = await fetch(`${baseURL}/api/vat-summary`, {
        method: 'POST',
        body: uploadForm(marchWorkbook, 'march.xlsx', XLSX_MIME),
      });
      const json = await response.json();

      expect(response.status).toBe(200);
      const body = summaryResponseSchema.parse(json);
      expect(body.data.summary.map(row => [row['FTA Box'], row['Net Value'], row['VAT Value']])).toEqual([
        ['Box A', 100, 5],
        ['Box B', 0, 0],
        ['Box C', 40, 2],
        ['Box D', 0, 3],
      ]);
      expect(body.data.summary[0]?.['Period']).toBe('Mar 2024');
      expect(body.data.warnings).toEqual([]);
      expect(body.data.persisted).toBe(true);
      expect(body.data.export?.fileName).toMatch(/^vat_summary_AtoD_\d{8}_\d{6}\.xlsx$/);
      expect(storage.replaceVatSummary).toHaveBeenCalledWith(body.data.summary);
    });

    it('groups by month only when asked to', async () => {
      const response = await fetch(`${baseURL}/api/vat-summary`, {
        method: 'POST',
        body: uploadForm(marchWorkbook, 'march.xlsx', XLSX_MIME, { grouping: 'month' }),
      });
      const body = summaryResponseSchema.parse(await response.json());

      expect(body.data.summary[0]?.['Period']).toBe('Mar');
    });

    it('still answers when the store is unavailable', async () => {
      vi.mocked(storage.replaceVatSummary).mockRejectedValue(new Error('connection refused'));

      const response = await fetch(`${baseURL}/api/vat-summary`, {
        method: 'POST',
        body: uploadForm(marchWorkbook, 'march.xlsx', XLSX_MIME),
      });
      const body = summaryResponseSchema.parse(await response.json());

      expect(response.status).toBe(200);
      expect(body.data.persisted).toBe(false);
      expect(body.data.warnings).toEqual([
        { code: 'PERSISTENCE_FAILED', message: 'Could not save to store: connection refused' },
      ]);
    });

    it('rejects a request without a workbook', async () => {
      const response = await fetch(`${baseURL}/api/vat-summary`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{}',
      });

      expect(response.status).toBe(400);
      expect((await errorOf(response)).code).toBe('VALIDATION_FAILED');
    });

    it('rejects files that are not workbooks', async () => {
      const response = await fetch(`${baseURL}/api/vat-summary`, {
        method: 'POST',
        body: uploadForm(Buffer.from('hello'), 'notes.txt', 'text/plain'),
      });

      expect(response.status).toBe(400);
      expect((await errorOf(response)).code).toBe('VALIDATION_FAILED');
    });

    it('rejects an unknown grouping', async () => {
      const response = await fetch(`${baseURL}/api/vat-summary`, {
        method: 'POST',
        body: uploadForm(marchWorkbook, 'march.xlsx', XLSX_MIME, { grouping: 'quarter' }),
      });

      expect(response.status).toBe(400);
      expect((await errorOf(response)).type).toBe('VALIDATION_ERROR');
    });

    it('answers 422 when no sheet has usable rows', async () => {
      const empty = workbookBytes({ 'March 2024': [['Date', 'Net', 'Tax', 'Box']] });

      const response = await fetch(`${baseURL}/api/vat-summary`, {
        method: 'POST',
        body: uploadForm(empty, 'empty.xlsx', XLSX_MIME),
      });
      const error = await errorOf(response);

      expect(response.status).toBe(422);
      expect(error.code).toBe('NO_DATA');
      expect(error.message).toBe('No sheets processed.');
      expect(storage.replaceVatSummary).not.toHaveBeenCalled();
    });
  });

  describe('POST /api/vat-summary after the client disconnects', () => {
    it('neither exports nor stores the summary', async () => {
      let markStarted = () => {};
      const started = new Promise<void>(resolve => { markStarted = () => resolve(); });
      let markFinished = () => {};
      const finished = new Promise<void>(resolve => { markFinished = () => resolve(); });

      // Holds the run until the request is aborted, then completes it
      class WaitForDisconnectPipeline extends VatSummaryPipeline {
        async summarizeWorkbook(buffer: Buffer, options: SummaryRunOptions = {}): Promise<SummaryRunResult> {
          markStarted();
          const signal = options.signal;
          if (signal && !signal.aborted) {
            await new Promise<void>(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
          }
          const result = await super.summarizeWorkbook(buffer, { grouping: options.grouping });
          markFinished();
          return result;
        }
      }

      const abandonedExportDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vat-summary-abandoned-'));
      const publisher = new VatReportPublisher({ storage, exportDir: abandonedExportDir });
      const publish = vi.spyOn(publisher, 'publish');
      const abandonedServer = createApp({ pipeline: new WaitForDisconnectPipeline(), publisher }).server;
      await new Promise<void>((resolve) => {
        abandonedServer.listen(0, 'localhost', () => resolve());
      });

      try {
        const address = abandonedServer.address();
        if (!address || typeof address === 'string') {
          throw new Error('Server address is invalid');
        }

        const client = new AbortController();
        const request = fetch(`http://localhost:${address.port}/api/vat-summary`, {
          method: 'POST',
          body: uploadForm(marchWorkbook, 'march.xlsx', XLSX_MIME),
          signal: client.signal,
        }).catch((error: unknown) => error);

        await started;
        client.abort();
        await finished;
        await new Promise(resolve => setTimeout(resolve, 50));

        expect(await request).toMatchObject({ name: 'AbortError' });
        expect(publish).not.toHaveBeenCalled();
        expect(storage.replaceVatSummary).not.toHaveBeenCalled();
        expect(await fs.readdir(abandonedExportDir)).toEqual([]);
      } finally {
        await new Promise<void>((resolve, reject) => {
          abandonedServer.close(error => (error ? reject(error) : resolve()));
        });
        await fs.rm(abandonedExportDir, { recursive: true, force: true });
      }
    });
  });

  describe('GET /api/vat-summary', () => {
    it('returns the stored summary', async () => {
      const rows = [
        { 'Period': 'Mar 2024', 'FTA Box': 'Box A', 'Description': 'Standard Rated Supplies (5%)', 'Net Value': 100, 'VAT Value': 5, 'Net VAT Payable': 0 },
      ];
      vi.mocked(storage.getVatSummary).mockResolvedValue(rows);

      const response = await fetch(`${baseURL}/api/vat-summary`);
      const body = storedSummaryResponseSchema.parse(await response.json());

      expect(response.status).toBe(200);
      expect(body.data.rows).toEqual(rows);
    });
  });

  describe('GET /api/vat-summary/exports/:fileName', () => {
    it('downloads an export written by an earlier upload', async () => {
      const upload = await fetch(`${baseURL}/api/vat-summary`, {
        method: 'POST',
        body: uploadForm(marchWorkbook, 'march.xlsx', XLSX_MIME),
      });
      const fileName = summaryResponseSchema.parse(await upload.json()).data.export?.fileName;

      const response = await fetch(`${baseURL}/api/vat-summary/exports/${fileName}`);
      const workbook = XLSX.read(Buffer.from(await response.arrayBuffer()), { type: 'buffer' });

      expect(response.status).toBe(200);
      expect(workbook.SheetNames).toEqual(['VAT_Summary']);
    });

    it('is 404 for unknown or malformed names', async () => {
      const missing = await fetch(`${baseURL}/api/vat-summary/exports/vat_summary_AtoD_19990101_000000.xlsx`);
      const malformed = await fetch(`${baseURL}/api/vat-summary/exports/secrets.txt`);

      expect(missing.status).toBe(404);
      expect((await errorOf(missing)).code).toBe('EXPORT_NOT_FOUND');
      expect(malformed.status).toBe(404);
    });
  });
});
