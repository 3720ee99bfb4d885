/**
 * VAT Summary Routes
 *
 * POST /api/vat-summary                    - upload a workbook, get the box summary
 * GET  /api/vat-summary                    - latest stored summary
 * GET  /api/vat-summary/exports/:fileName  - download an export
 */

import { Router, type Request } from "express";
import multer from "multer";
import * as path from "path";
import { createApiSuccessResponse, ERROR_CODES, VatSummaryError } from "@shared/errors";
import { exportFileNameSchema, summarizeRequestSchema } from "@shared/schema";
import { UPLOAD_CONFIG } from "../config";
import { HTTP_STATUS, UPLOAD } from "../config/constants";
import { asyncHandler, ServerError } from "../middleware/errorHandler";
import type { IStorage } from "../storage";
import { logger } from "../services/logger";
import type { VatReportPublisher } from "../services/vat-summary/report-publisher";
import type { VatSummaryPipeline } from "../services/vat-summary/vat-summary-pipeline";

export interface VatSummaryRouteDeps {
  pipeline: VatSummaryPipeline;
  publisher: VatReportPublisher;
  storage: IStorage;
}

const allowedExtensions = new Set<string>(UPLOAD_CONFIG.allowedExtensions);
const allowedMimeTypes = new Set<string>(UPLOAD_CONFIG.allowedMimeTypes);

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: UPLOAD_CONFIG.maxFileBytes,
    files: UPLOAD.MAX_FILES,
  },
  fileFilter: (_req, file, cb) => {
    const extension = path.extname(file.originalname).slice(1).toLowerCase();
    if (!allowedExtensions.has(extension) || !allowedMimeTypes.has(file.mimetype)) {
      cb(ServerError.validation(
        `Unsupported file type: ${file.originalname}. Upload an .xlsx, .xlsm or .xls workbook.`,
        { fileName: file.originalname, mimeType: file.mimetype }
      ));
      return;
    }
    cb(null, true);
  },
});

function requestId(req: Request): string {
  return req.get('x-request-id') ?? 'unknown';
}

export function createVatSummaryRouter({ pipeline, publisher, storage }: VatSummaryRouteDeps): Router {
  const router = Router();

  router.post("/", upload.single(UPLOAD.FIELD_NAME), asyncHandler(async (req, res) => {
    if (!req.file) {
      throw ServerError.validation(`No workbook uploaded; send it in the "${UPLOAD.FIELD_NAME}" field`);
    }
    const { grouping } = summarizeRequestSchema.parse(req.body);

    // Client went away before we answered
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    logger.info('vat-summary', 'Workbook received', {
      requestId: requestId(req),
      fileName: req.file.originalname,
      bytes: req.file.size,
    });

    const result = await pipeline.summarizeWorkbook(req.file.buffer, { grouping, signal: controller.signal });
    // Nothing is exported or stored for a client that already left
    if (controller.signal.aborted) {
      throw VatSummaryError.cancelled(result.sheets.length);
    }
    const published = await publisher.publish(result.table, logger.forRun(result.runId));

    res.status(HTTP_STATUS.OK).json(createApiSuccessResponse({
      runId: result.runId,
      summary: result.table,
      periodTotals: result.periodTotals,
      sheets: result.sheets,
      warnings: [...result.warnings, ...published.warnings],
      export: published.export,
      persisted: published.persisted,
    }, `Summarized ${result.recordCount} rows from ${result.sheets.length} sheet(s)`));
  }));

  router.get("/", asyncHandler(async (_req, res) => {
    const rows = await storage.getVatSummary();
    res.json(createApiSuccessResponse({ rows }));
  }));

  router.get("/exports/:fileName", asyncHandler(async (req, res, next) => {
    const parsed = exportFileNameSchema.safeParse(req.params.fileName);
    const filePath = parsed.success ? await publisher.resolveExport(parsed.data) : null;
    if (!parsed.success || !filePath) {
      throw ServerError.notFound(ERROR_CODES.EXPORT_NOT_FOUND, `Export ${req.params.fileName}`);
    }

    res.download(filePath, parsed.data, (error) => {
      if (error && !res.headersSent) next(error);
    });
  }));

  return router;
}
