/**
 * Shared error types between the API and its callers
 */

export interface ApiErrorResponse {
  success: false;
  error: {
    type: string;
    code: string;
    message: string;
    userMessage: string;
    details?: Record<string, unknown>;
    timestamp: string;
  };
}

export interface ApiSuccessResponse<T = unknown> {
  success: true;
  data: T;
  message?: string;
}

export const ERROR_CODES = {
  // Input validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  WORKBOOK_UNREADABLE: 'WORKBOOK_UNREADABLE',

  // Pipeline
  NO_DATA: 'NO_DATA',
  SHEET_PROCESSING_FAILED: 'SHEET_PROCESSING_FAILED',
  RUN_CANCELLED: 'RUN_CANCELLED',

  // Sinks
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
  EXPORT_NOT_FOUND: 'EXPORT_NOT_FOUND',

  // System errors
  DATABASE_ERROR: 'DATABASE_ERROR',
  INTERNAL_SERVER_ERROR: 'INTERNAL_SERVER_ERROR',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export function createApiErrorResponse(
  type: string,
  code: ErrorCode,
  message: string,
  userMessage: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    success: false,
    error: {
      type,
      code,
      message,
      userMessage,
      details,
      timestamp: new Date().toISOString()
    }
  };
}

export function createApiSuccessResponse<T>(
  data: T,
  message?: string
): ApiSuccessResponse<T> {
  return {
    success: true,
    data,
    message
  };
}

/**
 * High-level classification of pipeline failures
 */
export type VatSummaryErrorCategory =
  | 'unreadable_workbook' // Bytes are not a workbook
  | 'sheet_processing'    // One sheet failed; the run continues without it
  | 'no_data'             // No sheet produced records; terminal
  | 'persistence'         // Export or store write failed; reported, not fatal
  | 'cancelled'           // Caller aborted the run
  | 'unknown';

export class VatSummaryError extends Error {
  public details?: Record<string, unknown>;
  public category: VatSummaryErrorCategory;

  constructor(
    message: string,
    public code: ErrorCode = ERROR_CODES.INTERNAL_SERVER_ERROR,
    public statusCode: number = 500,
    options?: {
      details?: Record<string, unknown>;
      category?: VatSummaryErrorCategory;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'VatSummaryError';
    this.details = options?.details;
    this.category = options?.category ?? 'unknown';
  }

  // ========== Static factory methods ==========

  static unreadableWorkbook(reason: string, cause?: unknown) {
    return new VatSummaryError(
      `Workbook could not be read: ${reason}`,
      ERROR_CODES.WORKBOOK_UNREADABLE,
      400,
      { category: 'unreadable_workbook', cause }
    );
  }

  static sheetProcessing(sheet: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new VatSummaryError(
      `Error processing ${sheet}: ${reason}`,
      ERROR_CODES.SHEET_PROCESSING_FAILED,
      422,
      { details: { sheet }, category: 'sheet_processing', cause }
    );
  }

  static noData(sheetNames: string[]) {
    return new VatSummaryError(
      'No sheets processed.',
      ERROR_CODES.NO_DATA,
      422,
      { details: { sheetNames }, category: 'no_data' }
    );
  }

  static persistence(target: 'export' | 'store', cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new VatSummaryError(
      `Could not save to ${target}: ${reason}`,
      ERROR_CODES.PERSISTENCE_FAILED,
      500,
      { details: { target }, category: 'persistence', cause }
    );
  }

  static cancelled(processedSheets: number) {
    return new VatSummaryError(
      'VAT summary run was cancelled',
      ERROR_CODES.RUN_CANCELLED,
      499,
      { details: { processedSheets }, category: 'cancelled' }
    );
  }
}

export function isVatSummaryError(error: unknown): error is VatSummaryError {
  return error instanceof VatSummaryError;
}

