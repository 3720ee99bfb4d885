/**
 * Centralized Configuration Constants
 *
 * Magic numbers used by the pipeline and the HTTP layer.
 */

// ===== INGESTION =====

export const INGESTION = {
  /** Rows scanned when looking for the header row */
  HEADER_SCAN_ROWS: 30,

  /** Distinct header keywords a row needs to count as the header row */
  HEADER_MIN_SCORE: 2,

  /** Numeric cells in this range are spreadsheet serial day counts */
  SERIAL_DATE_MIN: 1,
  SERIAL_DATE_MAX: 60_000,

  /** Day zero of spreadsheet serial dates (UTC) */
  SERIAL_DATE_EPOCH_MS: Date.UTC(1899, 11, 30),
} as const;

export const MS_PER_DAY = 86_400_000;

// ===== HTTP STATUS CODES =====

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

// ===== UPLOADS =====

export const UPLOAD = {
  /** Multipart field carrying the workbook */
  FIELD_NAME: 'workbook',

  /** One workbook per request */
  MAX_FILES: 1,
} as const;
