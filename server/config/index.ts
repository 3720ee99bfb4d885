/**
 * Central configuration for the VAT summary service
 *
 * Consolidates all environment-driven settings into a single, type-safe
 * module. Static reference tables live in @shared/constants.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import * as dotenv from 'dotenv';
import { PERIOD_GROUPINGS } from '@shared/constants';
import { logger } from '../services/logger';

// Load environment variables from .env file
dotenv.config();

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(5000),

  // Database; without it the summary is still computed, only not stored
  DATABASE_URL: z.string().url('DATABASE_URL must be a valid URL').optional(),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Export artifacts
  EXPORT_DIR: z.string().min(1).default('exports'),

  // Uploads
  UPLOAD_MAX_FILE_MB: z.coerce.number().positive().default(25),

  // Optional header-mapping hint
  MAPPING_HINT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  PERIOD_GROUPING: z.enum(PERIOD_GROUPINGS).default('month-year'),
});

const envResult = envSchema.safeParse(process.env);

if (!envResult.success) {
  console.error('❌ Invalid environment configuration:');
  envResult.error.issues.forEach(issue => {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
  });
  process.exit(1);
}

const env = envResult.data;

logger.setLevel(env.LOG_LEVEL);

export const DATABASE_CONFIG = {
  url: env.DATABASE_URL,
  connectionPool: {
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000
  }
} as const;

export const PIPELINE_CONFIG = {
  exportDir: env.EXPORT_DIR,
  mappingHintTimeoutMs: env.MAPPING_HINT_TIMEOUT_MS,
  periodGrouping: env.PERIOD_GROUPING,
} as const;

export const UPLOAD_CONFIG = {
  maxFileBytes: Math.round(env.UPLOAD_MAX_FILE_MB * 1024 * 1024),
  allowedExtensions: ['xlsx', 'xlsm', 'xls'],
  allowedMimeTypes: [
    'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    'application/vnd.ms-excel.sheet.macroEnabled.12',
    'application/vnd.ms-excel',
    'application/octet-stream', // Browsers sometimes send this for workbooks
  ],
} as const;

export const config = {
  NODE_ENV: env.NODE_ENV,
  PORT: env.PORT,

  database: DATABASE_CONFIG,
  pipeline: PIPELINE_CONFIG,
  upload: UPLOAD_CONFIG,
} as const;

interface StartupSettings {
  databaseUrl?: string;
  exportDir: string;
}

// Validate critical configurations on startup
export function validateConfig(
  settings: StartupSettings = { databaseUrl: config.database.url, exportDir: config.pipeline.exportDir }
): boolean {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!settings.databaseUrl) {
    warnings.push('DATABASE_URL is not set; summaries will not be persisted');
  }

  // The export directory is created on first use, but a file in its place never becomes one
  const existing = fs.statSync(path.resolve(settings.exportDir), { throwIfNoEntry: false });
  if (existing && !existing.isDirectory()) {
    errors.push(`EXPORT_DIR ${settings.exportDir} exists and is not a directory`);
  }

  if (errors.length > 0) {
    logger.error('config', 'Configuration validation failed', { errors, warnings });
    return false;
  }

  if (warnings.length > 0) {
    logger.warn('config', 'Configuration incomplete', { warnings });
  } else {
    logger.info('config', 'Configuration validation passed');
  }
  return true;
}
