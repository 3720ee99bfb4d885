/**
 * Workbook Summarizer
 *
 * Prints the VAT box summary of a workbook; --publish also exports and stores it.
 * Usage: npm run summarize -- workbook.xlsx [--grouping month] [--publish]
 */

import fs from 'fs';
import path from 'path';
import type { PeriodGrouping } from '@shared/constants';
import { isVatSummaryError } from '@shared/errors';
import { periodGroupingSchema } from '@shared/schema';
import { PIPELINE_CONFIG } from '../server/config';
import { closeDatabase } from '../server/db';
import { storage } from '../server/storage';
import { logger } from '../server/services/logger';
import { VatReportPublisher } from '../server/services/vat-summary/report-publisher';
import { VatSummaryPipeline } from '../server/services/vat-summary/vat-summary-pipeline';

interface CliOptions {
  file: string;
  grouping?: PeriodGrouping;
  publish: boolean;
}

function parseArgs(argv: string[]): CliOptions {
  let file: string | undefined;
  let grouping: PeriodGrouping | undefined;
  let publish = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--publish') {
      publish = true;
    } else if (arg === '--grouping') {
      grouping = periodGroupingSchema.parse(argv[++i]);
    } else if (arg && !arg.startsWith('--')) {
      file = arg;
    }
  }

  if (!file) {
    console.error('Usage: npm run summarize -- <workbook.xlsx> [--grouping month] [--publish]');
    process.exit(1);
  }
  return { file, grouping, publish };
}

async function summarize(options: CliOptions) {
  const filePath = path.resolve(process.cwd(), options.file);
  if (!fs.existsSync(filePath)) {
    console.error(`❌ Workbook not found: ${filePath}`);
    process.exit(1);
  }

  console.log(`📄 Summarizing: ${path.basename(filePath)}\n`);

  const pipeline = new VatSummaryPipeline();
  const result = await pipeline.summarizeWorkbook(fs.readFileSync(filePath), { grouping: options.grouping });

  console.table(result.table);

  const warnings = [...result.warnings];
  if (options.publish) {
    const publisher = new VatReportPublisher({ storage, exportDir: PIPELINE_CONFIG.exportDir });
    const published = await publisher.publish(result.table, logger.forRun(result.runId));
    warnings.push(...published.warnings);
    if (published.export) {
      console.log(`💾 Export: ${path.join(PIPELINE_CONFIG.exportDir, published.export.fileName)}`);
    }
    console.log(published.persisted ? '✅ Stored in vat_summary' : '⚠️  Not stored');
  }

  for (const warning of warnings) {
    console.warn(`⚠️  [${warning.code}] ${warning.message}`);
  }
}

summarize(parseArgs(process.argv.slice(2)))
  .then(() => closeDatabase())
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (isVatSummaryError(error)) {
      console.error(`❌ [${error.code}] ${error.message}`);
    } else {
      console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(1);
  });
