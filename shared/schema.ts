import { pgTable, text, serial, doublePrecision } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { PERIOD_GROUPINGS, SUMMARY_BOXES, VAT_SUMMARY_TABLE } from "./constants";

/**
 * ===== DATABASE SCHEMA =====
 *
 * One table: the latest VAT box summary. Each run replaces its contents
 * entirely (delete + insert in one transaction), so there is no history and
 * no run identifier.
 *
 * Column names mirror the exported sheet (`Period`, `FTA Box`, ...) in
 * snake_case. `id` only preserves insertion order for reads.
 */
export const vatSummary = pgTable(VAT_SUMMARY_TABLE, {
  id: serial("id").primaryKey(),
  period: text("period").notNull(),
  ftaBox: text("fta_box").notNull(),
  description: text("description").notNull(),
  netValue: doublePrecision("net_value").notNull(),
  vatValue: doublePrecision("vat_value").notNull(),
  netVatPayable: doublePrecision("net_vat_payable").notNull(),
});

export const insertVatSummarySchema = createInsertSchema(vatSummary).omit({
  id: true,
});

export type VatSummaryRecord = typeof vatSummary.$inferSelect;
export type InsertVatSummary = z.infer<typeof insertVatSummarySchema>;

// ===== PIPELINE DATA MODEL =====

export const rawCellSchema = z.union([z.string(), z.number(), z.boolean(), z.date(), z.null()]);

export const rawSheetSchema = z.object({
  name: z.string(),
  rows: z.array(z.array(rawCellSchema)),
});

/**
 * One transaction row after its sheet has been processed.
 * Money fields are in the base currency (AED).
 */
export const normalizedRecordSchema = z.object({
  supplyType: z.string().optional(),
  invoiceNumber: z.string().optional(),
  date: z.date().nullable(),
  customerOrSupplierName: z.string().optional(),
  netValue: z.number(),
  vatValue: z.number(),
  invoiceValue: z.number(),
  recoverable: z.string().optional(),
  box: z.string(),
  boxLetter: z.string().length(1).nullable(),
  month: z.string(),
  monthNumber: z.number().int().min(0).max(12),
  year: z.number().int(),
  sourceSheet: z.string(),
});

export const summaryBoxSchema = z.enum(SUMMARY_BOXES);

export const summaryRowSchema = z.object({
  period: z.string(),
  box: summaryBoxSchema,
  description: z.string(),
  netValue: z.number(),
  vatValue: z.number(),
  netVatPayable: z.number(),
});

/** Export / persistence shape, keyed by the output column names */
export const summaryTableRowSchema = z.object({
  'Period': z.string(),
  'FTA Box': z.string(),
  'Description': z.string(),
  'Net Value': z.number(),
  'VAT Value': z.number(),
  'Net VAT Payable': z.number(),
});

export const periodTotalsSchema = z.object({
  period: z.string(),
  totalNetValue: z.number(),
  totalVatValue: z.number(),
  netVatPayable: z.number(),
});

export const periodGroupingSchema = z.enum(PERIOD_GROUPINGS);

export const pipelineWarningSchema = z.object({
  code: z.enum([
    'SHEET_FAILED',
    'SHEET_EMPTY',
    'YEAR_AMBIGUOUS',
    'MONTH_UNRESOLVED',
    'MAPPING_HINT_FAILED',
    'EXPORT_FAILED',
    'PERSISTENCE_FAILED',
  ]),
  message: z.string(),
  sheet: z.string().optional(),
});

export const sheetReportSchema = z.object({
  sheet: z.string(),
  /** Zero-based index of the detected header row */
  headerRow: z.number().int().min(0),
  columns: z.array(z.string()),
  month: z.string(),
  monthNumber: z.number().int().min(0).max(12),
  year: z.number().int(),
  recordCount: z.number().int().min(0),
});

export type RawCell = z.infer<typeof rawCellSchema>;
export type RawSheet = z.infer<typeof rawSheetSchema>;
export type NormalizedRecord = z.infer<typeof normalizedRecordSchema>;
export type SummaryRow = z.infer<typeof summaryRowSchema>;
export type SummaryTableRow = z.infer<typeof summaryTableRowSchema>;
export type PeriodTotals = z.infer<typeof periodTotalsSchema>;
export type PipelineWarning = z.infer<typeof pipelineWarningSchema>;
export type SheetReport = z.infer<typeof sheetReportSchema>;

// ===== API REQUESTS =====

export const summarizeRequestSchema = z.object({
  grouping: periodGroupingSchema.optional(),
});

export const exportFileNameSchema = z
  .string()
  .regex(/^vat_summary_AtoD_\d{8}_\d{6}\.xlsx$/, 'Unknown export file');
