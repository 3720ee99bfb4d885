import {
  insertVatSummarySchema,
  vatSummary,
  type InsertVatSummary,
  type SummaryTableRow,
  type VatSummaryRecord,
} from "@shared/schema";
import { VatSummaryError } from "@shared/errors";
import { VAT_SUMMARY_TABLE } from "@shared/constants";
import { asc } from "drizzle-orm";
import { db as defaultDb, type Database } from "./db";
import { logger } from "./services/logger";

export interface IStorage {
  /** Replace the stored summary with these rows, atomically */
  replaceVatSummary(rows: readonly SummaryTableRow[]): Promise<void>;
  /** Stored summary in insertion order; empty when nothing was stored yet */
  getVatSummary(): Promise<SummaryTableRow[]>;
}

function toInsert(row: SummaryTableRow): InsertVatSummary {
  return insertVatSummarySchema.parse({
    period: row['Period'],
    ftaBox: row['FTA Box'],
    description: row['Description'],
    netValue: row['Net Value'],
    vatValue: row['VAT Value'],
    netVatPayable: row['Net VAT Payable'],
  });
}

function toTableRow(record: VatSummaryRecord): SummaryTableRow {
  return {
    'Period': record.period,
    'FTA Box': record.ftaBox,
    'Description': record.description,
    'Net Value': record.netValue,
    'VAT Value': record.vatValue,
    'Net VAT Payable': record.netVatPayable,
  };
}

// DatabaseStorage - the latest summary in PostgreSQL
export class DatabaseStorage implements IStorage {
  // Replacements run one at a time within this process
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly database: Database | null = defaultDb) {}

  private requireDb(): Database {
    if (!this.database) {
      throw VatSummaryError.persistence('store', new Error('DATABASE_URL is not configured'));
    }
    return this.database;
  }

  async replaceVatSummary(rows: readonly SummaryTableRow[]): Promise<void> {
    const database = this.requireDb();
    const values = rows.map(toInsert);

    const write = this.writeQueue.then(() =>
      database.transaction(async (tx) => {
        await tx.delete(vatSummary);
        if (values.length > 0) {
          await tx.insert(vatSummary).values(values);
        }
      })
    );
    // Keep the queue alive after a failed write; the caller still sees the rejection
    this.writeQueue = write.catch((error: unknown) => {
      logger.debug('storage', 'Queued summary write failed', {
        reason: error instanceof Error ? error.message : String(error),
      });
    });

    await write;
    logger.info('storage', `Stored ${values.length} summary rows`, { table: VAT_SUMMARY_TABLE });
  }

  async getVatSummary(): Promise<SummaryTableRow[]> {
    const records = await this.requireDb()
      .select()
      .from(vatSummary)
      .orderBy(asc(vatSummary.id));
    return records.map(toTableRow);
  }
}

export const storage = new DatabaseStorage();
