import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle, type NeonDatabase } from 'drizzle-orm/neon-serverless';
import { sql } from 'drizzle-orm';
import ws from 'ws';
import * as schema from "@shared/schema";
import { config } from './config';
import { logger } from './services/logger';

// Node.js 20 has no global WebSocket
neonConfig.webSocketConstructor = ws;

export type Database = NeonDatabase<typeof schema>;

function createPool(url: string | undefined): Pool | null {
  if (!url) {
    logger.warn('db', 'DATABASE_URL not set; database disabled');
    return null;
  }
  return new Pool({
    connectionString: url,
    max: config.database.connectionPool.max,
    idleTimeoutMillis: config.database.connectionPool.idleTimeoutMillis,
    connectionTimeoutMillis: config.database.connectionPool.connectionTimeoutMillis
  });
}

export const pool = createPool(config.database.url);

// null when no database is configured
export const db: Database | null = pool ? drizzle({ client: pool, schema }) : null;

// Connection health check
export async function checkDatabaseConnection(): Promise<boolean> {
  if (!db) return false;
  try {
    await db.execute(sql`SELECT 1`);
    return true;
  } catch (error) {
    logger.error('db', 'Database connection check failed', {}, error instanceof Error ? error : undefined);
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    logger.info('db', 'Connection pool closed');
  }
}
