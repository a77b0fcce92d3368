/**
 * Database client and connection management
 */

import { sql } from 'drizzle-orm';
import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { neon } from '@neondatabase/serverless';
import { config } from '../utils/config.js';
import * as schema from './schema.js';

export type Database = NeonHttpDatabase<typeof schema>;

let db: Database | null = null;

/**
 * Whether a database URL is configured
 */
export function isDatabaseConfigured(): boolean {
  return config.DATABASE_URL !== '';
}

/**
 * Get database client for use in repositories (created on first use)
 */
export function getDb(): Database {
  if (!db) {
    db = drizzle(neon(config.DATABASE_URL), { schema });
  }
  return db;
}

/**
 * Check database connectivity
 */
export async function checkConnection(): Promise<boolean> {
  try {
    await getDb().execute(sql`select 1`);
    return true;
  } catch {
    return false;
  }
}
