import { readFile } from 'node:fs/promises';
import { defaultDb, type Queryable } from './client.js';

export const SCHEMA_FILE = new URL('../sql/schema.sql', import.meta.url);

/**
 * Apply the inventory schema. Every statement is IF NOT EXISTS / OR REPLACE,
 * so running it against an initialised database changes nothing.
 */
export async function applySchema(db: Queryable = defaultDb): Promise<void> {
  const sql = await readFile(SCHEMA_FILE, 'utf8');
  await db.query(sql);
}
