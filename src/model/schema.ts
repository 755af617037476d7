import { readFile } from 'fs/promises';
import { resolve } from 'path';

export const SCHEMA_PATH = resolve(__dirname, '../../sql/schema.sql');

// A mysql2 Pool or PoolConnection
export interface SchemaExecutor {
  query(sql: string): Promise<unknown>;
}

export const ensureUsersTable = async (db: SchemaExecutor, schemaPath = SCHEMA_PATH): Promise<void> => {
  const sql = await readFile(schemaPath, 'utf8');
  await db.query(sql);
};
