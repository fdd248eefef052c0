import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { getPool } from './pool.js';
import type { DbPool } from './pool.js';

function locateSchema(): string {
  const besideSources = resolve(__dirname, '../../sql/schema.sql');
  if (existsSync(besideSources)) return besideSources;
  // Compiled output lives under dist/; fall back to the workspace layout.
  return resolve(process.cwd(), 'packages/adapters/sql/schema.sql');
}

/** Create the schema and the singleton session row. Idempotent. */
export async function applySchema(pool: DbPool = getPool()): Promise<void> {
  const sql = readFileSync(locateSchema(), 'utf-8');
  await pool.query(sql);
  console.log('[pg-schema] schema applied');
}
