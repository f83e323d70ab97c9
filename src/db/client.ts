import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { Logger as DrizzleLogger } from 'drizzle-orm';
import type { DatabaseConfig } from '../config/database.js';
import { poolMax } from '../config/database.js';
import type { Logger } from '../util/logging.js';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: Pool;
  db: Database;
}

class PinoQueryLogger implements DrizzleLogger {
  constructor(private readonly log: Logger) {}

  logQuery(query: string, params: unknown[]): void {
    this.log.info({ query, params }, 'sql');
  }
}

export function createDatabase(cfg: DatabaseConfig, log: Logger): DatabaseHandle {
  const pool = new Pool({
    connectionString: cfg.url,
    max: poolMax(cfg),
    idleTimeoutMillis: cfg.idleTimeoutMs,
    connectionTimeoutMillis: cfg.connectTimeoutMs,
    statement_timeout: cfg.statementTimeoutMs,
    query_timeout: cfg.statementTimeoutMs + cfg.connectTimeoutMs,
    application_name: 'wiki-chat-agent',
  });
  // Idle clients can fail when the server restarts; the pool replaces them.
  pool.on('error', (err) => log.warn({ err }, 'idle postgres client error'));
  const db = drizzle(pool, { schema, logger: cfg.echo ? new PinoQueryLogger(log) : false });
  return { pool, db };
}

export const SCHEMA_FILE = path.resolve(__dirname, '../../sql/schema.sql');

/** Creates the enum, tables and indexes when they do not exist yet. */
export async function initDatabase(handle: DatabaseHandle, log: Logger, schemaFile = SCHEMA_FILE): Promise<void> {
  const ddl = await readFile(schemaFile, 'utf8');
  await handle.pool.query(ddl);
  log.info('✅ conversation schema ready');
}
