/**
 * DuckDB Database Module - Main Entry Point
 * Connection handling shared by the careers table functions
 */

import { DuckDBInstance, type DuckDBConnection, type DuckDBValue } from '@duckdb/node-api';
import { PersistenceError } from '../errors';
import { logger } from '../logger';

/**
 * An open connection plus the target it was opened from (token redacted)
 */
export interface CareersDatabase {
  connection: DuckDBConnection;
  target: string;
}

/**
 * Hides MotherDuck tokens embedded in a connection string
 */
export function redactTarget(target: string): string {
  return target.replace(/(motherduck_token=)[^&]*/gi, '$1***');
}

/**
 * Opens a local DuckDB file, `:memory:`, or a MotherDuck `md:` database.
 * Instances come from the process-wide cache so the same file can be
 * opened again in one process.
 */
export async function openDatabase(target: string): Promise<CareersDatabase> {
  const redacted = redactTarget(target);
  try {
    const instance = await DuckDBInstance.fromCache(target);
    const connection = await instance.connect();
    logger.debug(`Connected to ${redacted}`);
    return { connection, target: redacted };
  } catch (error) {
    throw new PersistenceError(redacted, 'Failed to open database', error);
  }
}

/**
 * Closes the connection; the cached instance is released with the process
 */
export function closeDatabase(db: CareersDatabase): void {
  db.connection.closeSync();
}

/**
 * Execute a statement with positional ($1, $2, ...) parameters
 */
export async function execute(
  db: CareersDatabase,
  sql: string,
  params?: DuckDBValue[]
): Promise<void> {
  await db.connection.run(sql, params);
}

/**
 * Execute a query and return its rows as objects keyed by column name
 */
export async function query(
  db: CareersDatabase,
  sql: string,
  params?: DuckDBValue[]
): Promise<Record<string, DuckDBValue>[]> {
  const reader = await db.connection.runAndReadAll(sql, params);
  return reader.getRowObjects();
}

/**
 * Runs `callback` inside BEGIN/COMMIT, rolling back on any error
 */
export async function withTransaction<T>(
  db: CareersDatabase,
  callback: (db: CareersDatabase) => Promise<T>
): Promise<T> {
  await execute(db, 'BEGIN TRANSACTION');
  try {
    const result = await callback(db);
    await execute(db, 'COMMIT');
    return result;
  } catch (error) {
    try {
      await execute(db, 'ROLLBACK');
    } catch (rollbackError) {
      logger.error('Rollback failed', {
        source: 'database',
        context: {
          target: db.target,
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        },
      });
    }
    throw error;
  }
}

export * from './types';
export * from './careers';
