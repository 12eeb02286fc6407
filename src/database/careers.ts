/**
 * Careers Table Functions
 * Stores scraped postings, batched by source URL
 */

import type { DuckDBValue } from '@duckdb/node-api';
import { PersistenceError } from '../errors';
import type { JobPosting } from '../job-extractor';
import { logger } from '../logger';
import {
  closeDatabase,
  execute,
  openDatabase,
  query,
  withTransaction,
  type CareersDatabase,
} from './index';
import { CAREERS_TABLE, type PersistOptions, type StoredPosting } from './types';

/**
 * DuckDB reads 'YYYY-MM-DD HH:MM:SS.mmm' as a TIMESTAMP; values are UTC
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '');
}

function stringOrNull(value: DuckDBValue | undefined): string | null {
  return typeof value === 'string' ? value : null;
}

function numberOrZero(value: DuckDBValue | undefined): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return 0;
}

/**
 * Create the careers table if it does not exist yet
 */
export async function ensureCareersTable(db: CareersDatabase): Promise<void> {
  await execute(
    db,
    `CREATE TABLE IF NOT EXISTS ${CAREERS_TABLE} (
       title VARCHAR,
       location VARCHAR,
       link VARCHAR,
       source_url VARCHAR NOT NULL,
       scraped_at TIMESTAMP NOT NULL
     )`
  );
}

/**
 * Count stored postings for a source URL
 */
export async function countPostingsForSource(
  db: CareersDatabase,
  sourceUrl: string
): Promise<number> {
  const rows = await query(
    db,
    `SELECT CAST(count(*) AS INTEGER) AS total FROM ${CAREERS_TABLE} WHERE source_url = $1`,
    [sourceUrl]
  );
  return numberOrZero(rows[0]?.total);
}

/**
 * Get stored postings for a source URL in insertion order
 */
export async function getPostingsForSource(
  db: CareersDatabase,
  sourceUrl: string
): Promise<StoredPosting[]> {
  const rows = await query(
    db,
    `SELECT title, location, link, source_url,
            CAST(epoch_ms(scraped_at) AS DOUBLE) AS scraped_at_ms
     FROM ${CAREERS_TABLE}
     WHERE source_url = $1
     ORDER BY rowid`,
    [sourceUrl]
  );

  return rows.map((row) => ({
    title: stringOrNull(row.title),
    location: stringOrNull(row.location),
    link: stringOrNull(row.link),
    sourceUrl: stringOrNull(row.source_url) ?? sourceUrl,
    scrapedAt: new Date(numberOrZero(row.scraped_at_ms)),
  }));
}

/**
 * Delete every posting of a source URL, returning how many were removed
 */
export async function deletePostingsForSource(
  db: CareersDatabase,
  sourceUrl: string
): Promise<number> {
  const existing = await countPostingsForSource(db, sourceUrl);
  await execute(db, `DELETE FROM ${CAREERS_TABLE} WHERE source_url = $1`, [sourceUrl]);
  return existing;
}

/**
 * Insert one row per posting, all sharing `sourceUrl` and `scrapedAt`
 */
export async function insertPostings(
  db: CareersDatabase,
  postings: JobPosting[],
  sourceUrl: string,
  scrapedAt: Date
): Promise<number> {
  const timestamp = formatTimestamp(scrapedAt);

  for (const posting of postings) {
    await execute(
      db,
      `INSERT INTO ${CAREERS_TABLE} (title, location, link, source_url, scraped_at)
       VALUES ($1, $2, $3, $4, CAST($5 AS TIMESTAMP))`,
      [posting.title, posting.location, posting.link, sourceUrl, timestamp]
    );
  }

  return postings.length;
}

/**
 * Stores a batch of postings in one transaction.
 * With `replace`, prior rows of the same source URL are deleted first;
 * if anything fails the whole batch (delete included) is rolled back.
 */
export async function persistPostings(
  postings: JobPosting[],
  sourceUrl: string,
  dbTarget: string,
  options: PersistOptions
): Promise<number> {
  const scrapedAt = options.scrapedAt ?? new Date();
  const db = await openDatabase(dbTarget);

  try {
    return await withTransaction(db, async (tx) => {
      await ensureCareersTable(tx);

      if (options.replace) {
        const removed = await deletePostingsForSource(tx, sourceUrl);
        logger.info(`Removed ${removed} existing postings for ${sourceUrl}`);
      }

      return insertPostings(tx, postings, sourceUrl, scrapedAt);
    });
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    throw new PersistenceError(db.target, 'Failed to store postings', error);
  } finally {
    closeDatabase(db);
  }
}
