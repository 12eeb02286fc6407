/**
 * Shared database types
 */

export const CAREERS_TABLE = 'careers';

export interface StoredPosting {
  title: string | null;
  location: string | null;
  link: string | null;
  sourceUrl: string;
  scrapedAt: Date;
}

export interface PersistOptions {
  replace: boolean;
  /** Defaults to the time persistence starts */
  scrapedAt?: Date;
}
