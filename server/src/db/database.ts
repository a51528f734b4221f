import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { logger } from '../utils/logger';

export type CacheDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS words (
    renshuu_id TEXT PRIMARY KEY,
    japanese TEXT NOT NULL,
    reading TEXT NOT NULL,
    jmdict_id TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_japanese_reading ON words(japanese, reading);
  CREATE INDEX IF NOT EXISTS idx_jmdict_id ON words(jmdict_id);

  CREATE TABLE IF NOT EXISTS list_memberships (
    list_id TEXT NOT NULL,
    renshuu_id TEXT NOT NULL REFERENCES words(renshuu_id) ON DELETE CASCADE,
    PRIMARY KEY (list_id, renshuu_id)
  );

  CREATE INDEX IF NOT EXISTS idx_list_id ON list_memberships(list_id);
`;

/**
 * Open (and create if needed) the word cache
 *
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): CacheDatabase {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);

  logger.debug('Cache database ready', { path: dbPath });
  return db;
}
