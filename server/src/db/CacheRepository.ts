import type { CacheDatabase } from './database';

export interface CachedWord {
  renshuuId: string;
  japanese: string;
  reading: string;
  jmdictId: string | null;
}

interface WordRow {
  renshuu_id: string;
  japanese: string;
  reading: string;
  jmdict_id: string | null;
}

function toCachedWord(row: WordRow): CachedWord {
  return {
    renshuuId: row.renshuu_id,
    japanese: row.japanese,
    reading: row.reading,
    jmdictId: row.jmdict_id,
  };
}

/**
 * Words and schedule memberships already seen on Renshuu
 */
export class CacheRepository {
  private readonly db: CacheDatabase;

  constructor(db: CacheDatabase) {
    this.db = db;
  }

  findWordByJmdictId(jmdictId: string): CachedWord | null {
    const row = this.db
      .prepare<[string], WordRow>('SELECT * FROM words WHERE jmdict_id = ? LIMIT 1')
      .get(jmdictId);
    return row ? toCachedWord(row) : null;
  }

  findWordByForm(japanese: string, reading: string): CachedWord | null {
    const row = this.db
      .prepare<[string, string], WordRow>('SELECT * FROM words WHERE japanese = ? AND reading = ? LIMIT 1')
      .get(japanese, reading);
    return row ? toCachedWord(row) : null;
  }

  getWord(renshuuId: string): CachedWord | null {
    const row = this.db
      .prepare<[string], WordRow>('SELECT * FROM words WHERE renshuu_id = ?')
      .get(renshuuId);
    return row ? toCachedWord(row) : null;
  }

  /**
   * Insert a word, or refresh its forms if already cached
   */
  upsertWord(word: CachedWord): void {
    this.db
      .prepare(`
        INSERT INTO words (renshuu_id, japanese, reading, jmdict_id)
        VALUES (@renshuuId, @japanese, @reading, @jmdictId)
        ON CONFLICT(renshuu_id) DO UPDATE SET
          japanese = excluded.japanese,
          reading = excluded.reading,
          jmdict_id = excluded.jmdict_id
      `)
      .run(word);
  }

  hasMembership(listId: string, renshuuId: string): boolean {
    const row = this.db
      .prepare<[string, string], { found: number }>(
        'SELECT 1 AS found FROM list_memberships WHERE list_id = ? AND renshuu_id = ?'
      )
      .get(listId, renshuuId);
    return row !== undefined;
  }

  /**
   * Record a membership; a no-op when it already exists
   */
  addMembership(listId: string, renshuuId: string): void {
    this.db
      .prepare('INSERT OR IGNORE INTO list_memberships (list_id, renshuu_id) VALUES (?, ?)')
      .run(listId, renshuuId);
  }

  /**
   * A list counts as cached once any membership of it is stored
   */
  isListCached(listId: string): boolean {
    return this.countMemberships(listId) > 0;
  }

  countMemberships(listId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM list_memberships WHERE list_id = ?')
      .get(listId);
    return row?.count ?? 0;
  }

  /**
   * Forget every membership of a list
   * @returns Number of deleted memberships
   */
  dropList(listId: string): number {
    const result = this.db.prepare('DELETE FROM list_memberships WHERE list_id = ?').run(listId);
    return result.changes;
  }

  /**
   * Cached words with the given forms, optionally restricted to one list
   */
  findWords(criteria: { japanese?: string; reading?: string; jmdictId?: string; listId?: string }): CachedWord[] {
    const clauses: string[] = [];
    const params: string[] = [];

    if (criteria.jmdictId !== undefined) {
      clauses.push('w.jmdict_id = ?');
      params.push(criteria.jmdictId);
    }
    if (criteria.japanese !== undefined) {
      clauses.push('w.japanese = ?');
      params.push(criteria.japanese);
    }
    if (criteria.reading !== undefined) {
      clauses.push('w.reading = ?');
      params.push(criteria.reading);
    }
    if (criteria.listId !== undefined) {
      clauses.push('EXISTS (SELECT 1 FROM list_memberships m WHERE m.renshuu_id = w.renshuu_id AND m.list_id = ?)');
      params.push(criteria.listId);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare<string[], WordRow>(`SELECT w.* FROM words w ${where} ORDER BY w.renshuu_id`)
      .all(...params);
    return rows.map(toCachedWord);
  }

  /**
   * Run several writes atomically
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}
