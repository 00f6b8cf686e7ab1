/**
 * SQLite cache of raw upstream records.
 * Lets a preparation run reuse the last fetched boundary and Census records
 * instead of hitting the network again.
 */
import Database from 'better-sqlite3';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

// ============================================================================
// Types
// ============================================================================

export interface SourceMetadata {
  sourceId: string;
  url: string | null;
  lastFetched: string;
  recordCount: number;
}

// ============================================================================
// Cache Implementation
// ============================================================================

export class SourceCache {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sources (
        source_id TEXT PRIMARY KEY,
        url TEXT,
        last_fetched TEXT NOT NULL,
        record_count INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS source_records (
        source_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        id TEXT NOT NULL,
        data TEXT NOT NULL,
        PRIMARY KEY (source_id, seq),
        FOREIGN KEY (source_id) REFERENCES sources(source_id)
      );

      CREATE INDEX IF NOT EXISTS idx_source_records_id
        ON source_records(source_id, id);
    `);
  }

  getSourceMetadata(sourceId: string): SourceMetadata | null {
    const row = this.db
      .prepare(
        `SELECT source_id, url, last_fetched, record_count
         FROM sources WHERE source_id = ?`
      )
      .get(sourceId) as
      | {
          source_id: string;
          url: string | null;
          last_fetched: string;
          record_count: number;
        }
      | undefined;

    if (!row) return null;

    return {
      sourceId: row.source_id,
      url: row.url,
      lastFetched: row.last_fetched,
      recordCount: row.record_count,
    };
  }

  /**
   * Replace every cached record of a source in one transaction.
   * Records are keyed by input position, so duplicate ids all survive.
   */
  replaceRecords<T>(
    sourceId: string,
    url: string,
    records: T[],
    getRecordId: (record: T, index: number) => string
  ): void {
    const upsertSource = this.db.prepare(
      `INSERT INTO sources (source_id, url, last_fetched, record_count)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(source_id) DO UPDATE SET
         url = excluded.url,
         last_fetched = excluded.last_fetched,
         record_count = excluded.record_count`
    );
    const clear = this.db.prepare(`DELETE FROM source_records WHERE source_id = ?`);
    const insert = this.db.prepare(
      `INSERT INTO source_records (source_id, seq, id, data)
       VALUES (?, ?, ?, ?)`
    );

    const replaceAll = this.db.transaction((items: T[]) => {
      upsertSource.run(sourceId, url, new Date().toISOString(), items.length);
      clear.run(sourceId);
      for (let i = 0; i < items.length; i++) {
        insert.run(sourceId, i, getRecordId(items[i], i), JSON.stringify(items[i]));
      }
    });

    replaceAll(records);
  }

  /**
   * Get all records for a source, in the order they were stored.
   */
  getRecords(sourceId: string): unknown[] {
    const rows = this.db
      .prepare(`SELECT data FROM source_records WHERE source_id = ? ORDER BY seq`)
      .all(sourceId) as { data: string }[];

    return rows.map((row) => JSON.parse(row.data) as unknown);
  }

  getRecordCount(sourceId: string): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) as count FROM source_records WHERE source_id = ?`)
      .get(sourceId) as { count: number };

    return row.count;
  }

  /**
   * Check if source needs refresh. Records fetched from a different URL
   * (another vintage or query) are never reused, whatever their age.
   */
  needsRefresh(sourceId: string, url: string, maxAgeHours = 24, now: Date = new Date()): boolean {
    const meta = this.getSourceMetadata(sourceId);
    if (!meta || meta.url !== url) return true;

    const lastFetched = new Date(meta.lastFetched);
    const ageMs = now.getTime() - lastFetched.getTime();
    const ageHours = ageMs / (1000 * 60 * 60);

    return ageHours > maxAgeHours;
  }

  close(): void {
    this.db.close();
  }
}

// ============================================================================
// Factory
// ============================================================================

export const DEFAULT_CACHE_PATH = new URL(
  '../../data/cache/sources.db',
  import.meta.url
).pathname;

export async function openCache(
  dbPath: string = DEFAULT_CACHE_PATH
): Promise<SourceCache> {
  await mkdir(dirname(dbPath), { recursive: true });
  return new SourceCache(dbPath);
}
