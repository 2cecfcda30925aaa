/**
 * Persistent tier for the TTL cache.
 *
 * Raw GitLab record sets survive restarts in a local SQLite file so a fresh
 * process does not re-page through the API for data that is still within its
 * TTL. Snapshots and trends are cheap to rebuild from records and stay in
 * memory only.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

// ─── Types ──────────────────────────────────────────────

export interface StoredEntry {
  /** JSON-encoded payload */
  payload: string;
  createdAt: number;
  ttlMs: number;
  version: number;
}

/** Synchronous key/value persistence behind TtlCache. */
export interface CacheStore {
  load(key: string): StoredEntry | null;
  save(key: string, entry: StoredEntry): void;
  delete(key: string): void;
  deletePrefix(prefix: string): number;
  clear(): void;
  close(): void;
}

// ─── Schema Migrations ──────────────────────────────────

const MIGRATIONS: Array<{ version: number; sql: string }> = [
  {
    version: 1,
    sql: `
      CREATE TABLE IF NOT EXISTS cache_entries (
        key           TEXT PRIMARY KEY,
        payload       TEXT NOT NULL,      -- JSON
        created_at    INTEGER NOT NULL,   -- epoch ms
        ttl_ms        INTEGER NOT NULL,
        version       INTEGER NOT NULL
      );

      INSERT OR IGNORE INTO schema_version (version) VALUES (1);
    `,
  },
];

function migrate(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version       INTEGER PRIMARY KEY,
      applied_at    TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db
    .prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM schema_version")
    .get();
  const currentVersion = row?.v ?? 0;

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      db.exec(migration.sql);
    }
  }
}

export function schemaVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM schema_version")
    .get();
  return row?.v ?? 0;
}

// ─── SQLite Store ───────────────────────────────────────

interface EntryRow {
  payload: string;
  created_at: number;
  ttl_ms: number;
  version: number;
}

export class SqliteCacheStore implements CacheStore {
  readonly db: Database.Database;

  /** `path` may be ":memory:" for an ephemeral store. */
  constructor(path: string) {
    if (path !== ":memory:") {
      const dir = dirname(path);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    migrate(this.db);
  }

  load(key: string): StoredEntry | null {
    const row = this.db
      .prepare<[string], EntryRow>(
        "SELECT payload, created_at, ttl_ms, version FROM cache_entries WHERE key = ?"
      )
      .get(key);
    if (!row) return null;
    return { payload: row.payload, createdAt: row.created_at, ttlMs: row.ttl_ms, version: row.version };
  }

  save(key: string, entry: StoredEntry): void {
    this.db
      .prepare(
        `INSERT INTO cache_entries (key, payload, created_at, ttl_ms, version)
         VALUES (@key, @payload, @createdAt, @ttlMs, @version)
         ON CONFLICT(key) DO UPDATE SET
           payload = excluded.payload,
           created_at = excluded.created_at,
           ttl_ms = excluded.ttl_ms,
           version = excluded.version`
      )
      .run({ key, ...entry });
  }

  delete(key: string): void {
    this.db.prepare("DELETE FROM cache_entries WHERE key = ?").run(key);
  }

  deletePrefix(prefix: string): number {
    const result = this.db
      .prepare("DELETE FROM cache_entries WHERE substr(key, 1, length(@prefix)) = @prefix")
      .run({ prefix });
    return result.changes;
  }

  clear(): void {
    this.db.exec("DELETE FROM cache_entries");
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
