/**
 * Sequential, append-only schema migrations. Each runs in a transaction and
 * is recorded in schema_version, so running them on every open is safe.
 */

import type Database from 'better-sqlite3';

type Migration = (db: Database.Database) => void;

const migrations: Migration[] = [
  // 0: baseline
  (db) => {
    db.exec(`
      CREATE TABLE source_records (
        source_type TEXT NOT NULL,
        source_id   TEXT NOT NULL,
        payload     TEXT NOT NULL,
        created_at  TEXT NOT NULL,
        PRIMARY KEY (source_type, source_id)
      );
      CREATE INDEX idx_source_records_created ON source_records (source_type, created_at);

      CREATE TABLE value_scores (
        user_id    TEXT PRIMARY KEY,
        run_id     TEXT NOT NULL,
        score      REAL NOT NULL,
        components TEXT NOT NULL,
        excluded   INTEGER NOT NULL DEFAULT 0,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE content_drafts (
        draft_id   TEXT PRIMARY KEY,
        run_id     TEXT NOT NULL,
        payload    TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  },
  // 1: persisted retrieval index
  (db) => {
    db.exec(`
      CREATE TABLE indexed_documents (
        source_type   TEXT NOT NULL,
        source_id     TEXT NOT NULL,
        content       TEXT NOT NULL,
        content_hash  TEXT NOT NULL,
        embedded_hash TEXT,
        embedding     TEXT NOT NULL,
        metadata      TEXT NOT NULL,
        snapshot_at   TEXT NOT NULL,
        indexed_at    TEXT NOT NULL,
        PRIMARY KEY (source_type, source_id)
      );
    `);
  },
];

export const SCHEMA_VERSION = migrations.length - 1;

export function runMigrations(db: Database.Database): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db
    .prepare<[], { v: number | null }>('SELECT MAX(version) AS v FROM schema_version')
    .get();
  const current = row?.v ?? -1;
  if (current >= SCHEMA_VERSION) return 0;

  const stamp = db.prepare<[number]>("INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))");
  let applied = 0;
  for (let i = current + 1; i < migrations.length; i++) {
    const txn = db.transaction(() => {
      migrations[i](db);
      stamp.run(i);
    });
    txn();
    applied++;
  }
  return applied;
}
