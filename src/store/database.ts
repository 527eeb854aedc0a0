/**
 * SQLite schema and connection for the source store.
 */

import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";

export type StoreDatabase = Database;

// ============================================================================
// SCHEMA
// ============================================================================

/**
 * Collections keep their member ids as a JSON array with no foreign key,
 * so deleting a source leaves dangling ids for readers to surface.
 */
const SCHEMA = `
  CREATE TABLE IF NOT EXISTS sources (
    id TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    normalized_url TEXT NOT NULL UNIQUE,
    title TEXT NOT NULL DEFAULT '',
    content TEXT NOT NULL DEFAULT '',
    content_hash TEXT NOT NULL DEFAULT '',
    domain TEXT NOT NULL,
    author TEXT,
    publish_date TEXT,
    publish_ts TEXT,
    credibility_score REAL NOT NULL DEFAULT 0,
    tags TEXT NOT NULL DEFAULT '[]',
    metadata TEXT NOT NULL DEFAULT '{}',
    access_count INTEGER NOT NULL DEFAULT 0,
    last_accessed TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS collections (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    source_ids TEXT NOT NULL DEFAULT '[]',
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_sources_domain ON sources(domain);
  CREATE INDEX IF NOT EXISTS idx_sources_credibility ON sources(credibility_score);
  CREATE INDEX IF NOT EXISTS idx_sources_publish_ts ON sources(publish_ts);
  CREATE INDEX IF NOT EXISTS idx_sources_last_accessed ON sources(last_accessed);
  CREATE INDEX IF NOT EXISTS idx_sources_content_hash ON sources(content_hash);
`;

// ============================================================================
// ROWS
// ============================================================================

export interface SourceRow {
  id: string;
  url: string;
  normalized_url: string;
  title: string;
  content: string;
  content_hash: string;
  domain: string;
  author: string | null;
  publish_date: string | null;
  /** publish_date as an ISO timestamp, for range queries */
  publish_ts: string | null;
  credibility_score: number;
  tags: string;
  metadata: string;
  access_count: number;
  last_accessed: string;
  created_at: string;
}

export interface CollectionRow {
  id: string;
  name: string;
  description: string;
  source_ids: string;
  metadata: string;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// CONNECTION
// ============================================================================

/**
 * Open (creating if needed) the store database and apply the schema.
 * `:memory:` gives a private in-process database.
 */
export async function openStoreDatabase(dbPath: string): Promise<StoreDatabase> {
  const filename = dbPath === ":memory:" ? dbPath : resolve(dbPath);
  if (filename !== ":memory:") {
    mkdirSync(dirname(filename), { recursive: true });
  }

  const db = await open({
    filename,
    driver: sqlite3.Database,
  });

  await db.exec(SCHEMA);
  return db;
}
