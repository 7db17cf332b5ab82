import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export interface Db {
  sqlite: Database.Database;
}

interface Migration {
  version: number;
  sql: string;
}

/** Applied in order; each entry moves `schema_meta.version` to its own number. */
const MIGRATIONS: Migration[] = [
  {
    version: 1,
    sql: `CREATE TABLE IF NOT EXISTS papers (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        abstract TEXT NOT NULL,
        notes TEXT NOT NULL DEFAULT '',
        arxiv_id TEXT,
        authors_json TEXT NOT NULL DEFAULT '[]',
        categories_json TEXT NOT NULL DEFAULT '[]',
        published_at TEXT,
        pdf_path TEXT,
        relevance_score REAL NOT NULL,
        raw_score REAL NOT NULL,
        category TEXT NOT NULL,
        status TEXT NOT NULL,
        embedding_json TEXT,
        embedding_needs_update INTEGER NOT NULL DEFAULT 0,
        embedding_updated_at TEXT,
        scored_model TEXT NOT NULL,
        context_version TEXT NOT NULL,
        recalculated_at TEXT,
        added_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS snippets (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        content TEXT NOT NULL,
        source TEXT,
        paper_id TEXT,
        added_at TEXT NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_papers_arxiv_id ON papers(arxiv_id) WHERE arxiv_id IS NOT NULL;
      CREATE INDEX IF NOT EXISTS idx_papers_status ON papers(status);
      CREATE INDEX IF NOT EXISTS idx_papers_relevance ON papers(relevance_score DESC);`,
  },
  {
    // remember which model/context the stored scores belong to
    version: 2,
    sql: `CREATE TABLE IF NOT EXISTS engine_state (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        active_model TEXT NOT NULL,
        context_version TEXT,
        recalculated_at TEXT,
        updated_at TEXT NOT NULL
      );`,
  },
];

export const SCHEMA_VERSION = MIGRATIONS.reduce((max, m) => Math.max(max, m.version), 0);

export function openDb(dbPath: string): Db {
  if (dbPath !== ':memory:') fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  return { sqlite };
}

export function schemaVersion(db: Db): number {
  const row = db.sqlite.prepare('SELECT version FROM schema_meta WHERE id=1').get() as { version?: number } | undefined;
  return row?.version ?? 0;
}

export function migrate(db: Db): void {
  const sqlite = db.sqlite;
  sqlite.exec(
    `CREATE TABLE IF NOT EXISTS schema_meta (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      version INTEGER NOT NULL,
      updated_at TEXT NOT NULL
    );`
  );

  const current = schemaVersion(db);
  const setVersion = sqlite.prepare(
    `INSERT INTO schema_meta (id, version, updated_at) VALUES (1, @version, @updatedAt)
     ON CONFLICT(id) DO UPDATE SET version=excluded.version, updated_at=excluded.updated_at`
  );

  for (const m of MIGRATIONS) {
    if (m.version <= current) continue;
    sqlite.transaction(() => {
      sqlite.exec(m.sql);
      setVersion.run({ version: m.version, updatedAt: new Date().toISOString() });
    })();
  }
}
