import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { migrate, openDb, schemaVersion, SCHEMA_VERSION, type Db } from './db.js';

describe('migrate', () => {
  let tmpDir: string;
  let db: Db;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-triage-db-'));
    db = openDb(path.join(tmpDir, 'nested', 'test.sqlite'));
  });

  afterEach(() => {
    db.sqlite.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function tables(): string[] {
    const rows = db.sqlite
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all() as Array<{ name: string }>;
    return rows.map((r) => r.name);
  }

  it('creates the schema at the current version', () => {
    migrate(db);
    expect(tables()).toEqual(['engine_state', 'papers', 'schema_meta', 'snippets']);
    expect(db.sqlite.prepare('SELECT version FROM schema_meta WHERE id = 1').get()).toEqual({ version: 2 });
    expect(schemaVersion(db)).toBe(SCHEMA_VERSION);
  });

  it('reports version 0 before the first migration', () => {
    db.sqlite.exec('CREATE TABLE schema_meta (id INTEGER PRIMARY KEY, version INTEGER NOT NULL, updated_at TEXT NOT NULL)');
    expect(schemaVersion(db)).toBe(0);
  });

  it('is idempotent', () => {
    migrate(db);
    migrate(db);
    expect(tables()).toEqual(['engine_state', 'papers', 'schema_meta', 'snippets']);
  });

  it('upgrades a version 1 database', () => {
    migrate(db);
    db.sqlite.exec('DROP TABLE engine_state');
    db.sqlite.prepare('UPDATE schema_meta SET version = 1 WHERE id = 1').run();

    migrate(db);
    expect(tables()).toContain('engine_state');
    expect(db.sqlite.prepare('SELECT version FROM schema_meta WHERE id = 1').get()).toEqual({ version: 2 });
  });
});
