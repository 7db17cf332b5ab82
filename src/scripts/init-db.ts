import path from 'node:path';
import { loadConfig } from '../lib/config.js';
import { migrate, openDb, schemaVersion } from '../lib/db.js';
import { printJson } from '../lib/cli.js';
import { paperStatistics } from '../lib/papers/repo.js';
import { listSnippets } from '../lib/snippets/repo.js';
import { getEngineState } from '../lib/state/repo.js';
import { dbPath, ensureStorageRoot } from '../lib/storage.js';

const repoRoot = path.resolve(process.cwd());
const config = loadConfig(repoRoot);

ensureStorageRoot(config.storage.root);
const file = dbPath(config.storage.root);
const db = openDb(file);
migrate(db);

console.error(`DB ready: ${file}`);
printJson({
  kind: 'dbReady',
  path: file,
  schemaVersion: schemaVersion(db),
  papers: paperStatistics(db).totalPapers,
  snippets: listSnippets(db).length,
  activeModel: getEngineState(db)?.activeModel ?? null,
});
