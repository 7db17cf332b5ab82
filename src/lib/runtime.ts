import path from 'node:path';

import { loadConfig } from './config.js';
import { readContextFile } from './context/source.js';
import { migrate, openDb, type Db } from './db.js';
import { createBackendLoader, type BackendLoader } from './encoder/index.js';
import { consoleLogger, type Logger } from './log.js';
import { createSession, type RelevanceSession } from './session.js';
import { listSnippets } from './snippets/repo.js';
import { syncActiveModel, type ModelSync } from './state/repo.js';
import { dbPath, ensureStorageRoot } from './storage.js';
import type { AppConfig } from './types.js';

export interface Workspace {
  config: AppConfig;
  db: Db;
}

export function openWorkspace(repoRoot = path.resolve(process.cwd()), config = loadConfig(repoRoot)): Workspace {
  ensureStorageRoot(config.storage.root);
  const db = openDb(dbPath(config.storage.root));
  migrate(db);
  return { config, db };
}

export interface StartSessionOptions {
  /** Overrides `encoder.models` from config.yml. */
  models?: readonly string[];
  load?: BackendLoader;
  logger?: Logger;
}

export interface StartedSession {
  session: RelevanceSession;
  modelSync: ModelSync;
}

/**
 * Load the encoder, record which model is active (flagging stored papers
 * stale if it changed) and embed the context file plus stored snippets.
 */
export async function startSession(ws: Workspace, opts: StartSessionOptions = {}): Promise<StartedSession> {
  const logger = opts.logger ?? consoleLogger;
  const session = await createSession({
    models: opts.models ?? ws.config.encoder.models,
    load: opts.load ?? createBackendLoader(ws.config.encoder),
    thresholds: ws.config.scoring.thresholds,
    logger,
  });

  const modelSync = syncActiveModel(ws.db, session.model);
  if (modelSync.changed) {
    logger.warn(
      `Embedding model changed (${modelSync.previous} -> ${session.model}); ` +
      `${modelSync.staleMarked} stored paper(s) flagged for recalculation. Run: npm run recalculate`,
    );
  }

  await session.loadContext(readContextFile(ws.config.context.file), listSnippets(ws.db));
  return { session, modelSync };
}
