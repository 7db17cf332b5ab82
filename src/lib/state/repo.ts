import type { Db } from '../db.js';
import { markAllEmbeddingsStale } from '../papers/repo.js';

export interface EngineState {
  activeModel: string;
  contextVersion: string | null;
  recalculatedAt: string | null;
  updatedAt: string;
}

export function getEngineState(db: Db): EngineState | null {
  const row = db.sqlite.prepare(
    `SELECT active_model as activeModel, context_version as contextVersion,
            recalculated_at as recalculatedAt, updated_at as updatedAt
     FROM engine_state WHERE id = 1`
  ).get() as EngineState | undefined;
  return row ?? null;
}

export interface ModelSync {
  changed: boolean;
  previous: string | null;
  /** Papers newly flagged stale because the model changed. */
  staleMarked: number;
}

/**
 * Record the model the current process is scoring with. When it differs
 * from the last recorded one, every stored paper embedding is flagged stale:
 * scores from different models are not comparable.
 */
export function syncActiveModel(db: Db, model: string, now = new Date()): ModelSync {
  const state = getEngineState(db);
  const iso = now.toISOString();

  if (state?.activeModel === model) return { changed: false, previous: model, staleMarked: 0 };

  const apply = db.sqlite.transaction(() => {
    const staleMarked = state ? markAllEmbeddingsStale(db, now) : 0;
    db.sqlite.prepare(
      `INSERT INTO engine_state (id, active_model, context_version, recalculated_at, updated_at)
       VALUES (1, ?, NULL, NULL, ?)
       ON CONFLICT(id) DO UPDATE SET
         active_model = excluded.active_model,
         context_version = NULL,
         updated_at = excluded.updated_at`
    ).run(model, iso);
    return staleMarked;
  });

  return { changed: state !== null, previous: state?.activeModel ?? null, staleMarked: apply() };
}

/** Remember the context version a full recalculation last ran against. */
export function recordRecalculation(db: Db, contextVersion: string, now = new Date()): void {
  db.sqlite
    .prepare('UPDATE engine_state SET context_version = ?, recalculated_at = ?, updated_at = ? WHERE id = 1')
    .run(contextVersion, now.toISOString(), now.toISOString());
}
