import type { Db } from '../db.js';
import { listPapers, savePaperScore } from '../papers/repo.js';
import type { Paper } from '../types.js';
import type { RelevanceSession } from '../session.js';
import { recordRecalculation } from '../state/repo.js';
import {
  batchUpdateEmbeddingsWithNotes,
  needsNotesRefresh,
  recalculateAllScores,
  recalculateContext,
  type NotesRecalcResult,
  type RecalcProgress,
  type ScoreRecalcResult,
} from './coordinator.js';

export interface RunRecalculationOptions {
  /** Only refresh papers whose notes changed since their last embedding. */
  notesOnly?: boolean;
  tolerance?: number;
  onProgress?: (progress: RecalcProgress) => void;
  now?: () => Date;
}

export type RecalculationSummary =
  | { kind: 'scores'; contextVersion: string; result: ScoreRecalcResult }
  | { kind: 'notes'; contextVersion: string; result: NotesRecalcResult };

/**
 * The cheapest pass that refreshes a stale paper. Clearing the notes leaves
 * the paper stale with nothing for the notes pass to pick up, so only a full
 * run replaces its score.
 */
export function pendingRecalculation(paper: Paper): 'notes' | 'full' | null {
  if (!paper.embeddingNeedsUpdate) return null;
  return needsNotesRefresh(paper) ? 'notes' : 'full';
}

/**
 * Recalculate stored papers and write every result back as it completes.
 * A full run re-embeds the context first so all papers share one version.
 */
export async function runRecalculation(
  db: Db,
  session: RelevanceSession,
  opts: RunRecalculationOptions = {},
): Promise<RecalculationSummary> {
  const papers = listPapers(db);
  const save = (paper: Paper) => {
    savePaperScore(db, paper);
  };

  if (opts.notesOnly) {
    const result = await batchUpdateEmbeddingsWithNotes(session, papers, {
      save,
      onProgress: opts.onProgress,
      now: opts.now,
    });
    return { kind: 'notes', contextVersion: session.requireContext().version, result };
  }

  const context = await recalculateContext(session);
  const result = await recalculateAllScores(session, papers, {
    save,
    onProgress: opts.onProgress,
    now: opts.now,
    tolerance: opts.tolerance,
  });
  if (result.errorCount === 0) recordRecalculation(db, context.version, opts.now?.());
  return { kind: 'scores', contextVersion: context.version, result };
}
