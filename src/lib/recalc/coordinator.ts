/**
 * Recalculation coordinator: batch re-scoring against the current context.
 *
 * Both batch passes are idempotent and tolerate per-paper failures: a paper
 * that throws is logged, counted and left as it was, and the rest of the
 * batch carries on. Neither pass ever touches a paper's reading status.
 */

import type { ResearchContext } from '../context/research-context.js';
import { PerItemProcessingError } from '../errors.js';
import { applyScore, hasNotes } from '../papers/model.js';
import { scorePaper } from '../scoring/scorer.js';
import type { RelevanceSession } from '../session.js';
import type { Paper } from '../types.js';

export const DEFAULT_UPDATE_TOLERANCE = 1.0;

export type RecalcOutcome = 'updated' | 'unchanged' | 'error';

export interface RecalcProgress {
  processed: number;
  total: number;
  paperId: string;
  outcome: RecalcOutcome;
}

export interface RecalcOptions {
  onProgress?: (progress: RecalcProgress) => void;
  /** Persist each recalculated paper as soon as it is ready. */
  save?: (paper: Paper) => void;
  now?: () => Date;
  /** Minimum score change (percentage points) that counts as "updated". */
  tolerance?: number;
}

export interface ScoreRecalcResult {
  total: number;
  updatedCount: number;
  unchangedCount: number;
  errorCount: number;
  contextVersion: string;
  papers: Paper[];
  errors: PerItemProcessingError[];
}

export interface NotesRecalcResult {
  /** Papers eligible for the pass: non-blank notes and a stale embedding. */
  totalPapers: number;
  updatedCount: number;
  errorCount: number;
  skippedCount: number;
  papers: Paper[];
  errors: PerItemProcessingError[];
}

/**
 * Re-derive the composed context and re-embed it. Run this before a batch
 * re-score so every paper is compared against the same context version.
 */
export async function recalculateContext(session: RelevanceSession): Promise<ResearchContext> {
  const context = session.requireContext();
  await context.recalculate();
  session.logger.info(`Context recalculated (version ${context.version}, model ${context.model})`);
  return context;
}

async function rescore(session: RelevanceSession, paper: Paper, now: Date, save?: (paper: Paper) => void): Promise<Paper> {
  const result = await scorePaper(session, paper);
  const next = applyScore(paper, result, now.toISOString());
  save?.(next);
  return next;
}

export async function recalculateAllScores(
  session: RelevanceSession,
  papers: readonly Paper[],
  opts: RecalcOptions = {},
): Promise<ScoreRecalcResult> {
  const { onProgress, save, now = () => new Date(), tolerance = DEFAULT_UPDATE_TOLERANCE } = opts;
  const context = session.requireContext();

  const result: ScoreRecalcResult = {
    total: papers.length,
    updatedCount: 0,
    unchangedCount: 0,
    errorCount: 0,
    contextVersion: context.version,
    papers: [],
    errors: [],
  };

  for (const [i, paper] of papers.entries()) {
    let outcome: RecalcOutcome;
    try {
      const next = await rescore(session, paper, now(), save);
      result.papers.push(next);
      if (Math.abs(next.relevanceScore - paper.relevanceScore) > tolerance) {
        result.updatedCount += 1;
        outcome = 'updated';
      } else {
        result.unchangedCount += 1;
        outcome = 'unchanged';
      }
    } catch (e) {
      const err = new PerItemProcessingError(paper.id, 'recalculate score', e);
      session.logger.warn(`${err.message} (title: ${paper.title})`);
      result.errors.push(err);
      result.errorCount += 1;
      outcome = 'error';
    }
    onProgress?.({ processed: i + 1, total: papers.length, paperId: paper.id, outcome });
  }

  return result;
}

/** Picked up by `batchUpdateEmbeddingsWithNotes`: stale and carrying notes. */
export function needsNotesRefresh(paper: Paper): boolean {
  return paper.embeddingNeedsUpdate && hasNotes(paper);
}

export async function batchUpdateEmbeddingsWithNotes(
  session: RelevanceSession,
  papers: readonly Paper[],
  opts: RecalcOptions = {},
): Promise<NotesRecalcResult> {
  const { onProgress, save, now = () => new Date() } = opts;
  session.requireContext();

  const eligible = papers.filter(needsNotesRefresh);
  const result: NotesRecalcResult = {
    totalPapers: eligible.length,
    updatedCount: 0,
    errorCount: 0,
    skippedCount: papers.length - eligible.length,
    papers: [],
    errors: [],
  };

  for (const [i, paper] of eligible.entries()) {
    let outcome: RecalcOutcome;
    try {
      result.papers.push(await rescore(session, paper, now(), save));
      result.updatedCount += 1;
      outcome = 'updated';
    } catch (e) {
      const err = new PerItemProcessingError(paper.id, 'update notes embedding', e);
      session.logger.warn(`${err.message} (title: ${paper.title})`);
      result.errors.push(err);
      result.errorCount += 1;
      outcome = 'error';
    }
    onProgress?.({ processed: i + 1, total: eligible.length, paperId: paper.id, outcome });
  }

  return result;
}
