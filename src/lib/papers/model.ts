import crypto from 'node:crypto';

import { TriageError } from '../errors.js';
import type { ScoreResult } from '../scoring/scorer.js';
import type { IsoDateTime, Paper, PaperStatus, RelevanceCategory } from '../types.js';

export interface NewPaper {
  title: string;
  abstract: string;
  notes?: string;
  arxivId?: string | null;
  authors?: string[];
  categories?: string[];
  publishedAt?: string | null;
}

/** Low-relevance papers are stored as discarded unless the user says otherwise. */
export function initialStatus(category: RelevanceCategory): PaperStatus {
  return category === 'Low Relevance' ? 'discarded' : 'to_read';
}

export function createPaper(
  input: NewPaper,
  result: ScoreResult,
  opts: { status?: PaperStatus; now?: Date; id?: string } = {},
): Paper {
  const title = input.title.trim();
  const abstract = input.abstract.trim();
  if (!title) throw new TriageError('Paper title is empty', 'INVALID_PAPER');
  if (!abstract) throw new TriageError(`Paper abstract is empty: ${title}`, 'INVALID_PAPER', { context: { title } });

  const now = (opts.now ?? new Date()).toISOString();
  return {
    id: opts.id ?? crypto.randomUUID(),
    title,
    abstract,
    notes: input.notes?.trim() ?? '',
    arxivId: input.arxivId ?? null,
    authors: input.authors ?? [],
    categories: input.categories ?? [],
    publishedAt: input.publishedAt ?? null,
    pdfPath: null,
    relevanceScore: result.score,
    rawScore: result.rawScore,
    category: result.category,
    status: opts.status ?? initialStatus(result.category),
    embedding: result.paperEmbedding,
    embeddingNeedsUpdate: false,
    embeddingUpdatedAt: now,
    scoredModel: result.model,
    contextVersion: result.contextVersion,
    recalculatedAt: null,
    addedAt: now,
    updatedAt: now,
  };
}

/** Editing notes invalidates the cached notes-inclusive embedding. */
export function editNotes(paper: Paper, notes: string, now: Date = new Date()): Paper {
  const next = notes.trim();
  if (next === paper.notes) return paper;
  return {
    ...paper,
    notes: next,
    embeddingNeedsUpdate: true,
    updatedAt: now.toISOString(),
  };
}

/** Record a fresh score (and the embedding it came from); status is left alone. */
export function applyScore(paper: Paper, result: ScoreResult, now: IsoDateTime): Paper {
  return {
    ...paper,
    relevanceScore: result.score,
    rawScore: result.rawScore,
    category: result.category,
    embedding: result.paperEmbedding,
    embeddingNeedsUpdate: false,
    embeddingUpdatedAt: now,
    scoredModel: result.model,
    contextVersion: result.contextVersion,
    recalculatedAt: now,
    updatedAt: now,
  };
}

export function hasNotes(paper: Pick<Paper, 'notes'>): boolean {
  return paper.notes.trim().length > 0;
}

export type PaperView = Omit<Paper, 'embedding'>;

/** A paper as shown or exported: everything but the cached vector. */
export function toPaperView(paper: Paper): PaperView {
  const { embedding: _embedding, ...view } = paper;
  return view;
}
