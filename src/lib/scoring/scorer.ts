import type { RelevanceSession } from '../session.js';
import type { EmbeddingVector, RelevanceCategory } from '../types.js';
import { categorize, clampScore } from './categories.js';
import { cosineSimilarity } from './similarity.js';

export interface PaperText {
  title: string;
  abstract: string;
  notes?: string | null;
}

export interface ScoreResult {
  /** rawScore clamped to [0, 100] for display and storage. */
  score: number;
  /** similarity * 100, unclamped. */
  rawScore: number;
  similarity: number;
  category: RelevanceCategory;
  paperEmbedding: EmbeddingVector;
  model: string;
  contextVersion: string;
}

export const NOTES_HEADER = 'Researcher notes:';

export function buildPaperText(paper: PaperText): string {
  const text = `${paper.title.trim()}\n\n${paper.abstract.trim()}`;
  const notes = paper.notes?.trim();
  return notes ? `${text}\n\n${NOTES_HEADER}\n${notes}` : text;
}

/** Score an already-computed paper embedding against the session's context. */
export function scoreEmbedding(session: RelevanceSession, paperEmbedding: EmbeddingVector): ScoreResult {
  const context = session.requireContext();
  const similarity = cosineSimilarity(context.embedding, paperEmbedding);
  const rawScore = similarity * 100;
  return {
    score: clampScore(rawScore),
    rawScore,
    similarity,
    category: categorize(rawScore, session.categories),
    paperEmbedding,
    model: context.model,
    contextVersion: context.version,
  };
}

export async function scoreText(session: RelevanceSession, text: string): Promise<ScoreResult> {
  session.requireContext();
  const embedding = await session.encoder.embed(text);
  return scoreEmbedding(session, embedding);
}

export async function scorePaper(session: RelevanceSession, paper: PaperText): Promise<ScoreResult> {
  return scoreText(session, buildPaperText(paper));
}
