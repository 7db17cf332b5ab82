import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import type { Db } from '../db.js';
import { normalizeArxivId } from '../arxiv.js';
import { ensureDir } from '../storage.js';
import { PAPER_STATUSES, type Paper, type PaperStatus, type RelevanceCategory } from '../types.js';
import { editNotes, toPaperView } from './model.js';

interface PaperDbRow {
  id: string;
  title: string;
  abstract: string;
  notes: string;
  arxiv_id: string | null;
  authors_json: string;
  categories_json: string;
  published_at: string | null;
  pdf_path: string | null;
  relevance_score: number;
  raw_score: number;
  category: string;
  status: string;
  embedding_json: string | null;
  embedding_needs_update: number;
  embedding_updated_at: string | null;
  scored_model: string;
  context_version: string;
  recalculated_at: string | null;
  added_at: string;
  updated_at: string;
}

const StringList = z.array(z.string());
const Vector = z.array(z.number());
const Category = z.enum(['Highly Relevant', 'Moderately Relevant', 'Somewhat Relevant', 'Low Relevance']);
const Status = z.enum(['to_read', 'reading', 'read', 'discarded']);

function rowToPaper(r: PaperDbRow): Paper {
  return {
    id: r.id,
    title: r.title,
    abstract: r.abstract,
    notes: r.notes,
    arxivId: r.arxiv_id,
    authors: StringList.parse(JSON.parse(r.authors_json)),
    categories: StringList.parse(JSON.parse(r.categories_json)),
    publishedAt: r.published_at,
    pdfPath: r.pdf_path,
    relevanceScore: r.relevance_score,
    rawScore: r.raw_score,
    category: Category.parse(r.category),
    status: Status.parse(r.status),
    embedding: r.embedding_json ? Vector.parse(JSON.parse(r.embedding_json)) : null,
    embeddingNeedsUpdate: r.embedding_needs_update === 1,
    embeddingUpdatedAt: r.embedding_updated_at,
    scoredModel: r.scored_model,
    contextVersion: r.context_version,
    recalculatedAt: r.recalculated_at,
    addedAt: r.added_at,
    updatedAt: r.updated_at,
  };
}

function paperParams(p: Paper) {
  return {
    id: p.id,
    title: p.title,
    abstract: p.abstract,
    notes: p.notes,
    arxiv_id: p.arxivId,
    authors_json: JSON.stringify(p.authors),
    categories_json: JSON.stringify(p.categories),
    published_at: p.publishedAt,
    pdf_path: p.pdfPath,
    relevance_score: p.relevanceScore,
    raw_score: p.rawScore,
    category: p.category,
    status: p.status,
    embedding_json: p.embedding ? JSON.stringify(p.embedding) : null,
    embedding_needs_update: p.embeddingNeedsUpdate ? 1 : 0,
    embedding_updated_at: p.embeddingUpdatedAt,
    scored_model: p.scoredModel,
    context_version: p.contextVersion,
    recalculated_at: p.recalculatedAt,
    added_at: p.addedAt,
    updated_at: p.updatedAt,
  };
}

export function isPaperStatus(s: string): s is PaperStatus {
  return (PAPER_STATUSES as readonly string[]).includes(s);
}

/**
 * Insert or fully overwrite a paper record.
 */
export function upsertPaper(db: Db, paper: Paper): void {
  db.sqlite.prepare(
    `INSERT INTO papers (
      id, title, abstract, notes, arxiv_id, authors_json, categories_json, published_at, pdf_path,
      relevance_score, raw_score, category, status, embedding_json, embedding_needs_update,
      embedding_updated_at, scored_model, context_version, recalculated_at, added_at, updated_at
    ) VALUES (
      @id, @title, @abstract, @notes, @arxiv_id, @authors_json, @categories_json, @published_at, @pdf_path,
      @relevance_score, @raw_score, @category, @status, @embedding_json, @embedding_needs_update,
      @embedding_updated_at, @scored_model, @context_version, @recalculated_at, @added_at, @updated_at
    )
    ON CONFLICT(id) DO UPDATE SET
      title=excluded.title,
      abstract=excluded.abstract,
      notes=excluded.notes,
      arxiv_id=excluded.arxiv_id,
      authors_json=excluded.authors_json,
      categories_json=excluded.categories_json,
      published_at=excluded.published_at,
      pdf_path=excluded.pdf_path,
      relevance_score=excluded.relevance_score,
      raw_score=excluded.raw_score,
      category=excluded.category,
      status=excluded.status,
      embedding_json=excluded.embedding_json,
      embedding_needs_update=excluded.embedding_needs_update,
      embedding_updated_at=excluded.embedding_updated_at,
      scored_model=excluded.scored_model,
      context_version=excluded.context_version,
      recalculated_at=excluded.recalculated_at,
      updated_at=excluded.updated_at`
  ).run(paperParams(paper));
}

/** Insert a new paper; an existing id or arXiv id is a constraint error. */
export function insertPaper(db: Db, paper: Paper): void {
  db.sqlite.prepare(
    `INSERT INTO papers (
      id, title, abstract, notes, arxiv_id, authors_json, categories_json, published_at, pdf_path,
      relevance_score, raw_score, category, status, embedding_json, embedding_needs_update,
      embedding_updated_at, scored_model, context_version, recalculated_at, added_at, updated_at
    ) VALUES (
      @id, @title, @abstract, @notes, @arxiv_id, @authors_json, @categories_json, @published_at, @pdf_path,
      @relevance_score, @raw_score, @category, @status, @embedding_json, @embedding_needs_update,
      @embedding_updated_at, @scored_model, @context_version, @recalculated_at, @added_at, @updated_at
    )`
  ).run(paperParams(paper));
}

/**
 * Write back only what scoring produces. Status and notes are left as they
 * are in the table. Returns false when the paper no longer exists.
 */
export function savePaperScore(db: Db, paper: Paper): boolean {
  const p = paperParams(paper);
  const res = db.sqlite.prepare(
    `UPDATE papers SET
      relevance_score = @relevance_score,
      raw_score = @raw_score,
      category = @category,
      embedding_json = @embedding_json,
      embedding_needs_update = @embedding_needs_update,
      embedding_updated_at = @embedding_updated_at,
      scored_model = @scored_model,
      context_version = @context_version,
      recalculated_at = @recalculated_at,
      updated_at = @updated_at
    WHERE id = @id`
  ).run({
    id: p.id,
    relevance_score: p.relevance_score,
    raw_score: p.raw_score,
    category: p.category,
    embedding_json: p.embedding_json,
    embedding_needs_update: p.embedding_needs_update,
    embedding_updated_at: p.embedding_updated_at,
    scored_model: p.scored_model,
    context_version: p.context_version,
    recalculated_at: p.recalculated_at,
    updated_at: p.updated_at,
  });
  return res.changes > 0;
}

export function getPaper(db: Db, id: string): Paper | null {
  const row = db.sqlite.prepare('SELECT * FROM papers WHERE id = ?').get(id) as PaperDbRow | undefined;
  return row ? rowToPaper(row) : null;
}

export function findPaperByArxivId(db: Db, arxivId: string): Paper | null {
  const row = db.sqlite.prepare('SELECT * FROM papers WHERE arxiv_id = ?').get(arxivId) as PaperDbRow | undefined;
  return row ? rowToPaper(row) : null;
}

export interface ListPapersOptions {
  status?: PaperStatus | null;
  minScore?: number | null;
  limit?: number | null;
}

/** Papers ordered by relevance, highest first. */
export function listPapers(db: Db, opts: ListPapersOptions = {}): Paper[] {
  const where: string[] = [];
  const params: unknown[] = [];

  if (opts.status) {
    where.push('status = ?');
    params.push(opts.status);
  }
  if (opts.minScore !== undefined && opts.minScore !== null) {
    where.push('relevance_score >= ?');
    params.push(opts.minScore);
  }

  let sql = 'SELECT * FROM papers';
  if (where.length > 0) sql += ` WHERE ${where.join(' AND ')}`;
  sql += ' ORDER BY relevance_score DESC, added_at DESC';
  if (opts.limit) {
    sql += ' LIMIT ?';
    params.push(opts.limit);
  }

  const rows = db.sqlite.prepare(sql).all(...params) as PaperDbRow[];
  return rows.map(rowToPaper);
}

export function updatePaperStatus(db: Db, id: string, status: PaperStatus, now = new Date()): boolean {
  const res = db.sqlite
    .prepare('UPDATE papers SET status = ?, updated_at = ? WHERE id = ?')
    .run(status, now.toISOString(), id);
  return res.changes > 0;
}

/**
 * Replace a paper's notes. A real change flags the cached embedding stale;
 * writing the same notes again is a no-op.
 */
export function updatePaperNotes(db: Db, id: string, notes: string, now = new Date()): Paper | null {
  const paper = getPaper(db, id);
  if (!paper) return null;
  const next = editNotes(paper, notes, now);
  if (next !== paper) upsertPaper(db, next);
  return next;
}

export function updatePdfPath(db: Db, id: string, pdfPath: string, now = new Date()): boolean {
  const res = db.sqlite
    .prepare('UPDATE papers SET pdf_path = ?, updated_at = ? WHERE id = ?')
    .run(pdfPath, now.toISOString(), id);
  return res.changes > 0;
}

export function deletePaper(db: Db, id: string): boolean {
  return db.sqlite.prepare('DELETE FROM papers WHERE id = ?').run(id).changes > 0;
}

/** Case-insensitive substring search over title and abstract. */
export function searchPapers(db: Db, query: string): Paper[] {
  const q = query.trim().toLowerCase();
  if (!q) return [];
  const rows = db.sqlite.prepare(
    `SELECT * FROM papers
     WHERE instr(lower(title), ?) > 0 OR instr(lower(abstract), ?) > 0
     ORDER BY relevance_score DESC`
  ).all(q, q) as PaperDbRow[];
  return rows.map(rowToPaper);
}

/** Flag every stored embedding stale (model switch). Returns the number flagged. */
export function markAllEmbeddingsStale(db: Db, now = new Date()): number {
  return db.sqlite
    .prepare('UPDATE papers SET embedding_needs_update = 1, updated_at = ? WHERE embedding_needs_update = 0')
    .run(now.toISOString()).changes;
}

export interface PaperStatistics {
  totalPapers: number;
  byStatus: Record<PaperStatus, number>;
  byCategory: Record<RelevanceCategory, number>;
  averageRelevance: number;
  withPdf: number;
  staleEmbeddings: number;
  contextVersions: number;
}

export function paperStatistics(db: Db): PaperStatistics {
  const byStatus: Record<PaperStatus, number> = { to_read: 0, reading: 0, read: 0, discarded: 0 };
  const statusRows = db.sqlite
    .prepare('SELECT status, COUNT(*) as n FROM papers GROUP BY status')
    .all() as Array<{ status: string; n: number }>;
  for (const r of statusRows) {
    if (isPaperStatus(r.status)) byStatus[r.status] = r.n;
  }

  const byCategory: Record<RelevanceCategory, number> = {
    'Highly Relevant': 0,
    'Moderately Relevant': 0,
    'Somewhat Relevant': 0,
    'Low Relevance': 0,
  };
  const categoryRows = db.sqlite
    .prepare('SELECT category, COUNT(*) as n FROM papers GROUP BY category')
    .all() as Array<{ category: string; n: number }>;
  for (const r of categoryRows) {
    const parsed = Category.safeParse(r.category);
    if (parsed.success) byCategory[parsed.data] = r.n;
  }

  const totals = db.sqlite.prepare(
    `SELECT
      COUNT(*) as total,
      AVG(relevance_score) as avg,
      SUM(CASE WHEN pdf_path IS NOT NULL THEN 1 ELSE 0 END) as withPdf,
      SUM(embedding_needs_update) as stale,
      COUNT(DISTINCT context_version) as versions
    FROM papers`
  ).get() as { total: number; avg: number | null; withPdf: number | null; stale: number | null; versions: number };

  return {
    totalPapers: totals.total,
    byStatus,
    byCategory,
    averageRelevance: Math.round((totals.avg ?? 0) * 100) / 100,
    withPdf: totals.withPdf ?? 0,
    staleEmbeddings: totals.stale ?? 0,
    contextVersions: totals.versions,
  };
}

/**
 * Write papers (optionally one status only) to a JSON file, without their
 * embeddings. Returns the number exported.
 */
export function exportPapers(db: Db, outPath: string, status?: PaperStatus | null): number {
  const papers = listPapers(db, { status: status ?? null }).map(toPaperView);
  ensureDir(path.dirname(outPath));
  fs.writeFileSync(outPath, `${JSON.stringify(papers, null, 2)}\n`);
  return papers.length;
}

/** Look a paper up by its id or, failing that, by arXiv id in any accepted form. */
export function resolvePaper(db: Db, ref: string): Paper | null {
  const trimmed = ref.trim();
  if (!trimmed) return null;
  return getPaper(db, trimmed) ?? findPaperByArxivId(db, normalizeArxivId(trimmed));
}
