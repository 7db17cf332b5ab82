import type { Db } from '../db.js';
import type { Snippet } from '../types.js';

interface SnippetDbRow {
  id: string;
  content: string;
  source: string | null;
  paper_id: string | null;
  added_at: string;
}

/**
 * Snippets in insertion order, which is the order they are composed into the context.
 */
export function listSnippets(db: Db): Snippet[] {
  const rows = db.sqlite
    .prepare('SELECT id, content, source, paper_id, added_at FROM snippets ORDER BY seq ASC')
    .all() as SnippetDbRow[];

  return rows.map((r) => ({
    id: r.id,
    content: r.content,
    source: r.source,
    paperId: r.paper_id,
    addedAt: r.added_at,
  }));
}

export function insertSnippet(db: Db, snippet: Snippet): void {
  db.sqlite.prepare(
    `INSERT INTO snippets (id, content, source, paper_id, added_at)
     VALUES (@id, @content, @source, @paperId, @addedAt)`
  ).run({
    id: snippet.id,
    content: snippet.content,
    source: snippet.source,
    paperId: snippet.paperId,
    addedAt: snippet.addedAt,
  });
}

export function deleteSnippet(db: Db, id: string): boolean {
  return db.sqlite.prepare('DELETE FROM snippets WHERE id = ?').run(id).changes > 0;
}
