/**
 * arXiv lookup CLI: fetch candidates, score them against the research
 * context, and optionally keep them in the library.
 *
 * Usage (via tsx):
 *   tsx src/commands/arxiv.ts search "<query>" [--max 10] [--store] [--min 60]
 *   tsx src/commands/arxiv.ts get <arxiv-id|url> [--store] [--pdf] [--notes "..."]
 */

import { fetchArxivEntry, pdfUrlFor, searchArxiv, type ArxivEntry } from '../lib/arxiv.js';
import { modelsFlag, numberFlag, parseArgs, printJson, runMain, usage } from '../lib/cli.js';
import { downloadPaperPdf } from '../lib/download.js';
import { errorMessage } from '../lib/errors.js';
import { createPaper, toPaperView } from '../lib/papers/model.js';
import { findPaperByArxivId, insertPaper, updatePdfPath } from '../lib/papers/repo.js';
import { openWorkspace, startSession, type Workspace } from '../lib/runtime.js';
import { scorePaper, type ScoreResult } from '../lib/scoring/index.js';
import type { RelevanceSession } from '../lib/session.js';
import type { Paper } from '../lib/types.js';

interface ScoredEntry {
  entry: ArxivEntry;
  result: ScoreResult;
}

async function scoreEntries(session: RelevanceSession, entries: ArxivEntry[], notes = ''): Promise<ScoredEntry[]> {
  const scored: ScoredEntry[] = [];
  for (const entry of entries) {
    const result = await scorePaper(session, { title: entry.title, abstract: entry.summary, notes });
    scored.push({ entry, result });
  }
  return scored.sort((a, b) => b.result.rawScore - a.result.rawScore);
}

/** Store a scored entry unless its arXiv id is already in the library. */
function storeEntry(ws: Workspace, { entry, result }: ScoredEntry, notes = ''): { paper: Paper; created: boolean } {
  const existing = findPaperByArxivId(ws.db, entry.arxivId);
  if (existing) return { paper: existing, created: false };

  const paper = createPaper(
    {
      title: entry.title,
      abstract: entry.summary,
      notes,
      arxivId: entry.arxivId,
      authors: entry.authors,
      categories: entry.categories,
      publishedAt: entry.publishedAt || null,
    },
    result,
  );
  insertPaper(ws.db, paper);
  return { paper, created: true };
}

function entrySummary({ entry, result }: ScoredEntry) {
  return {
    arxivId: entry.arxivId,
    title: entry.title,
    authors: entry.authors,
    publishedAt: entry.publishedAt,
    score: result.score,
    category: result.category,
    absUrl: entry.absUrl,
  };
}

async function cmdSearch(ws: Workspace, query: string, flags: Record<string, string>): Promise<void> {
  const max = numberFlag(flags, 'max') ?? ws.config.arxiv.maxResults;
  const min = numberFlag(flags, 'min') ?? 0;

  const entries = await searchArxiv(query, max);
  if (entries.length === 0) {
    printJson({ kind: 'arxivSearch', query, count: 0, results: [] });
    return;
  }

  const { session } = await startSession(ws, { models: modelsFlag(flags) });
  const scored = (await scoreEntries(session, entries)).filter((s) => s.result.score >= min);

  let stored = 0;
  if (flags.store === 'true') {
    for (const s of scored) {
      if (storeEntry(ws, s).created) stored += 1;
    }
    console.error(`📚 Stored ${stored} new paper(s)`);
  }

  printJson({ kind: 'arxivSearch', query, count: scored.length, stored, results: scored.map(entrySummary) });
}

async function cmdGet(ws: Workspace, ref: string, flags: Record<string, string>): Promise<void> {
  const entry = await fetchArxivEntry(ref);
  if (!entry) throw new Error(`No arXiv entry found for ${ref}`);

  const notes = flags.notes ?? '';
  const { session } = await startSession(ws, { models: modelsFlag(flags) });
  const [scored] = await scoreEntries(session, [entry], notes);
  if (!scored) throw new Error(`Scoring produced no result for ${entry.arxivId}`);

  if (flags.store !== 'true') {
    printJson({ kind: 'arxivEntry', ...entrySummary(scored), summary: entry.summary });
    return;
  }

  const { paper, created } = storeEntry(ws, scored, notes);
  let pdfPath = paper.pdfPath;
  if (flags.pdf === 'true') {
    try {
      const res = await downloadPaperPdf(ws.config.storage.root, { arxivId: entry.arxivId, title: entry.title }, pdfUrlFor(entry));
      updatePdfPath(ws.db, paper.id, res.path);
      pdfPath = res.path;
    } catch (err) {
      // The paper is stored either way; the PDF can be fetched later with `papers download`.
      console.error(`⚠️  PDF download failed for ${entry.arxivId}: ${errorMessage(err)}`);
    }
  }

  printJson({ kind: 'arxivStored', created, paper: { ...toPaperView(paper), pdfPath } });
}

// ── Main ───────────────────────────────────────────────────────────────

runMain(async () => {
  const { positional, flags } = parseArgs(process.argv.slice(2));
  const command = positional[0];

  if (!command) {
    console.log('Usage: tsx src/commands/arxiv.ts <search|get> [args] [--flags]');
    process.exit(0);
  }

  const ws = openWorkspace();

  switch (command) {
    case 'search': {
      const query = positional[1];
      if (!query) usage('arxiv search "<query>" [--max 10] [--store] [--min 60]');
      await cmdSearch(ws, query, flags);
      break;
    }
    case 'get': {
      const ref = positional[1];
      if (!ref) usage('arxiv get <arxiv-id|url> [--store] [--pdf] [--notes "..."]');
      await cmdGet(ws, ref, flags);
      break;
    }
    default:
      console.error(`Unknown command: ${command}`);
      process.exit(1);
  }
});
