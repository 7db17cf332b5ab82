/**
 * Paper library CLI
 *
 * Usage (via tsx):
 *   tsx src/commands/papers.ts score --title "..." --abstract "..." [--notes "..."]
 *   tsx src/commands/papers.ts add --title "..." --abstract "..." [--notes "..."] [--arxiv <id>] [--status to_read]
 *   tsx src/commands/papers.ts list [--status to_read] [--min 60 | --at-least "Moderately Relevant"] [--limit 20]
 *   tsx src/commands/papers.ts show <id|arxiv-id>
 *   tsx src/commands/papers.ts status <id|arxiv-id> <to_read|reading|read|discarded>
 *   tsx src/commands/papers.ts notes <id|arxiv-id> "<notes>" [--rescore]
 *   tsx src/commands/papers.ts delete <id|arxiv-id>
 *   tsx src/commands/papers.ts search "<query>"
 *   tsx src/commands/papers.ts stats
 *   tsx src/commands/papers.ts export <file> [--status read]
 *   tsx src/commands/papers.ts download <id|arxiv-id>
 */

import path from 'node:path';

import { normalizeArxivId, pdfUrlFor } from '../lib/arxiv.js';
import { modelsFlag, numberFlag, parseArgs, printJson, runMain, usage } from '../lib/cli.js';
import { downloadPaperPdf } from '../lib/download.js';
import { applyScore, createPaper, toPaperView } from '../lib/papers/model.js';
import {
  deletePaper,
  exportPapers,
  insertPaper,
  isPaperStatus,
  listPapers,
  paperStatistics,
  resolvePaper,
  savePaperScore,
  searchPapers,
  updatePaperNotes,
  updatePaperStatus,
  updatePdfPath,
} from '../lib/papers/repo.js';
import { pendingRecalculation } from '../lib/recalc/run.js';
import { openWorkspace, startSession, type Workspace } from '../lib/runtime.js';
import { buildCategoryTable, scorePaper, thresholdFor } from '../lib/scoring/index.js';
import type { Paper, PaperStatus, RelevanceCategory } from '../lib/types.js';

const CATEGORY_ICONS: Record<Paper['category'], string> = {
  'Highly Relevant': '🔥',
  'Moderately Relevant': '⭐',
  'Somewhat Relevant': '📄',
  'Low Relevance': '💤',
};

function requirePaper(ws: Workspace, ref: string | undefined, line: string): Paper {
  if (!ref) usage(line);
  const paper = resolvePaper(ws.db, ref);
  if (!paper) {
    console.error(`Paper not found: ${ref}`);
    process.exit(1);
  }
  return paper;
}

function statusFlag(flags: Record<string, string>): PaperStatus | undefined {
  const raw = flags.status;
  if (raw === undefined) return undefined;
  if (!isPaperStatus(raw)) throw new Error(`Unknown status "${raw}" (expected to_read, reading, read or discarded)`);
  return raw;
}

function isCategory(raw: string): raw is RelevanceCategory {
  return Object.hasOwn(CATEGORY_ICONS, raw);
}

/** `--min <score>`, or `--at-least <category>` read through the configured thresholds. */
function minScoreFlag(ws: Workspace, flags: Record<string, string>): number | null {
  const category = flags['at-least'];
  if (category === undefined) return numberFlag(flags, 'min') ?? null;
  if (!isCategory(category)) throw new Error(`Unknown category "${category}"`);
  const min = thresholdFor(category, buildCategoryTable(ws.config.scoring.thresholds));
  return Number.isFinite(min) ? min : null;
}

function paperInput(flags: Record<string, string>) {
  const title = flags.title;
  const abstract = flags.abstract;
  if (!title || !abstract) usage('papers score|add --title "..." --abstract "..." [--notes "..."]');
  return { title, abstract, notes: flags.notes ?? '' };
}

async function cmdScore(ws: Workspace, flags: Record<string, string>): Promise<void> {
  const { session } = await startSession(ws, { models: modelsFlag(flags) });
  const result = await scorePaper(session, paperInput(flags));
  printJson({
    kind: 'score',
    score: result.score,
    rawScore: result.rawScore,
    similarity: result.similarity,
    category: result.category,
    model: result.model,
    contextVersion: result.contextVersion,
  });
}

async function cmdAdd(ws: Workspace, flags: Record<string, string>): Promise<void> {
  const input = paperInput(flags);
  const arxivId = flags.arxiv ? normalizeArxivId(flags.arxiv) : null;
  const { session } = await startSession(ws, { models: modelsFlag(flags) });

  const result = await scorePaper(session, input);
  const paper = createPaper({ ...input, arxivId }, result, { status: statusFlag(flags) });
  insertPaper(ws.db, paper);

  console.error(`${CATEGORY_ICONS[paper.category]} ${paper.category} (${paper.relevanceScore.toFixed(1)}): ${paper.title}`);
  printJson({ kind: 'paperAdded', paper: toPaperView(paper) });
}

function cmdList(ws: Workspace, flags: Record<string, string>): void {
  const papers = listPapers(ws.db, {
    status: statusFlag(flags) ?? null,
    minScore: minScoreFlag(ws, flags),
    limit: numberFlag(flags, 'limit') ?? null,
  });
  printJson({
    kind: 'papers',
    count: papers.length,
    papers: papers.map((p) => ({
      id: p.id,
      arxivId: p.arxivId,
      title: p.title,
      relevanceScore: p.relevanceScore,
      category: p.category,
      status: p.status,
      embeddingNeedsUpdate: p.embeddingNeedsUpdate,
    })),
  });
}

async function cmdNotes(ws: Workspace, paper: Paper, notes: string, flags: Record<string, string>): Promise<void> {
  const updated = updatePaperNotes(ws.db, paper.id, notes);
  if (!updated) throw new Error(`Paper not found: ${paper.id}`);

  if (flags.rescore !== 'true') {
    const pending = pendingRecalculation(updated);
    if (pending === 'notes') console.error('💡 Notes changed; run `npm run recalculate -- --notes-only` to refresh the score');
    if (pending === 'full') console.error('💡 Notes cleared; run `npm run recalculate` to refresh the score');
    printJson({ kind: 'notesUpdated', paper: toPaperView(updated) });
    return;
  }

  const { session } = await startSession(ws, { models: modelsFlag(flags) });
  const rescored = applyScore(updated, await scorePaper(session, updated), new Date().toISOString());
  savePaperScore(ws.db, rescored);
  printJson({ kind: 'notesUpdated', paper: toPaperView(rescored) });
}

async function cmdDownload(ws: Workspace, paper: Paper): Promise<void> {
  if (!paper.arxivId) throw new Error(`Paper has no arXiv id: ${paper.title}`);
  const res = await downloadPaperPdf(ws.config.storage.root, { arxivId: paper.arxivId, title: paper.title }, pdfUrlFor({ arxivId: paper.arxivId, pdfUrl: null }));
  updatePdfPath(ws.db, paper.id, res.path);
  console.error(`📥 ${res.path} (${res.bytes} bytes)`);
  printJson({ kind: 'pdfDownloaded', id: paper.id, ...res });
}

// ── Main ───────────────────────────────────────────────────────────────

runMain(async () => {
  const { positional, flags } = parseArgs(process.argv.slice(2));
  const command = positional[0];

  if (!command) {
    console.log('Usage: tsx src/commands/papers.ts <score|add|list|show|status|notes|delete|search|stats|export|download> [args] [--flags]');
    process.exit(0);
  }

  const ws = openWorkspace();

  switch (command) {
    case 'score':
      await cmdScore(ws, flags);
      break;
    case 'add':
      await cmdAdd(ws, flags);
      break;
    case 'list':
      cmdList(ws, flags);
      break;
    case 'show': {
      const paper = requirePaper(ws, positional[1], 'papers show <id|arxiv-id>');
      printJson({ kind: 'paper', paper: toPaperView(paper) });
      break;
    }
    case 'status': {
      const paper = requirePaper(ws, positional[1], 'papers status <id|arxiv-id> <status>');
      const status = positional[2];
      if (!status || !isPaperStatus(status)) usage('papers status <id|arxiv-id> <to_read|reading|read|discarded>');
      updatePaperStatus(ws.db, paper.id, status);
      console.error(`✅ ${paper.title}: ${paper.status} → ${status}`);
      printJson({ kind: 'statusUpdated', id: paper.id, status });
      break;
    }
    case 'notes': {
      const paper = requirePaper(ws, positional[1], 'papers notes <id|arxiv-id> "<notes>" [--rescore]');
      const notes = positional[2];
      if (notes === undefined) usage('papers notes <id|arxiv-id> "<notes>" [--rescore]');
      await cmdNotes(ws, paper, notes, flags);
      break;
    }
    case 'delete': {
      const paper = requirePaper(ws, positional[1], 'papers delete <id|arxiv-id>');
      deletePaper(ws.db, paper.id);
      printJson({ kind: 'paperDeleted', id: paper.id });
      break;
    }
    case 'search': {
      const query = positional[1];
      if (!query) usage('papers search "<query>"');
      const papers = searchPapers(ws.db, query);
      printJson({ kind: 'searchResults', query, count: papers.length, papers: papers.map(toPaperView) });
      break;
    }
    case 'stats':
      printJson({ kind: 'stats', ...paperStatistics(ws.db) });
      break;
    case 'export': {
      const file = positional[1];
      if (!file) usage('papers export <file> [--status read]');
      const outPath = path.resolve(file);
      const count = exportPapers(ws.db, outPath, statusFlag(flags));
      printJson({ kind: 'papersExported', path: outPath, count });
      break;
    }
    case 'download': {
      const paper = requirePaper(ws, positional[1], 'papers download <id|arxiv-id>');
      await cmdDownload(ws, paper);
      break;
    }
    default:
      console.error(`Unknown command: ${command}`);
      process.exit(1);
  }
});
