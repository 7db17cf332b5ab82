/**
 * Research context CLI
 *
 * Usage (via tsx):
 *   tsx src/commands/context.ts show [--full]
 *   tsx src/commands/context.ts snippets
 *   tsx src/commands/context.ts add "<snippet text>" [--source "..."] [--paper <id|arxiv-id>]
 *   tsx src/commands/context.ts remove <snippet-id>
 *   tsx src/commands/context.ts preview "<any text>"
 *   tsx src/commands/context.ts export <file>
 *   tsx src/commands/context.ts switch-model <model[,fallback...]> [--recalculate]
 *
 * Every command accepts --model <id[,id...]> to override encoder.models.
 * Results go to stdout as JSON; progress and warnings go to stderr.
 */

import path from 'node:path';

import { modelsFlag, parseArgs, printJson, runMain, usage } from '../lib/cli.js';
import { exportContextFile } from '../lib/context/index.js';
import { createBackendLoader } from '../lib/encoder/index.js';
import { markAllEmbeddingsStale, resolvePaper } from '../lib/papers/repo.js';
import { runRecalculation } from '../lib/recalc/run.js';
import { openWorkspace, startSession, type Workspace } from '../lib/runtime.js';
import { scoreText } from '../lib/scoring/index.js';
import { switchModel, type RelevanceSession } from '../lib/session.js';
import { deleteSnippet, insertSnippet, listSnippets } from '../lib/snippets/repo.js';
import { syncActiveModel } from '../lib/state/repo.js';

function cmdShow(session: RelevanceSession, flags: Record<string, string>): void {
  const context = session.requireContext();
  printJson({
    kind: 'context',
    model: context.model,
    version: context.version,
    baseCharacters: context.baseText.length,
    snippetCount: context.snippets.length,
    dimension: context.embedding.length,
    ...(flags.full === 'true' ? { composedText: context.composedText } : {}),
  });
}

async function cmdAdd(ws: Workspace, session: RelevanceSession, content: string, flags: Record<string, string>): Promise<void> {
  let paperId: string | null = null;
  if (flags.paper) {
    const paper = resolvePaper(ws.db, flags.paper);
    if (!paper) throw new Error(`Paper not found: ${flags.paper}`);
    paperId = paper.id;
  }

  const context = session.requireContext();
  const id = await context.addSnippet(content, flags.source ?? null, paperId);
  const snippet = context.getSnippet(id);
  if (!snippet) throw new Error(`Snippet ${id} missing after add`);
  insertSnippet(ws.db, snippet);

  console.error('✅ Snippet added; context re-embedded');
  printJson({ kind: 'snippetAdded', snippet, contextVersion: context.version });
}

async function cmdRemove(ws: Workspace, session: RelevanceSession, id: string): Promise<void> {
  const context = session.requireContext();
  const removed = await context.removeSnippet(id);
  // A row with no live counterpart is still cleaned up.
  const deleted = deleteSnippet(ws.db, id);
  if (!removed && !deleted) {
    console.error(`Snippet not found: ${id}`);
    process.exit(1);
  }
  printJson({ kind: 'snippetRemoved', id, contextVersion: context.version });
}

async function cmdPreview(session: RelevanceSession, text: string): Promise<void> {
  const result = await scoreText(session, text);
  printJson({
    kind: 'preview',
    score: result.score,
    rawScore: result.rawScore,
    category: result.category,
    model: result.model,
    contextVersion: result.contextVersion,
  });
}

async function cmdSwitchModel(
  ws: Workspace,
  session: RelevanceSession,
  models: string[],
  flags: Record<string, string>,
): Promise<void> {
  const next = await switchModel(session, {
    models,
    load: createBackendLoader(ws.config.encoder),
    markStale: () => {
      const flagged = markAllEmbeddingsStale(ws.db);
      console.error(`⚠️  ${flagged} paper(s) flagged for recalculation`);
    },
  });
  syncActiveModel(ws.db, next.model);

  if (flags.recalculate === 'true') {
    const summary = await runRecalculation(ws.db, next, {
      tolerance: ws.config.scoring.updateTolerance,
    });
    printJson({ kind: 'modelSwitched', previous: session.model, model: next.model, recalculation: summary.result });
  } else {
    printJson({ kind: 'modelSwitched', previous: session.model, model: next.model });
  }

  if (!ws.config.encoder.models.includes(next.model)) {
    console.error(`💡 Put "${next.model}" first in encoder.models in config.yml to keep using it`);
  }
}

// ── Main ───────────────────────────────────────────────────────────────

runMain(async () => {
  const { positional, flags } = parseArgs(process.argv.slice(2));
  const command = positional[0];

  if (!command) {
    console.log('Usage: tsx src/commands/context.ts <show|snippets|add|remove|preview|export|switch-model> [args] [--flags]');
    process.exit(0);
  }

  const ws = openWorkspace();

  // Listing snippets needs no encoder.
  if (command === 'snippets') {
    printJson({ kind: 'snippets', snippets: listSnippets(ws.db) });
    return;
  }

  const { session } = await startSession(ws, { models: modelsFlag(flags) });

  switch (command) {
    case 'show':
      cmdShow(session, flags);
      break;
    case 'add': {
      const content = positional[1];
      if (!content) usage('context add "<snippet text>" [--source "..."] [--paper <id>]');
      await cmdAdd(ws, session, content, flags);
      break;
    }
    case 'remove': {
      const id = positional[1];
      if (!id) usage('context remove <snippet-id>');
      await cmdRemove(ws, session, id);
      break;
    }
    case 'preview': {
      const text = positional[1];
      if (!text) usage('context preview "<text>"');
      await cmdPreview(session, text);
      break;
    }
    case 'export': {
      const file = positional[1];
      if (!file) usage('context export <file>');
      const outPath = path.resolve(file);
      exportContextFile(session.requireContext(), outPath);
      printJson({ kind: 'contextExported', path: outPath });
      break;
    }
    case 'switch-model': {
      const models = positional[1]?.split(',').map((m) => m.trim()).filter(Boolean) ?? [];
      if (models.length === 0) usage('context switch-model <model[,fallback...]> [--recalculate]');
      await cmdSwitchModel(ws, session, models, flags);
      break;
    }
    default:
      console.error(`Unknown command: ${command}`);
      process.exit(1);
  }
});
