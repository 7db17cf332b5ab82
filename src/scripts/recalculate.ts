/**
 * Re-score the whole library against the current context and model.
 *
 * Usage (via tsx):
 *   tsx src/scripts/recalculate.ts [--notes-only] [--tolerance 1.0] [--model <id[,id...]>]
 */

import { modelsFlag, numberFlag, parseArgs, printJson, runMain } from '../lib/cli.js';
import { runRecalculation } from '../lib/recalc/run.js';
import { openWorkspace, startSession } from '../lib/runtime.js';

const PROGRESS_EVERY = 10;

runMain(async () => {
  const { flags } = parseArgs(process.argv.slice(2));
  const ws = openWorkspace();
  const { session } = await startSession(ws, { models: modelsFlag(flags) });

  const summary = await runRecalculation(ws.db, session, {
    notesOnly: flags['notes-only'] === 'true',
    tolerance: numberFlag(flags, 'tolerance') ?? ws.config.scoring.updateTolerance,
    onProgress: ({ processed, total }) => {
      if (processed % PROGRESS_EVERY === 0 || processed === total) {
        console.error(`  ${processed}/${total}`);
      }
    },
  });

  // Per-paper errors were already logged; keep only their messages here.
  const { papers: _papers, errors, ...counts } = summary.result;
  printJson({
    kind: summary.kind === 'notes' ? 'notesRecalculation' : 'scoreRecalculation',
    model: session.model,
    contextVersion: summary.contextVersion,
    ...counts,
    errors: errors.map((e) => e.message),
  });

  if (counts.errorCount > 0) process.exitCode = 1;
});
