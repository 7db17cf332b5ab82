import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Logger } from './log.js';
import { createPaper } from './papers/model.js';
import { getPaper, insertPaper } from './papers/repo.js';
import { openWorkspace, startSession, type Workspace } from './runtime.js';
import { insertSnippet } from './snippets/repo.js';
import { getEngineState } from './state/repo.js';

const CONFIG = `
storage:
  root: ./data
context:
  file: context.txt
encoder:
  models: ["hash:256"]
  apiKeyEnv: null
`;

function recordingLogger(): { lines: string[]; logger: Logger } {
  const lines: string[] = [];
  return {
    lines,
    logger: {
      info: (m) => lines.push(`info: ${m}`),
      warn: (m) => lines.push(`warn: ${m}`),
    },
  };
}

describe('runtime', () => {
  let tmpDir: string;
  let ws: Workspace;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-triage-runtime-'));
    fs.writeFileSync(path.join(tmpDir, 'config.yml'), CONFIG);
    fs.writeFileSync(path.join(tmpDir, 'context.txt'), 'Surface code decoders.\n');
    ws = openWorkspace(tmpDir);
  });

  afterEach(() => {
    ws.db.sqlite.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates the storage layout under the config directory', () => {
    expect(ws.config.storage.root).toBe(path.join(tmpDir, 'data'));
    expect(fs.existsSync(path.join(tmpDir, 'data', 'db.sqlite'))).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, 'data', 'papers'))).toBe(true);
  });

  it('loads the context file together with stored snippets', async () => {
    insertSnippet(ws.db, { id: 's1', content: 'lattice surgery', source: null, paperId: null, addedAt: '2026-03-01T00:00:00.000Z' });

    const { session, modelSync } = await startSession(ws, { logger: recordingLogger().logger });

    expect(session.model).toBe('hash:256');
    expect(modelSync).toEqual({ changed: false, previous: null, staleMarked: 0 });
    expect(session.requireContext().composedText).toBe(
      'Surface code decoders.\n\n=== Additional Context Snippets ===\n- lattice surgery',
    );
    expect(getEngineState(ws.db)?.activeModel).toBe('hash:256');
  });

  it('flags stored papers when started with a different model', async () => {
    await startSession(ws, { logger: recordingLogger().logger });
    insertPaper(ws.db, createPaper(
      { title: 'T', abstract: 'A' },
      { score: 50, rawScore: 50, similarity: 0.5, category: 'Somewhat Relevant', paperEmbedding: [1], model: 'hash:256', contextVersion: 'v' },
      { id: 'p1' },
    ));

    const { lines, logger } = recordingLogger();
    const { session, modelSync } = await startSession(ws, { models: ['hash:128'], logger });

    expect(session.model).toBe('hash:128');
    expect(modelSync).toEqual({ changed: true, previous: 'hash:256', staleMarked: 1 });
    expect(getPaper(ws.db, 'p1')?.embeddingNeedsUpdate).toBe(true);
    expect(lines).toContain(
      'warn: Embedding model changed (hash:256 -> hash:128); 1 stored paper(s) flagged for recalculation. Run: npm run recalculate',
    );
  });
});
