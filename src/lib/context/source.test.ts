import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadEncoder } from '../encoder/adapter.js';
import { createHashBackend } from '../encoder/hashing.js';
import { ContextFileNotFoundError, EmptyContextError } from '../errors.js';
import { silentLogger } from '../log.js';
import { ResearchContext } from './research-context.js';
import { exportContextFile, readContextFile } from './source.js';

describe('context files', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-triage-context-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads and trims a context file', () => {
    const file = path.join(tmpDir, 'context.txt');
    fs.writeFileSync(file, '\n  Quantum error correction.  \n');
    expect(readContextFile(file)).toBe('Quantum error correction.');
  });

  it('throws ContextFileNotFoundError for a missing file', () => {
    const file = path.join(tmpDir, 'missing.txt');
    expect(() => readContextFile(file)).toThrow(ContextFileNotFoundError);
    expect(() => readContextFile(file)).toThrow(`Context file not found: ${file}`);
  });

  it('throws EmptyContextError for a blank file', () => {
    const file = path.join(tmpDir, 'blank.txt');
    fs.writeFileSync(file, '   \n');
    expect(() => readContextFile(file)).toThrow(EmptyContextError);
    expect(() => readContextFile(file)).toThrow(`Context file is empty: ${file}`);
  });

  it('re-reads only the base part of an exported context', async () => {
    const encoder = await loadEncoder({ models: ['hash:64'], load: async (m) => createHashBackend(m), logger: silentLogger });
    const context = await ResearchContext.load(encoder, 'Quantum error correction.');
    await context.addSnippet('lattice surgery', 'talk notes');

    const out = path.join(tmpDir, 'export', 'context.txt');
    exportContextFile(context, out);

    expect(fs.readFileSync(out, 'utf8')).toBe(`${context.composedText}\n`);
    expect(readContextFile(out)).toBe('Quantum error correction.');
  });
});
