import fs from 'node:fs';
import path from 'node:path';

import { ContextFileNotFoundError, EmptyContextError } from '../errors.js';
import { ensureDir } from '../storage.js';
import { extractBase } from './compose.js';
import type { ResearchContext } from './research-context.js';

/**
 * Read a context file. A file previously written by `exportContextFile`
 * carries its snippet section; only the base part is returned, since the
 * snippets themselves live in the snippet store.
 */
export function readContextFile(filePath: string): string {
  if (!fs.existsSync(filePath)) throw new ContextFileNotFoundError(filePath);
  const text = extractBase(fs.readFileSync(filePath, 'utf8')).trim();
  if (!text) throw new EmptyContextError(filePath);
  return text;
}

export function exportContextFile(context: ResearchContext, outPath: string): void {
  ensureDir(path.dirname(outPath));
  fs.writeFileSync(outPath, `${context.composedText}\n`);
}
