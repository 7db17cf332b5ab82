import fs from 'node:fs';
import path from 'node:path';

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const MAX_TITLE_CHARS = 100;

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function dbPath(storageRoot: string): string {
  return path.join(storageRoot, 'db.sqlite');
}

export function papersDir(storageRoot: string): string {
  return path.join(storageRoot, 'papers');
}

export function cleanFilename(title: string): string {
  let clean = title.replace(INVALID_FILENAME_CHARS, ' ').replace(/\s+/g, ' ').trim();
  if (clean.length > MAX_TITLE_CHARS) clean = `${clean.slice(0, MAX_TITLE_CHARS).trim()}...`;
  return clean;
}

// e.g. papers/[2502.12345] Surface codes at scale.pdf
export function pdfPathFor(storageRoot: string, arxivId: string, title: string): string {
  return path.join(papersDir(storageRoot), `[${arxivId}] ${cleanFilename(title)}.pdf`);
}

export function ensureStorageRoot(storageRoot: string) {
  ensureDir(storageRoot);
  ensureDir(papersDir(storageRoot));
}
