import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { request } from 'undici';

import { ensureDir, pdfPathFor } from './storage.js';

export interface DownloadResult {
  path: string;
  bytes: number;
  sha256: string;
}

export interface DownloadOptions {
  timeoutMs?: number;
  userAgent?: string;
}

const PDF_MAGIC = '%PDF-';

/** Write every chunk to `file`, hashing as it goes. The stream is closed before this resolves. */
async function writeChunks(chunks: AsyncIterable<Uint8Array>, file: string): Promise<Omit<DownloadResult, 'path'>> {
  const hash = crypto.createHash('sha256');
  const out = fs.createWriteStream(file);
  let bytes = 0;
  try {
    for await (const chunk of chunks) {
      bytes += chunk.byteLength;
      hash.update(chunk);
      out.write(chunk);
    }
  } finally {
    await new Promise<void>((resolve, reject) => {
      out.on('error', reject);
      out.end(() => resolve());
    });
  }
  return { bytes, sha256: hash.digest('hex') };
}

function describeFile(file: string): DownloadResult {
  const buf = fs.readFileSync(file);
  return { path: file, bytes: buf.length, sha256: crypto.createHash('sha256').update(buf).digest('hex') };
}

/**
 * Fetch `url` into `outPath` through a `.tmp` sibling. Only a body that starts
 * with the PDF magic bytes is renamed into place.
 */
export async function downloadToFile(url: string, outPath: string, opts: DownloadOptions = {}): Promise<DownloadResult> {
  const timeoutMs = opts.timeoutMs ?? 60_000;
  ensureDir(path.dirname(outPath));

  const res = await request(url, {
    method: 'GET',
    headers: { 'User-Agent': opts.userAgent ?? 'paper-triage' },
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
  });

  if (res.statusCode < 200 || res.statusCode >= 300) {
    await res.body.dump();
    throw new Error(`Download failed: ${res.statusCode} for ${url}`);
  }

  // arXiv answers with an HTML page for withdrawn or unknown papers.
  const contentType = String(res.headers['content-type'] ?? '');
  if (contentType && !contentType.includes('pdf')) {
    await res.body.dump();
    throw new Error(`Unexpected content-type for ${url}: ${contentType}`);
  }

  const tmpPath = `${outPath}.tmp`;
  const written = await writeChunks(res.body, tmpPath);

  if (!isPdfFile(tmpPath)) {
    fs.rmSync(tmpPath, { force: true });
    throw new Error(`Downloaded file is not a valid PDF (missing ${PDF_MAGIC} header): ${url}`);
  }

  fs.renameSync(tmpPath, outPath);
  return { path: outPath, ...written };
}

export function isPdfFile(file: string): boolean {
  if (!fs.existsSync(file)) return false;
  const fd = fs.openSync(file, 'r');
  try {
    const head = Buffer.alloc(PDF_MAGIC.length);
    const read = fs.readSync(fd, head, 0, head.length, 0);
    return head.subarray(0, read).toString('utf8') === PDF_MAGIC;
  } finally {
    fs.closeSync(fd);
  }
}

/** Download into `<storage>/papers/[<arxivId>] <title>.pdf`, reusing an existing valid file. */
export async function downloadPaperPdf(
  storageRoot: string,
  paper: { arxivId: string; title: string },
  url: string,
  opts?: DownloadOptions,
): Promise<DownloadResult> {
  const outPath = pdfPathFor(storageRoot, paper.arxivId, paper.title);
  if (isPdfFile(outPath)) return describeFile(outPath);
  return downloadToFile(url, outPath, opts);
}
