import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const requestMock = vi.hoisted(() => vi.fn());
vi.mock('undici', () => ({ request: requestMock }));

import { downloadPaperPdf, downloadToFile, isPdfFile } from './download.js';

function response(statusCode: number, contentType: string, chunks: Buffer[]) {
  const dump = vi.fn(async () => {});
  return {
    statusCode,
    headers: { 'content-type': contentType },
    body: {
      dump,
      async *[Symbol.asyncIterator]() {
        for (const chunk of chunks) yield chunk;
      },
    },
  };
}

const PDF_CHUNKS = [Buffer.from('%PDF-1.7\n'), Buffer.from('stream data\n%%EOF\n')];

describe('download', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-triage-download-'));
  });

  afterEach(() => {
    requestMock.mockReset();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('streams a PDF to disk and reports its size and hash', async () => {
    requestMock.mockResolvedValueOnce(response(200, 'application/pdf', PDF_CHUNKS));
    const out = path.join(tmpDir, 'nested', 'paper.pdf');

    const res = await downloadToFile('https://arxiv.org/pdf/2502.12345.pdf', out);

    const expected = Buffer.concat(PDF_CHUNKS);
    expect(res).toEqual({
      path: out,
      bytes: expected.length,
      sha256: crypto.createHash('sha256').update(expected).digest('hex'),
    });
    expect(fs.readFileSync(out)).toEqual(expected);
    expect(fs.existsSync(`${out}.tmp`)).toBe(false);
  });

  it('passes the timeout and user agent to the request', async () => {
    requestMock.mockResolvedValueOnce(response(200, 'application/pdf', PDF_CHUNKS));

    await downloadToFile('https://arxiv.org/pdf/2502.12345.pdf', path.join(tmpDir, 'p.pdf'), { timeoutMs: 5_000, userAgent: 'triage-test' });

    expect(requestMock).toHaveBeenCalledWith('https://arxiv.org/pdf/2502.12345.pdf', {
      method: 'GET',
      headers: { 'User-Agent': 'triage-test' },
      bodyTimeout: 5_000,
      headersTimeout: 5_000,
    });
  });

  it('fails on a non-2xx status and drains the body', async () => {
    const res = response(404, 'text/plain', []);
    requestMock.mockResolvedValueOnce(res);

    await expect(downloadToFile('https://arxiv.org/pdf/x.pdf', path.join(tmpDir, 'x.pdf')))
      .rejects.toThrow('Download failed: 404 for https://arxiv.org/pdf/x.pdf');
    expect(res.body.dump).toHaveBeenCalledTimes(1);
  });

  it('refuses an HTML answer', async () => {
    requestMock.mockResolvedValueOnce(response(200, 'text/html; charset=utf-8', [Buffer.from('<html>')]));

    await expect(downloadToFile('https://arxiv.org/pdf/x.pdf', path.join(tmpDir, 'x.pdf')))
      .rejects.toThrow('Unexpected content-type for https://arxiv.org/pdf/x.pdf: text/html; charset=utf-8');
  });

  it('removes a body that is not a PDF', async () => {
    requestMock.mockResolvedValueOnce(response(200, 'application/pdf', [Buffer.from('not a pdf')]));
    const out = path.join(tmpDir, 'bad.pdf');

    await expect(downloadToFile('https://arxiv.org/pdf/x.pdf', out))
      .rejects.toThrow('Downloaded file is not a valid PDF (missing %PDF- header): https://arxiv.org/pdf/x.pdf');
    expect(fs.existsSync(out)).toBe(false);
    expect(fs.existsSync(`${out}.tmp`)).toBe(false);
  });

  it('reuses a valid PDF that is already on disk', async () => {
    const existing = path.join(tmpDir, 'papers', '[2502.12345] Surface codes.pdf');
    fs.mkdirSync(path.dirname(existing), { recursive: true });
    fs.writeFileSync(existing, '%PDF-1.4 cached');

    const res = await downloadPaperPdf(tmpDir, { arxivId: '2502.12345', title: 'Surface codes' }, 'https://arxiv.org/pdf/2502.12345.pdf');

    expect(res.path).toBe(existing);
    expect(res.bytes).toBe(15);
    expect(requestMock).not.toHaveBeenCalled();
    expect(isPdfFile(existing)).toBe(true);
  });

  it('isPdfFile is false for a missing file', () => {
    expect(isPdfFile(path.join(tmpDir, 'missing.pdf'))).toBe(false);
  });
});
