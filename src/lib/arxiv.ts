import { XMLParser } from 'fast-xml-parser';

import { backoffMs, isRetryableStatus, sleep } from './retry.js';

export interface ArxivEntry {
  arxivId: string; // canonical, no version
  version: string; // v1, v2, ...
  title: string;
  summary: string;
  authors: string[];
  categories: string[];
  publishedAt: string;
  updatedAt: string;
  pdfUrl: string | null;
  absUrl: string | null;
  rawIdUrl: string;
}

const API_URL = 'https://export.arxiv.org/api/query';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
});

type XmlNode = Record<string, unknown>;

function isNode(x: unknown): x is XmlNode {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function field(x: unknown, key: string): unknown {
  return isNode(x) ? x[key] : undefined;
}

function text(x: unknown): string {
  if (typeof x === 'string') return x;
  if (typeof x === 'number') return String(x);
  // <title type="text">…</title> parses to { '#text': …, '@_type': … }
  const inner = field(x, '#text');
  return typeof inner === 'string' ? inner : '';
}

function asArray(x: unknown): unknown[] {
  if (x === undefined || x === null || x === '') return [];
  return Array.isArray(x) ? x : [x];
}

// Example id URL: http://arxiv.org/abs/2502.12345v2
export function parseArxivId(idUrl: string): { arxivId: string; version: string } {
  const m = idUrl.match(/arxiv\.org\/abs\/(.+)$/);
  const tail = m?.[1] ?? idUrl;
  const mv = tail.match(/^(?<id>\d{4}\.\d{4,5})(?<v>v\d+)?$/);
  const arxivId = mv?.groups?.id ?? tail.replace(/v\d+$/, '');
  const version = mv?.groups?.v ?? 'v1';
  return { arxivId, version };
}

/** Accepts `2502.12345`, `2502.12345v2`, `arxiv:2502.12345` or an abs/pdf URL. */
export function normalizeArxivId(input: string): string {
  const s = input.trim().replace(/^arxiv:/i, '');
  const url = s.match(/arxiv\.org\/(?:abs|pdf)\/([^?#]+?)(?:\.pdf)?$/);
  return parseArxivId(url?.[1] ?? s).arxivId;
}

function normalizeWhitespace(t: string): string {
  return t.replace(/\s+/g, ' ').trim();
}

export function searchUrl(searchQuery: string, maxResults: number): string {
  return `${API_URL}?search_query=${encodeURIComponent(searchQuery)}&start=0&max_results=${maxResults}&sortBy=relevance&sortOrder=descending`;
}

export function idListUrl(arxivId: string): string {
  return `${API_URL}?id_list=${encodeURIComponent(arxivId)}`;
}

// Be polite + resilient: retry on transient failures (esp. 429 rate limiting).
export async function fetchAtom(url: string, label: string): Promise<string> {
  const maxAttempts = 5;
  const FETCH_TIMEOUT_MS = 30_000;
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const signal = AbortSignal.timeout(FETCH_TIMEOUT_MS);
    let res: Response;
    try {
      res = await fetch(url, {
        signal,
        headers: {
          'User-Agent': 'paper-triage',
        },
      });
    } catch (err) {
      // Timeout (AbortError) or network error; retryable
      if (attempt === maxAttempts) {
        const msg = err instanceof Error ? err.message : String(err);
        throw new Error(`arXiv fetch failed for ${label} (attempt ${attempt}): ${msg}`);
      }
      await sleep(backoffMs(attempt));
      continue;
    }

    if (res.ok) return await res.text();

    const status = res.status;
    if (!isRetryableStatus(status) || attempt === maxAttempts) {
      throw new Error(`arXiv fetch failed for ${label}: ${status} ${res.statusText}`);
    }

    await sleep(backoffMs(attempt));
  }

  throw new Error(`arXiv fetch failed for ${label}: exceeded retries`);
}

export function parseAtom(xml: string): ArxivEntry[] {
  const doc: unknown = parser.parse(xml);
  const entries = asArray(field(field(doc, 'feed'), 'entry'));

  return entries
    .map((e) => {
      const rawIdUrl = text(field(e, 'id'));
      const { arxivId, version } = parseArxivId(rawIdUrl);

      const authors = asArray(field(e, 'author'))
        .map((a) => normalizeWhitespace(text(field(a, 'name'))))
        .filter(Boolean);

      const categories = asArray(field(e, 'category'))
        .map((c) => text(field(c, '@_term')))
        .filter(Boolean);

      const links = asArray(field(e, 'link')).map((l) => ({
        href: text(field(l, '@_href')),
        type: text(field(l, '@_type')),
        title: text(field(l, '@_title')),
      }));
      const absUrl = links.find((l) => l.href.includes('/abs/'))?.href ?? null;
      const pdfUrl = links.find((l) => l.type === 'application/pdf' || l.title === 'pdf')?.href ?? null;

      return {
        arxivId,
        version,
        title: normalizeWhitespace(text(field(e, 'title'))),
        summary: normalizeWhitespace(text(field(e, 'summary'))),
        authors,
        categories,
        publishedAt: text(field(e, 'published')),
        updatedAt: text(field(e, 'updated')),
        pdfUrl,
        absUrl,
        rawIdUrl,
      } satisfies ArxivEntry;
    })
    // Malformed ids come back as an entry under /api/errors; unknown ones as an empty entry.
    .filter((e) => e.title && e.summary && !e.rawIdUrl.includes('/api/errors'));
}

/**
 * Full-text search; when `all:` finds nothing, retry as a title search.
 */
export async function searchArxiv(query: string, maxResults = 10): Promise<ArxivEntry[]> {
  const q = query.trim();
  if (!q) return [];

  const entries = parseAtom(await fetchAtom(searchUrl(`all:${q}`, maxResults), `"${q}"`));
  if (entries.length > 0) return entries;
  return parseAtom(await fetchAtom(searchUrl(`ti:${q}`, maxResults), `title "${q}"`));
}

export async function fetchArxivEntry(idOrUrl: string): Promise<ArxivEntry | null> {
  const arxivId = normalizeArxivId(idOrUrl);
  const entries = parseAtom(await fetchAtom(idListUrl(arxivId), arxivId));
  return entries[0] ?? null;
}

export function pdfUrlFor(entry: Pick<ArxivEntry, 'arxivId' | 'pdfUrl'>): string {
  return entry.pdfUrl ?? `https://arxiv.org/pdf/${entry.arxivId}.pdf`;
}
