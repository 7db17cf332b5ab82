import { request } from 'undici';
import { z } from 'zod';

import { EmbeddingError, errorMessage } from '../errors.js';
import { backoffMs as defaultBackoffMs, isRetryableStatus, sleep } from '../retry.js';
import type { EmbeddingVector } from '../types.js';
import type { EncoderBackend } from './types.js';

export interface HttpBackendOptions {
  /** Base URL; the model id is appended as a path segment. */
  endpoint: string;
  apiKey?: string | null;
  timeoutMs?: number;
  maxAttempts?: number;
  backoffMs?: (attempt: number) => number;
}

// Sentence-transformers models answer with a pooled vector; plain
// transformer models answer with one vector per token (optionally batched).
const FeatureResponseSchema = z.union([
  z.array(z.number()),
  z.array(z.array(z.number())),
  z.array(z.array(z.array(z.number()))),
]);

const ErrorBodySchema = z.object({ error: z.string() }).passthrough();

const PROBE_TEXT = 'embedding model availability probe';

export function meanPool(tokens: number[][]): EmbeddingVector {
  const first = tokens[0];
  if (!first || first.length === 0) {
    throw new EmbeddingError('Cannot pool an empty token matrix');
  }
  const out = new Array<number>(first.length).fill(0);
  for (const row of tokens) {
    if (row.length !== out.length) {
      throw new EmbeddingError(`Ragged token matrix: expected width ${out.length}, got ${row.length}`);
    }
    for (let i = 0; i < row.length; i++) {
      out[i] = (out[i] ?? 0) + (row[i] ?? 0);
    }
  }
  return out.map((v) => v / tokens.length);
}

type FeaturePayload = z.infer<typeof FeatureResponseSchema>;

function isPooled(p: FeaturePayload): p is number[] {
  return typeof p[0] === 'number';
}

function isBatched(p: FeaturePayload): p is number[][][] {
  const head = p[0];
  return Array.isArray(head) && Array.isArray(head[0]);
}

export function toSentenceVector(payload: unknown): EmbeddingVector {
  const parsed = FeatureResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const err = ErrorBodySchema.safeParse(payload);
    throw new EmbeddingError(
      err.success ? `Embedding service error: ${err.data.error}` : 'Unexpected embedding response shape',
    );
  }

  const data = parsed.data;
  if (isPooled(data)) return data;
  if (isBatched(data)) return meanPool(data[0] ?? []);
  return meanPool(data);
}

function modelUrl(endpoint: string, model: string): string {
  return `${endpoint.replace(/\/+$/, '')}/${model.split('/').map(encodeURIComponent).join('/')}`;
}

export function createHttpBackend(model: string, opts: HttpBackendOptions): EncoderBackend {
  const {
    endpoint,
    apiKey = null,
    timeoutMs = 60_000,
    maxAttempts = 4,
    backoffMs = defaultBackoffMs,
  } = opts;
  const url = modelUrl(endpoint, model);

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': 'paper-triage',
  };
  if (apiKey) headers.Authorization = `Bearer ${apiKey}`;

  async function embed(text: string): Promise<EmbeddingVector> {
    const body = JSON.stringify({ inputs: text, options: { wait_for_model: true } });

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      let statusCode: number;
      let payload: unknown;
      try {
        const res = await request(url, {
          method: 'POST',
          headers,
          body,
          bodyTimeout: timeoutMs,
          headersTimeout: timeoutMs,
        });
        statusCode = res.statusCode;
        payload = statusCode >= 200 && statusCode < 300 ? await res.body.json() : await res.body.text();
      } catch (e) {
        if (attempt === maxAttempts) {
          throw new EmbeddingError(`Embedding request to ${model} failed (attempt ${attempt}): ${errorMessage(e)}`, {
            cause: e,
            context: { model },
          });
        }
        await sleep(backoffMs(attempt));
        continue;
      }

      if (statusCode >= 200 && statusCode < 300) return toSentenceVector(payload);

      if (!isRetryableStatus(statusCode) || attempt === maxAttempts) {
        throw new EmbeddingError(`Embedding request to ${model} failed: ${statusCode} ${String(payload).slice(0, 200)}`, {
          context: { model, statusCode },
        });
      }
      await sleep(backoffMs(attempt));
    }

    throw new EmbeddingError(`Embedding request to ${model} failed: exceeded retries`, { context: { model } });
  }

  return { model, embed };
}

/** Creates the backend and probes it once, so a missing model fails at load time. */
export async function loadHttpBackend(model: string, opts: HttpBackendOptions): Promise<EncoderBackend> {
  const backend = createHttpBackend(model, opts);
  await backend.embed(PROBE_TEXT);
  return backend;
}
