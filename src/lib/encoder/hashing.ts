/**
 * Local term-hash encoder.
 *
 * Model ids of the form `hash:<dim>` select a feature-hashing bag-of-words
 * encoder: each token is hashed (FNV-1a) into one of `dim` buckets, counts
 * are accumulated and the vector is L2-normalised. It needs no weights or
 * network, so it is what offline runs and the test suite use. Similarity is
 * purely lexical.
 */

import type { EmbeddingVector } from '../types.js';
import type { EncoderBackend } from './types.js';

export const HASH_MODEL_PREFIX = 'hash:';

const MIN_DIM = 16;
const MAX_DIM = 65_536;

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
  'of', 'with', 'by', 'from', 'as', 'is', 'was', 'are', 'were', 'be',
  'this', 'that', 'these', 'those', 'we', 'our', 'it', 'its', 'via',
]);

export function parseHashModel(model: string): number | null {
  if (!model.startsWith(HASH_MODEL_PREFIX)) return null;
  const dim = Number(model.slice(HASH_MODEL_PREFIX.length));
  if (!Number.isInteger(dim) || dim < MIN_DIM || dim > MAX_DIM) return null;
  return dim;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length >= 2 && !STOP_WORDS.has(t));
}

export function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export function hashEmbed(text: string, dim: number): EmbeddingVector {
  const vec = new Array<number>(dim).fill(0);
  for (const token of tokenize(text)) {
    const bucket = fnv1a(token) % dim;
    vec[bucket] = (vec[bucket] ?? 0) + 1;
  }

  let norm = 0;
  for (const v of vec) norm += v * v;
  if (norm === 0) return vec;

  const scale = 1 / Math.sqrt(norm);
  return vec.map((v) => v * scale);
}

export function createHashBackend(model: string): EncoderBackend {
  const dim = parseHashModel(model);
  if (dim === null) {
    throw new Error(`Invalid term-hash model id "${model}" (expected ${HASH_MODEL_PREFIX}<${MIN_DIM}-${MAX_DIM}>)`);
  }
  return {
    model,
    async embed(text: string): Promise<EmbeddingVector> {
      return hashEmbed(text, dim);
    },
  };
}
