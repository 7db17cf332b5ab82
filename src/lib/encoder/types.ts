import type { EmbeddingVector } from '../types.js';

/** A loaded text-embedding backend for one model. */
export interface EncoderBackend {
  readonly model: string;
  embed(text: string): Promise<EmbeddingVector>;
}

/**
 * Loads the backend for a model id. Throws when the model's weights or
 * service are unavailable; the adapter then moves on to the next model.
 */
export type BackendLoader = (model: string) => Promise<EncoderBackend>;

/** The single embedding contract the rest of the engine depends on. */
export interface Encoder {
  /** Identity of the model that actually became active. */
  readonly model: string;
  /** Models that were tried and failed before `model` loaded. */
  readonly skipped: readonly string[];
  /** Vector dimension, known after the first embedding. */
  readonly dimension: number | null;
  embed(text: string): Promise<EmbeddingVector>;
}
