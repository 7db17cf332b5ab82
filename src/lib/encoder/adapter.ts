/**
 * Encoder adapter: resolves an ordered model chain to one active backend.
 *
 * The first model that loads wins; every failure on the way is logged with
 * the model that takes over, so scores stay attributable to the model that
 * actually produced them. Exhausting the chain throws ModelLoadError.
 */

import { EmbeddingError, ModelLoadError, errorMessage, type ModelAttempt } from '../errors.js';
import { consoleLogger, type Logger } from '../log.js';
import type { EmbeddingVector } from '../types.js';
import type { BackendLoader, Encoder, EncoderBackend } from './types.js';

export interface LoadEncoderOptions {
  models: readonly string[];
  load: BackendLoader;
  logger?: Logger;
}

class ActiveEncoder implements Encoder {
  private dim: number | null = null;

  constructor(
    private readonly backend: EncoderBackend,
    readonly skipped: readonly string[],
  ) {}

  get model(): string {
    return this.backend.model;
  }

  get dimension(): number | null {
    return this.dim;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    if (!text.trim()) {
      throw new EmbeddingError('Cannot embed empty text', { context: { model: this.model } });
    }

    const vector = await this.backend.embed(text);
    if (vector.length === 0) {
      throw new EmbeddingError(`Model ${this.model} returned an empty vector`, { context: { model: this.model } });
    }
    if (this.dim === null) {
      this.dim = vector.length;
    } else if (vector.length !== this.dim) {
      throw new EmbeddingError(
        `Model ${this.model} returned dimension ${vector.length}, expected ${this.dim}`,
        { context: { model: this.model } },
      );
    }
    return vector;
  }
}

export async function loadEncoder(opts: LoadEncoderOptions): Promise<Encoder> {
  const { models, load, logger = consoleLogger } = opts;
  const attempts: ModelAttempt[] = [];

  for (const [i, model] of models.entries()) {
    logger.info(`Loading embedding model: ${model}...`);
    try {
      const backend = await load(model);
      if (attempts.length > 0) {
        logger.warn(`Embedding model active: ${model} (fallback after ${attempts.map((a) => a.model).join(', ')})`);
      } else {
        logger.info(`Embedding model active: ${model}`);
      }
      return new ActiveEncoder(backend, attempts.map((a) => a.model));
    } catch (e) {
      const error = errorMessage(e);
      attempts.push({ model, error });
      const next = models[i + 1];
      logger.warn(
        next
          ? `Embedding model ${model} unavailable (${error}); falling back to ${next}`
          : `Embedding model ${model} unavailable (${error}); no fallback left`,
      );
    }
  }

  throw new ModelLoadError(attempts);
}
