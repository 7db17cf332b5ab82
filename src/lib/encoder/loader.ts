import type { AppConfig } from '../types.js';
import { createHashBackend, HASH_MODEL_PREFIX } from './hashing.js';
import { loadHttpBackend } from './http.js';
import type { BackendLoader } from './types.js';

/**
 * Default backend loader: `hash:<dim>` ids load the local term-hash encoder,
 * everything else goes to the configured feature-extraction endpoint.
 */
export function createBackendLoader(
  encoder: AppConfig['encoder'],
  env: NodeJS.ProcessEnv = process.env,
): BackendLoader {
  const apiKey = encoder.apiKeyEnv ? env[encoder.apiKeyEnv] ?? null : null;

  return async (model: string) => {
    if (model.startsWith(HASH_MODEL_PREFIX)) return createHashBackend(model);
    return loadHttpBackend(model, {
      endpoint: encoder.endpoint,
      apiKey,
      timeoutMs: encoder.timeoutMs,
    });
  };
}
