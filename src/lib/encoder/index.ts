export type { Encoder, EncoderBackend, BackendLoader } from './types.js';
export type { LoadEncoderOptions } from './adapter.js';
export { loadEncoder } from './adapter.js';
export { createBackendLoader } from './loader.js';
export { createHashBackend, hashEmbed, parseHashModel, tokenize, HASH_MODEL_PREFIX } from './hashing.js';
export type { HttpBackendOptions } from './http.js';
export { createHttpBackend, loadHttpBackend, meanPool, toSentenceVector } from './http.js';
