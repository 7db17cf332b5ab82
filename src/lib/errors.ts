/**
 * Error taxonomy for the relevance engine.
 *
 * Every error carries a stable `code` and, where useful, a `context` record
 * (paper id, operation, attempted models) so the CLI can print something the
 * user can act on.
 */

export type ErrorContext = Record<string, unknown>;

export interface TriageErrorOptions {
  cause?: unknown;
  context?: ErrorContext;
}

export class TriageError extends Error {
  readonly code: string;
  readonly context: ErrorContext;

  constructor(message: string, code: string, options: TriageErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.context = options.context ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class ContextNotLoadedError extends TriageError {
  constructor() {
    super('Research context not loaded. Load a context file before scoring papers.', 'CONTEXT_NOT_LOADED');
  }
}

export class EmptyContextError extends TriageError {
  constructor(source?: string) {
    super(
      source ? `Context file is empty: ${source}` : 'Context text is empty',
      'EMPTY_CONTEXT',
      { context: source ? { source } : {} },
    );
  }
}

export class EmptySnippetError extends TriageError {
  constructor() {
    super('Snippet content is empty', 'EMPTY_SNIPPET');
  }
}

export class ContextFileNotFoundError extends TriageError {
  constructor(filePath: string) {
    super(`Context file not found: ${filePath}`, 'CONTEXT_FILE_NOT_FOUND', { context: { path: filePath } });
  }
}

export interface ModelAttempt {
  model: string;
  error: string;
}

export class ModelLoadError extends TriageError {
  readonly attempts: ModelAttempt[];

  constructor(attempts: ModelAttempt[]) {
    const chain = attempts.map((a) => a.model).join(' -> ') || '(empty model list)';
    const detail = attempts.map((a) => `${a.model}: ${a.error}`).join('; ');
    super(
      `No embedding model could be loaded (tried ${chain})${detail ? `: ${detail}` : ''}`,
      'MODEL_LOAD_FAILED',
      { context: { attempts } },
    );
    this.attempts = attempts;
  }
}

export class EmbeddingError extends TriageError {
  constructor(message: string, options: TriageErrorOptions = {}) {
    super(message, 'EMBEDDING_FAILED', options);
  }
}

export class PerItemProcessingError extends TriageError {
  readonly paperId: string;
  readonly operation: string;

  constructor(paperId: string, operation: string, cause: unknown) {
    super(`${operation} failed for paper ${paperId}: ${errorMessage(cause)}`, 'ITEM_FAILED', {
      cause,
      context: { paperId, operation },
    });
    this.paperId = paperId;
    this.operation = operation;
  }
}

export class ConfigError extends TriageError {
  constructor(message: string, options: TriageErrorOptions = {}) {
    super(message, 'CONFIG_INVALID', options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
