/**
 * RelevanceSession: one active encoder plus one active research context.
 *
 * Scorer and recalculation calls take the session explicitly, so several
 * sessions (different contexts or models) can live side by side. Changing
 * the model never mutates a session: `switchModel` builds a new one,
 * re-embeds the context under it and hands it back for the caller to swap in.
 */

import { ResearchContext } from './context/research-context.js';
import { loadEncoder, type BackendLoader, type Encoder } from './encoder/index.js';
import { ContextNotLoadedError } from './errors.js';
import { consoleLogger, type Logger } from './log.js';
import { buildCategoryTable, type CategoryTable } from './scoring/categories.js';
import type { CategoryThreshold, Snippet } from './types.js';

export interface SessionOptions {
  models: readonly string[];
  load: BackendLoader;
  thresholds?: readonly CategoryThreshold[];
  logger?: Logger;
}

export class RelevanceSession {
  private ctx: ResearchContext | null = null;

  constructor(
    readonly encoder: Encoder,
    readonly categories: CategoryTable,
    readonly logger: Logger = consoleLogger,
  ) {}

  get model(): string {
    return this.encoder.model;
  }

  get context(): ResearchContext | null {
    return this.ctx;
  }

  requireContext(): ResearchContext {
    if (!this.ctx) throw new ContextNotLoadedError();
    return this.ctx;
  }

  /** Replace the active context; the old one stays active if embedding fails. */
  async loadContext(baseText: string, snippets: readonly Snippet[] = []): Promise<ResearchContext> {
    const next = await ResearchContext.load(this.encoder, baseText, snippets);
    this.ctx = next;
    this.logger.info(`Loaded context: ${next.baseText.length} characters, ${next.snippets.length} snippet(s)`);
    return next;
  }

  /** Adopt a context that was already embedded by this session's encoder. */
  adoptContext(context: ResearchContext): void {
    if (context.model !== this.encoder.model) {
      throw new Error(`Context was embedded with ${context.model}, session uses ${this.encoder.model}`);
    }
    this.ctx = context;
  }
}

export async function createSession(opts: SessionOptions): Promise<RelevanceSession> {
  const logger = opts.logger ?? consoleLogger;
  const encoder = await loadEncoder({ models: opts.models, load: opts.load, logger });
  return new RelevanceSession(encoder, buildCategoryTable(opts.thresholds), logger);
}

export interface SwitchModelOptions {
  models: readonly string[];
  load: BackendLoader;
  logger?: Logger;
  /** Flags every stored paper stale once the new session is ready. */
  markStale?: () => void;
}

export async function switchModel(current: RelevanceSession, opts: SwitchModelOptions): Promise<RelevanceSession> {
  const logger = opts.logger ?? current.logger;
  const encoder = await loadEncoder({ models: opts.models, load: opts.load, logger });
  const next = new RelevanceSession(encoder, current.categories, logger);

  const context = current.context;
  if (context) {
    next.adoptContext(await context.rebuild(encoder));
  }

  opts.markStale?.();
  logger.info(`Switched embedding model ${current.model} -> ${next.model}; stored scores need recalculation`);
  return next;
}
