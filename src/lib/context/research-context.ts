/**
 * ResearchContext: base text + ordered snippets + the embedding of their
 * composition.
 *
 * Base and snippets are held separately; the composed string is only
 * materialised to feed the encoder (and for export). Every mutation embeds
 * the new composition first and commits afterwards, so a failed embed
 * leaves the context exactly as it was and a resolved mutation is always
 * visible to the next score.
 */

import crypto from 'node:crypto';

import type { Encoder } from '../encoder/index.js';
import { EmptyContextError, EmptySnippetError } from '../errors.js';
import type { EmbeddingVector, Snippet } from '../types.js';
import { compose } from './compose.js';

export function contextVersion(model: string, composedText: string): string {
  return crypto.createHash('sha256').update(`${model}\n${composedText}`).digest('hex').slice(0, 16);
}

export class ResearchContext {
  private snippetList: Snippet[];
  private composed: string;
  private vector: EmbeddingVector;
  private ver: string;

  private constructor(
    private readonly encoder: Encoder,
    readonly baseText: string,
    snippets: Snippet[],
    composed: string,
    vector: EmbeddingVector,
  ) {
    this.snippetList = snippets;
    this.composed = composed;
    this.vector = vector;
    this.ver = contextVersion(encoder.model, composed);
  }

  /** Embed a base text, plus any persisted snippets, under `encoder`. */
  static async load(encoder: Encoder, text: string, snippets: readonly Snippet[] = []): Promise<ResearchContext> {
    const base = text.trim();
    if (!base) throw new EmptyContextError();
    for (const s of snippets) {
      if (!s.content.trim()) throw new EmptySnippetError();
    }

    const list = [...snippets];
    const composed = compose(base, list);
    const vector = await encoder.embed(composed);
    return new ResearchContext(encoder, base, list, composed, vector);
  }

  get model(): string {
    return this.encoder.model;
  }

  get snippets(): readonly Snippet[] {
    return this.snippetList;
  }

  get composedText(): string {
    return this.composed;
  }

  get embedding(): readonly number[] {
    return this.vector;
  }

  /** Changes whenever the composed text or the model changes. */
  get version(): string {
    return this.ver;
  }

  getSnippet(id: string): Snippet | undefined {
    return this.snippetList.find((s) => s.id === id);
  }

  async addSnippet(content: string, source?: string | null, paperId?: string | null): Promise<string> {
    const trimmed = content.trim();
    if (!trimmed) throw new EmptySnippetError();

    const snippet: Snippet = {
      id: crypto.randomUUID(),
      content: trimmed,
      source: source?.trim() || null,
      paperId: paperId ?? null,
      addedAt: new Date().toISOString(),
    };
    await this.commit([...this.snippetList, snippet]);
    return snippet.id;
  }

  async removeSnippet(id: string): Promise<boolean> {
    const next = this.snippetList.filter((s) => s.id !== id);
    if (next.length === this.snippetList.length) return false;
    await this.commit(next);
    return true;
  }

  /** Re-derive the composed text and re-embed it with the current encoder. */
  async recalculate(): Promise<void> {
    await this.commit(this.snippetList);
  }

  /** Same base and snippets, embedded by another encoder. */
  rebuild(encoder: Encoder): Promise<ResearchContext> {
    return ResearchContext.load(encoder, this.baseText, this.snippetList);
  }

  private async commit(snippets: Snippet[]): Promise<void> {
    const composed = compose(this.baseText, snippets);
    const vector = await this.encoder.embed(composed);
    this.snippetList = snippets;
    this.composed = composed;
    this.vector = vector;
    this.ver = contextVersion(this.encoder.model, composed);
  }
}
