import type { Snippet } from '../types.js';

/**
 * Separates the base context from the snippet section in composed text.
 * No proper prefix of it is also a suffix of it. A base text that itself
 * contains this sequence does not survive `extractBase(compose(...))`.
 */
export const SNIPPET_DELIMITER = '\n\n=== Additional Context Snippets ===';

type SnippetText = Pick<Snippet, 'content' | 'source'>;

function renderSnippet(s: SnippetText): string {
  const content = s.content.trim();
  return s.source ? `- ${content} (Source: ${s.source})` : `- ${content}`;
}

export function compose(base: string, snippets: readonly SnippetText[]): string {
  if (snippets.length === 0) return base;
  return `${base}${SNIPPET_DELIMITER}\n${snippets.map(renderSnippet).join('\n')}`;
}

export function extractBase(composed: string): string {
  const at = composed.indexOf(SNIPPET_DELIMITER);
  return at === -1 ? composed : composed.slice(0, at);
}
