import type { RetrievedSnippet } from '../agent/state.js';

/**
 * Ranked lookup of reference material. Implementations return at most `k`
 * snippets sorted by descending score, and an empty list rather than an error
 * when the backing store is unavailable.
 */
export interface RetrievalClient {
  readonly name: string;
  retrieve(query: string, k: number, signal?: AbortSignal): Promise<RetrievedSnippet[]>;
}

export function rankSnippets(snippets: RetrievedSnippet[], k: number): RetrievedSnippet[] {
  return [...snippets].sort((a, b) => b.score - a.score).slice(0, Math.max(0, k));
}
