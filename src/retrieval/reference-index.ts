import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { RetrievedSnippet } from '../agent/state.js';
import { silentLogger, type RuntimeLogger } from '../utils/logger.js';
import { rankSnippets, type RetrievalClient } from './types.js';

export const DEFAULT_REFERENCE_FILE = fileURLToPath(
  new URL('../../data/reference-snippets.json', import.meta.url)
);

const ReferenceEntrySchema = z.object({
  id: z.string(),
  title: z.string(),
  tags: z.array(z.string()).default([]),
  text: z.string(),
});

export type ReferenceEntry = z.infer<typeof ReferenceEntrySchema>;

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'do', 'for', 'from', 'how', 'i', 'in', 'is',
  'it', 'my', 'of', 'on', 'or', 'the', 'this', 'to', 'what', 'when', 'why', 'with', 'you',
]);

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9_]+/g) ?? []).filter(
    token => token.length > 1 && !STOP_WORDS.has(token)
  );
}

interface IndexedEntry {
  entry: ReferenceEntry;
  terms: Set<string>;
}

/**
 * In-process lexical index. A snippet's score is the idf-weighted share of
 * the query's terms it contains, in [0, 1].
 */
export class ReferenceIndex implements RetrievalClient {
  readonly name = 'reference-index';

  private readonly entries: IndexedEntry[];
  private readonly documentFrequency = new Map<string, number>();

  constructor(entries: ReferenceEntry[]) {
    this.entries = entries.map(entry => ({
      entry,
      terms: new Set(tokenize(`${entry.title} ${entry.tags.join(' ')} ${entry.text}`)),
    }));
    for (const { terms } of this.entries) {
      for (const term of terms) {
        this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
      }
    }
  }

  /**
   * Loads the corpus from a JSON file. A missing or malformed file yields an
   * empty index, which retrieves nothing.
   */
  static fromFile(file: string = DEFAULT_REFERENCE_FILE, logger: RuntimeLogger = silentLogger): ReferenceIndex {
    try {
      const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
      return new ReferenceIndex(z.array(ReferenceEntrySchema).parse(raw));
    } catch (error) {
      logger.warn('RetrievalUnavailable', {
        store: 'reference-index',
        file,
        error: error instanceof Error ? error.message : String(error),
      });
      return new ReferenceIndex([]);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  async retrieve(query: string, k: number): Promise<RetrievedSnippet[]> {
    const queryTerms = [...new Set(tokenize(query))];
    if (queryTerms.length === 0 || this.entries.length === 0 || k <= 0) {
      return [];
    }

    const weights = queryTerms.map(term => [term, this.idf(term)] as const);
    const totalWeight = weights.reduce((sum, [, weight]) => sum + weight, 0);

    const snippets: RetrievedSnippet[] = [];
    for (const { entry, terms } of this.entries) {
      const matched = weights.reduce((sum, [term, weight]) => (terms.has(term) ? sum + weight : sum), 0);
      if (matched > 0) {
        snippets.push({ sourceId: entry.id, score: matched / totalWeight, text: entry.text });
      }
    }
    return rankSnippets(snippets, k);
  }

  private idf(term: string): number {
    const df = this.documentFrequency.get(term) ?? 0;
    return Math.log(1 + this.entries.length / Math.max(df, 1));
  }
}
