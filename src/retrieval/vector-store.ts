import type { VectorStoreInterface } from '@langchain/core/vectorstores';
import type { RetrievedSnippet } from '../agent/state.js';
import { raceAbort } from '../utils/abort.js';
import { silentLogger, type RuntimeLogger } from '../utils/logger.js';
import { rankSnippets, type RetrievalClient } from './types.js';

export interface VectorStoreRetrievalOptions {
  store: VectorStoreInterface;
  /** Set when the store returns distances (lower is closer) instead of similarities. */
  scoreIsDistance?: boolean;
  logger?: RuntimeLogger;
}

/**
 * Retrieval over any LangChain vector store.
 */
export class VectorStoreRetrievalClient implements RetrievalClient {
  readonly name = 'vector-store';

  private readonly store: VectorStoreInterface;
  private readonly scoreIsDistance: boolean;
  private readonly logger: RuntimeLogger;

  constructor(options: VectorStoreRetrievalOptions) {
    this.store = options.store;
    this.scoreIsDistance = options.scoreIsDistance ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  async retrieve(query: string, k: number, signal?: AbortSignal): Promise<RetrievedSnippet[]> {
    if (k <= 0) return [];

    try {
      const search = this.store.similaritySearchWithScore(query, k);
      const results = await (signal ? raceAbort(search, signal) : search);
      const snippets = results.map(([document, score], index): RetrievedSnippet => {
        const source: unknown = document.metadata.source ?? document.id;
        return {
          sourceId: typeof source === 'string' ? source : `document-${index}`,
          score: this.scoreIsDistance ? 1 / (1 + score) : score,
          text: document.pageContent,
        };
      });
      return rankSnippets(snippets, k);
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      this.logger.warn('RetrievalUnavailable', {
        store: this.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}
