import type { AgentRole, AgentStepResult, RetrievedSnippet } from '../agent/state.js';
import { ContextOverflowError } from '../agent/errors.js';
import { estimateTokens as defaultEstimator, type TokenEstimator } from './tokens.js';
import { silentLogger, type RuntimeLogger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export interface ContextEntry {
  readonly role: AgentRole;
  /** Position of the step in the run's trace. */
  readonly stepIndex: number;
  readonly text: string;
  readonly summarized: boolean;
}

export type EvictionKind = 'snippet_dropped' | 'output_summarized' | 'summary_dropped';

export interface EvictionRecord {
  readonly kind: EvictionKind;
  /** Snippet source id, or `<role>#<stepIndex>` for agent outputs. */
  readonly ref: string;
}

/**
 * The token-budgeted material threaded through one run. Never mutated;
 * `ContextAggregator.append` returns a new value.
 */
export interface ExecutionContext {
  readonly query: string;
  readonly snippets: readonly RetrievedSnippet[];
  readonly outputs: readonly ContextEntry[];
  readonly tokenCount: number;
  readonly tokenBudget: number;
  readonly evictions: readonly EvictionRecord[];
}

export type ContextMaterial =
  | { kind: 'snippets'; snippets: readonly RetrievedSnippet[] }
  | { kind: 'step'; step: AgentStepResult; stepIndex: number };

export interface ContextAggregatorOptions {
  tokenBudget: number;
  summaryMaxChars: number;
  estimateTokens?: TokenEstimator;
  logger?: RuntimeLogger;
}

// ============================================================================
// Context Aggregator
// ============================================================================

/**
 * Folds retrieved snippets and agent outputs into the execution context while
 * keeping its token estimate within budget.
 *
 * Eviction order when over budget:
 * 1. lowest-scoring snippets (on equal scores the later one goes first)
 * 2. oldest agent outputs are replaced by a truncated summary
 * 3. oldest summaries are dropped
 *
 * The query and the most recent output are never evicted. If they alone exceed
 * the budget, `ContextOverflowError` is thrown.
 */
export class ContextAggregator {
  private readonly tokenBudget: number;
  private readonly summaryMaxChars: number;
  private readonly estimate: TokenEstimator;
  private readonly logger: RuntimeLogger;

  constructor(options: ContextAggregatorOptions) {
    this.tokenBudget = options.tokenBudget;
    this.summaryMaxChars = options.summaryMaxChars;
    this.estimate = options.estimateTokens ?? defaultEstimator;
    this.logger = options.logger ?? silentLogger;
  }

  createContext(query: string): ExecutionContext {
    return this.fit({
      query,
      snippets: [],
      outputs: [],
      evictions: [],
    });
  }

  append(context: ExecutionContext, material: ContextMaterial): ExecutionContext {
    if (material.kind === 'snippets') {
      return this.fit({
        query: context.query,
        snippets: [...context.snippets, ...material.snippets],
        outputs: [...context.outputs],
        evictions: [...context.evictions],
      });
    }

    const { step, stepIndex } = material;
    if (step.status !== 'ok') {
      return context;
    }

    return this.fit({
      query: context.query,
      snippets: [...context.snippets],
      outputs: [
        ...context.outputs,
        { role: step.agentRole, stepIndex, text: step.outputText, summarized: false },
      ],
      evictions: [...context.evictions],
    });
  }

  /**
   * Token estimate of a context's contents.
   */
  measure(context: Pick<ExecutionContext, 'query' | 'snippets' | 'outputs'>): number {
    return (
      this.estimate(context.query) +
      context.snippets.reduce((sum, snippet) => sum + this.estimate(snippet.text), 0) +
      context.outputs.reduce((sum, entry) => sum + this.estimate(entry.text), 0)
    );
  }

  // ============================================================================
  // Eviction
  // ============================================================================

  private fit(draft: {
    query: string;
    snippets: RetrievedSnippet[];
    outputs: ContextEntry[];
    evictions: EvictionRecord[];
  }): ExecutionContext {
    const { query, snippets, outputs, evictions } = draft;
    const priorEvictions = evictions.length;
    let tokenCount = this.measure(draft);

    while (tokenCount > this.tokenBudget && snippets.length > 0) {
      const index = lowestScoreIndex(snippets);
      const [dropped] = snippets.splice(index, 1);
      tokenCount -= this.estimate(dropped.text);
      evictions.push({ kind: 'snippet_dropped', ref: dropped.sourceId });
    }

    // The last entry is the most recent output and stays as it is.
    const protectedIndex = outputs.length - 1;

    for (let i = 0; i < protectedIndex && tokenCount > this.tokenBudget; i++) {
      const entry = outputs[i];
      if (entry.summarized) continue;
      const summary = this.summarize(entry.text);
      tokenCount += this.estimate(summary) - this.estimate(entry.text);
      outputs[i] = { ...entry, text: summary, summarized: true };
      evictions.push({ kind: 'output_summarized', ref: entryRef(entry) });
    }

    while (tokenCount > this.tokenBudget) {
      const index = outputs.findIndex((entry, i) => entry.summarized && i < outputs.length - 1);
      if (index === -1) break;
      const [dropped] = outputs.splice(index, 1);
      tokenCount -= this.estimate(dropped.text);
      evictions.push({ kind: 'summary_dropped', ref: entryRef(dropped) });
    }

    if (tokenCount > this.tokenBudget) {
      throw new ContextOverflowError(tokenCount, this.tokenBudget);
    }

    if (evictions.length > priorEvictions) {
      this.logger.debug('Context evictions applied', {
        evictions: evictions.slice(priorEvictions),
        tokenCount,
        tokenBudget: this.tokenBudget,
      });
    }

    return { query, snippets, outputs, evictions, tokenCount, tokenBudget: this.tokenBudget };
  }

  private summarize(text: string): string {
    if (text.length <= this.summaryMaxChars) return text;
    const marker = '...';
    return text.slice(0, Math.max(0, this.summaryMaxChars - marker.length)) + marker;
  }
}

function lowestScoreIndex(snippets: readonly RetrievedSnippet[]): number {
  let index = 0;
  for (let i = 1; i < snippets.length; i++) {
    if (snippets[i].score <= snippets[index].score) {
      index = i;
    }
  }
  return index;
}

function entryRef(entry: ContextEntry): string {
  return `${entry.role}#${entry.stepIndex}`;
}
