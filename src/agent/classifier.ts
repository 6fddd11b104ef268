import type { StructuredProvider } from '../model/types.js';
import { silentLogger, type RuntimeLogger } from '../utils/logger.js';
import { buildClassificationPrompt, getClassificationSystemPrompt } from './prompts.js';
import { ClassificationSchema } from './schemas.js';
import { TASK_CATEGORIES } from './state.js';
import type { Classification, TaskCategory } from './state.js';

// ============================================================================
// Keyword Table
// ============================================================================

interface KeywordRule {
  category: TaskCategory;
  pattern: RegExp;
  weight: number;
}

const RULES: readonly KeywordRule[] = [
  { category: 'debugging', pattern: /\bwhy\s+(?:isn['’]?t|is\s+not|doesn['’]?t|does\s+not|won['’]?t|can['’]?t)\b/i, weight: 3 },
  { category: 'debugging', pattern: /\bdebug/i, weight: 3 },
  { category: 'debugging', pattern: /\bfix(?:es|ed|ing)?\b/i, weight: 3 },
  { category: 'debugging', pattern: /\b(?:error|exception|bug|crash(?:es|ing)?|broken|stack\s?trace)\b/i, weight: 2 },
  { category: 'debugging', pattern: /\bnot\s+(?:working|rendering|updating|running)\b/i, weight: 2 },

  { category: 'optimization', pattern: /\boptimi[sz](?:e|ed|es|ing|ation)\b/i, weight: 3 },
  { category: 'optimization', pattern: /\bperformance\b/i, weight: 3 },
  { category: 'optimization', pattern: /\b(?:faster|speed\s+up|too\s+slow|latency|memory\s+usage|time\s+complexity)\b/i, weight: 2 },

  { category: 'review', pattern: /\breview\b/i, weight: 3 },
  { category: 'review', pattern: /\baudit\b/i, weight: 3 },
  { category: 'review', pattern: /\b(?:code\s+quality|best\s+practices|security\s+issues?|vulnerabilit(?:y|ies))\b/i, weight: 2 },

  { category: 'code_generation', pattern: /\b(?:write|create|implement|build|generate)\b/i, weight: 3 },
  { category: 'code_generation', pattern: /\b(?:unit\s+)?tests?\b/i, weight: 2 },
  { category: 'code_generation', pattern: /\b(?:function|class|component|endpoint|script|module)\b/i, weight: 1 },

  { category: 'general', pattern: /\bexplain\b/i, weight: 3 },
  { category: 'general', pattern: /\bwhat\s+(?:is|are|does)\b/i, weight: 3 },
  { category: 'general', pattern: /\b(?:difference\s+between|how\s+does)\b/i, weight: 2 },
];

/**
 * Order used to break ties between equally scored categories.
 */
export const CATEGORY_PRIORITY: readonly TaskCategory[] = [
  'debugging',
  'optimization',
  'review',
  'code_generation',
  'general',
];

// ============================================================================
// Heuristic Pass
// ============================================================================

export interface HeuristicResult {
  category: TaskCategory;
  confidence: number;
  scores: Record<TaskCategory, number>;
  /** No rule matched at all. */
  matched: boolean;
}

function emptyScores(): Record<TaskCategory, number> {
  return { code_generation: 0, debugging: 0, optimization: 0, review: 0, general: 0 };
}

/**
 * Scores the query against the keyword table. Each rule counts once.
 * Deterministic for a given query.
 */
export function classifyHeuristic(rawQuery: string): HeuristicResult {
  const scores = emptyScores();
  for (const rule of RULES) {
    if (rule.pattern.test(rawQuery)) {
      scores[rule.category] += rule.weight;
    }
  }

  const total = TASK_CATEGORIES.reduce((sum, category) => sum + scores[category], 0);
  if (total === 0) {
    return { category: 'code_generation', confidence: 0, scores, matched: false };
  }

  const category = CATEGORY_PRIORITY.reduce((best, candidate) =>
    scores[candidate] > scores[best] ? candidate : best
  );
  return { category, confidence: scores[category] / total, scores, matched: true };
}

// ============================================================================
// LLM Fallback
// ============================================================================

/**
 * Decides ambiguous queries. Advisory only: errors degrade the run to
 * `general` instead of failing it.
 */
export interface ClassificationFallback {
  classify(rawQuery: string, candidates: readonly TaskCategory[], signal?: AbortSignal): Promise<TaskCategory>;
}

export class LlmClassificationFallback implements ClassificationFallback {
  constructor(private readonly provider: StructuredProvider) {}

  async classify(rawQuery: string, candidates: readonly TaskCategory[], signal?: AbortSignal): Promise<TaskCategory> {
    const result = await this.provider.completeStructured(
      ClassificationSchema,
      getClassificationSystemPrompt(),
      buildClassificationPrompt(rawQuery, candidates),
      signal
    );
    return result.category;
  }
}

// ============================================================================
// Task Classifier
// ============================================================================

export interface TaskClassifierOptions {
  confidenceThreshold: number;
  fallback?: ClassificationFallback;
  logger?: RuntimeLogger;
}

export class TaskClassifier {
  private readonly confidenceThreshold: number;
  private readonly fallback?: ClassificationFallback;
  private readonly logger: RuntimeLogger;

  constructor(options: TaskClassifierOptions) {
    this.confidenceThreshold = options.confidenceThreshold;
    this.fallback = options.fallback;
    this.logger = options.logger ?? silentLogger;
  }

  async classify(rawQuery: string, signal?: AbortSignal): Promise<Classification> {
    const heuristic = classifyHeuristic(rawQuery);
    const { category, confidence, scores } = heuristic;

    if (!heuristic.matched) {
      return { category, method: 'default', confidence, scores };
    }
    if (confidence >= this.confidenceThreshold || !this.fallback) {
      return { category, method: 'heuristic', confidence, scores };
    }

    const candidates = CATEGORY_PRIORITY.filter(candidate => scores[candidate] > 0);
    try {
      const decided = await this.fallback.classify(rawQuery, candidates, signal);
      this.logger.debug('Ambiguous query classified by fallback', { category: decided, confidence });
      return { category: decided, method: 'llm', confidence, scores };
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn('ClassificationDegraded', {
        error: error instanceof Error ? error.message : String(error),
        confidence,
      });
      return { category: 'general', method: 'degraded', confidence, scores };
    }
  }
}
