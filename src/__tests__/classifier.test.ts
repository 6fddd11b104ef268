import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import {
  LlmClassificationFallback,
  TaskClassifier,
  classifyHeuristic,
  type ClassificationFallback,
} from '../agent/classifier.js';
import { RunCancelledError } from '../agent/errors.js';
import type { StructuredProvider } from '../model/types.js';

describe('classifyHeuristic', () => {
  it('scores a code generation request', () => {
    const result = classifyHeuristic('Create a function to reverse a string');

    expect(result.category).toBe('code_generation');
    expect(result.confidence).toBe(1);
    expect(result.scores.code_generation).toBe(4);
  });

  it('scores a debugging question above the component keyword', () => {
    const result = classifyHeuristic("Why isn't my component re-rendering?");

    expect(result.category).toBe('debugging');
    expect(result.confidence).toBe(0.75);
    expect(result.scores).toEqual({ code_generation: 1, debugging: 3, optimization: 0, review: 0, general: 0 });
  });

  it('recognizes optimization and review requests', () => {
    expect(classifyHeuristic('Optimize this loop').category).toBe('optimization');
    expect(classifyHeuristic('Please review my pull request').category).toBe('review');
  });

  it('breaks ties by category priority', () => {
    // debug (3) and optimize (3)
    const result = classifyHeuristic('debug and optimize');

    expect(result.category).toBe('debugging');
    expect(result.confidence).toBe(0.5);
  });

  it('defaults to code generation when nothing matches', () => {
    expect(classifyHeuristic('hello there')).toMatchObject({ category: 'code_generation', confidence: 0, matched: false });
  });

  it('returns the same result for the same query', () => {
    const query = 'Fix the error in my tests';
    expect(classifyHeuristic(query)).toEqual(classifyHeuristic(query));
  });
});

describe('TaskClassifier', () => {
  it('does not consult the fallback when the heuristic is confident', async () => {
    const fallback = { classify: vi.fn<ClassificationFallback['classify']>() };
    const classifier = new TaskClassifier({ confidenceThreshold: 0.6, fallback });

    const result = await classifier.classify('Create a function to reverse a string');

    expect(result.method).toBe('heuristic');
    expect(fallback.classify).not.toHaveBeenCalled();
  });

  it('asks the fallback about ambiguous queries', async () => {
    const fallback = { classify: vi.fn<ClassificationFallback['classify']>().mockResolvedValue('optimization') };
    const classifier = new TaskClassifier({ confidenceThreshold: 0.6, fallback });

    const result = await classifier.classify('debug and optimize');

    expect(result).toMatchObject({ category: 'optimization', method: 'llm', confidence: 0.5 });
    expect(fallback.classify).toHaveBeenCalledWith('debug and optimize', ['debugging', 'optimization'], undefined);
  });

  it('degrades to general when the fallback fails', async () => {
    const fallback = { classify: vi.fn<ClassificationFallback['classify']>().mockRejectedValue(new Error('provider down')) };
    const classifier = new TaskClassifier({ confidenceThreshold: 0.6, fallback });

    const result = await classifier.classify('debug and optimize');

    expect(result).toMatchObject({ category: 'general', method: 'degraded' });
  });

  it('rethrows when the run was aborted during the fallback', async () => {
    const controller = new AbortController();
    const reason = new RunCancelledError();
    const fallback: ClassificationFallback = {
      classify: async () => {
        controller.abort(reason);
        throw reason;
      },
    };
    const classifier = new TaskClassifier({ confidenceThreshold: 0.6, fallback });

    await expect(classifier.classify('debug and optimize', controller.signal)).rejects.toBe(reason);
  });

  it('keeps the heuristic answer when there is no fallback', async () => {
    const classifier = new TaskClassifier({ confidenceThreshold: 0.6 });

    const result = await classifier.classify('debug and optimize');

    expect(result).toMatchObject({ category: 'debugging', method: 'heuristic' });
  });

  it('marks unmatched queries as defaulted', async () => {
    const classifier = new TaskClassifier({ confidenceThreshold: 0.6 });

    expect((await classifier.classify('hello there')).method).toBe('default');
  });
});

describe('LlmClassificationFallback', () => {
  it('returns the category from the structured output', async () => {
    const prompts: string[] = [];
    const provider: StructuredProvider = {
      completeStructured: async <T extends Record<string, unknown>>(
        schema: z.ZodType<T>,
        _system: string,
        prompt: string
      ): Promise<T> => {
        prompts.push(prompt);
        return schema.parse({ category: 'review', reasoning: 'asks for an assessment' });
      },
    };

    const category = await new LlmClassificationFallback(provider).classify('look at this', ['review', 'general']);

    expect(category).toBe('review');
    expect(prompts).toEqual(['Request:\nlook at this\n\nKeyword analysis found signals for: review, general.']);
  });
});
