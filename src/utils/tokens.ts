import { getEncoding, type Tiktoken } from 'js-tiktoken';

/**
 * Estimates the number of tokens a piece of text costs in a prompt.
 */
export type TokenEstimator = (text: string) => number;

let encoder: Tiktoken | null = null;

export const estimateTokens: TokenEstimator = text => {
  if (!text) return 0;
  if (!encoder) {
    encoder = getEncoding('cl100k_base');
  }
  return encoder.encode(text).length;
};

/**
 * Cheap whitespace estimator. Useful where exact counts do not matter.
 */
export const countWords: TokenEstimator = text => {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
};
