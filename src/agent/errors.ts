import type { StepErrorKind } from './state.js';

// ============================================================================
// Provider Errors
// ============================================================================

export type ProviderErrorKind =
  | 'rate_limited'
  | 'timeout'
  | 'invalid_request'
  | 'provider_unavailable';

/**
 * Raised by a ProviderClient. Every provider failure is mapped onto one of
 * four kinds so the Agent can decide whether to retry.
 */
export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;

  constructor(kind: ProviderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderError';
    this.kind = kind;
  }

  get retryable(): boolean {
    return this.kind !== 'invalid_request';
  }
}

// ============================================================================
// Context Errors
// ============================================================================

/**
 * The query and the most recent agent output alone exceed the token budget.
 */
export class ContextOverflowError extends Error {
  readonly tokenCount: number;
  readonly tokenBudget: number;

  constructor(tokenCount: number, tokenBudget: number) {
    super(`Context needs ${tokenCount} tokens after eviction but the budget is ${tokenBudget}`);
    this.name = 'ContextOverflowError';
    this.tokenCount = tokenCount;
    this.tokenBudget = tokenBudget;
  }
}

// ============================================================================
// State Machine Errors
// ============================================================================

export class IllegalTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal run state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

// ============================================================================
// Abort Reasons
// ============================================================================

// These are passed to AbortController.abort() so that whoever observes the
// signal can tell why the work was stopped.

export class RunDeadlineError extends Error {
  constructor(deadlineMs: number) {
    super(`Run deadline of ${deadlineMs}ms exceeded`);
    this.name = 'RunDeadlineError';
  }
}

export class StageTimeoutError extends Error {
  readonly stageIndex: number;

  constructor(stageIndex: number, timeoutMs: number) {
    super(`Stage ${stageIndex} exceeded its ${timeoutMs}ms timeout`);
    this.name = 'StageTimeoutError';
    this.stageIndex = stageIndex;
  }
}

export class RunCancelledError extends Error {
  constructor(message = 'Run cancelled by caller') {
    super(message);
    this.name = 'RunCancelledError';
  }
}

/**
 * Maps the reason a signal was aborted with onto the step error kind.
 */
export function abortKind(reason: unknown): Extract<StepErrorKind, 'cancelled' | 'stage_timeout' | 'deadline_exceeded'> {
  if (reason instanceof RunDeadlineError) return 'deadline_exceeded';
  if (reason instanceof StageTimeoutError) return 'stage_timeout';
  return 'cancelled';
}

export function abortMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return 'Operation aborted';
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
