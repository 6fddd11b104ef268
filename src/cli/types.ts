import type { PipelineRunResult } from '../agent/state.js';

/**
 * Application state for the CLI
 */
export type AppState = 'idle' | 'running' | 'model_select';

/**
 * Panels the slash commands can open below the input.
 */
export type InfoPanel = 'agents' | 'tools' | 'trace' | null;

/**
 * A finished query, kept in the scrollback.
 */
export interface CompletedTurn {
  id: string;
  query: string;
  result: PipelineRunResult;
}

/**
 * Generate a unique ID for turns
 */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}
