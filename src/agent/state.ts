import type { ToolError } from '../tools/types.js';

// ============================================================================
// Task Types
// ============================================================================

/**
 * Closed set of task categories. The category selects the pipeline plan.
 */
export const TASK_CATEGORIES = [
  'code_generation',
  'debugging',
  'optimization',
  'review',
  'general',
] as const;

export type TaskCategory = (typeof TASK_CATEGORIES)[number];

/**
 * A classified request. Immutable once created.
 */
export interface Task {
  readonly id: string;
  readonly rawQuery: string;
  readonly category: TaskCategory;
  readonly createdAt: string;
}

/**
 * How the category was decided.
 * - heuristic: a single category cleared the confidence threshold
 * - default: no pattern matched at all
 * - llm: heuristics were ambiguous and the LLM fallback decided
 * - degraded: the LLM fallback failed, so the run falls back to `general`
 */
export type ClassificationMethod = 'heuristic' | 'default' | 'llm' | 'degraded';

export interface Classification {
  category: TaskCategory;
  method: ClassificationMethod;
  confidence: number;
  scores: Record<TaskCategory, number>;
}

// ============================================================================
// Agent Roles
// ============================================================================

export const AGENT_ROLES = ['planner', 'coder', 'reviewer', 'debugger', 'optimizer'] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

// ============================================================================
// Pipeline Plan Types
// ============================================================================

export type PipelineStage =
  | { kind: 'single'; role: AgentRole }
  | { kind: 'parallel'; roles: AgentRole[] };

/**
 * last_output: the response is the last successful step's output.
 * combined: the response stitches every successful step under a role heading.
 */
export type ResponseMode = 'last_output' | 'combined';

export interface PipelinePlan {
  readonly category: TaskCategory;
  readonly stages: readonly PipelineStage[];
  readonly responseMode: ResponseMode;
}

// ============================================================================
// Retrieval Types
// ============================================================================

export interface RetrievedSnippet {
  readonly sourceId: string;
  readonly score: number;
  readonly text: string;
}

// ============================================================================
// Step Types
// ============================================================================

export type StepStatus = 'ok' | 'failed' | 'skipped';

export type StepErrorKind =
  | 'invalid_request'
  | 'retries_exhausted'
  | 'depth_exceeded'
  | 'cancelled'
  | 'stage_timeout'
  | 'deadline_exceeded';

export interface StepError {
  kind: StepErrorKind;
  message: string;
}

/**
 * One tool invocation made during an agent step.
 */
export type ToolCallRecord =
  | {
      toolName: string;
      arguments: Record<string, unknown>;
      result: unknown;
      durationMs: number;
    }
  | {
      toolName: string;
      arguments: Record<string, unknown>;
      error: ToolError;
      durationMs: number;
    };

export interface AgentStepResult {
  agentRole: AgentRole;
  stageIndex: number;
  inputPromptDigest: string;
  outputText: string;
  toolCalls: ToolCallRecord[];
  startedAt: string;
  durationMs: number;
  status: StepStatus;
  error?: StepError;
}

// ============================================================================
// Run Types
// ============================================================================

export type RunState =
  | 'PENDING'
  | 'CLASSIFIED'
  | 'RETRIEVED'
  | 'EXECUTING'
  | 'AGGREGATED'
  | 'COMPLETED'
  | 'FAILED';

export type RunStatus = 'COMPLETED' | 'FAILED';

export type FailureReason =
  | 'critical_step_failed'
  | 'deadline_exceeded'
  | 'cancelled'
  | 'context_overflow'
  | 'no_output'
  | 'internal_error';

export interface RunFailure {
  reason: FailureReason;
  message: string;
  role?: AgentRole;
}

/**
 * Inbound request after validation.
 */
export interface TaskRequest {
  message: string;
  useRag: boolean;
  temperature: number;
}

export interface PipelineRunResult {
  task: Task | null;
  classification: Classification | null;
  plan: PipelinePlan | null;
  status: RunStatus;
  response: string;
  agentTrace: AgentStepResult[];
  sources: RetrievedSnippet[];
  stateHistory: RunState[];
  executionTimeMs: number;
  failure?: RunFailure;
}

export function isToolCallError(
  record: ToolCallRecord
): record is Extract<ToolCallRecord, { error: ToolError }> {
  return 'error' in record;
}
