import { isToolCallError } from './state.js';
import type {
  AgentRole,
  AgentStepResult,
  PipelinePlan,
  PipelineRunResult,
  ToolCallRecord,
} from './state.js';

// ============================================================================
// Response Composition
// ============================================================================

export const RESPONSE_HEADINGS: Record<AgentRole, string> = {
  planner: 'Plan',
  coder: 'Implementation',
  reviewer: 'Review',
  debugger: 'Debugging Analysis',
  optimizer: 'Optimization',
};

/**
 * Builds the final response from the successful steps of the trace, or
 * returns null when no step succeeded.
 */
export function composeResponse(plan: PipelinePlan, trace: readonly AgentStepResult[]): string | null {
  const okSteps = trace.filter(step => step.status === 'ok');
  if (okSteps.length === 0) return null;

  if (plan.responseMode === 'last_output') {
    return okSteps[okSteps.length - 1].outputText;
  }

  return okSteps
    .map(step => `## ${RESPONSE_HEADINGS[step.agentRole]}\n\n${step.outputText.trim()}`)
    .join('\n\n');
}

// ============================================================================
// Wire Payload
// ============================================================================

export interface ToolCallPayload {
  tool_name: string;
  arguments: Record<string, unknown>;
  result?: unknown;
  error?: { kind: string; message: string };
  duration_ms: number;
}

export interface AgentStepPayload {
  agent_role: AgentRole;
  stage_index: number;
  input_prompt_digest: string;
  output_text: string;
  tool_calls: ToolCallPayload[];
  started_at: string;
  duration_ms: number;
  status: AgentStepResult['status'];
  error?: { kind: string; message: string };
}

export interface RunResultPayload {
  status: PipelineRunResult['status'];
  category: string | null;
  classification_method: string | null;
  response: string;
  agent_trace: AgentStepPayload[];
  sources: Array<{ source_id: string; score: number; text: string }>;
  /** Seconds. */
  execution_time: number;
  failure?: { reason: string; message: string; role?: AgentRole };
}

function serializeToolCall(record: ToolCallRecord): ToolCallPayload {
  const base = {
    tool_name: record.toolName,
    arguments: record.arguments,
    duration_ms: record.durationMs,
  };
  return isToolCallError(record)
    ? { ...base, error: { kind: record.error.kind, message: record.error.message } }
    : { ...base, result: record.result };
}

export function serializeStep(step: AgentStepResult): AgentStepPayload {
  return {
    agent_role: step.agentRole,
    stage_index: step.stageIndex,
    input_prompt_digest: step.inputPromptDigest,
    output_text: step.outputText,
    tool_calls: step.toolCalls.map(serializeToolCall),
    started_at: step.startedAt,
    duration_ms: step.durationMs,
    status: step.status,
    ...(step.error ? { error: { ...step.error } } : {}),
  };
}

/**
 * The snake_case payload returned to API clients and printed by the
 * headless CLI.
 */
export function serializeRunResult(result: PipelineRunResult): RunResultPayload {
  return {
    status: result.status,
    category: result.task?.category ?? null,
    classification_method: result.classification?.method ?? null,
    response: result.response,
    agent_trace: result.agentTrace.map(serializeStep),
    sources: result.sources.map(snippet => ({
      source_id: snippet.sourceId,
      score: snippet.score,
      text: snippet.text,
    })),
    execution_time: result.executionTimeMs / 1000,
    ...(result.failure ? { failure: { ...result.failure } } : {}),
  };
}
