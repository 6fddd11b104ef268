// ============================================================================
// Agent pipeline - classification, staged agents, tools and retrieval
// ============================================================================

// Orchestrator
export { Orchestrator, RunStateMachine } from './orchestrator.js';
export type { OrchestratorOptions, PipelineCallbacks, RunOptions } from './orchestrator.js';

// Agent
export { Agent, backoffDelay, promptDigest } from './agent.js';
export type { AgentOptions, AgentRunOptions, AgentStepCallbacks } from './agent.js';
export { ROLE_DEFINITIONS, listRoles, roleTemperature } from './roles.js';
export type { RoleDefinition } from './roles.js';

// Classification
export { TaskClassifier, LlmClassificationFallback, classifyHeuristic } from './classifier.js';
export type { ClassificationFallback, TaskClassifierOptions } from './classifier.js';

// Tools
export { ToolExecutor } from './tool-executor.js';
export type { ToolExecutorOptions, ToolInvocationResult } from './tool-executor.js';

// Plans and responses
export { buildPlans, isCriticalRole, describePlan } from './plans.js';
export { composeResponse, serializeRunResult } from './response.js';
export type { RunResultPayload } from './response.js';

// Errors
export {
  ProviderError,
  ContextOverflowError,
  IllegalTransitionError,
  RunCancelledError,
  RunDeadlineError,
  StageTimeoutError,
} from './errors.js';

// Schemas
export {
  TaskRequestSchema,
  PipelineConfigSchema,
  ClassificationSchema,
  DEFAULT_PIPELINE_CONFIG,
  parseTaskRequest,
} from './schemas.js';
export type { PipelineConfig, PipelineConfigInput, RetryPolicy } from './schemas.js';

// State types
export { AGENT_ROLES, TASK_CATEGORIES } from './state.js';
export type {
  AgentRole,
  AgentStepResult,
  Classification,
  PipelinePlan,
  PipelineRunResult,
  PipelineStage,
  RetrievedSnippet,
  RunState,
  Task,
  TaskCategory,
  TaskRequest,
  ToolCallRecord,
} from './state.js';

// Collaborators
export { createServices } from '../services.js';
export type { Services, ServiceOptions } from '../services.js';
export { LangChainProviderClient } from '../model/llm.js';
export type { ProviderClient, ProviderRequest, ProviderResponse } from '../model/types.js';
export { ReferenceIndex } from '../retrieval/reference-index.js';
export { VectorStoreRetrievalClient } from '../retrieval/vector-store.js';
export type { RetrievalClient } from '../retrieval/types.js';
export { ContextAggregator } from '../utils/context.js';
export type { ExecutionContext } from '../utils/context.js';
