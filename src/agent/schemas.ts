import { z } from 'zod';
import { AGENT_ROLES, TASK_CATEGORIES, type TaskCategory, type TaskRequest } from './state.js';

// ============================================================================
// Inbound Request Schema
// ============================================================================

/**
 * Schema for an inbound task request. Keys follow the wire format.
 */
export const TaskRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty')
    .describe('The natural-language coding request'),
  use_rag: z.boolean().default(true)
    .describe('Whether to enrich the context with retrieved reference material'),
  temperature: z.number().min(0).max(2).default(0.7)
    .describe('Sampling temperature for agent calls'),
});

export type TaskRequestInput = z.input<typeof TaskRequestSchema>;

export function parseTaskRequest(input: unknown): TaskRequest {
  const parsed = TaskRequestSchema.parse(input);
  return {
    message: parsed.message,
    useRag: parsed.use_rag,
    temperature: parsed.temperature,
  };
}

// ============================================================================
// Classification Schema
// ============================================================================

/**
 * Structured output of the LLM classification fallback.
 */
export const ClassificationSchema = z.object({
  category: z.enum(TASK_CATEGORIES)
    .describe('The single category that best describes the request'),
  reasoning: z.string()
    .describe('One short sentence explaining the choice'),
});

export type ClassificationOutput = z.infer<typeof ClassificationSchema>;

// ============================================================================
// Pipeline Configuration Schema
// ============================================================================

const RoleSchema = z.enum(AGENT_ROLES);

/**
 * A stage is either one role or an array of at least two distinct roles run
 * concurrently.
 */
const StageConfigSchema = z.union([
  RoleSchema,
  z.array(RoleSchema).min(2).refine(
    roles => new Set(roles).size === roles.length,
    'parallel stage roles must be distinct'
  ),
]);

export type StageConfig = z.infer<typeof StageConfigSchema>;

const PlanConfigSchema = z.object({
  stages: z.array(StageConfigSchema).min(1),
  responseMode: z.enum(['last_output', 'combined']),
});

export type PlanConfig = z.infer<typeof PlanConfigSchema>;

export const DEFAULT_PLAN_CONFIG: Record<TaskCategory, PlanConfig> = {
  code_generation: { stages: ['planner', 'coder', 'reviewer'], responseMode: 'combined' },
  debugging: { stages: ['debugger', 'reviewer'], responseMode: 'combined' },
  optimization: { stages: ['planner', 'optimizer', 'reviewer'], responseMode: 'combined' },
  review: { stages: ['reviewer'], responseMode: 'last_output' },
  general: { stages: ['coder'], responseMode: 'last_output' },
};

const PlansSchema = z.object({
  code_generation: PlanConfigSchema.default(DEFAULT_PLAN_CONFIG.code_generation),
  debugging: PlanConfigSchema.default(DEFAULT_PLAN_CONFIG.debugging),
  optimization: PlanConfigSchema.default(DEFAULT_PLAN_CONFIG.optimization),
  review: PlanConfigSchema.default(DEFAULT_PLAN_CONFIG.review),
  general: PlanConfigSchema.default(DEFAULT_PLAN_CONFIG.general),
});

const RetrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  initialDelayMs: z.number().int().min(0).default(500),
  backoffMultiplier: z.number().min(1).default(2),
  maxDelayMs: z.number().int().min(0).default(8000),
});

const ClassificationConfigSchema = z.object({
  confidenceThreshold: z.number().min(0).max(1).default(0.6),
  llmFallback: z.boolean().default(true),
});

/**
 * Every pipeline parameter, all defaulted. Parsing `{}` yields the defaults.
 */
export const PipelineConfigSchema = z.object({
  tokenBudget: z.number().int().positive().default(6000),
  summaryMaxChars: z.number().int().min(16).default(200),
  maxToolDepth: z.number().int().min(0).default(5),
  retry: RetrySchema.default({}),
  providerTimeoutMs: z.number().int().positive().default(60_000),
  toolTimeoutMs: z.number().int().positive().default(15_000),
  stageTimeoutMs: z.number().int().positive().default(120_000),
  runDeadlineMs: z.number().int().positive().default(300_000),
  retrievalTopK: z.number().int().min(1).default(5),
  classification: ClassificationConfigSchema.default({}),
  plans: PlansSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type RetryPolicy = PipelineConfig['retry'];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = PipelineConfigSchema.parse({});
