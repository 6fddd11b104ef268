import { randomUUID } from 'crypto';
import type { RetrievalClient } from '../retrieval/types.js';
import { createTimeoutController, raceAbort } from '../utils/abort.js';
import { ContextAggregator, type ExecutionContext } from '../utils/context.js';
import { silentLogger, type RuntimeLogger } from '../utils/logger.js';
import type { TokenEstimator } from '../utils/tokens.js';
import { promptDigest, type Agent, type AgentStepCallbacks } from './agent.js';
import type { TaskClassifier } from './classifier.js';
import {
  ContextOverflowError,
  IllegalTransitionError,
  RunDeadlineError,
  StageTimeoutError,
  abortKind,
  abortMessage,
  toError,
} from './errors.js';
import { buildPlans, describePlan, isCriticalRole, stageRoles } from './plans.js';
import { buildAgentPrompt, getRoleTitle } from './prompts.js';
import { composeResponse } from './response.js';
import type { PipelineConfig } from './schemas.js';
import type {
  AgentRole,
  AgentStepResult,
  Classification,
  FailureReason,
  PipelinePlan,
  PipelineRunResult,
  PipelineStage,
  RetrievedSnippet,
  RunFailure,
  RunState,
  RunStatus,
  Task,
  TaskCategory,
  TaskRequest,
  ToolCallRecord,
} from './state.js';

// ============================================================================
// Run State Machine
// ============================================================================

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  PENDING: ['CLASSIFIED', 'FAILED'],
  CLASSIFIED: ['RETRIEVED', 'FAILED'],
  RETRIEVED: ['EXECUTING', 'FAILED'],
  EXECUTING: ['AGGREGATED', 'FAILED'],
  AGGREGATED: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
};

export class RunStateMachine {
  private current: RunState = 'PENDING';
  private readonly history: RunState[] = ['PENDING'];

  constructor(private readonly onChange?: (state: RunState, previous: RunState) => void) {}

  get state(): RunState {
    return this.current;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(to: RunState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    const previous = this.current;
    this.current = to;
    this.history.push(to);
    this.onChange?.(to, previous);
  }

  getHistory(): RunState[] {
    return [...this.history];
  }
}

// ============================================================================
// Callbacks Interface
// ============================================================================

/**
 * Callbacks for observing a pipeline run.
 */
export interface PipelineCallbacks extends AgentStepCallbacks {
  onStateChange?: (state: RunState, previous: RunState) => void;
  onClassified?: (task: Task, classification: Classification, plan: PipelinePlan) => void;
  onRetrieved?: (snippets: RetrievedSnippet[]) => void;
  onStageStart?: (stageIndex: number, roles: AgentRole[]) => void;
  onStepStart?: (role: AgentRole, stageIndex: number) => void;
  onStepComplete?: (step: AgentStepResult) => void;
}

// ============================================================================
// Orchestrator Options
// ============================================================================

export interface OrchestratorOptions {
  classifier: TaskClassifier;
  agent: Agent;
  config: PipelineConfig;
  retrieval?: RetrievalClient;
  estimateTokens?: TokenEstimator;
  logger?: RuntimeLogger;
}

export interface RunOptions {
  /** Cancels the run when aborted. */
  signal?: AbortSignal;
  callbacks?: PipelineCallbacks;
}

/**
 * Per-role bookkeeping for a running stage, so that a role the orchestrator
 * stops waiting on still shows up in the trace with its tool calls.
 */
interface RoleTracker {
  role: AgentRole;
  digest: string;
  startedAt: string;
  startTime: number;
  toolCalls: ToolCallRecord[];
  result?: AgentStepResult;
}

// ============================================================================
// Orchestrator Implementation
// ============================================================================

/**
 * Drives one request through the pipeline:
 *
 * 1. Classify: pick the task category and its plan
 * 2. Retrieve: fetch reference snippets into the context (when enabled)
 * 3. Execute: run the plan's stages in order, roles of a parallel stage
 *    concurrently on the same context snapshot
 * 4. Aggregate: compose the response from the successful steps
 *
 * `run` never throws. Every outcome, including deadline expiry and
 * cancellation, is reported as a PipelineRunResult with the trace so far.
 */
export class Orchestrator {
  private readonly classifier: TaskClassifier;
  private readonly agent: Agent;
  private readonly config: PipelineConfig;
  private readonly retrieval?: RetrievalClient;
  private readonly aggregator: ContextAggregator;
  private readonly plans: Record<TaskCategory, PipelinePlan>;
  private readonly logger: RuntimeLogger;

  constructor(options: OrchestratorOptions) {
    this.classifier = options.classifier;
    this.agent = options.agent;
    this.config = options.config;
    this.retrieval = options.retrieval;
    this.logger = options.logger ?? silentLogger;
    this.plans = buildPlans(options.config.plans);
    this.aggregator = new ContextAggregator({
      tokenBudget: options.config.tokenBudget,
      summaryMaxChars: options.config.summaryMaxChars,
      estimateTokens: options.estimateTokens,
      logger: this.logger,
    });
  }

  getPlan(category: TaskCategory): PipelinePlan {
    return this.plans[category];
  }

  async run(request: TaskRequest, options: RunOptions = {}): Promise<PipelineRunResult> {
    const callbacks = options.callbacks ?? {};
    const startTime = Date.now();
    const machine = new RunStateMachine(callbacks.onStateChange);
    const deadline = createTimeoutController(
      options.signal ?? new AbortController().signal,
      this.config.runDeadlineMs,
      () => new RunDeadlineError(this.config.runDeadlineMs)
    );
    const signal = deadline.signal;

    let logger = this.logger;
    let task: Task | null = null;
    let classification: Classification | null = null;
    let plan: PipelinePlan | null = null;
    let sources: RetrievedSnippet[] = [];
    const trace: AgentStepResult[] = [];

    const finish = (status: RunStatus, response: string, failure?: RunFailure): PipelineRunResult => {
      const result: PipelineRunResult = {
        task,
        classification,
        plan,
        status,
        response,
        agentTrace: trace,
        sources,
        stateHistory: machine.getHistory(),
        executionTimeMs: Date.now() - startTime,
        ...(failure ? { failure } : {}),
      };
      logger.info('Run finished', {
        status,
        failure: failure?.reason,
        steps: trace.length,
        executionTimeMs: result.executionTimeMs,
      });
      return result;
    };

    const fail = (reason: FailureReason, message: string, role?: AgentRole): PipelineRunResult => {
      if (!machine.isTerminal) {
        machine.transition('FAILED');
      }
      return finish('FAILED', '', role ? { reason, message, role } : { reason, message });
    };

    try {
      // ======================================================================
      // Classify
      // ======================================================================
      classification = await raceAbort(this.classifier.classify(request.message, signal), signal);
      task = Object.freeze({
        id: randomUUID(),
        rawQuery: request.message,
        category: classification.category,
        createdAt: new Date().toISOString(),
      });
      const activePlan = this.plans[task.category];
      plan = activePlan;
      logger = this.logger.child({ taskId: task.id });
      logger.info('Task classified', {
        category: classification.category,
        method: classification.method,
        confidence: classification.confidence,
        plan: describePlan(activePlan),
      });
      machine.transition('CLASSIFIED');
      callbacks.onClassified?.(task, classification, activePlan);

      // ======================================================================
      // Retrieve
      // ======================================================================
      let context = this.aggregator.createContext(request.message);
      if (request.useRag && this.retrieval) {
        sources = await this.retrieve(request.message, signal, logger);
        context = this.aggregator.append(context, { kind: 'snippets', snippets: sources });
        callbacks.onRetrieved?.(sources);
      }
      machine.transition('RETRIEVED');

      // ======================================================================
      // Execute
      // ======================================================================
      machine.transition('EXECUTING');

      for (let stageIndex = 0; stageIndex < activePlan.stages.length; stageIndex++) {
        if (signal.aborted) throw signal.reason;

        const steps = await this.runStage(activePlan.stages[stageIndex], stageIndex, context, request, signal, callbacks, logger);
        const firstIndex = trace.length;
        trace.push(...steps);

        if (signal.aborted) throw signal.reason;

        steps.forEach((step, offset) => {
          context = this.aggregator.append(context, { kind: 'step', step, stepIndex: firstIndex + offset });
        });

        const criticalFailure = steps.find(step => step.status !== 'ok' && isCriticalRole(activePlan, step.agentRole));
        if (criticalFailure) {
          const detail = criticalFailure.error?.message ?? criticalFailure.status;
          return fail(
            'critical_step_failed',
            `${getRoleTitle(criticalFailure.agentRole)} step failed: ${detail}`,
            criticalFailure.agentRole
          );
        }
      }

      // ======================================================================
      // Aggregate
      // ======================================================================
      machine.transition('AGGREGATED');
      const response = composeResponse(activePlan, trace);
      if (response === null) {
        return fail('no_output', 'No agent step produced output');
      }

      machine.transition('COMPLETED');
      return finish('COMPLETED', response);
    } catch (error) {
      if (error instanceof ContextOverflowError) {
        return fail('context_overflow', error.message);
      }
      if (signal.aborted) {
        const kind = abortKind(signal.reason);
        return fail(kind === 'deadline_exceeded' ? 'deadline_exceeded' : 'cancelled', abortMessage(signal));
      }
      logger.error('Run failed unexpectedly', toError(error));
      return fail('internal_error', toError(error).message);
    } finally {
      deadline.dispose();
    }
  }

  private async retrieve(query: string, signal: AbortSignal, logger: RuntimeLogger): Promise<RetrievedSnippet[]> {
    if (!this.retrieval) return [];
    try {
      const snippets = await raceAbort(this.retrieval.retrieve(query, this.config.retrievalTopK, signal), signal);
      logger.debug('Retrieved reference snippets', { count: snippets.length, store: this.retrieval.name });
      return snippets;
    } catch (error) {
      if (signal.aborted) throw signal.reason;
      logger.warn('RetrievalUnavailable', {
        store: this.retrieval.name,
        error: toError(error).message,
      });
      return [];
    }
  }

  /**
   * Runs every role of a stage on the same context snapshot and returns
   * their steps ordered by role name. If the stage is aborted before all
   * roles finish, unfinished roles are reported as failed steps.
   */
  private async runStage(
    stage: PipelineStage,
    stageIndex: number,
    context: ExecutionContext,
    request: TaskRequest,
    runSignal: AbortSignal,
    callbacks: PipelineCallbacks,
    logger: RuntimeLogger
  ): Promise<AgentStepResult[]> {
    const roles = stageRoles(stage);
    const stageTimeout = createTimeoutController(
      runSignal,
      this.config.stageTimeoutMs,
      () => new StageTimeoutError(stageIndex, this.config.stageTimeoutMs)
    );
    const signal = stageTimeout.signal;

    logger.info('Stage started', { stageIndex, roles });
    callbacks.onStageStart?.(stageIndex, roles);

    let joined = false;
    const trackers = roles.map((role): RoleTracker => ({
      role,
      digest: promptDigest(buildAgentPrompt(context, role)),
      startedAt: new Date().toISOString(),
      startTime: Date.now(),
      toolCalls: [],
    }));

    const runRole = async (tracker: RoleTracker): Promise<AgentStepResult> => {
      callbacks.onStepStart?.(tracker.role, stageIndex);
      const step = await this.agent.run(tracker.role, context, {
        stageIndex,
        temperature: request.temperature,
        signal,
        callbacks: {
          onPromptBuilt: callbacks.onPromptBuilt,
          onToolCall: (role, record) => {
            tracker.toolCalls.push(record);
            callbacks.onToolCall?.(role, record);
          },
        },
      });
      if (!joined) {
        tracker.result = step;
        callbacks.onStepComplete?.(step);
      }
      return step;
    };

    let steps: AgentStepResult[];
    try {
      steps = await raceAbort(Promise.all(trackers.map(runRole)), signal);
    } catch (error) {
      // Agent.run reports its own failures, so anything but an abort is a callback fault.
      if (!signal.aborted) throw error;
      steps = trackers.map(tracker => {
        if (tracker.result) return tracker.result;
        const step = incompleteStep(tracker, stageIndex, signal);
        callbacks.onStepComplete?.(step);
        return step;
      });
    } finally {
      joined = true;
      stageTimeout.dispose();
    }

    if (signal.aborted && !runSignal.aborted) {
      logger.warn('Stage timed out', { stageIndex, timeoutMs: this.config.stageTimeoutMs });
    }

    return [...steps].sort(byRoleName);
  }
}

function incompleteStep(tracker: RoleTracker, stageIndex: number, signal: AbortSignal): AgentStepResult {
  return {
    agentRole: tracker.role,
    stageIndex,
    inputPromptDigest: tracker.digest,
    outputText: '',
    toolCalls: [...tracker.toolCalls],
    startedAt: tracker.startedAt,
    durationMs: Date.now() - tracker.startTime,
    status: 'failed',
    error: { kind: abortKind(signal.reason), message: abortMessage(signal) },
  };
}

function byRoleName(a: AgentStepResult, b: AgentStepResult): number {
  if (a.agentRole === b.agentRole) return 0;
  return a.agentRole < b.agentRole ? -1 : 1;
}
