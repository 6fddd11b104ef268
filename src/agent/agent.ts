import { createHash } from 'crypto';
import type { ProviderClient, ProviderRequest, ProviderResponse } from '../model/types.js';
import type { ToolRegistry } from '../tools/types.js';
import type { ExecutionContext } from '../utils/context.js';
import { sleep } from '../utils/abort.js';
import { silentLogger, type RuntimeLogger } from '../utils/logger.js';
import { ProviderError, abortKind, abortMessage, toError } from './errors.js';
import { appendToolObservation, buildAgentPrompt } from './prompts.js';
import { ROLE_DEFINITIONS, roleTemperature } from './roles.js';
import type { RetryPolicy } from './schemas.js';
import type { AgentRole, AgentStepResult, StepError, StepStatus, ToolCallRecord } from './state.js';
import type { ToolExecutor, ToolInvocationResult } from './tool-executor.js';

// ============================================================================
// Agent Options
// ============================================================================

export interface AgentOptions {
  provider: ProviderClient;
  toolExecutor: ToolExecutor;
  registry: ToolRegistry;
  maxToolDepth: number;
  retry: RetryPolicy;
  logger?: RuntimeLogger;
}

/**
 * Hooks for observing a single step while it runs.
 */
export interface AgentStepCallbacks {
  onPromptBuilt?: (role: AgentRole, prompt: string) => void;
  onToolCall?: (role: AgentRole, record: ToolCallRecord) => void;
}

export interface AgentRunOptions {
  stageIndex: number;
  /** Requested temperature; the role may cap it. */
  temperature: number;
  signal?: AbortSignal;
  callbacks?: AgentStepCallbacks;
}

/**
 * Carries a step error out of the retry loop.
 */
class StepFailure extends Error {
  readonly stepError: StepError;

  constructor(stepError: StepError) {
    super(stepError.message);
    this.name = 'StepFailure';
    this.stepError = stepError;
  }
}

export function promptDigest(prompt: string): string {
  return createHash('md5').update(prompt).digest('hex').slice(0, 12);
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * policy.backoffMultiplier ** attempt, policy.maxDelayMs);
}

// ============================================================================
// Agent Implementation
// ============================================================================

/**
 * Runs one role against the execution context.
 *
 * The step is a bounded loop: ask the model, run the tool it asks for, fold
 * the observation into the prompt and ask again, until it answers or the
 * tool-call depth is used up. Every provider call goes through the retry
 * policy. The returned step never throws; failures are reported in its
 * `status` and `error`.
 */
export class Agent {
  private readonly provider: ProviderClient;
  private readonly toolExecutor: ToolExecutor;
  private readonly registry: ToolRegistry;
  private readonly maxToolDepth: number;
  private readonly retry: RetryPolicy;
  private readonly logger: RuntimeLogger;

  constructor(options: AgentOptions) {
    this.provider = options.provider;
    this.toolExecutor = options.toolExecutor;
    this.registry = options.registry;
    this.maxToolDepth = options.maxToolDepth;
    this.retry = options.retry;
    this.logger = options.logger ?? silentLogger;
  }

  async run(role: AgentRole, context: ExecutionContext, options: AgentRunOptions): Promise<AgentStepResult> {
    const { signal, callbacks = {} } = options;
    const definition = ROLE_DEFINITIONS[role];
    const logger = this.logger.child({ role, stageIndex: options.stageIndex });

    const startedAt = new Date().toISOString();
    const startTime = Date.now();
    const initialPrompt = buildAgentPrompt(context, role);
    const toolCalls: ToolCallRecord[] = [];

    const finish = (status: StepStatus, outputText: string, error?: StepError): AgentStepResult => ({
      agentRole: role,
      stageIndex: options.stageIndex,
      inputPromptDigest: promptDigest(initialPrompt),
      outputText,
      toolCalls,
      startedAt,
      durationMs: Date.now() - startTime,
      status,
      ...(error ? { error } : {}),
    });

    if (signal?.aborted) {
      logger.debug('Step skipped, signal already aborted');
      return finish('skipped', '', { kind: abortKind(signal.reason), message: abortMessage(signal) });
    }

    callbacks.onPromptBuilt?.(role, initialPrompt);

    const tools = this.registry.declarationsFor(definition.tools);
    const temperature = roleTemperature(role, options.temperature);
    let prompt = initialPrompt;

    while (true) {
      let response: ProviderResponse;
      try {
        response = await this.completeWithRetry(
          { systemPrompt: definition.systemPrompt, prompt, tools, temperature },
          logger,
          signal
        );
      } catch (error) {
        const stepError = this.toStepError(error, signal);
        logger.warn('Step failed', { kind: stepError.kind, message: stepError.message });
        return finish('failed', '', stepError);
      }

      if (response.type === 'final') {
        logger.debug('Step completed', { toolCalls: toolCalls.length });
        return finish('ok', response.text);
      }

      if (toolCalls.length >= this.maxToolDepth) {
        const message = `Tool call depth of ${this.maxToolDepth} exceeded (requested ${response.toolName})`;
        logger.warn('Step failed', { kind: 'depth_exceeded', message });
        return finish('failed', '', { kind: 'depth_exceeded', message });
      }

      const requested = response.toolName;
      const offered = tools.some(tool => tool.name === requested);
      if (!offered) {
        logger.warn('Model asked for a tool the role was not given', { toolName: response.toolName });
      }
      const outcome: ToolInvocationResult = offered
        ? await this.toolExecutor.invoke(response.toolName, response.arguments, signal)
        : {
            ok: false,
            error: { kind: 'unknown_tool', message: `Tool not available to the ${role}: ${response.toolName}` },
            durationMs: 0,
          };
      const record: ToolCallRecord = outcome.ok
        ? { toolName: response.toolName, arguments: response.arguments, result: outcome.result, durationMs: outcome.durationMs }
        : { toolName: response.toolName, arguments: response.arguments, error: outcome.error, durationMs: outcome.durationMs };
      toolCalls.push(record);
      callbacks.onToolCall?.(role, record);

      if (signal?.aborted) {
        return finish('failed', '', { kind: abortKind(signal.reason), message: abortMessage(signal) });
      }

      const observation = outcome.ok
        ? formatResult(outcome.result)
        : `Error (${outcome.error.kind}): ${outcome.error.message}`;
      prompt = appendToolObservation(prompt, response.toolName, response.arguments, observation);
    }
  }

  private async completeWithRetry(
    request: Omit<ProviderRequest, 'signal'>,
    logger: RuntimeLogger,
    signal?: AbortSignal
  ): Promise<ProviderResponse> {
    let lastError: ProviderError | undefined;

    for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
      if (signal?.aborted) throw signal.reason;

      try {
        return await this.provider.complete({ ...request, signal });
      } catch (error) {
        if (signal?.aborted) throw error;

        const providerError = error instanceof ProviderError
          ? error
          : new ProviderError('provider_unavailable', toError(error).message, { cause: error });

        if (!providerError.retryable) {
          throw new StepFailure({ kind: 'invalid_request', message: providerError.message });
        }

        lastError = providerError;
        if (attempt < this.retry.maxAttempts - 1) {
          const delayMs = backoffDelay(this.retry, attempt);
          logger.warn('Provider call failed, retrying', {
            kind: providerError.kind,
            attempt: attempt + 1,
            delayMs,
          });
          await sleep(delayMs, signal);
        }
      }
    }

    throw new StepFailure({
      kind: 'retries_exhausted',
      message: `Provider failed after ${this.retry.maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
    });
  }

  private toStepError(error: unknown, signal?: AbortSignal): StepError {
    if (error instanceof StepFailure) return error.stepError;
    if (signal?.aborted) {
      return { kind: abortKind(signal.reason), message: abortMessage(signal) };
    }
    return { kind: 'retries_exhausted', message: toError(error).message };
  }
}

function formatResult(result: unknown): string {
  if (typeof result === 'string') return result;
  return JSON.stringify(result, null, 2);
}
