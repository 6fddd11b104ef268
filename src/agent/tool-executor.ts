import type { ToolError, ToolRegistry } from '../tools/types.js';
import { createTimeoutController, raceAbort } from '../utils/abort.js';
import { silentLogger, type RuntimeLogger } from '../utils/logger.js';

// ============================================================================
// Tool Executor Options
// ============================================================================

export interface ToolExecutorOptions {
  registry: ToolRegistry;
  /** Applies to tools that declare no timeout of their own. */
  defaultTimeoutMs: number;
  logger?: RuntimeLogger;
}

export type ToolInvocationResult =
  | { ok: true; result: unknown; durationMs: number }
  | { ok: false; error: ToolError; durationMs: number };

class ToolTimeout extends Error {
  constructor(toolName: string, timeoutMs: number) {
    super(`Tool ${toolName} timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeout';
  }
}

// ============================================================================
// Tool Executor Implementation
// ============================================================================

/**
 * Validates and dispatches tool calls. Never throws: every failure comes back
 * as a ToolError so the agent can hand it to the model as an observation.
 */
export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly defaultTimeoutMs: number;
  private readonly logger: RuntimeLogger;

  constructor(options: ToolExecutorOptions) {
    this.registry = options.registry;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  async invoke(
    toolName: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<ToolInvocationResult> {
    const startTime = Date.now();
    const fail = (kind: ToolError['kind'], message: string): ToolInvocationResult => {
      this.logger.warn('Tool call failed', { toolName, kind, message });
      return { ok: false, error: { kind, message }, durationMs: Date.now() - startTime };
    };

    const declaration = this.registry.get(toolName);
    if (!declaration) {
      return fail('unknown_tool', `Unknown tool: ${toolName}`);
    }

    const parsedArgs = declaration.argumentSchema.safeParse(args);
    if (!parsedArgs.success) {
      const details = parsedArgs.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return fail('invalid_arguments', `Invalid arguments for ${toolName}: ${details}`);
    }

    const parent = signal ?? new AbortController().signal;
    if (parent.aborted) {
      return fail('cancelled', `Tool ${toolName} cancelled before it started`);
    }

    const timeoutMs = declaration.timeoutMs ?? this.defaultTimeoutMs;
    const timeout = createTimeoutController(parent, timeoutMs, () => new ToolTimeout(toolName, timeoutMs));

    try {
      const pending = declaration.tool.invoke(parsedArgs.data, { signal: timeout.signal });
      const result = await raceAbort(pending, timeout.signal);
      const checked = declaration.resultSchema.safeParse(result);
      if (!checked.success) {
        return fail('execution_failed', `Tool ${toolName} returned a result that does not match its schema`);
      }
      this.logger.debug('Tool call completed', { toolName, durationMs: Date.now() - startTime });
      return { ok: true, result: checked.data, durationMs: Date.now() - startTime };
    } catch (error) {
      if (timeout.signal.aborted) {
        return timeout.signal.reason instanceof ToolTimeout
          ? fail('timeout', timeout.signal.reason.message)
          : fail('cancelled', `Tool ${toolName} cancelled`);
      }
      const message = error instanceof Error ? error.message : String(error);
      return fail('execution_failed', message);
    } finally {
      timeout.dispose();
    }
  }
}
