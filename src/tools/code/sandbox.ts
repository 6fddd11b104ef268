import { format } from 'util';
import { runInNewContext } from 'vm';
import { raceAbort } from '../../utils/abort.js';

export interface CodeExecutionResult {
  success: boolean;
  stdout: string;
  stderr: string;
  error: string | null;
  executionTimeMs: number;
}

export interface CodeSandbox {
  execute(code: string, options: { timeoutMs: number; signal?: AbortSignal }): Promise<CodeExecutionResult>;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Runs JavaScript in a fresh `vm` context with a captured console and no
 * access to `require`, `process` or the module system. This isolates globals,
 * it is not a security boundary against hostile code.
 */
export class VmCodeSandbox implements CodeSandbox {
  async execute(code: string, options: { timeoutMs: number; signal?: AbortSignal }): Promise<CodeExecutionResult> {
    const startTime = Date.now();
    const stdout: string[] = [];
    const stderr: string[] = [];

    const sandboxConsole = {
      log: (...args: unknown[]) => stdout.push(format(...args)),
      info: (...args: unknown[]) => stdout.push(format(...args)),
      debug: (...args: unknown[]) => stdout.push(format(...args)),
      warn: (...args: unknown[]) => stderr.push(format(...args)),
      error: (...args: unknown[]) => stderr.push(format(...args)),
    };

    const done = (error: string | null): CodeExecutionResult => ({
      success: error === null,
      stdout: stdout.join('\n'),
      stderr: stderr.join('\n'),
      error,
      executionTimeMs: Date.now() - startTime,
    });

    try {
      const value: unknown = runInNewContext(code, { console: sandboxConsole }, {
        timeout: options.timeoutMs,
        filename: 'sandbox.js',
      });
      if (isPromiseLike(value)) {
        const settled = Promise.resolve(value);
        await (options.signal ? raceAbort(settled, options.signal) : settled);
      }
      return done(null);
    } catch (error) {
      if (options.signal?.aborted) throw options.signal.reason;
      return done(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
    }
  }
}
