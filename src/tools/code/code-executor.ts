import { DynamicStructuredTool } from '@langchain/core/tools';
import { z } from 'zod';
import { declareTool, type ToolDeclaration } from '../types.js';
import { VmCodeSandbox, type CodeSandbox } from './sandbox.js';

const CODE_TIMEOUT_MS = 10_000;

const CodeExecutorInputSchema = z.object({
  code: z.string().min(1).describe('JavaScript source to run. Use console.log to produce output.'),
});

const CodeExecutionResultSchema = z.object({
  success: z.boolean(),
  stdout: z.string(),
  stderr: z.string(),
  error: z.string().nullable(),
  executionTimeMs: z.number(),
});

export function createCodeExecutorTool(sandbox: CodeSandbox = new VmCodeSandbox()): ToolDeclaration {
  const tool = new DynamicStructuredTool({
    name: 'code_executor',
    description:
      'Run a JavaScript snippet in an isolated sandbox and return its console output. Errors are reported in the result rather than thrown.',
    schema: CodeExecutorInputSchema,
    func: (input, _runManager, config) =>
      sandbox.execute(input.code, { timeoutMs: CODE_TIMEOUT_MS, signal: config?.signal }),
  });
  return declareTool(tool, { resultSchema: CodeExecutionResultSchema, timeoutMs: CODE_TIMEOUT_MS });
}
