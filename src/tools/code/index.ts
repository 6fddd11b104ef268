export { createCodeExecutorTool } from './code-executor.js';
export { VmCodeSandbox } from './sandbox.js';
export type { CodeSandbox, CodeExecutionResult } from './sandbox.js';
