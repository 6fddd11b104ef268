import { DynamicStructuredTool } from '@langchain/core/tools';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { Agent, backoffDelay, promptDigest } from '../agent/agent.js';
import { ProviderError, RunCancelledError } from '../agent/errors.js';
import { buildAgentPrompt } from '../agent/prompts.js';
import { ToolExecutor } from '../agent/tool-executor.js';
import { createCodeExecutorTool } from '../tools/code/index.js';
import { declareTool, ToolRegistry, type ToolDeclaration } from '../tools/types.js';
import { ContextAggregator } from '../utils/context.js';
import { countWords } from '../utils/tokens.js';
import { FAST_RETRY, ScriptedProvider, final, toolRequest, type RoleScript } from './helpers.js';
import type { AgentRole } from '../agent/state.js';

// Stands in for read_file, which every role but the optimizer may call.
const fakeReadFile = declareTool(
  new DynamicStructuredTool({
    name: 'read_file',
    description: 'Return a canned file body',
    schema: z.object({ path: z.string() }),
    func: async ({ path }) => ({ path, content: 'const x = 1;' }),
  }),
  { resultSchema: z.object({ path: z.string(), content: z.string() }) }
);

const context = new ContextAggregator({ tokenBudget: 1000, summaryMaxChars: 100, estimateTokens: countWords })
  .createContext('reverse a string');

function createAgent(
  scripts: Partial<Record<AgentRole, RoleScript>>,
  maxToolDepth = 5,
  tools: ToolDeclaration[] = [fakeReadFile]
) {
  const provider = new ScriptedProvider(scripts);
  const registry = new ToolRegistry(tools);
  const agent = new Agent({
    provider,
    toolExecutor: new ToolExecutor({ registry, defaultTimeoutMs: 1000 }),
    registry,
    maxToolDepth,
    retry: FAST_RETRY,
  });
  return { agent, provider };
}

describe('Agent', () => {
  it('returns the final answer with the step metadata', async () => {
    const { agent } = createAgent({ coder: () => final('const r = 1;') });

    const step = await agent.run('coder', context, { stageIndex: 1, temperature: 0.2 });

    expect(step).toMatchObject({
      agentRole: 'coder',
      stageIndex: 1,
      outputText: 'const r = 1;',
      toolCalls: [],
      status: 'ok',
      inputPromptDigest: promptDigest(buildAgentPrompt(context, 'coder')),
    });
    expect(step.error).toBeUndefined();
  });

  it('folds a tool result back into the prompt', async () => {
    const { agent, provider } = createAgent({
      planner: (_request, call) => (call === 0 ? toolRequest('read_file', { path: 'a.ts' }) : final('done')),
    });

    const step = await agent.run('planner', context, { stageIndex: 0, temperature: 0.2 });

    expect(step.toolCalls).toHaveLength(1);
    expect(step.toolCalls[0]).toMatchObject({
      toolName: 'read_file',
      arguments: { path: 'a.ts' },
      result: { path: 'a.ts', content: 'const x = 1;' },
    });
    expect(provider.requests[1].request.prompt.endsWith(
      '## Tool call: read_file\n\nArguments: {"path":"a.ts"}\n\nObservation:\n{\n  "path": "a.ts",\n  "content": "const x = 1;"\n}'
    )).toBe(true);
  });

  it('hands tool errors to the model as observations', async () => {
    const { agent, provider } = createAgent({
      planner: (_request, call) => (call === 0 ? toolRequest('nope', {}) : final('recovered')),
    });

    const step = await agent.run('planner', context, { stageIndex: 0, temperature: 0.2 });

    expect(step.status).toBe('ok');
    expect(step.toolCalls[0]).toMatchObject({
      error: { kind: 'unknown_tool', message: 'Tool not available to the planner: nope' },
    });
    expect(provider.requests[1].request.prompt.endsWith(
      'Observation:\nError (unknown_tool): Tool not available to the planner: nope'
    )).toBe(true);
  });

  it('does not run a registered tool the role was not given', async () => {
    const { agent, provider } = createAgent(
      { reviewer: (_request, call) => (call === 0 ? toolRequest('code_executor', { code: "console.log('ran')" }) : final('ok')) },
      5,
      [fakeReadFile, createCodeExecutorTool()]
    );
    const outcomes: string[] = [];

    const step = await agent.run('reviewer', context, {
      stageIndex: 0,
      temperature: 0.2,
      callbacks: { onToolCall: (_role, record) => outcomes.push('result' in record ? 'ran' : 'refused') },
    });

    expect(provider.requests[0].request.tools.map(tool => tool.name)).toEqual(['read_file']);
    expect(step.toolCalls).toEqual([
      {
        toolName: 'code_executor',
        arguments: { code: "console.log('ran')" },
        error: { kind: 'unknown_tool', message: 'Tool not available to the reviewer: code_executor' },
        durationMs: 0,
      },
    ]);
    expect(outcomes).toEqual(['refused']);
    expect(step.status).toBe('ok');
  });

  it('fails once the tool-call depth is used up', async () => {
    const { agent, provider } = createAgent({ debugger: () => toolRequest('read_file', { path: 'a.ts' }) }, 2);

    const step = await agent.run('debugger', context, { stageIndex: 0, temperature: 0.2 });

    expect(step.status).toBe('failed');
    expect(step.error).toEqual({ kind: 'depth_exceeded', message: 'Tool call depth of 2 exceeded (requested read_file)' });
    expect(step.toolCalls).toHaveLength(2);
    expect(provider.callCount('debugger')).toBe(3);
  });

  it('does not retry an invalid request', async () => {
    const { agent, provider } = createAgent({
      reviewer: () => {
        throw new ProviderError('invalid_request', 'bad prompt');
      },
    });

    const step = await agent.run('reviewer', context, { stageIndex: 0, temperature: 0.2 });

    expect(step.error).toEqual({ kind: 'invalid_request', message: 'bad prompt' });
    expect(provider.callCount('reviewer')).toBe(1);
  });

  it('retries unknown failures as provider outages', async () => {
    const { agent, provider } = createAgent({
      reviewer: () => {
        throw new Error('boom');
      },
    });

    const step = await agent.run('reviewer', context, { stageIndex: 0, temperature: 0.2 });

    expect(step.error).toEqual({ kind: 'retries_exhausted', message: 'Provider failed after 3 attempts: boom' });
    expect(provider.callCount('reviewer')).toBe(3);
  });

  it('skips the step when the signal is already aborted', async () => {
    const { agent, provider } = createAgent({});
    const controller = new AbortController();
    controller.abort(new RunCancelledError());

    const step = await agent.run('coder', context, { stageIndex: 0, temperature: 0.2, signal: controller.signal });

    expect(step.status).toBe('skipped');
    expect(step.error).toEqual({ kind: 'cancelled', message: 'Run cancelled by caller' });
    expect(provider.callCount('coder')).toBe(0);
  });

  it('caps the coder temperature and offers only the role tools that are registered', async () => {
    const { agent, provider } = createAgent({});

    await agent.run('coder', context, { stageIndex: 0, temperature: 0.9 });
    await agent.run('optimizer', context, { stageIndex: 0, temperature: 0.9 });

    expect(provider.requests.map(entry => entry.request.temperature)).toEqual([0.3, 0.9]);
    expect(provider.requests.map(entry => entry.request.tools.map(tool => tool.name))).toEqual([['read_file'], []]);
  });

  it('reports prompts and tool calls through the callbacks', async () => {
    const { agent } = createAgent({
      debugger: (_request, call) => (call === 0 ? toolRequest('read_file', { path: 'a.ts' }) : final('ok')),
    });
    const prompts: string[] = [];
    const tools: string[] = [];

    await agent.run('debugger', context, {
      stageIndex: 0,
      temperature: 0.2,
      callbacks: {
        onPromptBuilt: (_role, prompt) => prompts.push(prompt),
        onToolCall: (role, record) => tools.push(`${role}:${record.toolName}`),
      },
    });

    expect(prompts).toEqual([buildAgentPrompt(context, 'debugger')]);
    expect(tools).toEqual(['debugger:read_file']);
  });
});

describe('backoffDelay', () => {
  const policy = { maxAttempts: 3, initialDelayMs: 500, backoffMultiplier: 2, maxDelayMs: 8000 };

  it('grows exponentially up to the cap', () => {
    expect([0, 1, 2, 5].map(attempt => backoffDelay(policy, attempt))).toEqual([500, 1000, 2000, 8000]);
  });
});

describe('promptDigest', () => {
  it('is the first 12 hex characters of the md5 digest', () => {
    expect(promptDigest('abc')).toBe('900150983cd2');
  });
});
