import { DynamicStructuredTool } from '@langchain/core/tools';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { RunCancelledError } from '../agent/errors.js';
import { ToolExecutor } from '../agent/tool-executor.js';
import { declareTool, ToolRegistry } from '../tools/types.js';

const echoTool = declareTool(
  new DynamicStructuredTool({
    name: 'echo',
    description: 'Echo the text back',
    schema: z.object({ text: z.string(), times: z.number().int().default(1) }),
    func: async ({ text, times }) => ({ echoed: text.repeat(times) }),
  }),
  { resultSchema: z.object({ echoed: z.string() }) }
);

function neverSettles(): Promise<unknown> {
  return new Promise(() => undefined);
}

function emptyTool(name: string, func: () => Promise<unknown>) {
  return new DynamicStructuredTool({ name, description: name, schema: z.object({}), func });
}

const slowTool = declareTool(emptyTool('slow', neverSettles), { resultSchema: z.unknown(), timeoutMs: 20 });

const slowDefaultTool = declareTool(emptyTool('slow_default', neverSettles), { resultSchema: z.unknown() });

const failingTool = declareTool(
  emptyTool('failing', async () => {
    throw new Error('disk full');
  }),
  { resultSchema: z.unknown() }
);

const lyingTool = declareTool(
  emptyTool('liar', async () => ({ n: 'not a number' })),
  { resultSchema: z.object({ n: z.number() }) }
);

const executor = new ToolExecutor({
  registry: new ToolRegistry([echoTool, slowTool, slowDefaultTool, failingTool, lyingTool]),
  defaultTimeoutMs: 30,
});

describe('ToolExecutor', () => {
  it('returns the validated result with schema defaults applied', async () => {
    const outcome = await executor.invoke('echo', { text: 'ab', times: 2 });

    expect(outcome).toMatchObject({ ok: true, result: { echoed: 'abab' } });
    expect(await executor.invoke('echo', { text: 'ab' })).toMatchObject({ ok: true, result: { echoed: 'ab' } });
  });

  it('rejects unknown tools', async () => {
    expect(await executor.invoke('missing', {})).toMatchObject({
      ok: false,
      error: { kind: 'unknown_tool', message: 'Unknown tool: missing' },
    });
  });

  it('rejects arguments that fail the schema without invoking the tool', async () => {
    expect(await executor.invoke('echo', { text: 5 })).toMatchObject({
      ok: false,
      error: { kind: 'invalid_arguments', message: 'Invalid arguments for echo: text: Expected string, received number' },
    });
  });

  it('times out with the tool timeout', async () => {
    expect(await executor.invoke('slow', {})).toMatchObject({
      ok: false,
      error: { kind: 'timeout', message: 'Tool slow timed out after 20ms' },
    });
  });

  it('falls back to the default timeout', async () => {
    expect(await executor.invoke('slow_default', {})).toMatchObject({
      ok: false,
      error: { kind: 'timeout', message: 'Tool slow_default timed out after 30ms' },
    });
  });

  it('reports a cancelled call when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new RunCancelledError());

    expect(await executor.invoke('echo', { text: 'x' }, controller.signal)).toMatchObject({
      ok: false,
      error: { kind: 'cancelled', message: 'Tool echo cancelled before it started' },
    });
  });

  it('stops waiting when the caller aborts mid-call', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(new RunCancelledError()), 5);

    expect(await executor.invoke('slow', {}, controller.signal)).toMatchObject({
      ok: false,
      error: { kind: 'cancelled', message: 'Tool slow cancelled' },
    });
  });

  it('reports a thrown error as an execution failure', async () => {
    expect(await executor.invoke('failing', {})).toMatchObject({
      ok: false,
      error: { kind: 'execution_failed', message: 'disk full' },
    });
  });

  it('reports a result that does not match its schema', async () => {
    expect(await executor.invoke('liar', {})).toMatchObject({
      ok: false,
      error: { kind: 'execution_failed', message: 'Tool liar returned a result that does not match its schema' },
    });
  });
});

describe('ToolRegistry', () => {
  it('refuses duplicate names', () => {
    const registry = new ToolRegistry([echoTool]);

    expect(() => registry.register(echoTool)).toThrow('Tool already registered: echo');
  });

  it('skips unregistered names when listing declarations', () => {
    const registry = new ToolRegistry([echoTool]);

    expect(registry.declarationsFor(['web_search', 'echo']).map(tool => tool.name)).toEqual(['echo']);
  });
});

describe('declareTool', () => {
  it('takes the name, description and argument schema from the LangChain tool', () => {
    expect(echoTool.name).toBe('echo');
    expect(echoTool.description).toBe('Echo the text back');
    expect(Object.keys(echoTool.argumentSchema.shape)).toEqual(['text', 'times']);
    expect(echoTool.timeoutMs).toBeUndefined();
  });
});
