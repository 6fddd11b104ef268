import { afterEach, describe, expect, it, vi } from 'vitest';
import { ChatAnthropic } from '@langchain/anthropic';
import { AIMessage } from '@langchain/core/messages';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import { ProviderError, RunCancelledError } from '../agent/errors.js';
import { LangChainProviderClient, classifyProviderError, getChatModel, parseModelMessage } from '../model/llm.js';
import { getModelIdForProvider, listProviderChoices } from '../model/providers.js';

describe('classifyProviderError', () => {
  it.each([
    [Object.assign(new Error('Too many requests'), { status: 429 }), 'rate_limited'],
    [new Error('Rate limit reached for gpt-4.1'), 'rate_limited'],
    [new Error('Request timed out.'), 'timeout'],
    [Object.assign(new Error('socket hang up'), { code: 'ETIMEDOUT' }), 'timeout'],
    [Object.assign(new Error('Bad request'), { status: 400 }), 'invalid_request'],
    [{ response: { status: 401 }, message: 'Unauthorized' }, 'invalid_request'],
    [Object.assign(new Error('Service unavailable'), { status: 503 }), 'provider_unavailable'],
    [new Error('ECONNRESET'), 'provider_unavailable'],
  ])('classifies %s', (error, kind) => {
    expect(classifyProviderError(error).kind).toBe(kind);
  });

  it('keeps an existing ProviderError', () => {
    const error = new ProviderError('timeout', 'slow');

    expect(classifyProviderError(error)).toBe(error);
  });

  it('only retries kinds other than invalid_request', () => {
    expect(new ProviderError('invalid_request', 'x').retryable).toBe(false);
    expect(new ProviderError('rate_limited', 'x').retryable).toBe(true);
  });
});

describe('parseModelMessage', () => {
  it('prefers the first tool call', () => {
    const message = new AIMessage({
      content: 'thinking',
      tool_calls: [
        { name: 'read_file', args: { path: 'src/a.ts' }, id: 'call-1', type: 'tool_call' },
        { name: 'code_executor', args: { code: '1' }, id: 'call-2', type: 'tool_call' },
      ],
    });

    expect(parseModelMessage(message)).toEqual({
      type: 'tool_request',
      toolName: 'read_file',
      arguments: { path: 'src/a.ts' },
    });
  });

  it('joins text parts into the final answer', () => {
    const message = new AIMessage({
      content: [
        { type: 'text', text: 'Use ' },
        { type: 'text', text: 'Array.from' },
      ],
    });

    expect(parseModelMessage(message)).toEqual({ type: 'final', text: 'Use Array.from' });
  });
});

describe('LangChainProviderClient', () => {
  it('completes through the model built for the request', async () => {
    const created: Array<[string, number]> = [];
    const client = new LangChainProviderClient({
      model: 'test-model',
      createModel: (name, temperature) => {
        created.push([name, temperature]);
        return new FakeListChatModel({ responses: ['reversed'] });
      },
    });

    const response = await client.complete({ systemPrompt: 'system', prompt: 'reverse it', tools: [], temperature: 0.3 });

    expect(response).toEqual({ type: 'final', text: 'reversed' });
    expect(created).toEqual([['test-model', 0.3]]);
  });

  it('surfaces the caller abort reason', async () => {
    const controller = new AbortController();
    const reason = new RunCancelledError();
    controller.abort(reason);
    const client = new LangChainProviderClient({
      createModel: () => new FakeListChatModel({ responses: ['late'] }),
    });

    await expect(
      client.complete({ systemPrompt: 's', prompt: 'p', tools: [], temperature: 0, signal: controller.signal })
    ).rejects.toBe(reason);
  });
});

describe('getChatModel', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('picks the provider by model prefix', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

    expect(getChatModel('claude-sonnet-4-5')).toBeInstanceOf(ChatAnthropic);
  });

  it('reports a missing API key as an invalid request', () => {
    vi.stubEnv('OPENAI_API_KEY', '');

    expect(() => getChatModel('gpt-4.1')).toThrow(
      new ProviderError('invalid_request', 'OPENAI_API_KEY not found in environment variables')
    );
  });
});

describe('listProviderChoices', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('marks the current provider and the keys that are missing', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    vi.stubEnv('GOOGLE_API_KEY', 'your-google-api-key');

    expect(listProviderChoices('anthropic')).toEqual([
      {
        providerId: 'openai',
        modelId: 'gpt-4.1',
        description: 'strong coding and tool use',
        displayName: 'OpenAI',
        current: false,
      },
      {
        providerId: 'anthropic',
        modelId: 'claude-sonnet-4-5',
        description: 'long multi-step coding tasks',
        displayName: 'Anthropic',
        current: true,
        missingKey: 'ANTHROPIC_API_KEY',
      },
      {
        providerId: 'google',
        modelId: 'gemini-2.5-pro',
        description: 'large context window',
        displayName: 'Google',
        current: false,
        missingKey: 'GOOGLE_API_KEY',
      },
    ]);
  });

  it('maps a provider to its model', () => {
    expect(getModelIdForProvider('google')).toBe('gemini-2.5-pro');
    expect(getModelIdForProvider('mistral')).toBeUndefined();
  });
});
