import { ChatOpenAI } from '@langchain/openai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { AIMessage, BaseMessage } from '@langchain/core/messages';
import type { z } from 'zod';
import { ProviderError } from '../agent/errors.js';
import type { ToolDeclaration } from '../tools/types.js';
import { createTimeoutController, raceAbort } from '../utils/abort.js';
import type { ProviderClient, ProviderRequest, ProviderResponse, StructuredProvider } from './types.js';

export const DEFAULT_PROVIDER = 'openai';
export const DEFAULT_MODEL = 'gpt-4.1';

// Model provider configuration
interface ModelOpts {
  temperature: number;
  maxRetries: number;
}

export type ModelFactory = (name: string, opts: ModelOpts) => BaseChatModel;

function getApiKey(envVar: string): string {
  const apiKey = process.env[envVar];
  if (!apiKey) {
    throw new ProviderError('invalid_request', `${envVar} not found in environment variables`);
  }
  return apiKey;
}

const MODEL_PROVIDERS: Record<string, ModelFactory> = {
  'claude-': (name, opts) =>
    new ChatAnthropic({
      model: name,
      ...opts,
      apiKey: getApiKey('ANTHROPIC_API_KEY'),
    }),
  'gemini-': (name, opts) =>
    new ChatGoogleGenerativeAI({
      model: name,
      ...opts,
      apiKey: getApiKey('GOOGLE_API_KEY'),
    }),
};

const DEFAULT_MODEL_FACTORY: ModelFactory = (name, opts) =>
  new ChatOpenAI({
    model: name,
    ...opts,
    apiKey: getApiKey('OPENAI_API_KEY'),
  });

export function getChatModel(modelName: string = DEFAULT_MODEL, temperature = 0.7): BaseChatModel {
  // Retries are owned by the Agent's policy, not the SDK.
  const opts: ModelOpts = { temperature, maxRetries: 0 };
  const prefix = Object.keys(MODEL_PROVIDERS).find((p) => modelName.startsWith(p));
  const factory = prefix ? MODEL_PROVIDERS[prefix] : DEFAULT_MODEL_FACTORY;
  return factory(modelName, opts);
}

type ModelMessage = Pick<AIMessage, 'content' | 'tool_calls'>;

const promptTemplate = ChatPromptTemplate.fromMessages([
  ['system', '{system}'],
  ['user', '{prompt}'],
]);

// ============================================================================
// Provider Client
// ============================================================================

export interface LangChainProviderOptions {
  model?: string;
  /** Per-call timeout. */
  timeoutMs?: number;
  createModel?: (modelName: string, temperature: number) => BaseChatModel;
}

/**
 * ProviderClient backed by a LangChain chat model. The model is picked by
 * name prefix: `claude-` for Anthropic, `gemini-` for Google, anything else
 * for OpenAI.
 */
export class LangChainProviderClient implements ProviderClient, StructuredProvider {
  readonly model: string;
  private readonly timeoutMs: number;
  private readonly createModel: (modelName: string, temperature: number) => BaseChatModel;

  constructor(options: LangChainProviderOptions = {}) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.createModel = options.createModel ?? getChatModel;
  }

  async complete(request: ProviderRequest): Promise<ProviderResponse> {
    const messages = await promptTemplate.formatMessages({
      system: request.systemPrompt,
      prompt: request.prompt,
    });

    const message = await this.withTimeout(request.signal, signal =>
      this.invoke(messages, request.tools, request.temperature, signal)
    );
    return parseModelMessage(message);
  }

  /**
   * One structured-output call, validated against `schema`.
   */
  async completeStructured<T extends Record<string, unknown>>(
    schema: z.ZodType<T>,
    systemPrompt: string,
    prompt: string,
    signal?: AbortSignal
  ): Promise<T> {
    const messages = await promptTemplate.formatMessages({ system: systemPrompt, prompt });
    const result = await this.withTimeout(signal, callSignal =>
      this.createModel(this.model, 0).withStructuredOutput(schema).invoke(messages, { signal: callSignal })
    );
    return schema.parse(result);
  }

  private async invoke(
    messages: BaseMessage[],
    tools: readonly ToolDeclaration[],
    temperature: number,
    signal: AbortSignal
  ): Promise<ModelMessage> {
    const llm = this.createModel(this.model, temperature);
    if (tools.length > 0 && llm.bindTools) {
      return llm.bindTools(tools.map(declaration => declaration.tool)).invoke(messages, { signal });
    }
    return llm.invoke(messages, { signal });
  }

  private async withTimeout<T>(parent: AbortSignal | undefined, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeout = createTimeoutController(
      parent ?? new AbortController().signal,
      this.timeoutMs,
      () => new ProviderError('timeout', `Provider call exceeded ${this.timeoutMs}ms`)
    );
    try {
      return await raceAbort(fn(timeout.signal), timeout.signal);
    } catch (error) {
      // Either our own timeout or the caller's abort reason.
      if (timeout.signal.aborted) throw timeout.signal.reason;
      throw classifyProviderError(error);
    } finally {
      timeout.dispose();
    }
  }
}

// ============================================================================
// Response Parsing
// ============================================================================

/**
 * The first tool call wins; otherwise the text content is the final answer.
 */
export function parseModelMessage(message: ModelMessage): ProviderResponse {
  const [call] = message.tool_calls ?? [];
  if (call) {
    return { type: 'tool_request', toolName: call.name, arguments: { ...call.args } };
  }
  return { type: 'final', text: extractText(message.content) };
}

function extractText(content: AIMessage['content']): string {
  if (typeof content === 'string') return content;
  return content
    .map(part => {
      if (typeof part === 'string') return part;
      if ('text' in part && typeof part.text === 'string') return part.text;
      return '';
    })
    .join('');
}

// ============================================================================
// Error Classification
// ============================================================================

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function statusOf(error: unknown): number | undefined {
  const candidates = [
    readProperty(error, 'status'),
    readProperty(error, 'statusCode'),
    readProperty(readProperty(error, 'response'), 'status'),
  ];
  return candidates.find((value): value is number => typeof value === 'number');
}

/**
 * Maps an SDK or network error onto a ProviderError kind.
 */
export function classifyProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);
  const code = readProperty(error, 'code');
  const name = readProperty(error, 'name');

  let kind: ProviderError['kind'];
  if (status === 429 || /rate.?limit/i.test(message)) {
    kind = 'rate_limited';
  } else if (
    status === 408 ||
    name === 'TimeoutError' ||
    code === 'ETIMEDOUT' ||
    /timed?\s?out/i.test(message)
  ) {
    kind = 'timeout';
  } else if (status !== undefined && status >= 400 && status < 500) {
    kind = 'invalid_request';
  } else {
    kind = 'provider_unavailable';
  }

  return new ProviderError(kind, message, { cause: error });
}
