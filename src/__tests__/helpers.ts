import { Agent } from '../agent/agent.js';
import { TaskClassifier, type ClassificationFallback } from '../agent/classifier.js';
import { Orchestrator } from '../agent/orchestrator.js';
import { ROLE_DEFINITIONS } from '../agent/roles.js';
import { PipelineConfigSchema, type PipelineConfig, type PipelineConfigInput } from '../agent/schemas.js';
import type { AgentRole, RetrievedSnippet } from '../agent/state.js';
import { ToolExecutor } from '../agent/tool-executor.js';
import type { ProviderClient, ProviderRequest, ProviderResponse } from '../model/types.js';
import type { RetrievalClient } from '../retrieval/types.js';
import { ToolRegistry, type ToolDeclaration } from '../tools/types.js';
import { AGENT_ROLES } from '../agent/state.js';
import { countWords } from '../utils/tokens.js';

export type RoleScript = (request: ProviderRequest, call: number) => ProviderResponse | Promise<ProviderResponse>;

export function final(text: string): ProviderResponse {
  return { type: 'final', text };
}

export function toolRequest(toolName: string, args: Record<string, unknown>): ProviderResponse {
  return { type: 'tool_request', toolName, arguments: args };
}

/**
 * Never settles until the request's signal aborts, then rejects with its reason.
 */
export function hang(request: ProviderRequest): Promise<ProviderResponse> {
  return new Promise((_resolve, reject) => {
    const { signal } = request;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export function roleForSystemPrompt(systemPrompt: string): AgentRole {
  const role = AGENT_ROLES.find(candidate => ROLE_DEFINITIONS[candidate].systemPrompt === systemPrompt);
  if (!role) {
    throw new Error('Request does not carry a known role system prompt');
  }
  return role;
}

/**
 * Provider stand-in that answers per role. Roles without a script answer
 * with `<role> output`.
 */
export class ScriptedProvider implements ProviderClient {
  readonly requests: Array<{ role: AgentRole; request: ProviderRequest }> = [];
  private readonly calls = new Map<AgentRole, number>();

  constructor(private readonly scripts: Partial<Record<AgentRole, RoleScript>> = {}) {}

  callCount(role: AgentRole): number {
    return this.calls.get(role) ?? 0;
  }

  async complete(request: ProviderRequest): Promise<ProviderResponse> {
    const role = roleForSystemPrompt(request.systemPrompt);
    const call = this.callCount(role);
    this.calls.set(role, call + 1);
    this.requests.push({ role, request });

    const script = this.scripts[role];
    return script ? script(request, call) : final(`${role} output`);
  }
}

export class StaticRetrieval implements RetrievalClient {
  readonly name = 'static';
  queries: string[] = [];

  constructor(private readonly snippets: RetrievedSnippet[]) {}

  async retrieve(query: string, k: number): Promise<RetrievedSnippet[]> {
    this.queries.push(query);
    return this.snippets.slice(0, k);
  }
}

export const FAST_RETRY = { maxAttempts: 3, initialDelayMs: 1, backoffMultiplier: 2, maxDelayMs: 10 };

export function testConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  return PipelineConfigSchema.parse({ retry: FAST_RETRY, ...overrides });
}

export interface HarnessOptions {
  scripts?: Partial<Record<AgentRole, RoleScript>>;
  config?: PipelineConfigInput;
  retrieval?: RetrievalClient;
  tools?: ToolDeclaration[];
  fallback?: ClassificationFallback;
}

/**
 * An orchestrator wired to in-process stand-ins. Token counts are whitespace
 * word counts so budgets are easy to reason about.
 */
export function createHarness(options: HarnessOptions = {}) {
  const config = testConfig(options.config);
  const provider = new ScriptedProvider(options.scripts);
  const registry = new ToolRegistry(options.tools ?? []);
  const agent = new Agent({
    provider,
    toolExecutor: new ToolExecutor({ registry, defaultTimeoutMs: config.toolTimeoutMs }),
    registry,
    maxToolDepth: config.maxToolDepth,
    retry: config.retry,
  });
  const classifier = new TaskClassifier({
    confidenceThreshold: config.classification.confidenceThreshold,
    fallback: options.fallback,
  });
  const orchestrator = new Orchestrator({
    classifier,
    agent,
    config,
    retrieval: options.retrieval,
    estimateTokens: countWords,
  });
  return { config, provider, registry, orchestrator };
}
