import { Agent } from './agent/agent.js';
import { LlmClassificationFallback, TaskClassifier } from './agent/classifier.js';
import { Orchestrator } from './agent/orchestrator.js';
import type { PipelineConfig } from './agent/schemas.js';
import { LangChainProviderClient } from './model/llm.js';
import { ReferenceIndex } from './retrieval/reference-index.js';
import type { RetrievalClient } from './retrieval/types.js';
import { createDefaultRegistry } from './tools/index.js';
import type { ToolRegistry } from './tools/types.js';
import { ToolExecutor } from './agent/tool-executor.js';
import { loadPipelineConfig } from './utils/config.js';
import { getLogger, type RuntimeLogger } from './utils/logger.js';

export interface ServiceOptions {
  model: string;
  config?: PipelineConfig;
  /** Overrides the bundled reference index. */
  retrieval?: RetrievalClient;
  logger?: RuntimeLogger;
}

/**
 * The process-wide collaborators. Built once and shared by every run; none of
 * them holds per-run state.
 */
export interface Services {
  config: PipelineConfig;
  provider: LangChainProviderClient;
  registry: ToolRegistry;
  retrieval: RetrievalClient;
  orchestrator: Orchestrator;
}

export function createServices(options: ServiceOptions): Services {
  const logger = options.logger ?? getLogger();
  const config = options.config ?? loadPipelineConfig();

  const provider = new LangChainProviderClient({
    model: options.model,
    timeoutMs: config.providerTimeoutMs,
  });
  const registry = createDefaultRegistry();
  const retrieval = options.retrieval ?? ReferenceIndex.fromFile(undefined, logger);

  const classifier = new TaskClassifier({
    confidenceThreshold: config.classification.confidenceThreshold,
    fallback: config.classification.llmFallback ? new LlmClassificationFallback(provider) : undefined,
    logger: logger.child({ component: 'classifier' }),
  });

  const agent = new Agent({
    provider,
    toolExecutor: new ToolExecutor({
      registry,
      defaultTimeoutMs: config.toolTimeoutMs,
      logger: logger.child({ component: 'tools' }),
    }),
    registry,
    maxToolDepth: config.maxToolDepth,
    retry: config.retry,
    logger: logger.child({ component: 'agent' }),
  });

  const orchestrator = new Orchestrator({
    classifier,
    agent,
    config,
    retrieval,
    logger: logger.child({ component: 'orchestrator' }),
  });

  return { config, provider, registry, retrieval, orchestrator };
}
