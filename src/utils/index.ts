export { loadConfig, saveConfig, getSetting, setSetting, loadPipelineConfig } from './config.js';
export {
  getApiKeyNameForProvider,
  getProviderDisplayName,
  checkApiKeyExists,
  checkApiKeyExistsForProvider,
} from './env.js';
export { ContextAggregator } from './context.js';
export type { ExecutionContext, ContextEntry, EvictionRecord } from './context.js';
export { createLogger, getLogger, configureLogger, silentLogger } from './logger.js';
export type { RuntimeLogger } from './logger.js';
export { estimateTokens, countWords } from './tokens.js';
