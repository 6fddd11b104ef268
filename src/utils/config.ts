import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import {
  DEFAULT_PIPELINE_CONFIG,
  PipelineConfigSchema,
  type PipelineConfig,
} from '../agent/schemas.js';
import { getLogger } from './logger.js';

export const SETTINGS_FILE = '.codesmith/settings.json';

/** Contents of the settings file: `provider`, `model` and `pipeline` overrides. */
type Config = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadConfig(file: string = SETTINGS_FILE): Config {
  if (!existsSync(file)) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    if (!isRecord(parsed)) {
      getLogger().warn('Settings file is not a JSON object, ignoring it', { file });
      return {};
    }
    return parsed;
  } catch (error) {
    getLogger().warn('Settings file could not be read, ignoring it', {
      file,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

export function saveConfig(config: Config, file: string = SETTINGS_FILE): boolean {
  try {
    const dir = dirname(file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(file, JSON.stringify(config, null, 2));
    return true;
  } catch (error) {
    getLogger().error('Failed to save settings', error instanceof Error ? error : { file });
    return false;
  }
}

export function getSetting<T>(key: string, defaultValue: T, isValue: (value: unknown) => value is T): T {
  const value = loadConfig()[key];
  return isValue(value) ? value : defaultValue;
}

export function setSetting(key: string, value: unknown): boolean {
  const config = loadConfig();
  config[key] = value;
  return saveConfig(config);
}

/**
 * Reads the `pipeline` overrides from the settings file and merges them over
 * the defaults. Invalid overrides are reported and the defaults are used.
 */
export function loadPipelineConfig(file: string = SETTINGS_FILE): PipelineConfig {
  const overrides = loadConfig(file).pipeline;
  if (overrides === undefined) {
    return DEFAULT_PIPELINE_CONFIG;
  }

  const result = PipelineConfigSchema.safeParse(overrides);
  if (!result.success) {
    getLogger().warn('Invalid pipeline settings, using defaults', {
      file,
      issues: result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
    return DEFAULT_PIPELINE_CONFIG;
  }
  return result.data;
}
