import { checkApiKeyExistsForProvider, getApiKeyNameForProvider, getProviderDisplayName } from '../utils/env.js';

interface ProviderModel {
  providerId: string;
  modelId: string;
  description: string;
}

const PROVIDER_MODELS: readonly ProviderModel[] = [
  { providerId: 'openai', modelId: 'gpt-4.1', description: 'strong coding and tool use' },
  { providerId: 'anthropic', modelId: 'claude-sonnet-4-5', description: 'long multi-step coding tasks' },
  { providerId: 'google', modelId: 'gemini-2.5-pro', description: 'large context window' },
];

export function getModelIdForProvider(providerId: string): string | undefined {
  return PROVIDER_MODELS.find(entry => entry.providerId === providerId)?.modelId;
}

/**
 * A row of the /model picker.
 */
export interface ProviderChoice extends ProviderModel {
  displayName: string;
  current: boolean;
  /** Set when the provider's API key is missing. */
  missingKey?: string;
}

export function listProviderChoices(currentProvider?: string): ProviderChoice[] {
  return PROVIDER_MODELS.map(entry => {
    const choice: ProviderChoice = {
      ...entry,
      displayName: getProviderDisplayName(entry.providerId),
      current: entry.providerId === currentProvider,
    };
    if (!checkApiKeyExistsForProvider(entry.providerId)) {
      choice.missingKey = getApiKeyNameForProvider(entry.providerId);
    }
    return choice;
  });
}
