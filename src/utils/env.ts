import { config } from 'dotenv';

// Load .env on module import
config({ quiet: true });

const PROVIDER_API_KEY_MAP: Record<string, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_API_KEY',
};

const PROVIDER_DISPLAY_NAMES: Record<string, string> = {
  openai: 'OpenAI',
  anthropic: 'Anthropic',
  google: 'Google',
};

export const WEB_SEARCH_API_KEY = 'TAVILY_API_KEY';

export function getApiKeyNameForProvider(providerId: string): string | undefined {
  return PROVIDER_API_KEY_MAP[providerId];
}

export function getProviderDisplayName(providerId: string): string {
  return PROVIDER_DISPLAY_NAMES[providerId] || providerId;
}

/**
 * True when the variable is set to something other than a placeholder from
 * `.env.example`.
 */
export function checkApiKeyExists(apiKeyName: string): boolean {
  const value = process.env[apiKeyName]?.trim();
  return Boolean(value && !value.startsWith('your-'));
}

export function checkApiKeyExistsForProvider(providerId: string): boolean {
  const apiKeyName = getApiKeyNameForProvider(providerId);
  if (!apiKeyName) return false;
  return checkApiKeyExists(apiKeyName);
}
