/**
 * Centralized Model Configuration
 *
 * Single source of truth for the language-model providers the strategy
 * parser can talk to, and the model each one uses when none is configured.
 *
 * Environment variables (from .env):
 * - PARSER_PROVIDER: google | openai | deepseek
 * - PARSER_MODEL: overrides the provider's default model
 */

export type ProviderName = 'google' | 'openai' | 'deepseek';

export const PROVIDER_NAMES = ['google', 'openai', 'deepseek'] as const satisfies readonly ProviderName[];

export interface ModelConfig {
  provider: ProviderName;
  model: string;
  description: string;
}

/**
 * Default model per provider
 */
export const MODELS = {
  // Fast and cheap enough for one structured-extraction call per request
  google: {
    provider: 'google',
    model: 'gemini-2.5-flash',
    description: 'Gemini model for strategy extraction',
  },

  openai: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    description: 'OpenAI model for strategy extraction',
  },

  // OpenAI-compatible endpoint
  deepseek: {
    provider: 'deepseek',
    model: 'deepseek-chat',
    description: 'DeepSeek model for strategy extraction',
  },
} as const satisfies Record<ProviderName, ModelConfig>;

export const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';

/**
 * Resolve the model for a provider, honouring an explicit override
 */
export function resolveModel(provider: ProviderName, override?: string): ModelConfig {
  const base = MODELS[provider];
  if (!override) return base;
  return { ...base, model: override };
}
