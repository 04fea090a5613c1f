import {
  LLMClientError,
  LLMAuthenticationError,
  LLMProvider,
  type LLMClient,
  type LLMProviderConfig,
} from './interfaces.js';
import { OpenAIProvider } from './providers/openai.js';
import { GeminiProvider } from './providers/gemini.js';
import { AnthropicProvider } from './providers/anthropic.js';
import type { Logger } from '../utils/logger.js';

/**
 * Environment variable holding each provider's API key
 */
export const API_KEY_ENV_VARS: Record<LLMProvider, string> = {
  [LLMProvider.OPENAI]: 'OPENAI_API_KEY',
  [LLMProvider.ANTHROPIC]: 'ANTHROPIC_API_KEY',
  [LLMProvider.GEMINI]: 'GEMINI_API_KEY',
  [LLMProvider.OPENROUTER]: 'OPENROUTER_API_KEY',
};

// Sent to OpenRouter so requests are attributed to this tool
const OPENROUTER_HEADERS = {
  'X-Title': 'API Discovery Agent',
};

export interface LLMClientSettings extends LLMProviderConfig {
  provider: LLMProvider;
}

export function isLLMProvider(value: string): value is LLMProvider {
  return Object.values(LLMProvider).some((provider) => provider === value);
}

/**
 * Factory class for creating LLM client instances
 */
export class LLMFactory {
  /**
   * Create an LLM client instance for the configured provider
   * @throws {LLMAuthenticationError} When API key is missing
   * @throws {LLMClientError} When provider is unsupported
   */
  static create(settings: LLMClientSettings, logger?: Logger): LLMClient {
    if (!settings.apiKey || settings.apiKey.trim() === '') {
      throw new LLMAuthenticationError(
        `API key is required for ${settings.provider} provider (set ${API_KEY_ENV_VARS[settings.provider]})`,
        settings.provider
      );
    }

    const { provider, ...providerConfig } = settings;

    switch (provider) {
      case LLMProvider.OPENAI:
        return new OpenAIProvider({ ...providerConfig, provider: LLMProvider.OPENAI }, logger);

      case LLMProvider.OPENROUTER:
        return new OpenAIProvider(
          { ...providerConfig, provider: LLMProvider.OPENROUTER, defaultHeaders: OPENROUTER_HEADERS },
          logger
        );

      case LLMProvider.ANTHROPIC:
        return new AnthropicProvider(providerConfig, logger);

      case LLMProvider.GEMINI:
        return new GeminiProvider(providerConfig, logger);

      default:
        throw new LLMClientError(
          `Unsupported LLM provider: ${String(provider)}. Supported providers: ${Object.values(LLMProvider).join(', ')}`,
          'UNSUPPORTED_PROVIDER'
        );
    }
  }
}
