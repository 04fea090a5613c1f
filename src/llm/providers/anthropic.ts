import Anthropic from '@anthropic-ai/sdk';
import {
  LLMClientError,
  LLMRateLimitError,
  LLMAuthenticationError,
  LLMServerError,
  LLMProvider,
  TokenUsageTracker,
  type LLMClient,
  type LLMProviderConfig,
  type LLMResponse,
  type TokenUsage,
} from '../interfaces.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

/**
 * Anthropic model mappings
 */
export const AnthropicModels = {
  CLAUDE_3_HAIKU: 'claude-3-haiku-20240307',
  CLAUDE_3_5_SONNET: 'claude-3-5-sonnet-20240620',
} as const;

/**
 * Anthropic provider implementation of the LLMClient interface
 */
export class AnthropicProvider implements LLMClient {
  readonly provider = LLMProvider.ANTHROPIC;
  private client: Anthropic;
  private usage = new TokenUsageTracker();
  private logger: Logger;

  constructor(private config: LLMProviderConfig, logger?: Logger) {
    this.logger = logger ?? defaultLogger.child('anthropic');
    this.validateApiKey();
    this.client = new Anthropic({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout ?? 60000,
      maxRetries: this.config.maxRetries ?? 0,
    });
  }

  /**
   * Validate the Anthropic API key format
   */
  private validateApiKey(): void {
    const apiKey = this.config.apiKey;

    if (!apiKey) {
      throw new LLMAuthenticationError('Anthropic API key is required.', LLMProvider.ANTHROPIC);
    }

    if (!apiKey.startsWith('sk-ant-')) {
      this.logger.warn('Anthropic API keys typically start with "sk-ant-".');
    }
  }

  async generateText(prompt: string, systemPrompt?: string): Promise<LLMResponse> {
    const model = this.config.model ?? AnthropicModels.CLAUDE_3_HAIKU;

    this.logger.debug(`Using model: ${model} (prompt length ${prompt.length})`);

    try {
      const response = await this.client.messages.create({
        model,
        max_tokens: this.config.maxTokens ?? 500,
        temperature: this.config.temperature ?? 0,
        messages: [{ role: 'user', content: prompt }],
        ...(systemPrompt ? { system: systemPrompt } : {}),
      });

      const content = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('\n');

      if (!content) {
        throw new LLMClientError('No content received from Anthropic API', 'EMPTY_RESPONSE', LLMProvider.ANTHROPIC);
      }

      this.usage.record(response.usage.input_tokens, response.usage.output_tokens);

      return {
        content,
        tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
        model,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  getTokenUsage(): TokenUsage {
    return this.usage.snapshot();
  }

  private handleError(error: unknown): Error {
    if (error instanceof LLMClientError) {
      return error;
    }

    if (error instanceof Anthropic.APIError) {
      const status = error.status;

      if (status === 401 || status === 403) {
        return new LLMAuthenticationError('Invalid Anthropic API key or insufficient permissions', LLMProvider.ANTHROPIC);
      }
      if (status === 429) {
        return new LLMRateLimitError('Anthropic API rate limit exceeded', undefined, LLMProvider.ANTHROPIC);
      }
      if (status !== undefined && status >= 500) {
        return new LLMServerError(`Anthropic API server error: ${error.message}`, status, LLMProvider.ANTHROPIC);
      }
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new LLMClientError(`Anthropic API error: ${message}`, undefined, LLMProvider.ANTHROPIC);
  }
}
