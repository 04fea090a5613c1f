import OpenAI from 'openai';
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
 * OpenAI model mappings
 */
export const OpenAIModels = {
  GPT_4O_MINI: 'gpt-4o-mini',
  GPT_4O: 'gpt-4o',
} as const;

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const OPENROUTER_DEFAULT_MODEL = 'deepseek/deepseek-chat-v3.1:free';

/**
 * OpenAI provider configuration
 */
export interface OpenAIConfig extends LLMProviderConfig {
  /** Set for OpenAI-compatible gateways such as OpenRouter */
  provider?: LLMProvider.OPENAI | LLMProvider.OPENROUTER;
  defaultHeaders?: Record<string, string>;
}

/**
 * OpenAI chat-completions client. Also serves OpenRouter, which speaks the same protocol.
 */
export class OpenAIProvider implements LLMClient {
  readonly provider: LLMProvider.OPENAI | LLMProvider.OPENROUTER;
  private client: OpenAI;
  private usage = new TokenUsageTracker();
  private logger: Logger;

  constructor(private config: OpenAIConfig, logger?: Logger) {
    this.provider = config.provider ?? LLMProvider.OPENAI;
    this.logger = logger ?? defaultLogger.child(this.provider);
    this.validateApiKey();

    const isOpenRouter = this.provider === LLMProvider.OPENROUTER;
    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl ?? (isOpenRouter ? OPENROUTER_BASE_URL : undefined),
      timeout: this.config.timeout ?? 60000,
      maxRetries: this.config.maxRetries ?? 0,
      defaultHeaders: this.config.defaultHeaders,
    });
  }

  /**
   * Validate the API key format
   */
  private validateApiKey(): void {
    const apiKey = this.config.apiKey;

    if (!apiKey) {
      throw new LLMAuthenticationError(`${this.provider} API key is required.`, this.provider);
    }

    if (this.provider === LLMProvider.OPENAI && !apiKey.startsWith('sk-')) {
      this.logger.warn('OpenAI API keys typically start with "sk-".');
    }
  }

  async generateText(prompt: string, systemPrompt?: string): Promise<LLMResponse> {
    const model = this.config.model ?? this.defaultModel();

    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [
      ...(systemPrompt ? [{ role: 'system' as const, content: systemPrompt }] : []),
      { role: 'user' as const, content: prompt },
    ];

    this.logger.debug(`Using model: ${model} (prompt length ${prompt.length})`);

    try {
      const completion = await this.client.chat.completions.create({
        model,
        messages,
        temperature: this.config.temperature ?? 0,
        max_tokens: this.config.maxTokens ?? 500,
      });

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new LLMClientError(`No content received from ${this.provider}`, 'EMPTY_RESPONSE', this.provider);
      }

      if (completion.usage) {
        this.usage.record(completion.usage.prompt_tokens, completion.usage.completion_tokens);
      }

      return {
        content,
        tokensUsed: completion.usage?.total_tokens ?? 0,
        model,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  getTokenUsage(): TokenUsage {
    return this.usage.snapshot();
  }

  private defaultModel(): string {
    return this.provider === LLMProvider.OPENROUTER ? OPENROUTER_DEFAULT_MODEL : OpenAIModels.GPT_4O_MINI;
  }

  /**
   * Handle and transform errors
   */
  private handleError(error: unknown): Error {
    if (error instanceof LLMClientError) {
      return error;
    }

    if (error instanceof OpenAI.APIError) {
      const status = error.status;

      if (status === 401 || status === 403) {
        return new LLMAuthenticationError(`Invalid ${this.provider} API key or insufficient permissions`, this.provider);
      }
      if (status === 429) {
        const retryAfter = error.headers?.['retry-after'];
        return new LLMRateLimitError(
          `${this.provider} API rate limit exceeded`,
          retryAfter ? parseInt(retryAfter, 10) : undefined,
          this.provider
        );
      }
      if (status !== undefined && status >= 500) {
        return new LLMServerError(`${this.provider} API server error: ${error.message}`, status, this.provider);
      }
      return new LLMClientError(`${this.provider} API error: ${error.message}`, status ? String(status) : undefined, this.provider);
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new LLMClientError(`${this.provider} API error: ${message}`, undefined, this.provider);
  }
}
