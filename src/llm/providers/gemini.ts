import { GoogleGenerativeAI } from '@google/generative-ai';
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

// Default model to use
const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash-latest';

/**
 * Gemini provider implementation of the LLMClient interface
 */
export class GeminiProvider implements LLMClient {
  readonly provider = LLMProvider.GEMINI;
  private genAI: GoogleGenerativeAI;
  private usage = new TokenUsageTracker();
  private logger: Logger;

  constructor(private config: LLMProviderConfig, logger?: Logger) {
    this.logger = logger ?? defaultLogger.child('gemini');
    if (!config.apiKey) {
      throw new LLMAuthenticationError('Gemini API key is required.', LLMProvider.GEMINI);
    }
    this.genAI = new GoogleGenerativeAI(config.apiKey);
  }

  async generateText(prompt: string, systemPrompt?: string): Promise<LLMResponse> {
    const modelName = this.config.model ?? DEFAULT_GEMINI_MODEL;
    const model = this.genAI.getGenerativeModel(
      {
        model: modelName,
        generationConfig: {
          temperature: this.config.temperature ?? 0,
          maxOutputTokens: this.config.maxTokens ?? 500,
        },
      },
      { timeout: this.config.timeout ?? 60000 }
    );

    // Gemini takes the system prompt as leading text of the user turn
    const parts = [...(systemPrompt ? [{ text: `${systemPrompt}\n\n` }] : []), { text: prompt }];

    this.logger.debug(`Using model: ${modelName} (prompt length ${prompt.length})`);

    try {
      const result = await model.generateContent({ contents: [{ role: 'user', parts }] });
      const content = result.response.text();

      if (!content) {
        throw new LLMClientError('No content received from Gemini API', 'EMPTY_RESPONSE', LLMProvider.GEMINI);
      }

      const usage = result.response.usageMetadata;
      if (usage) {
        this.usage.record(usage.promptTokenCount ?? 0, usage.candidatesTokenCount ?? 0);
      }

      return {
        content,
        tokensUsed: usage?.totalTokenCount ?? 0,
        model: modelName,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  getTokenUsage(): TokenUsage {
    return this.usage.snapshot();
  }

  /**
   * The SDK reports HTTP failures only in the message, e.g. "[429 Too Many Requests] ..."
   */
  private handleError(error: unknown): Error {
    if (error instanceof LLMClientError) {
      return error;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    const status = Number(/\[(\d{3})[^\]]*\]/.exec(message)?.[1]);

    if (message.includes('API key not valid') || status === 401 || status === 403) {
      return new LLMAuthenticationError('Invalid Gemini API key', LLMProvider.GEMINI);
    }
    if (status === 429) {
      return new LLMRateLimitError('Gemini API rate limit exceeded', undefined, LLMProvider.GEMINI);
    }
    if (status >= 500) {
      return new LLMServerError(`Gemini API server error: ${message}`, status, LLMProvider.GEMINI);
    }

    return new LLMClientError(`Gemini API error: ${message}`, undefined, LLMProvider.GEMINI);
  }
}
