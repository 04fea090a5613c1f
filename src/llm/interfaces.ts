/**
 * Core abstraction interfaces for LLM providers
 * Gives the AI-assisted lookup one interface over OpenAI, Anthropic, Gemini and OpenRouter
 */

/**
 * Supported LLM providers
 */
export enum LLMProvider {
  OPENAI = 'openai',
  ANTHROPIC = 'anthropic',
  GEMINI = 'gemini',
  OPENROUTER = 'openrouter',
}

/**
 * Token usage tracking interface
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * LLM response interface
 */
export interface LLMResponse {
  content: string;
  tokensUsed: number;
  model: string;
}

/**
 * Settings shared by every provider
 */
export interface LLMProviderConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Base LLM client error class
 */
export class LLMClientError extends Error {
  constructor(message: string, public readonly code?: string, public readonly provider?: LLMProvider) {
    super(message);
    this.name = 'LLMClientError';
  }
}

/**
 * Rate limit error for LLM providers
 */
export class LLMRateLimitError extends LLMClientError {
  constructor(
    message: string,
    public readonly retryAfter?: number,
    provider?: LLMProvider
  ) {
    super(message, 'RATE_LIMIT', provider);
    this.name = 'LLMRateLimitError';
  }
}

/**
 * Authentication error for LLM providers
 */
export class LLMAuthenticationError extends LLMClientError {
  constructor(message: string, provider?: LLMProvider) {
    super(message, 'AUTHENTICATION', provider);
    this.name = 'LLMAuthenticationError';
  }
}

/**
 * Server error for LLM providers
 */
export class LLMServerError extends LLMClientError {
  constructor(message: string, public readonly status?: number, provider?: LLMProvider) {
    super(message, 'SERVER_ERROR', provider);
    this.name = 'LLMServerError';
  }
}

/**
 * Core LLM client interface that all providers must implement
 */
export interface LLMClient {
  readonly provider: LLMProvider;

  /**
   * Send a single prompt and return the model's text answer
   * @param systemPrompt Optional system prompt to guide the model
   */
  generateText(prompt: string, systemPrompt?: string): Promise<LLMResponse>;

  /**
   * Token usage accumulated over all calls on this client
   */
  getTokenUsage(): TokenUsage;
}

/**
 * Token counter shared by provider implementations
 */
export class TokenUsageTracker {
  private usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

  record(promptTokens: number, completionTokens: number): void {
    this.usage.promptTokens += promptTokens;
    this.usage.completionTokens += completionTokens;
    this.usage.totalTokens += promptTokens + completionTokens;
  }

  snapshot(): TokenUsage {
    return { ...this.usage };
  }
}
