import type { DocumentationLookup } from '../interfaces/lookup.js';
import type { LLMClient } from '../llm/interfaces.js';
import { AIServiceError, ErrorCode, ErrorUtils } from '../errors/error-types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { LOOKUP_SYSTEM_PROMPT, buildLookupPrompt } from './prompts.js';

// Fields that may carry the URL, most specific first
const URL_FIELDS = ['documentation_url', 'documentationUrl', 'docs_url', 'url', 'base_url'];

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;
const HTTP_URL = /https?:\/\/[^\s"'<>`)\]]+/i;

/**
 * Pull a URL out of a model answer.
 * Accepts JSON (bare or inside a code fence) or plain text containing a URL.
 * Returns `undefined` when the model says there is no API or gives nothing usable.
 */
export function parseLookupResponse(content: string): string | undefined {
  const trimmed = content.trim();
  const fenced = FENCED_BLOCK.exec(trimmed);
  const body = fenced ? fenced[1].trim() : trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return firstUrl(trimmed);
  }

  if (typeof parsed === 'string') {
    return firstUrl(parsed);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }

  const fields = new Map<string, unknown>(Object.entries(parsed));
  if (fields.get('has_api') === false) {
    return undefined;
  }

  for (const field of URL_FIELDS) {
    const value = fields.get(field);
    if (typeof value === 'string' && value.trim() !== '') {
      return firstUrl(value);
    }
  }

  return undefined;
}

function firstUrl(text: string): string | undefined {
  const match = HTTP_URL.exec(text);
  return match ? match[0].replace(/[.,;:]+$/, '') : undefined;
}

/**
 * Asks an LLM for a company's documentation URL.
 * Provider failures are logged and reported as "no suggestion"; the caller
 * still probes whatever URL comes back before trusting it.
 */
export class AiDocumentationLookup implements DocumentationLookup {
  private readonly logger: Logger;

  constructor(private readonly client: LLMClient, logger?: Logger) {
    this.logger = logger ?? defaultLogger.child('ai');
  }

  async suggestDocumentationUrl(company: string): Promise<string | undefined> {
    this.logger.info(`Searching for ${company} API documentation using ${this.client.provider}...`);

    try {
      const response = await this.client.generateText(buildLookupPrompt(company), LOOKUP_SYSTEM_PROMPT);
      const url = parseLookupResponse(response.content);

      if (!url) {
        throw new AIServiceError(
          `Could not read a documentation URL from the ${this.client.provider} answer`,
          ErrorCode.AI_SERVICE_INVALID_RESPONSE,
          this.client.provider
        );
      }

      this.logger.debug(`AI suggested ${url}`);
      return url;
    } catch (error) {
      const failure = error instanceof AIServiceError
        ? error
        : new AIServiceError(
          `AI lookup failed: ${ErrorUtils.toError(error).message}`,
          ErrorCode.AI_SERVICE_UNAVAILABLE,
          this.client.provider,
          ErrorUtils.toError(error)
        );
      this.logger.warn(failure.getUserMessage());
      return undefined;
    }
  }
}
