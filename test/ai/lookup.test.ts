import { describe, expect, it, vi } from 'vitest';
import { AiDocumentationLookup, parseLookupResponse } from '../../src/ai/lookup.js';
import { LOOKUP_SYSTEM_PROMPT, buildLookupPrompt } from '../../src/ai/prompts.js';
import { LLMProvider, LLMRateLimitError, type LLMClient, type LLMResponse } from '../../src/llm/interfaces.js';
import { Logger } from '../../src/utils/logger.js';

function fakeClient(generateText: LLMClient['generateText']): LLMClient {
  return {
    provider: LLMProvider.OPENROUTER,
    generateText,
    getTokenUsage: () => ({ promptTokens: 0, completionTokens: 0, totalTokens: 0 }),
  };
}

function answer(content: string): LLMResponse {
  return { content, tokensUsed: 42, model: 'test-model' };
}

describe('parseLookupResponse', () => {
  it('reads the documentation URL from a JSON answer', () => {
    const content = '{"company_name":"Acme","has_api":true,"documentation_url":"https://docs.acme.com/api"}';

    expect(parseLookupResponse(content)).toBe('https://docs.acme.com/api');
  });

  it('reads JSON inside a code fence', () => {
    const content = 'Here you go:\n```json\n{"documentation_url": "https://developer.acme.com/reference"}\n```';

    expect(parseLookupResponse(content)).toBe('https://developer.acme.com/reference');
  });

  it('falls back to alternative field names', () => {
    expect(parseLookupResponse('{"docs_url": "https://acme.dev/docs"}')).toBe('https://acme.dev/docs');
  });

  it('returns nothing when the model says there is no API', () => {
    expect(parseLookupResponse('{"has_api": false, "documentation_url": "https://acme.com"}')).toBeUndefined();
  });

  it('takes the first URL from a plain-text answer', () => {
    expect(parseLookupResponse('The docs live at https://acme.dev/api. Good luck!')).toBe('https://acme.dev/api');
  });

  it('accepts a bare JSON string', () => {
    expect(parseLookupResponse('"https://acme.dev/reference"')).toBe('https://acme.dev/reference');
  });

  it('returns nothing for answers without a usable URL', () => {
    expect(parseLookupResponse('[]')).toBeUndefined();
    expect(parseLookupResponse('{"documentation_url": ""}')).toBeUndefined();
    expect(parseLookupResponse('{"documentation_url": "docs.acme.com"}')).toBeUndefined();
    expect(parseLookupResponse('I do not know.')).toBeUndefined();
  });
});

describe('buildLookupPrompt', () => {
  it('names the company and asks for JSON', () => {
    const prompt = buildLookupPrompt('Acme');

    expect(prompt).toContain('"Acme"');
    expect(prompt).toContain('"documentation_url"');
  });
});

describe('AiDocumentationLookup', () => {
  it('asks the model and returns the URL it suggests', async () => {
    const generateText = vi.fn<[string, string?], Promise<LLMResponse>>()
      .mockResolvedValue(answer('{"has_api": true, "documentation_url": "https://docs.acme.com/api"}'));
    const lookup = new AiDocumentationLookup(fakeClient(generateText), new Logger({ level: 'silent' }));

    await expect(lookup.suggestDocumentationUrl('Acme')).resolves.toBe('https://docs.acme.com/api');
    expect(generateText).toHaveBeenCalledWith(buildLookupPrompt('Acme'), LOOKUP_SYSTEM_PROMPT);
  });

  it('reports an unreadable answer as no suggestion', async () => {
    const logger = new Logger({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const lookup = new AiDocumentationLookup(fakeClient(vi.fn().mockResolvedValue(answer('no idea'))), logger);

    await expect(lookup.suggestDocumentationUrl('Acme')).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith('Could not read a documentation URL from the openrouter answer');
  });

  it('reports a provider failure as no suggestion', async () => {
    const logger = new Logger({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const failing = vi.fn().mockRejectedValue(new LLMRateLimitError('Rate limit exceeded', undefined, LLMProvider.OPENROUTER));
    const lookup = new AiDocumentationLookup(fakeClient(failing), logger);

    await expect(lookup.suggestDocumentationUrl('Acme')).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith('AI lookup failed: Rate limit exceeded');
  });
});
