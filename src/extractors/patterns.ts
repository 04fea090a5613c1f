import {
  HttpMethod,
  UNKNOWN_METHOD,
  type EndpointMethod,
  type EndpointRecord,
  type ExtractionStrategyName,
} from '../models/types.js';

export const METHOD_TOKENS: readonly HttpMethod[] = Object.values(HttpMethod);

export const MAX_DESCRIPTION_LENGTH = 200;

const METHOD_ALTERNATION = METHOD_TOKENS.join('|');

// Optional scheme and host, so `POST https://api.example.com/v1/orders` yields `/v1/orders`
const PATH_OR_URL = String.raw`(?:https?:\/\/[^\s\/,;]+)?\/[^\s,;]*`;

/**
 * `METHOD PATH` on a single line (code samples)
 */
export const LINE_ENDPOINT_PATTERN = new RegExp(
  String.raw`\b(${METHOD_ALTERNATION})\b[ \t]*[:\-]?[ \t]*(${PATH_OR_URL})`,
  'gi'
);

/**
 * `METHOD PATH` anywhere in free text, possibly across a line break
 */
export const LOOSE_ENDPOINT_PATTERN = new RegExp(
  String.raw`\b(${METHOD_ALTERNATION})\b\s*[:\-]?\s*((?:https?:\/\/[^\s\/,;]+)?\/[^\s,;]+)`,
  'gi'
);

/**
 * A table cell holding only `METHOD PATH`
 */
export const CELL_ENDPOINT_PATTERN = new RegExp(
  String.raw`^(${METHOD_ALTERNATION})\s+(${PATH_OR_URL})$`,
  'i'
);

const TRAILING_PUNCTUATION = /[.,;:)\]'"`]+$/;

/**
 * Match a method token case-insensitively; `undefined` when it is not one
 */
export function parseMethod(token: string): HttpMethod | undefined {
  const upper = token.trim().toUpperCase();
  return METHOD_TOKENS.find((method) => method === upper);
}

/**
 * Turn a raw path-like token into an endpoint path.
 * Absolute URLs are reduced to their path; query strings, fragments
 * and trailing punctuation are dropped. Returns `undefined` for anything
 * that does not start with a single `/` or contains whitespace.
 */
export function normalizePath(raw: string): string | undefined {
  let candidate = raw.trim();

  if (/^https?:\/\//i.test(candidate)) {
    try {
      // URL encodes `{id}` placeholders; decode them back
      candidate = decodeURI(new URL(candidate).pathname);
    } catch {
      return undefined;
    }
  }

  candidate = candidate.split(/[?#]/)[0].replace(TRAILING_PUNCTUATION, '');

  if (!candidate.startsWith('/') || candidate.startsWith('//') || /\s/.test(candidate)) {
    return undefined;
  }

  return candidate;
}

/**
 * Collapse runs of whitespace into single spaces
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Normalize a description for display
 */
export function cleanDescription(text: string): string {
  const collapsed = collapseWhitespace(text);
  // Count code points so an astral character is never cut in half
  const characters = Array.from(collapsed);
  if (characters.length <= MAX_DESCRIPTION_LENGTH) {
    return collapsed;
  }
  return `${characters.slice(0, MAX_DESCRIPTION_LENGTH - 1).join('')}…`;
}

export function createEndpointRecord(
  method: EndpointMethod,
  path: string,
  description: string,
  sourceStrategy: ExtractionStrategyName
): EndpointRecord {
  return {
    method,
    path,
    fullEndpoint: `${method} ${path}`,
    description: cleanDescription(description),
    sourceStrategy,
  };
}

/**
 * Identity key: method compared case-insensitively, path compared exactly
 */
export function endpointKey(record: Pick<EndpointRecord, 'method' | 'path'>): string {
  return `${record.method.toUpperCase()} ${record.path}`;
}

/**
 * Run a global `METHOD PATH` pattern over text and return every well-formed pair
 */
export function matchEndpoints(
  text: string,
  pattern: RegExp
): Array<{ method: EndpointMethod; path: string; match: string }> {
  const found: Array<{ method: EndpointMethod; path: string; match: string }> = [];

  for (const match of text.matchAll(pattern)) {
    const path = normalizePath(match[2] ?? '');
    if (!path) {
      continue;
    }
    found.push({ method: parseMethod(match[1] ?? '') ?? UNKNOWN_METHOD, path, match: match[0] });
  }

  return found;
}
