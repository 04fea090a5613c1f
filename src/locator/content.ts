import { parseDocument, visibleText } from '../extractors/document.js';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

export const API_KEYWORDS: readonly string[] = ['api', 'endpoint', 'rest', 'graphql', 'documentation'];

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * HTML or any `text/*` type. Without a content type, a body that opens with markup is accepted.
 */
export function isHtmlContent(contentType: string | undefined, body: string): boolean {
  if (!contentType) {
    return body.trimStart().startsWith('<');
  }

  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return HTML_CONTENT_TYPES.includes(mediaType) || mediaType.startsWith('text/');
}

/**
 * Whether the visible text of a page mentions an API at all
 */
export function mentionsApi(html: string): boolean {
  const $ = parseDocument(html);
  const text = visibleText($.root().get()).toLowerCase();
  return API_KEYWORDS.some((keyword) => text.includes(keyword));
}
