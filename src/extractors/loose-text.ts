import type { CheerioAPI } from 'cheerio';
import type { ExtractionStrategy } from '../interfaces/strategy.js';
import { ExtractionStrategyName, type EndpointRecord } from '../models/types.js';
import { visibleText } from './document.js';
import { LOOSE_ENDPOINT_PATTERN, createEndpointRecord, matchEndpoints } from './patterns.js';

/**
 * Scans the visible page text for a method token followed by a path.
 * Lowest confidence: catches prose that no structural strategy recognized.
 */
export function extractFromText($: CheerioAPI): EndpointRecord[] {
  const text = visibleText($.root().get());

  return matchEndpoints(text, LOOSE_ENDPOINT_PATTERN).map(({ method, path }) =>
    createEndpointRecord(method, path, '', ExtractionStrategyName.LOOSE_TEXT)
  );
}

export const looseTextStrategy: ExtractionStrategy = {
  name: ExtractionStrategyName.LOOSE_TEXT,
  extract: extractFromText,
};
