import type { CheerioAPI } from 'cheerio';
import type { ExtractionStrategy } from '../interfaces/strategy.js';
import { ExtractionStrategyName, type EndpointRecord } from '../models/types.js';
import { HEADING_SELECTOR } from './document.js';
import { LOOSE_ENDPOINT_PATTERN, collapseWhitespace, createEndpointRecord, matchEndpoints } from './patterns.js';

/**
 * Looks for a method token directly followed by a path in heading text,
 * link text and link targets. The rest of the heading or link text becomes
 * the description.
 */
export function extractFromHeadingsAndLinks($: CheerioAPI): EndpointRecord[] {
  const records: EndpointRecord[] = [];

  $(`${HEADING_SELECTOR}, a`).each((_, element) => {
    const text = collapseWhitespace($(element).text());

    for (const { method, path, match } of matchEndpoints(text, LOOSE_ENDPOINT_PATTERN)) {
      const description = text.replace(match, ' ').replace(/^[\s:\-–—|]+|[\s:\-–—|]+$/g, '');
      records.push(createEndpointRecord(method, path, description, ExtractionStrategyName.HEADING_LINK));
    }

    const href = element.name === 'a' ? $(element).attr('href') : undefined;
    if (href) {
      for (const { method, path } of matchEndpoints(safeDecode(href), LOOSE_ENDPOINT_PATTERN)) {
        records.push(createEndpointRecord(method, path, text, ExtractionStrategyName.HEADING_LINK));
      }
    }
  });

  return records;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export const headingLinkStrategy: ExtractionStrategy = {
  name: ExtractionStrategyName.HEADING_LINK,
  extract: extractFromHeadingsAndLinks,
};
