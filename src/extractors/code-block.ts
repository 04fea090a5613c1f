import type { CheerioAPI } from 'cheerio';
import type { ExtractionStrategy } from '../interfaces/strategy.js';
import { ExtractionStrategyName, type EndpointRecord } from '../models/types.js';
import { nearestHeadingText } from './document.js';
import { LINE_ENDPOINT_PATTERN, createEndpointRecord, matchEndpoints } from './patterns.js';

/**
 * Finds `METHOD /path` lines in `<pre>` and `<code>` blocks.
 * Inline `<code>` inside a `<pre>` is read once, as part of the `<pre>`.
 * The description is the closest heading above the block.
 */
export function extractFromCodeBlocks($: CheerioAPI): EndpointRecord[] {
  const records: EndpointRecord[] = [];

  $('pre, code').each((_, block) => {
    if (block.name === 'code' && $(block).parents('pre').length > 0) {
      return;
    }

    const heading = nearestHeadingText($, block);

    for (const line of $(block).text().split(/\r?\n/)) {
      for (const { method, path } of matchEndpoints(line, LINE_ENDPOINT_PATTERN)) {
        records.push(createEndpointRecord(method, path, heading, ExtractionStrategyName.CODE_BLOCK));
      }
    }
  });

  return records;
}

export const codeBlockStrategy: ExtractionStrategy = {
  name: ExtractionStrategyName.CODE_BLOCK,
  extract: extractFromCodeBlocks,
};
