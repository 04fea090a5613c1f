import type { CheerioAPI } from 'cheerio';
import type { EndpointRecord, ExtractionStrategyName } from '../models/types.js';

/**
 * Interface that all extraction strategies implement.
 * A strategy reads the parsed document and returns candidate records;
 * it never mutates the document and skips fragments that do not fit its shape.
 */
export interface ExtractionStrategy {
  readonly name: ExtractionStrategyName;

  extract($: CheerioAPI): EndpointRecord[];
}
