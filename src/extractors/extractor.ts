import type { ExtractionStrategy } from '../interfaces/strategy.js';
import type { DocumentationPage, EndpointRecord } from '../models/types.js';
import { ErrorUtils } from '../errors/error-types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { parseDocument } from './document.js';
import { createStrategies } from './factory.js';
import { endpointKey } from './patterns.js';

/**
 * Keep the first record for each (method, path) identity key, preserving order
 */
export function mergeEndpoints(records: readonly EndpointRecord[]): EndpointRecord[] {
  const merged = new Map<string, EndpointRecord>();

  for (const record of records) {
    const key = endpointKey(record);
    if (!merged.has(key)) {
      merged.set(key, record);
    }
  }

  return [...merged.values()];
}

/**
 * Turns a documentation page into endpoint records.
 * The page is parsed once; each strategy reads it independently and the
 * results are merged in strategy order, so higher-confidence strategies win
 * duplicates. An unparseable page gives an empty list, never an error.
 */
export class EndpointExtractor {
  private readonly strategies: ExtractionStrategy[];
  private readonly logger: Logger;

  constructor(strategies: ExtractionStrategy[] = createStrategies(), logger: Logger = defaultLogger.child('extractor')) {
    this.strategies = strategies;
    this.logger = logger;
  }

  extract(page: DocumentationPage): EndpointRecord[] {
    const $ = parseDocument(page.html);
    const candidates: EndpointRecord[] = [];

    for (const strategy of this.strategies) {
      try {
        const found = strategy.extract($);
        this.logger.debug(`${strategy.name}: ${found.length} candidate(s)`);
        candidates.push(...found);
      } catch (error) {
        this.logger.warn(`${strategy.name} strategy failed on ${page.sourceUrl}: ${ErrorUtils.toError(error).message}`);
      }
    }

    const endpoints = mergeEndpoints(candidates);

    if (endpoints.length === 0) {
      this.logger.warn(`No endpoints found at ${page.sourceUrl}`);
    } else {
      this.logger.info(`Found ${endpoints.length} endpoint(s) at ${page.sourceUrl}`);
    }

    return endpoints;
  }
}
