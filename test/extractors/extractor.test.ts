import { readFileSync } from 'fs';
import { describe, expect, it, vi } from 'vitest';
import { EndpointExtractor, mergeEndpoints } from '../../src/extractors/extractor.js';
import { codeBlockStrategy } from '../../src/extractors/code-block.js';
import { createStrategies, StrategyCreationError, STRATEGY_PRIORITY } from '../../src/extractors/factory.js';
import { endpointKey } from '../../src/extractors/patterns.js';
import { ExtractionStrategyName, HttpMethod, type DocumentationPage, type EndpointRecord } from '../../src/models/types.js';
import type { ExtractionStrategy } from '../../src/interfaces/strategy.js';
import { Logger } from '../../src/utils/logger.js';

const ACME_DOCS = readFileSync(new URL('../fixtures/acme-docs.html', import.meta.url), 'utf8');

function page(html: string): DocumentationPage {
  return { sourceUrl: 'https://docs.acme.com', html, fetchedAt: new Date(2024, 0, 1) };
}

function summary(records: EndpointRecord[]): string[] {
  return records.map((record) => `${record.sourceStrategy} ${record.fullEndpoint} | ${record.description}`);
}

describe('EndpointExtractor', () => {
  it('extracts every endpoint of a documentation page in strategy priority order', () => {
    const endpoints = new EndpointExtractor().extract(page(ACME_DOCS));

    expect(summary(endpoints)).toEqual([
      'code-block GET /v1/users | List users',
      'table POST /v1/orders | Create an order',
      'table DELETE /v1/orders/{id} | Cancel an order',
      'heading-link PATCH /v1/orders/{id} | Update an order',
      'heading-link PUT /v1/customers | Replace a customer',
      'loose-text HEAD /health | ',
    ]);
  });

  it('combines a code sample and a table row', () => {
    const html = `
      <pre>GET /v1/users</pre>
      <table><tr><td>POST</td><td>/v1/orders</td><td>Create an order</td></tr></table>`;

    const endpoints = new EndpointExtractor().extract(page(html));

    expect(endpoints).toEqual([
      {
        method: 'GET',
        path: '/v1/users',
        fullEndpoint: 'GET /v1/users',
        description: '',
        sourceStrategy: ExtractionStrategyName.CODE_BLOCK,
      },
      {
        method: 'POST',
        path: '/v1/orders',
        fullEndpoint: 'POST /v1/orders',
        description: 'Create an order',
        sourceStrategy: ExtractionStrategyName.TABLE,
      },
    ]);
  });

  it('attributes an endpoint found by several strategies to the highest-priority one', () => {
    const html = `
      <h2>Users</h2>
      <pre>GET /v1/users</pre>
      <table><tr><td>GET</td><td>/v1/users</td><td>List users</td></tr></table>`;

    const endpoints = new EndpointExtractor().extract(page(html));

    expect(endpoints).toHaveLength(1);
    expect(endpoints[0].sourceStrategy).toBe(ExtractionStrategyName.CODE_BLOCK);
    expect(endpoints[0].description).toBe('Users');
  });

  it('never returns two records with the same identity key', () => {
    const endpoints = new EndpointExtractor().extract(page(ACME_DOCS));
    const keys = endpoints.map(endpointKey);

    expect(new Set(keys).size).toBe(keys.length);
  });

  it('returns an empty list for a page without endpoints', () => {
    const extractor = new EndpointExtractor();

    expect(extractor.extract(page(''))).toEqual([]);
    expect(extractor.extract(page('<html><body><p>Welcome to our developer portal</p></body></html>'))).toEqual([]);
  });

  it('does not throw on malformed markup', () => {
    const extractor = new EndpointExtractor();

    expect(() => extractor.extract(page('<div><table><tr><td>GET<td>/v1/x</table'))).not.toThrow();
    expect(() => extractor.extract(page('<<<>>></pre></code><h2'))).not.toThrow();
  });

  it('ignores script and style content', () => {
    const html = '<script>fetch("GET /v1/secret")</script><style>/* POST /v1/hidden */</style><p>Nothing here</p>';

    expect(new EndpointExtractor().extract(page(html))).toEqual([]);
  });

  it('gives the same result when run twice on the same page', () => {
    const extractor = new EndpointExtractor();

    expect(extractor.extract(page(ACME_DOCS))).toEqual(extractor.extract(page(ACME_DOCS)));
  });

  it('logs a failing strategy and keeps the results of the others', () => {
    const logger = new Logger({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const broken: ExtractionStrategy = {
      name: ExtractionStrategyName.TABLE,
      extract: () => {
        throw new Error('boom');
      },
    };

    const endpoints = new EndpointExtractor([codeBlockStrategy, broken], logger).extract(page('<pre>GET /v1/users</pre>'));

    expect(endpoints.map((endpoint) => endpoint.fullEndpoint)).toEqual(['GET /v1/users']);
    expect(warn).toHaveBeenCalledWith('table strategy failed on https://docs.acme.com: boom');
  });
});

describe('mergeEndpoints', () => {
  it('keeps the first record per method and path, comparing paths exactly', () => {
    const first: EndpointRecord = {
      method: HttpMethod.GET,
      path: '/a',
      fullEndpoint: 'GET /a',
      description: 'first',
      sourceStrategy: ExtractionStrategyName.CODE_BLOCK,
    };
    const second: EndpointRecord = { ...first, description: 'second', sourceStrategy: ExtractionStrategyName.LOOSE_TEXT };
    const otherPath: EndpointRecord = { ...first, path: '/A', fullEndpoint: 'GET /A' };

    expect(mergeEndpoints([first, second, otherPath])).toEqual([first, otherPath]);
  });
});

describe('createStrategies', () => {
  it('returns every strategy in priority order by default', () => {
    expect(createStrategies().map((strategy) => strategy.name)).toEqual([...STRATEGY_PRIORITY]);
  });

  it('keeps priority order for a requested subset', () => {
    const names = createStrategies([ExtractionStrategyName.LOOSE_TEXT, ExtractionStrategyName.CODE_BLOCK])
      .map((strategy) => strategy.name);

    expect(names).toEqual(['code-block', 'loose-text']);
  });

  it('rejects an empty selection', () => {
    expect(() => createStrategies([])).toThrow(StrategyCreationError);
  });
});
