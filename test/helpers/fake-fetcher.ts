import type { FetchedPage, PageFetcher } from '../../src/interfaces/fetcher.js';

export const API_PAGE = '<html><body><h1>Acme API</h1><pre>GET /v1/users</pre></body></html>';

export type FakeResponse = Partial<Omit<FetchedPage, 'url'>> | Error;

/**
 * In-process stand-in for the HTTP client.
 * Unknown URLs answer 404; `delays` hold a response back and honour abort signals.
 */
export class FakeFetcher implements PageFetcher {
  readonly requested: string[] = [];
  readonly aborted: string[] = [];

  constructor(
    private readonly responses: Record<string, FakeResponse> = {},
    private readonly delays: Record<string, number> = {}
  ) {}

  async fetch(url: string, signal?: AbortSignal): Promise<FetchedPage> {
    this.requested.push(url);

    const delay = this.delays[url];
    if (delay !== undefined) {
      try {
        await wait(delay, signal);
      } catch (error) {
        this.aborted.push(url);
        throw error;
      }
    }

    const response = this.responses[url];
    if (response === undefined) {
      return { url, status: 404, contentType: 'text/html', body: '<html><body>Not found</body></html>' };
    }
    if (response instanceof Error) {
      throw response;
    }
    return {
      url,
      status: response.status ?? 200,
      contentType: 'contentType' in response ? response.contentType : 'text/html; charset=utf-8',
      body: response.body ?? API_PAGE,
    };
  }
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('request aborted'));
      },
      { once: true }
    );
  });
}
