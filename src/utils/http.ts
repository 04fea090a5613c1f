import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { CandidateUnreachableError, ErrorCode, ErrorUtils } from '../errors/error-types.js';
import type { FetchedPage, PageFetcher } from '../interfaces/fetcher.js';
import { logger as defaultLogger, type Logger } from './logger.js';

/**
 * Configuration options for HTTP client
 */
export interface HttpClientConfig {
  timeout?: number;
  maxRedirects?: number;
  maxContentLength?: number;
  userAgent?: string;
  /** Replaces the network transport, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; api-doc-discovery/1.0.0)';

/**
 * HTTP client used to probe documentation URLs.
 * One GET per call, bounded by `timeout`, no automatic retries: a failed
 * candidate is abandoned in favour of the next one.
 */
export class HttpClient implements PageFetcher {
  private client: AxiosInstance;
  private config: Required<Omit<HttpClientConfig, 'adapter' | 'logger'>>;
  private logger: Logger;

  constructor(config: HttpClientConfig = {}) {
    this.config = {
      timeout: config.timeout ?? 10000,
      maxRedirects: config.maxRedirects ?? 5,
      maxContentLength: config.maxContentLength ?? 10 * 1024 * 1024,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    };
    this.logger = config.logger ?? defaultLogger.child('http');

    this.client = axios.create({
      timeout: this.config.timeout,
      maxRedirects: this.config.maxRedirects,
      maxContentLength: this.config.maxContentLength,
      responseType: 'text',
      // Every status is a response; the locator decides what counts as success
      validateStatus: () => true,
      headers: {
        'User-Agent': this.config.userAgent,
        'Accept': 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
      },
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.client.interceptors.request.use((config) => {
      this.logger.debug(`GET ${config.url}`);
      return config;
    });

    this.client.interceptors.response.use((response) => {
      this.logger.debug(`${response.status} ${response.config.url}`);
      return response;
    });
  }

  async fetch(url: string, signal?: AbortSignal): Promise<FetchedPage> {
    try {
      const response = await this.client.get<string>(url, { signal });
      const contentType = response.headers['content-type'];

      return {
        url,
        status: response.status,
        contentType: typeof contentType === 'string' ? contentType : undefined,
        body: typeof response.data === 'string' ? response.data : '',
      };
    } catch (error) {
      throw this.createUnreachableError(url, error);
    }
  }

  /**
   * Map a transport failure onto a categorized error
   */
  private createUnreachableError(url: string, error: unknown): CandidateUnreachableError {
    if (axios.isCancel(error)) {
      return new CandidateUnreachableError(url, 'request aborted', ErrorCode.NETWORK_ABORTED);
    }

    const cause = ErrorUtils.toError(error);

    if (axios.isAxiosError(error)) {
      switch (error.code) {
        case 'ECONNABORTED':
        case 'ETIMEDOUT':
          return new CandidateUnreachableError(
            url,
            `timed out after ${this.config.timeout}ms`,
            ErrorCode.NETWORK_TIMEOUT,
            cause
          );
        case 'ENOTFOUND':
        case 'EAI_AGAIN':
          return new CandidateUnreachableError(url, 'host not found', ErrorCode.NETWORK_DNS_RESOLUTION, cause);
        case 'ECONNREFUSED':
          return new CandidateUnreachableError(url, 'connection refused', ErrorCode.NETWORK_CONNECTION_REFUSED, cause);
        default:
          break;
      }
    }

    return new CandidateUnreachableError(url, cause.message, ErrorCode.NETWORK_CONNECTION_FAILED, cause);
  }
}

/**
 * Create a default HTTP client instance
 */
export function createHttpClient(config?: HttpClientConfig): HttpClient {
  return new HttpClient(config);
}
