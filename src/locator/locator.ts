import { DocumentationNotFoundError, ErrorUtils } from '../errors/error-types.js';
import type { FetchedPage, PageFetcher } from '../interfaces/fetcher.js';
import type { DocumentationLookup } from '../interfaces/lookup.js';
import type {
  DocumentationPage,
  LocateOutcome,
  ProbeAttempt,
  ProbeSource,
} from '../models/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { buildCandidateUrls } from './candidates.js';
import { isHtmlContent, isSuccessStatus, mentionsApi } from './content.js';

export interface LocatorOptions {
  /** Asked once after every generated candidate has failed */
  lookup?: DocumentationLookup;
  /** Candidates probed at the same time; 1 probes strictly one after another */
  probeConcurrency?: number;
  /** Reject pages whose text never mentions an API */
  contentCheck?: boolean;
  logger?: Logger;
  now?: () => Date;
}

interface ProbeResult {
  attempt: ProbeAttempt;
  page?: DocumentationPage;
}

/**
 * Resolves a company name to a reachable documentation page.
 *
 * Candidates are probed in their declared priority order and the search stops
 * at the first one that answers 2xx with HTML. With `probeConcurrency > 1`
 * candidates are probed in batches, but the winner is still the
 * earliest-priority success, so the outcome matches the sequential search.
 */
export class DocumentationLocator {
  private readonly lookup?: DocumentationLookup;
  private readonly probeConcurrency: number;
  private readonly contentCheck: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly fetcher: PageFetcher, options: LocatorOptions = {}) {
    this.lookup = options.lookup;
    this.probeConcurrency = Math.max(1, Math.floor(options.probeConcurrency ?? 1));
    this.contentCheck = options.contentCheck ?? true;
    this.logger = options.logger ?? defaultLogger.child('locator');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Find the documentation page for a company
   *
   * @throws DocumentationNotFoundError when every candidate and the AI lookup fail
   */
  async locate(companyName: string): Promise<DocumentationPage> {
    const outcome = await this.tryLocate(companyName);
    if (!outcome.found) {
      throw new DocumentationNotFoundError(companyName, outcome.attempts);
    }
    return outcome.page;
  }

  /**
   * Same search as `locate`, reporting failure as a value
   */
  async tryLocate(companyName: string): Promise<LocateOutcome> {
    const candidates = buildCandidateUrls(companyName);
    const attempts: ProbeAttempt[] = [];

    this.logger.info(`Searching for API documentation for: ${companyName}`);

    const winner = this.probeConcurrency > 1
      ? await this.probeConcurrently(candidates, attempts)
      : await this.probeSequentially(candidates, attempts);

    if (winner) {
      this.logger.success(`Found API documentation at: ${winner.sourceUrl}`);
      return { found: true, page: winner, via: 'candidate', attempts };
    }

    const suggested = await this.askLookup(companyName, attempts);
    if (suggested) {
      this.logger.success(`Found API documentation at: ${suggested.sourceUrl} (AI lookup)`);
      return { found: true, page: suggested, via: 'ai', attempts };
    }

    this.logger.warn(`Could not find API documentation for ${companyName}`);
    return { found: false, attempts };
  }

  /**
   * Fetch one URL and decide whether it is a usable documentation page
   */
  async probe(url: string, source: ProbeSource, signal?: AbortSignal): Promise<ProbeResult> {
    let fetched: FetchedPage;
    try {
      fetched = await this.fetcher.fetch(url, signal);
    } catch (error) {
      return this.reject({ url, source, accepted: false }, ErrorUtils.toError(error).message);
    }

    const attempt: ProbeAttempt = { url, source, accepted: false, status: fetched.status };

    if (!isSuccessStatus(fetched.status)) {
      return this.reject(attempt, `HTTP ${fetched.status}`);
    }
    if (!isHtmlContent(fetched.contentType, fetched.body)) {
      return this.reject(attempt, `unsupported content type ${fetched.contentType ?? '(none)'}`);
    }
    if (this.contentCheck) {
      let mentions: boolean;
      try {
        mentions = mentionsApi(fetched.body);
      } catch (error) {
        return this.reject(attempt, `content check failed: ${ErrorUtils.toError(error).message}`);
      }
      if (!mentions) {
        return this.reject(attempt, 'page does not mention an API');
      }
    }

    return {
      attempt: { ...attempt, accepted: true },
      page: { sourceUrl: url, html: fetched.body, fetchedAt: this.now() },
    };
  }

  private reject(attempt: ProbeAttempt, reason: string): ProbeResult {
    this.logger.debug(`Could not use ${attempt.url}: ${reason}`);
    return { attempt: { ...attempt, accepted: false, reason } };
  }

  private async probeSequentially(candidates: string[], attempts: ProbeAttempt[]): Promise<DocumentationPage | undefined> {
    for (const url of candidates) {
      const result = await this.probe(url, 'candidate');
      attempts.push(result.attempt);
      if (result.page) {
        return result.page;
      }
    }
    return undefined;
  }

  private async probeConcurrently(candidates: string[], attempts: ProbeAttempt[]): Promise<DocumentationPage | undefined> {
    for (let start = 0; start < candidates.length; start += this.probeConcurrency) {
      const batch = candidates.slice(start, start + this.probeConcurrency);
      const controllers = batch.map(() => new AbortController());

      const results = await Promise.all(
        batch.map(async (url, index) => {
          const result = await this.probe(url, 'candidate', controllers[index].signal);
          if (result.page) {
            // Lower-priority probes can no longer win
            controllers.slice(index + 1).forEach((controller) => controller.abort());
          }
          return result;
        })
      );

      for (const result of results) {
        attempts.push(result.attempt);
        if (result.page) {
          return result.page;
        }
      }
    }
    return undefined;
  }

  private async askLookup(companyName: string, attempts: ProbeAttempt[]): Promise<DocumentationPage | undefined> {
    if (!this.lookup) {
      return undefined;
    }

    this.logger.info('Asking the AI lookup for a documentation URL...');

    let suggestion: string | undefined;
    try {
      suggestion = await this.lookup.suggestDocumentationUrl(companyName);
    } catch (error) {
      this.logger.warn(`AI lookup failed: ${ErrorUtils.toError(error).message}`);
      return undefined;
    }

    const url = toHttpUrl(suggestion);
    if (!url) {
      this.logger.warn('AI lookup returned no usable URL');
      return undefined;
    }
    if (attempts.some((attempt) => toHttpUrl(attempt.url) === url)) {
      this.logger.debug(`AI lookup suggested ${url}, which was already rejected`);
      return undefined;
    }

    const result = await this.probe(url, 'ai');
    attempts.push(result.attempt);
    return result.page;
  }
}

/**
 * Accept only absolute http(s) URLs
 */
export function toHttpUrl(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  try {
    const url = new URL(value.trim());
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}
