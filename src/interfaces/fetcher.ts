/**
 * Raw HTTP response for a documentation URL. Any status code is returned;
 * only transport failures (timeout, DNS, refused) reject.
 */
export interface FetchedPage {
  url: string;
  status: number;
  contentType?: string;
  body: string;
}

/**
 * Interface that the locator uses to fetch candidate pages.
 * Implemented by the axios-backed HttpClient and by in-process fakes in tests.
 */
export interface PageFetcher {
  /**
   * Fetch a URL with a single bounded GET request.
   *
   * @param signal - aborts the request when a higher-priority candidate has already won
   * @throws CandidateUnreachableError when no response is received
   */
  fetch(url: string, signal?: AbortSignal): Promise<FetchedPage>;
}
