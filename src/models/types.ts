/**
 * HTTP methods recognized in documentation pages
 */
export enum HttpMethod {
  GET = 'GET',
  POST = 'POST',
  PUT = 'PUT',
  PATCH = 'PATCH',
  DELETE = 'DELETE',
  HEAD = 'HEAD',
  OPTIONS = 'OPTIONS',
}

/**
 * Method value for records whose HTTP method could not be determined
 */
export const UNKNOWN_METHOD = 'UNKNOWN';

export type EndpointMethod = HttpMethod | typeof UNKNOWN_METHOD;

/**
 * Extraction strategies, listed in priority order (highest confidence first)
 */
export enum ExtractionStrategyName {
  CODE_BLOCK = 'code-block',
  TABLE = 'table',
  HEADING_LINK = 'heading-link',
  LOOSE_TEXT = 'loose-text',
}

/**
 * A fetched documentation page, owned by a single pipeline run
 */
export interface DocumentationPage {
  sourceUrl: string;
  html: string;
  fetchedAt: Date;
}

/**
 * A single endpoint found in a documentation page.
 * Two records are the same endpoint when method (case-insensitive) and path (exact) match.
 */
export interface EndpointRecord {
  method: EndpointMethod;
  path: string;
  fullEndpoint: string;
  description: string;
  sourceStrategy: ExtractionStrategyName;
}

/**
 * Everything the spreadsheet exporter needs for one company
 */
export interface DiscoveryResult {
  company: string;
  documentationUrl?: string;
  endpoints: EndpointRecord[];
  generatedAt: Date;
}

/**
 * Where a probed URL came from
 */
export type ProbeSource = 'candidate' | 'ai';

/**
 * Outcome of probing one URL
 */
export interface ProbeAttempt {
  url: string;
  source: ProbeSource;
  accepted: boolean;
  status?: number;
  reason?: string;
}

/**
 * Result of a documentation search
 */
export type LocateOutcome =
  | { found: true; page: DocumentationPage; via: ProbeSource; attempts: ProbeAttempt[] }
  | { found: false; attempts: ProbeAttempt[] };
