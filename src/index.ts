// Main exports for programmatic use
export { discoverApi, formatDuration, formatTokenUsage, getDiscoverySummary } from './core/app.js';
export type { DiscoveryReport, DiscoveryDependencies, ProgressCallback } from './core/app.js';

// Configuration
export { ConfigBuilder, ConfigValidationError, DEFAULT_TIMEOUT_MS } from './models/config.js';
export type { Config, CliArgs } from './models/config.js';

// Data model
export { HttpMethod, UNKNOWN_METHOD, ExtractionStrategyName } from './models/types.js';
export type {
  EndpointMethod,
  DocumentationPage,
  EndpointRecord,
  DiscoveryResult,
  ProbeAttempt,
  ProbeSource,
  LocateOutcome,
} from './models/types.js';

// Locator
export { DocumentationLocator, toHttpUrl } from './locator/locator.js';
export type { LocatorOptions } from './locator/locator.js';
export { CANDIDATE_URL_TEMPLATES, buildCandidateUrls, normalizeCompanyName } from './locator/candidates.js';
export { HttpClient, createHttpClient } from './utils/http.js';
export type { PageFetcher, FetchedPage } from './interfaces/fetcher.js';
export type { DocumentationLookup } from './interfaces/lookup.js';

// Extraction
export { EndpointExtractor, mergeEndpoints } from './extractors/extractor.js';
export { createStrategies, STRATEGY_PRIORITY } from './extractors/factory.js';
export type { ExtractionStrategy } from './interfaces/strategy.js';

// AI fallback
export { AiDocumentationLookup, parseLookupResponse } from './ai/lookup.js';
export { LLMFactory } from './llm/factory.js';
export { LLMProvider } from './llm/interfaces.js';
export type { LLMClient, LLMResponse, TokenUsage } from './llm/interfaces.js';

// Export
export { SpreadsheetGenerator, defaultOutputFile } from './generators/spreadsheet.js';

// Errors
export {
  DiscoveryError,
  CandidateUnreachableError,
  DocumentationNotFoundError,
  AIServiceError,
  ConfigurationError,
  ExportError,
  ErrorUtils,
  ErrorCode,
  ErrorCategory,
} from './errors/error-types.js';

export { Logger, logger } from './utils/logger.js';
