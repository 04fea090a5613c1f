import type { Config } from '../models/config.js';
import type { DiscoveryResult, ProbeAttempt } from '../models/types.js';
import type { PageFetcher } from '../interfaces/fetcher.js';
import type { LLMClient } from '../llm/interfaces.js';
import { LLMFactory } from '../llm/factory.js';
import { AiDocumentationLookup } from '../ai/lookup.js';
import { DocumentationLocator } from '../locator/locator.js';
import { EndpointExtractor } from '../extractors/extractor.js';
import { createStrategies } from '../extractors/factory.js';
import { SpreadsheetGenerator } from '../generators/spreadsheet.js';
import { createHttpClient } from '../utils/http.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import {
  ConfigurationError,
  DocumentationNotFoundError,
  ErrorCode,
  ErrorUtils,
} from '../errors/error-types.js';

/**
 * Progress callback for tracking discovery steps
 */
export type ProgressCallback = (step: string, progress: number, total: number) => void;

/**
 * Result of a discovery run
 */
export interface DiscoveryReport {
  success: boolean;
  company: string;
  result?: DiscoveryResult;
  outputFile?: string;
  attempts: ProbeAttempt[];
  tokensUsed: number;
  duration: number;
  error?: string;
  /** The error that ended the run, for choosing an exit code */
  failure?: Error;
}

/**
 * Collaborators that tests and embedding code may replace
 */
export interface DiscoveryDependencies {
  fetcher?: PageFetcher;
  llmClient?: LLMClient;
  exporter?: Pick<SpreadsheetGenerator, 'write'>;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Locate a company's API documentation, extract its endpoints and export
 * them to a spreadsheet.
 *
 * Never throws: every failure is reported on the returned report.
 */
export async function discoverApi(
  config: Config,
  progressCallback?: ProgressCallback,
  deps: DiscoveryDependencies = {}
): Promise<DiscoveryReport> {
  const startTime = Date.now();
  const logger = deps.logger ?? defaultLogger;
  const now = deps.now ?? (() => new Date());
  let attempts: ProbeAttempt[] = [];
  let llmClient: LLMClient | undefined;

  const report = (fields: Omit<DiscoveryReport, 'company' | 'attempts' | 'tokensUsed' | 'duration'>): DiscoveryReport => ({
    company: config.company,
    attempts,
    tokensUsed: llmClient?.getTokenUsage().totalTokens ?? 0,
    duration: Date.now() - startTime,
    ...fields,
  });

  try {
    // Step 1: collaborators
    progressCallback?.('Initializing...', 0, 100);
    llmClient = createLlmClient(config, deps, logger);

    const locator = new DocumentationLocator(
      deps.fetcher ?? createHttpClient({ timeout: config.timeout, logger: logger.child('http') }),
      {
        lookup: llmClient ? new AiDocumentationLookup(llmClient, logger.child('ai')) : undefined,
        probeConcurrency: config.probeConcurrency,
        contentCheck: config.contentCheck,
        logger: logger.child('locator'),
        now,
      }
    );
    const extractor = new EndpointExtractor(createStrategies(config.strategies), logger.child('extractor'));

    // Step 2: find the documentation
    progressCallback?.(`Searching for ${config.company} API documentation...`, 10, 100);
    const outcome = await locator.tryLocate(config.company);
    attempts = outcome.attempts;

    if (!outcome.found) {
      const notFound = new DocumentationNotFoundError(config.company, outcome.attempts);
      return report({ success: false, error: notFound.message, failure: notFound });
    }

    // Step 3: extract endpoints
    progressCallback?.(`Extracting endpoints from ${outcome.page.sourceUrl}...`, 50, 100);
    const result: DiscoveryResult = {
      company: config.company,
      documentationUrl: outcome.page.sourceUrl,
      endpoints: extractor.extract(outcome.page),
      generatedAt: now(),
    };

    if (config.dryRun) {
      progressCallback?.('Dry run: skipping spreadsheet export', 100, 100);
      return report({ success: true, result });
    }

    // Step 4: export
    progressCallback?.('Writing spreadsheet...', 80, 100);
    const exporter = deps.exporter ?? new SpreadsheetGenerator();
    const outputFile = await exporter.write(result, config.outputFile);

    progressCallback?.('Discovery complete!', 100, 100);
    return report({ success: true, result, outputFile });

  } catch (error) {
    const failure = ErrorUtils.toError(error);

    if (config.debug) {
      logger.error('Discovery failed', failure);
      if (ErrorUtils.isDiscoveryError(failure)) {
        logger.debug(JSON.stringify(failure.serialize(), null, 2));
      }
    }

    return report({ success: false, error: failure.message, failure });
  }
}

/**
 * The AI fallback runs only when enabled and a key is available; without a
 * key it is skipped quietly.
 */
function createLlmClient(config: Config, deps: DiscoveryDependencies, logger: Logger): LLMClient | undefined {
  if (!config.aiFallback) {
    return undefined;
  }
  if (deps.llmClient) {
    return deps.llmClient;
  }
  if (!config.apiKey) {
    logger.debug(`No API key for ${config.provider}; AI fallback disabled`);
    return undefined;
  }

  try {
    return LLMFactory.create(
      { provider: config.provider, apiKey: config.apiKey, model: config.model, timeout: config.timeout, maxRetries: 0 },
      logger.child('llm')
    );
  } catch (error) {
    throw new ConfigurationError(
      `Failed to create ${config.provider} client: ${ErrorUtils.toError(error).message}`,
      ErrorCode.CONFIG_INVALID_VALUE,
      'provider'
    );
  }
}

/**
 * Utility function to format duration in human-readable format
 */
export function formatDuration(milliseconds: number): string {
  const seconds = Math.floor(milliseconds / 1000);
  const minutes = Math.floor(seconds / 60);

  if (minutes > 0) {
    const remainingSeconds = seconds % 60;
    return `${minutes}m ${remainingSeconds}s`;
  }

  return `${seconds}s`;
}

/**
 * Utility function to format token usage
 */
export function formatTokenUsage(tokens: number): string {
  if (tokens < 1000) {
    return `${tokens} tokens`;
  }

  const kTokens = (tokens / 1000).toFixed(1);
  return `${kTokens}k tokens`;
}

/**
 * One-line summary of a run for logging/reporting
 */
export function getDiscoverySummary(report: DiscoveryReport): string {
  const duration = formatDuration(report.duration);

  if (!report.success) {
    return `❌ Discovery failed after ${duration}. Error: ${report.error ?? 'Unknown error'}`;
  }

  const count = report.result?.endpoints.length ?? 0;
  const where = report.outputFile ? `Output: ${report.outputFile}` : 'No file written (dry run)';
  return `✅ Found ${count} endpoint(s) for ${report.company} in ${duration}. ${where}`;
}
