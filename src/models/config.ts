import { LLMProvider } from '../llm/interfaces.js';
import { isLLMProvider } from '../llm/factory.js';
import { defaultOutputFile } from '../generators/spreadsheet.js';
import { STRATEGY_PRIORITY } from '../extractors/factory.js';
import { ExtractionStrategyName } from './types.js';

export const DEFAULT_TIMEOUT_MS = 10000;
export const MIN_TIMEOUT_MS = 1000;
export const DEFAULT_PROVIDER = LLMProvider.OPENROUTER;

/**
 * Configuration for one discovery run
 */
export interface Config {
  company: string;
  outputFile: string;

  // Locator
  timeout: number; // per request, milliseconds
  probeConcurrency: number;
  contentCheck: boolean;

  // AI fallback
  aiFallback: boolean;
  provider: LLMProvider;
  apiKey?: string;
  model?: string;

  // Extraction
  strategies: ExtractionStrategyName[];

  verbose: boolean;
  debug: boolean;
  dryRun: boolean;
}

/**
 * Raw CLI arguments interface
 */
export interface CliArgs {
  company?: string;
  output?: string;
  timeout?: number;
  concurrency?: number;
  contentCheck?: boolean;
  ai?: boolean;
  provider?: string;
  apiKey?: string;
  model?: string;
  strategies?: string;
  verbose?: boolean;
  debug?: boolean;
  dryRun?: boolean;
}

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(message: string, public readonly configKey?: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

function isStrategyName(value: string): value is ExtractionStrategyName {
  return STRATEGY_PRIORITY.some((name) => name === value);
}

/**
 * Builder class for creating and validating configuration objects
 */
export class ConfigBuilder {
  private config: Partial<Config> = {};

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Set the company to search for
   */
  setCompany(company: string): ConfigBuilder {
    const trimmed = company.trim();
    if (trimmed === '') {
      throw new ConfigValidationError('Company name cannot be empty', 'company');
    }
    this.config.company = trimmed;
    return this;
  }

  /**
   * Set the output file path
   */
  setOutputFile(outputFile: string): ConfigBuilder {
    if (!outputFile || outputFile.trim() === '') {
      throw new ConfigValidationError('Output file path cannot be empty', 'outputFile');
    }
    if (!outputFile.trim().toLowerCase().endsWith('.xlsx')) {
      throw new ConfigValidationError(`Output file must end in .xlsx: ${outputFile}`, 'outputFile');
    }
    this.config.outputFile = outputFile.trim();
    return this;
  }

  /**
   * Set request timeout
   */
  setTimeout(timeout: number): ConfigBuilder {
    if (!Number.isFinite(timeout) || timeout < MIN_TIMEOUT_MS) {
      throw new ConfigValidationError(`Timeout must be at least ${MIN_TIMEOUT_MS}ms`, 'timeout');
    }
    this.config.timeout = timeout;
    return this;
  }

  /**
   * Set how many candidate URLs are probed at the same time
   */
  setProbeConcurrency(concurrency: number): ConfigBuilder {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigValidationError('Probe concurrency must be a whole number of at least 1', 'probeConcurrency');
    }
    this.config.probeConcurrency = concurrency;
    return this;
  }

  setContentCheck(enabled: boolean): ConfigBuilder {
    this.config.contentCheck = enabled;
    return this;
  }

  setAiFallback(enabled: boolean): ConfigBuilder {
    this.config.aiFallback = enabled;
    return this;
  }

  /**
   * Set the LLM provider used by the AI fallback
   */
  setProvider(provider: string): ConfigBuilder {
    const normalized = provider.trim().toLowerCase();
    if (!isLLMProvider(normalized)) {
      throw new ConfigValidationError(
        `Invalid provider: ${provider}. Must be one of: ${Object.values(LLMProvider).join(', ')}`,
        'provider'
      );
    }
    this.config.provider = normalized;
    return this;
  }

  setApiKey(apiKey: string): ConfigBuilder {
    if (!apiKey || apiKey.trim() === '') {
      throw new ConfigValidationError('API key cannot be empty', 'apiKey');
    }
    this.config.apiKey = apiKey.trim();
    return this;
  }

  setModel(model: string): ConfigBuilder {
    if (!model || model.trim() === '') {
      throw new ConfigValidationError('Model name cannot be empty', 'model');
    }
    this.config.model = model.trim();
    return this;
  }

  /**
   * Restrict extraction to the named strategies
   */
  setStrategies(names: string[]): ConfigBuilder {
    const strategies: ExtractionStrategyName[] = [];
    for (const raw of names) {
      const name = raw.trim().toLowerCase();
      if (!isStrategyName(name)) {
        throw new ConfigValidationError(
          `Invalid strategy: ${raw}. Must be one of: ${STRATEGY_PRIORITY.join(', ')}`,
          'strategies'
        );
      }
      if (!strategies.includes(name)) {
        strategies.push(name);
      }
    }
    if (strategies.length === 0) {
      throw new ConfigValidationError('At least one extraction strategy is required', 'strategies');
    }
    this.config.strategies = strategies;
    return this;
  }

  /**
   * Set verbose logging
   */
  setVerbose(verbose: boolean): ConfigBuilder {
    this.config.verbose = verbose;
    return this;
  }

  /**
   * Set debug mode
   */
  setDebug(debug: boolean): ConfigBuilder {
    this.config.debug = debug;
    return this;
  }

  /**
   * Skip writing the spreadsheet
   */
  setDryRun(dryRun: boolean): ConfigBuilder {
    this.config.dryRun = dryRun;
    return this;
  }

  /**
   * Build configuration from CLI arguments
   */
  static fromCliArgs(args: CliArgs, now?: () => Date): Config {
    const builder = new ConfigBuilder(now);

    if (args.company !== undefined) {
      builder.setCompany(args.company);
    }

    if (args.output !== undefined) {
      builder.setOutputFile(args.output);
    }

    if (args.timeout !== undefined) {
      builder.setTimeout(args.timeout);
    }

    if (args.concurrency !== undefined) {
      builder.setProbeConcurrency(args.concurrency);
    }

    if (args.contentCheck !== undefined) {
      builder.setContentCheck(args.contentCheck);
    }

    if (args.ai !== undefined) {
      builder.setAiFallback(args.ai);
    }

    if (args.provider) {
      builder.setProvider(args.provider);
    }

    if (args.apiKey) {
      builder.setApiKey(args.apiKey);
    }

    if (args.model) {
      builder.setModel(args.model);
    }

    if (args.strategies !== undefined) {
      builder.setStrategies(args.strategies.split(',').filter((name) => name.trim() !== ''));
    }

    if (args.verbose !== undefined) {
      builder.setVerbose(args.verbose);
    }

    if (args.debug !== undefined) {
      builder.setDebug(args.debug);
    }

    if (args.dryRun !== undefined) {
      builder.setDryRun(args.dryRun);
    }

    return builder.build();
  }

  /**
   * Build and validate the configuration
   */
  build(): Config {
    const { company } = this.config;
    if (!company) {
      throw new ConfigValidationError('Company name is required', 'company');
    }

    return {
      company,
      outputFile: this.config.outputFile ?? defaultOutputFile(company, this.now()),
      timeout: this.config.timeout ?? DEFAULT_TIMEOUT_MS,
      probeConcurrency: this.config.probeConcurrency ?? 1,
      contentCheck: this.config.contentCheck ?? true,
      aiFallback: this.config.aiFallback ?? true,
      provider: this.config.provider ?? DEFAULT_PROVIDER,
      apiKey: this.config.apiKey,
      model: this.config.model,
      strategies: this.config.strategies ?? [...STRATEGY_PRIORITY],
      verbose: this.config.verbose ?? false,
      debug: this.config.debug ?? false,
      dryRun: this.config.dryRun ?? false,
    };
  }
}
