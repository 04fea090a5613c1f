import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import type { CliArgs } from '../models/config.js';
import { LLMProvider } from '../llm/interfaces.js';
import { API_KEY_ENV_VARS, isLLMProvider } from '../llm/factory.js';
import { STRATEGY_PRIORITY } from '../extractors/factory.js';
import { DEFAULT_PROVIDER, DEFAULT_TIMEOUT_MS } from '../models/config.js';

// Package information
export const packageInfo = {
  name: 'api-discovery',
  version: '1.0.0',
  description: 'Finds a company\'s public API documentation and exports its endpoints to an Excel spreadsheet',
};

/**
 * Options as commander hands them to the action
 */
export interface CliOptions {
  output?: string;
  verbose: boolean;
  debug: boolean;
  timeout: number;
  concurrency: number;
  ai: boolean;
  contentCheck: boolean;
  provider: string;
  apiKey?: string;
  model?: string;
  strategies?: string;
  dryRun: boolean;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive whole number.');
  }
  return parsed;
}

/**
 * Define the command line interface
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(packageInfo.name)
    .description(packageInfo.description)
    .version(packageInfo.version, '-V, --version', 'display version number')
    .helpOption('-h, --help', 'display help for command')
    .argument('<company>', 'company name to search for, e.g. "Stripe"');

  program
    .option('-o, --output <file>', 'output .xlsx file (default: {Company}_API_Documentation_{timestamp}.xlsx)')
    .option('-v, --verbose', 'show every probed URL and progress step', false)
    .option('--debug', 'enable debug mode with detailed error information', false)
    .option('--timeout <ms>', 'request timeout in milliseconds', parsePositiveInteger, DEFAULT_TIMEOUT_MS)
    .option('--concurrency <n>', 'candidate URLs probed at the same time', parsePositiveInteger, 1)
    .option('--no-ai', 'do not ask an LLM when every candidate URL fails')
    .option('--no-content-check', 'accept any HTML page, even one that never mentions an API')
    .addOption(
      new Option('--provider <provider>', 'LLM provider for the AI fallback')
        .choices(Object.values(LLMProvider))
        .default(DEFAULT_PROVIDER)
    )
    .option('--api-key <key>', 'API key for the selected LLM provider (can also be set via environment variable)')
    .option('--model <model>', 'specific model to use (provider-dependent)')
    .option('--strategies <list>', `comma-separated extraction strategies (${STRATEGY_PRIORITY.join(', ')})`)
    .option('--dry-run', 'find and extract endpoints without writing the spreadsheet', false);

  program.addHelpText('after', `

${chalk.bold('Examples:')}
  ${chalk.cyan('# Find Stripe\'s API documentation and export it')}
  $ api-discovery Stripe

  ${chalk.cyan('# Choose the output file')}
  $ api-discovery "Acme Corp" --output ./exports/acme.xlsx

  ${chalk.cyan('# Probe four candidates at a time, without the AI fallback')}
  $ api-discovery github --concurrency 4 --no-ai

  ${chalk.cyan('# Use Anthropic for the AI fallback')}
  $ api-discovery twilio --provider anthropic --model claude-3-haiku-20240307

${chalk.bold('Environment Variables:')}
  ${chalk.yellow('OPENROUTER_API_KEY')}   API key for OpenRouter (default provider)
  ${chalk.yellow('OPENAI_API_KEY')}       API key for OpenAI
  ${chalk.yellow('ANTHROPIC_API_KEY')}    API key for Anthropic
  ${chalk.yellow('GEMINI_API_KEY')}       API key for Google Gemini
  ${chalk.yellow('DEBUG')}                Enable debug mode (alternative to --debug)

${chalk.bold('Exit Codes:')}
  0    endpoints exported (even when none were found on the page)
  1    documentation could not be located
  2    invalid configuration
  3    the spreadsheet could not be written
  130  interrupted
  143  terminated
`);

  return program;
}

/**
 * API key from the option, else from the provider's environment variable
 */
export function resolveApiKey(
  provider: string,
  explicitKey: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (explicitKey && explicitKey.trim() !== '') {
    return explicitKey;
  }
  if (!isLLMProvider(provider)) {
    return undefined;
  }
  const fromEnv = env[API_KEY_ENV_VARS[provider]];
  return fromEnv && fromEnv.trim() !== '' ? fromEnv : undefined;
}

/**
 * Parse CLI options into CliArgs format
 */
export function toCliArgs(company: string, options: CliOptions, env: NodeJS.ProcessEnv = process.env): CliArgs {
  return {
    company,
    output: options.output,
    timeout: options.timeout,
    concurrency: options.concurrency,
    contentCheck: options.contentCheck,
    ai: options.ai,
    provider: options.provider,
    apiKey: resolveApiKey(options.provider, options.apiKey, env),
    model: options.model,
    strategies: options.strategies,
    verbose: options.verbose,
    debug: options.debug || env.DEBUG === 'true',
    dryRun: options.dryRun,
  };
}
