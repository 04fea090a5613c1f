#!/usr/bin/env node

import chalk from 'chalk';
import dotenv from 'dotenv';
import { ConfigBuilder, ConfigValidationError } from '../models/config.js';
import { discoverApi, formatDuration, formatTokenUsage, getDiscoverySummary, type DiscoveryReport } from '../core/app.js';
import { DocumentationNotFoundError, ErrorUtils } from '../errors/error-types.js';
import { logger } from '../utils/logger.js';
import { createProgram, packageInfo, toCliArgs, type CliOptions } from './program.js';

// Load environment variables from .env file
dotenv.config();

const EXIT_INTERRUPTED = 130;
const EXIT_TERMINATED = 143;

/**
 * Main CLI program setup and execution
 */
async function main(): Promise<void> {
  const program = createProgram();

  program.action(async (company: string, options: CliOptions) => {
    try {
      const config = ConfigBuilder.fromCliArgs(toCliArgs(company, options));
      logger.setLevel(config.debug ? 'debug' : 'info');

      console.log(chalk.blue.bold(`\n🔎 ${packageInfo.name} v${packageInfo.version}`));
      console.log(chalk.gray(packageInfo.description));
      console.log();

      const report = await discoverApi(config, (step, progress, total) => {
        if (config.verbose) {
          const percentage = Math.round((progress / total) * 100);
          console.log(chalk.blue(`[${percentage}%] ${step}`));
        } else if (progress === 0) {
          logger.startSpinner(step);
        } else {
          logger.updateSpinner(step);
        }
      });

      if (!config.verbose) {
        if (report.success) {
          logger.succeedSpinner('Discovery finished');
        } else {
          logger.failSpinner('Discovery stopped');
        }
      }

      displayResults(report, config.verbose);
      process.exit(report.success ? 0 : ErrorUtils.exitCodeFor(report.failure));

    } catch (error) {
      handleError(error, options.debug);
      process.exit(error instanceof ConfigValidationError ? 2 : ErrorUtils.exitCodeFor(error));
    }
  });

  await program.parseAsync(process.argv);
}

/**
 * Display discovery results
 */
function displayResults(report: DiscoveryReport, verbose: boolean): void {
  console.log();

  if (verbose && report.attempts.length > 0) {
    console.log(chalk.bold('🌐 Probed URLs:'));
    for (const attempt of report.attempts) {
      const mark = attempt.accepted ? chalk.green('✓') : chalk.red('✗');
      const origin = attempt.source === 'ai' ? chalk.magenta(' (AI)') : '';
      const reason = attempt.reason ? chalk.gray(` ${attempt.reason}`) : '';
      console.log(`   ${mark} ${attempt.url}${origin}${reason}`);
    }
    console.log();
  }

  if (report.success && report.result) {
    const { result } = report;
    console.log(chalk.green.bold('✅ API discovery completed successfully!'));
    console.log();
    console.log(chalk.bold('📊 Summary:'));
    console.log(`   ${chalk.cyan('Documentation:')} ${result.documentationUrl ?? 'Not found'}`);
    console.log(`   ${chalk.cyan('Endpoints found:')} ${result.endpoints.length}`);
    if (report.tokensUsed > 0) {
      console.log(`   ${chalk.cyan('Tokens used:')} ${formatTokenUsage(report.tokensUsed)}`);
    }
    console.log(`   ${chalk.cyan('Duration:')} ${formatDuration(report.duration)}`);
    console.log(`   ${chalk.cyan('Output file:')} ${report.outputFile ?? 'none (dry run)'}`);

    if (result.endpoints.length === 0) {
      console.log();
      console.log(chalk.yellow('⚠️  No endpoints could be extracted; the spreadsheet links to the documentation instead.'));
    }

    if (verbose) {
      console.log();
      console.log(getDiscoverySummary(report));
    }
    return;
  }

  console.log(chalk.red.bold('❌ API discovery failed'));
  console.log();
  console.log(`   ${chalk.cyan('Duration:')} ${formatDuration(report.duration)}`);
  console.log(`   ${chalk.red('Error:')} ${report.error ?? 'Unknown error'}`);

  if (report.failure instanceof DocumentationNotFoundError && !verbose) {
    console.log();
    console.log(chalk.yellow('💡 Tip: run with --verbose to see every URL that was tried'));
  } else if (ErrorUtils.isDiscoveryError(report.failure)) {
    const suggestion = report.failure.getPrimarySuggestion();
    if (suggestion) {
      console.log();
      console.log(chalk.yellow(`💡 ${suggestion.description}`));
    }
  }
}

/**
 * Handle and display errors appropriately
 */
function handleError(error: unknown, debug: boolean = false): void {
  console.log(); // Add spacing

  if (error instanceof ConfigValidationError) {
    console.log(chalk.red.bold('❌ Configuration Error'));
    console.log(chalk.red(error.message));
    console.log();
    console.log(chalk.yellow('💡 Tip: Use --help to see all available options and examples'));
  } else if (error instanceof Error) {
    console.log(chalk.red.bold('❌ Error'));
    console.log(chalk.red(error.message));

    if (debug) {
      console.log();
      console.log(chalk.gray('Debug information:'));
      console.log(chalk.gray(error.stack ?? 'No stack trace available'));
    }
  } else {
    console.log(chalk.red.bold('❌ Unknown Error'));
    console.log(chalk.red('An unexpected error occurred'));

    if (debug) {
      console.log();
      console.log(chalk.gray('Debug information:'));
      console.log(chalk.gray(JSON.stringify(error, null, 2)));
    }
  }
}

/**
 * Handle uncaught exceptions and unhandled rejections
 */
process.on('uncaughtException', (error) => {
  console.log(chalk.red.bold('\n❌ Uncaught Exception'));
  console.log(chalk.red(error.message));
  console.log(chalk.gray('\nThe application will now exit.'));
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.log(chalk.red.bold('\n❌ Unhandled Promise Rejection'));
  console.log(chalk.red(reason instanceof Error ? reason.message : String(reason)));
  console.log(chalk.gray('\nThe application will now exit.'));
  process.exit(1);
});

// Handle graceful shutdown
process.on('SIGINT', () => {
  logger.stopSpinner();
  console.log(chalk.yellow('\n\n⚠️  Process interrupted by user'));
  process.exit(EXIT_INTERRUPTED);
});

process.on('SIGTERM', () => {
  logger.stopSpinner();
  console.log(chalk.yellow('\n\n⚠️  Process terminated'));
  process.exit(EXIT_TERMINATED);
});

// Run the main function
main().catch((error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

export { main };
