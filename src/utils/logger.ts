import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  enableSpinner?: boolean;
}

/**
 * Console state shared by a logger and its children, so that a child
 * stops the parent's spinner and picks up level changes.
 */
interface LoggerState {
  level: LogLevel;
  spinnerEnabled: boolean;
  spinnerInterval: NodeJS.Timeout | null;
  spinnerMessage: string;
}

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

class Logger {
  private readonly state: LoggerState;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}, state?: LoggerState) {
    this.state = state ?? {
      level: options.level ?? (process.env.DEBUG === 'true' ? 'debug' : 'info'),
      spinnerEnabled: options.enableSpinner ?? Boolean(process.stdout.isTTY),
      spinnerInterval: null,
      spinnerMessage: '',
    };
    this.scope = options.scope;
  }

  /**
   * Create a logger that prefixes every line with `[scope]`
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger({ scope: nested }, this.state);
  }

  info(message: string): void {
    if (this.enabled('info')) {
      this.stopSpinner();
      console.log(chalk.blue('ℹ'), this.format(message));
    }
  }

  success(message: string): void {
    if (this.enabled('info')) {
      this.stopSpinner();
      console.log(chalk.green('✓'), this.format(message));
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      this.stopSpinner();
      console.log(chalk.yellow('⚠'), this.format(message));
    }
  }

  /**
   * Log an error message; the stack is printed only at debug level
   */
  error(message: string, error?: Error): void {
    if (this.enabled('error')) {
      this.stopSpinner();
      console.error(chalk.red('✗'), this.format(message));
      if (error && this.enabled('debug')) {
        console.error(chalk.red(error.stack || error.message));
      }
    }
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      this.stopSpinner();
      console.log(chalk.gray('🐛'), chalk.gray(this.format(message)));
    }
  }

  startSpinner(message: string): void {
    if (!this.enabled('info')) {
      return;
    }
    if (!this.state.spinnerEnabled) {
      this.info(message);
      return;
    }

    this.stopSpinner();
    this.state.spinnerMessage = message;
    let frameIndex = 0;

    // Hide cursor
    process.stdout.write('\x1B[?25l');

    this.state.spinnerInterval = setInterval(() => {
      const frame = SPINNER_FRAMES[frameIndex];
      frameIndex = (frameIndex + 1) % SPINNER_FRAMES.length;
      process.stdout.write('\r\x1B[K');
      process.stdout.write(`${chalk.cyan(frame)} ${this.state.spinnerMessage}`);
    }, 80);
  }

  updateSpinner(message: string): void {
    this.state.spinnerMessage = message;
  }

  stopSpinner(): void {
    if (this.state.spinnerInterval) {
      clearInterval(this.state.spinnerInterval);
      this.state.spinnerInterval = null;

      // Clear line and show cursor
      process.stdout.write('\r\x1B[K');
      process.stdout.write('\x1B[?25h');
    }
  }

  succeedSpinner(message?: string): void {
    this.stopSpinner();
    this.success(message || this.state.spinnerMessage);
  }

  failSpinner(message?: string, error?: Error): void {
    this.stopSpinner();
    this.error(message || this.state.spinnerMessage, error);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.state.level];
  }

  private format(message: string): string {
    return this.scope ? `${chalk.dim(`[${this.scope}]`)} ${message}` : message;
  }
}

// Default logger instance shared by the library and the CLI
const logger = new Logger();

export { Logger, logger };
