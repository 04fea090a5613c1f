/**
 * Error types for the API discovery pipeline.
 * Only a failed documentation search and setup problems reach the caller;
 * per-candidate and per-fragment failures are recovered where they happen.
 */

import type { ProbeAttempt } from '../models/types.js';

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  NETWORK = 'network',
  DISCOVERY = 'discovery',
  AI = 'ai',
  CONFIG = 'config',
  OUTPUT = 'output',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/**
 * Specific error codes for different error types
 */
export enum ErrorCode {
  // Network errors (1000-1999)
  NETWORK_CONNECTION_FAILED = 1001,
  NETWORK_TIMEOUT = 1002,
  NETWORK_DNS_RESOLUTION = 1003,
  NETWORK_CONNECTION_REFUSED = 1004,
  NETWORK_ABORTED = 1005,

  // Discovery errors (2000-2999)
  DISCOVERY_DOCUMENTATION_NOT_FOUND = 2001,

  // AI service errors (3000-3999)
  AI_SERVICE_UNAVAILABLE = 3001,
  AI_SERVICE_INVALID_RESPONSE = 3003,

  // Configuration errors (4000-4999)
  CONFIG_MISSING_REQUIRED = 4001,
  CONFIG_INVALID_VALUE = 4002,

  // Output errors (5000-5999)
  OUTPUT_WRITE_FAILED = 5001,
  OUTPUT_INVALID_PATH = 5002,
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  operation?: string;
  url?: string;
  company?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Suggested actions for error recovery
 */
export interface ErrorSuggestion {
  action: string;
  description: string;
  priority: number;
}

/**
 * Serialized error format for logging and debugging
 */
export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  suggestions: ErrorSuggestion[];
  context?: ErrorContext;
  stack?: string;
  timestamp: string;
  originalError?: { name: string; message: string };
}

/**
 * Base error class for all discovery errors
 */
export abstract class DiscoveryError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly suggestions: ErrorSuggestion[];
  public readonly context?: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode,
    category: ErrorCategory,
    severity: ErrorSeverity,
    suggestions: ErrorSuggestion[] = [],
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.suggestions = suggestions;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging and debugging
   */
  public serialize(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      suggestions: this.suggestions,
      context: this.context,
      stack: this.stack,
      timestamp: this.timestamp.toISOString(),
      originalError: this.originalError
        ? { name: this.originalError.name, message: this.originalError.message }
        : undefined,
    };
  }

  /**
   * Get user-friendly error message
   */
  public getUserMessage(): string {
    return this.message;
  }

  /**
   * Get primary suggestion for error recovery
   */
  public getPrimarySuggestion(): ErrorSuggestion | undefined {
    return [...this.suggestions].sort((a, b) => a.priority - b.priority)[0];
  }
}

/**
 * A single candidate URL could not be used. Recorded on the probe attempt, never thrown to the caller.
 */
export class CandidateUnreachableError extends DiscoveryError {
  constructor(
    url: string,
    reason: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    originalError?: Error
  ) {
    super(
      `Could not reach ${url}: ${reason}`,
      code,
      ErrorCategory.NETWORK,
      ErrorSeverity.LOW,
      [],
      { operation: 'probe', url },
      originalError
    );
  }
}

/**
 * Every candidate URL and the AI fallback failed
 */
export class DocumentationNotFoundError extends DiscoveryError {
  public readonly company: string;
  public readonly attempts: ProbeAttempt[];

  constructor(company: string, attempts: ProbeAttempt[] = []) {
    const suggestions: ErrorSuggestion[] = [
      {
        action: 'check_spelling',
        description: 'Make sure the company name is spelled correctly',
        priority: 1,
      },
      {
        action: 'try_alias',
        description: 'Try the full company name or a common abbreviation',
        priority: 2,
      },
      {
        action: 'enable_ai_lookup',
        description: 'Provide an API key so the AI-assisted lookup can be used',
        priority: 3,
      },
    ];

    super(
      `Could not locate API documentation for '${company}'`,
      ErrorCode.DISCOVERY_DOCUMENTATION_NOT_FOUND,
      ErrorCategory.DISCOVERY,
      ErrorSeverity.HIGH,
      suggestions,
      { operation: 'locate', company, metadata: { attempts: attempts.length } }
    );
    this.company = company;
    this.attempts = attempts;
  }
}

/**
 * AI-assisted lookup failures
 */
export class AIServiceError extends DiscoveryError {
  public readonly provider?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.AI_SERVICE_UNAVAILABLE,
    provider?: string,
    originalError?: Error
  ) {
    super(message, code, ErrorCategory.AI, ErrorSeverity.MEDIUM, [], { operation: 'ai-lookup' }, originalError);
    this.provider = provider;
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends DiscoveryError {
  public readonly configKey?: string;

  constructor(message: string, code: ErrorCode = ErrorCode.CONFIG_MISSING_REQUIRED, configKey?: string) {
    const suggestions: ErrorSuggestion[] = [
      {
        action: 'check_arguments',
        description: 'Use --help to see all available options and examples',
        priority: 1,
      },
    ];

    super(message, code, ErrorCategory.CONFIG, ErrorSeverity.CRITICAL, suggestions, { operation: 'configure' });
    this.configKey = configKey;
  }
}

/**
 * Spreadsheet could not be written
 */
export class ExportError extends DiscoveryError {
  public readonly filePath: string;

  constructor(
    message: string,
    filePath: string,
    code: ErrorCode = ErrorCode.OUTPUT_WRITE_FAILED,
    originalError?: Error
  ) {
    const suggestions: ErrorSuggestion[] = [
      {
        action: 'check_permissions',
        description: 'Check that the output directory is writable',
        priority: 1,
      },
      {
        action: 'close_file',
        description: 'Close the workbook if it is open in another program',
        priority: 2,
      },
    ];

    super(message, code, ErrorCategory.OUTPUT, ErrorSeverity.HIGH, suggestions, { operation: 'export', url: filePath }, originalError);
    this.filePath = filePath;
  }
}

/**
 * Utility functions for error handling
 */
export class ErrorUtils {
  static isDiscoveryError(error: unknown): error is DiscoveryError {
    return error instanceof DiscoveryError;
  }

  /**
   * Normalize anything thrown into an Error
   */
  static toError(error: unknown): Error {
    if (error instanceof Error) {
      return error;
    }
    return new Error(typeof error === 'string' ? error : 'Unknown error');
  }

  /**
   * Process exit code for an error that ended a run
   */
  static exitCodeFor(error: unknown): number {
    if (error instanceof ConfigurationError) {
      return 2;
    }
    if (error instanceof ExportError) {
      return 3;
    }
    return 1;
  }
}
