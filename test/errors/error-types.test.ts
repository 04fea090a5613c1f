import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  DocumentationNotFoundError,
  ErrorCategory,
  ErrorCode,
  ErrorUtils,
  ExportError,
} from '../../src/errors/error-types.js';

describe('DocumentationNotFoundError', () => {
  const error = new DocumentationNotFoundError('Acme', [
    { url: 'https://api.acme.com', source: 'candidate', accepted: false, status: 404, reason: 'HTTP 404' },
  ]);

  it('carries the company, attempts and category', () => {
    expect(error.message).toBe('Could not locate API documentation for \'Acme\'');
    expect(error.name).toBe('DocumentationNotFoundError');
    expect(error.code).toBe(ErrorCode.DISCOVERY_DOCUMENTATION_NOT_FOUND);
    expect(error.category).toBe(ErrorCategory.DISCOVERY);
    expect(error.context).toEqual({ operation: 'locate', company: 'Acme', metadata: { attempts: 1 } });
  });

  it('suggests checking the spelling first', () => {
    expect(error.getPrimarySuggestion()?.action).toBe('check_spelling');
  });
});

describe('DiscoveryError.serialize', () => {
  it('includes the code, context and the wrapped error', () => {
    const cause = new Error('EACCES: permission denied');
    const error = new ExportError('Failed to write spreadsheet to /ro/acme.xlsx', '/ro/acme.xlsx', ErrorCode.OUTPUT_WRITE_FAILED, cause);

    const serialized = error.serialize();

    expect(serialized).toMatchObject({
      name: 'ExportError',
      message: 'Failed to write spreadsheet to /ro/acme.xlsx',
      code: ErrorCode.OUTPUT_WRITE_FAILED,
      category: ErrorCategory.OUTPUT,
      context: { operation: 'export', url: '/ro/acme.xlsx' },
      originalError: { name: 'Error', message: 'EACCES: permission denied' },
    });
    expect(serialized.timestamp).toBe(error.timestamp.toISOString());
  });
});

describe('ErrorUtils', () => {
  it('maps failures to exit codes', () => {
    expect(ErrorUtils.exitCodeFor(new ConfigurationError('bad provider', ErrorCode.CONFIG_INVALID_VALUE))).toBe(2);
    expect(ErrorUtils.exitCodeFor(new ExportError('disk full', 'acme.xlsx'))).toBe(3);
    expect(ErrorUtils.exitCodeFor(new DocumentationNotFoundError('Acme'))).toBe(1);
    expect(ErrorUtils.exitCodeFor(new Error('boom'))).toBe(1);
  });

  it('normalizes thrown values into errors', () => {
    const error = new Error('boom');

    expect(ErrorUtils.toError(error)).toBe(error);
    expect(ErrorUtils.toError('plain message').message).toBe('plain message');
    expect(ErrorUtils.toError({ status: 500 }).message).toBe('Unknown error');
  });

  it('recognizes discovery errors', () => {
    expect(ErrorUtils.isDiscoveryError(new ExportError('disk full', 'acme.xlsx'))).toBe(true);
    expect(ErrorUtils.isDiscoveryError(new Error('boom'))).toBe(false);
  });
});
