/**
 * Unit tests for resolver error handling
 *
 * Tests the error hierarchy, fromUnknown wrapping and stderr formatting.
 *
 * @module tests/unit/errors
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ConnectionError,
  CycleError,
  LoadError,
  NoSelectionError,
  QueryError,
  ResolverError,
  ValidationError,
  errorMessage,
  formatErrorMessage,
} from '../../src/utils/errors.js';

describe('ResolverError subclasses', () => {
  it.each([
    [new ValidationError('bad flag'), 'ValidationError', 'VALIDATION_ERROR'],
    [new ConfigurationError('no dsn'), 'ConfigurationError', 'CONFIGURATION_ERROR'],
    [new ConnectionError('refused'), 'ConnectionError', 'CONNECTION_ERROR'],
    [new LoadError('no table'), 'LoadError', 'LOAD_ERROR'],
    [new QueryError('bad sql'), 'QueryError', 'QUERY_ERROR'],
    [new CycleError(1, [1, 2, 1]), 'CycleError', 'CYCLE_ERROR'],
    [new NoSelectionError(), 'NoSelectionError', 'NO_SELECTION'],
  ])('%s has name %s and category %s', (error, name, category) => {
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ResolverError);
    expect(error.name).toBe(name);
    expect(error.category).toBe(category);
  });

  it('gives NoSelectionError a default message', () => {
    expect(new NoSelectionError().message).toBe('No page ids selected');
  });

  it('records the cycle path on CycleError', () => {
    const error = new CycleError(4, [4, 5, 4]);
    expect(error.path).toEqual([4, 5, 4]);
    expect(error.details).toEqual({ startId: 4, path: [4, 5, 4] });
  });

  it('has a stack trace', () => {
    expect(new LoadError('x').stack).toContain('LoadError');
  });
});

describe('ResolverError.fromUnknown', () => {
  it('returns resolver errors unchanged', () => {
    const error = new QueryError('bad sql');
    expect(ResolverError.fromUnknown(error)).toBe(error);
  });

  it('wraps plain errors as INTERNAL_ERROR', () => {
    const wrapped = ResolverError.fromUnknown(new TypeError('boom'));
    expect(wrapped.category).toBe('INTERNAL_ERROR');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.details?.originalName).toBe('TypeError');
  });

  it('wraps non-error values with the given category', () => {
    const wrapped = ResolverError.fromUnknown('oops', 'QUERY_ERROR');
    expect(wrapped.category).toBe('QUERY_ERROR');
    expect(wrapped.message).toBe('oops');
    expect(wrapped.details).toEqual({ originalValue: 'oops' });
  });
});

describe('formatErrorMessage', () => {
  it('prints category and message', () => {
    expect(formatErrorMessage(new LoadError('Cannot load pages: boom'))).toBe(
      'Error [LOAD_ERROR]: Cannot load pages: boom'
    );
  });

  it('appends details when verbose', () => {
    const error = new QueryError('bad', { sql: 'SELECT x' });
    expect(formatErrorMessage(error, true)).toBe(
      'Error [QUERY_ERROR]: bad\n{\n  "sql": "SELECT x"\n}'
    );
  });

  it('leaves out stack details even when verbose', () => {
    const wrapped = ResolverError.fromUnknown(new Error('boom'));
    expect(formatErrorMessage(wrapped, true)).toBe(
      'Error [INTERNAL_ERROR]: boom\n{\n  "originalName": "Error"\n}'
    );
  });

  it('prints only the head when there are no details', () => {
    expect(formatErrorMessage(new ConfigurationError('no dsn'), true)).toBe(
      'Error [CONFIGURATION_ERROR]: no dsn'
    );
  });
});

describe('errorMessage', () => {
  it('reads the message of errors and stringifies the rest', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage(42)).toBe('42');
  });
});
