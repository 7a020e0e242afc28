// ============================================================================
// Error Handler Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ErrorCode,
  ErrorSeverity,
  SaverError,
  StorageError,
  formatErrorForDev,
  normalizeError,
  tryCatch,
  unwrapOr,
} from '../../../src/main/errors';

class FakeSqliteError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = 'SqliteError';
  }
}

describe('normalizeError', () => {
  it('should pass SaverErrors through', () => {
    const original = new ConfigError('/tmp/config.yaml', 'bad');

    expect(normalizeError(original)).toBe(original);
  });

  it('should map SQLite errors to StorageError', () => {
    const busy = normalizeError(new FakeSqliteError('database is locked', 'SQLITE_BUSY'), 'save');
    const other = normalizeError(new FakeSqliteError('no such table: x', 'SQLITE_ERROR'), 'recent');

    expect(busy).toBeInstanceOf(StorageError);
    expect(busy.code).toBe(ErrorCode.STORAGE_UNAVAILABLE);
    expect(busy.context).toEqual({ operation: 'save', dbPath: undefined });
    expect(other.code).toBe(ErrorCode.STORAGE_READ_FAILED);
  });

  it('should wrap plain errors as internal', () => {
    const normalized = normalizeError(new TypeError('boom'), 'search');

    expect(normalized).toBeInstanceOf(SaverError);
    expect(normalized).not.toBeInstanceOf(StorageError);
    expect(normalized.code).toBe(ErrorCode.INTERNAL);
    expect(normalized.message).toBe('boom');
  });

  it('should apply the operation failure code', () => {
    const sqlite = normalizeError(
      new FakeSqliteError('fts5: syntax error', 'SQLITE_ERROR'),
      'search',
      ErrorCode.SEARCH_FAILED
    );
    const locked = normalizeError(
      new FakeSqliteError('database is locked', 'SQLITE_BUSY'),
      'save',
      ErrorCode.STORAGE_WRITE_FAILED
    );
    const plain = normalizeError(new TypeError('boom'), 'search', ErrorCode.SEARCH_FAILED);

    expect(sqlite).toBeInstanceOf(StorageError);
    expect(sqlite.code).toBe(ErrorCode.SEARCH_FAILED);
    expect(locked.code).toBe(ErrorCode.STORAGE_UNAVAILABLE);
    expect(plain.code).toBe(ErrorCode.SEARCH_FAILED);
  });

  it('should wrap strings and unknown values', () => {
    expect(normalizeError('plain message').message).toBe('plain message');
    expect(normalizeError(42).context).toEqual({ operation: 'unknown', originalError: '42' });
  });
});

describe('tryCatch', () => {
  it('should wrap a returned value', () => {
    expect(tryCatch('op', () => 3)).toEqual({ ok: true, value: 3 });
  });

  it('should turn a throw into a failure result', () => {
    const result = tryCatch('op', () => {
      throw new Error('nope');
    });

    expect(result.ok).toBe(false);
    expect(unwrapOr(result, 'fallback')).toBe('fallback');
  });

  it('should tag the failure with the given code', () => {
    const result = tryCatch(
      'save',
      () => {
        throw new FakeSqliteError('no such table: captures', 'SQLITE_ERROR');
      },
      ErrorCode.STORAGE_WRITE_FAILED
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.STORAGE_WRITE_FAILED);
  });
});

describe('SaverError', () => {
  it('should serialize for JSON output', () => {
    const error = new ConfigError('/tmp/config.yaml', 'Invalid config');

    expect(error.toJSON()).toMatchObject({
      name: 'ConfigError',
      message: 'Invalid config',
      code: ErrorCode.CONFIG_INVALID,
      severity: ErrorSeverity.WARNING,
      context: { configPath: '/tmp/config.yaml' },
      recoverable: true,
    });
    expect(formatErrorForDev(error)).toBe(
      '[CONFIG_INVALID] Invalid config\nContext: {"configPath":"/tmp/config.yaml"}'
    );
  });
});
