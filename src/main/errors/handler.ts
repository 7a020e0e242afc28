// ============================================================================
// Error Handler - Centralized error handling utilities
// ============================================================================

import {
  SaverError,
  StorageError,
  ErrorCode,
  ErrorSeverity,
} from './types';
import { err, ok, type Result } from './result';
import { createLogger } from '../services/infra/logger';

const logger = createLogger('ErrorHandler');

// ----------------------------------------------------------------------------
// Error Normalization
// ----------------------------------------------------------------------------

/**
 * Convert any thrown value to a SaverError.
 * SQLite failures (better-sqlite3 throws `SqliteError` with an `SQLITE_*`
 * code) become StorageError. `failureCode` names what the operation was
 * doing; lock and permission errors keep STORAGE_UNAVAILABLE.
 */
export function normalizeError(
  error: unknown,
  operation = 'unknown',
  failureCode?: ErrorCode
): SaverError {
  if (error instanceof SaverError) {
    return error;
  }

  if (error instanceof Error) {
    if (isSqliteError(error)) {
      return new StorageError(operation, error.message, {
        code: inferStorageCode(error, failureCode ?? ErrorCode.STORAGE_READ_FAILED),
        cause: error,
      });
    }
    return new SaverError(error.message, {
      cause: error,
      code: failureCode ?? ErrorCode.INTERNAL,
      context: { operation },
    });
  }

  if (typeof error === 'string') {
    return new SaverError(error, { context: { operation } });
  }

  return new SaverError('An unknown error occurred', {
    context: { operation, originalError: String(error) },
  });
}

function isSqliteError(error: Error): error is Error & { code: string } {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' && (error.name === 'SqliteError' || code.startsWith('SQLITE_'));
}

function inferStorageCode(error: Error & { code: string }, fallback: ErrorCode): ErrorCode {
  switch (error.code) {
    case 'SQLITE_CANTOPEN':
    case 'SQLITE_PERM':
    case 'SQLITE_READONLY':
    case 'SQLITE_BUSY':
    case 'SQLITE_LOCKED':
      return ErrorCode.STORAGE_UNAVAILABLE;
    default:
      return fallback;
  }
}

// ----------------------------------------------------------------------------
// Error Logging
// ----------------------------------------------------------------------------

/**
 * Log error with appropriate level
 */
export function logError(error: SaverError): void {
  const logData = {
    code: ErrorCode[error.code],
    context: error.context,
    recoverable: error.recoverable,
  };

  switch (error.severity) {
    case ErrorSeverity.INFO:
      logger.info(error.message, logData);
      break;
    case ErrorSeverity.WARNING:
      logger.warn(error.message, logData);
      break;
    case ErrorSeverity.CRITICAL:
      logger.error(error.message, { ...logData, stack: error.stack });
      break;
    case ErrorSeverity.ERROR:
    default:
      logger.error(error.message, logData);
      break;
  }
}

// ----------------------------------------------------------------------------
// Error Wrapping
// ----------------------------------------------------------------------------

/**
 * Run a synchronous operation, turning anything it throws into a logged
 * failure Result.
 */
export function tryCatch<T>(
  operation: string,
  fn: () => T,
  failureCode?: ErrorCode
): Result<T> {
  try {
    return ok(fn());
  } catch (error) {
    const normalized = normalizeError(error, operation, failureCode);
    logError(normalized);
    return err(normalized);
  }
}

// ----------------------------------------------------------------------------
// Error Formatting
// ----------------------------------------------------------------------------

/**
 * Format error for developer output (`--debug`)
 */
export function formatErrorForDev(error: SaverError): string {
  const parts = [`[${ErrorCode[error.code]}] ${error.message}`];

  if (error.context) {
    parts.push(`Context: ${JSON.stringify(error.context)}`);
  }

  return parts.join('\n');
}
