// ============================================================================
// Errors Module - Unified error handling
// ============================================================================

// Error types
export {
  ErrorCode,
  ErrorSeverity,
  SaverError,
  CaptureValidationError,
  StorageError,
  ConfigError,
  type SaverErrorOptions,
  type SerializedError,
} from './types';

// Result values
export { ok, err, unwrapOr, type Result } from './result';

// Error handling utilities
export {
  normalizeError,
  logError,
  tryCatch,
  formatErrorForDev,
} from './handler';
