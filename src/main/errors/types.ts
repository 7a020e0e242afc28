// ============================================================================
// Error Types - Unified error type hierarchy
// ============================================================================

/**
 * Error codes for categorization and handling
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Configuration errors (2xxx)
  CONFIG_INVALID = 2000,
  CONFIG_PARSE = 2001,

  // Capture input errors (3xxx)
  CAPTURE_INVALID = 3000,

  // Storage errors (4xxx)
  STORAGE_UNAVAILABLE = 4000,
  STORAGE_NOT_INITIALIZED = 4001,
  STORAGE_WRITE_FAILED = 4002,
  STORAGE_READ_FAILED = 4003,
  INDEX_REBUILD_FAILED = 4004,

  // Search errors (5xxx)
  SEARCH_FAILED = 5000,
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Informational - can be safely ignored */
  INFO = 'info',
  /** Warning - something unexpected but recoverable */
  WARNING = 'warning',
  /** Error - operation failed but system stable */
  ERROR = 'error',
  /** Critical - system may be unstable */
  CRITICAL = 'critical',
}

export interface SaverErrorOptions {
  code?: ErrorCode;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  recoverable?: boolean;
  cause?: unknown;
}

/**
 * Base error class for all Saver errors
 */
export class SaverError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly timestamp: number;
  public context?: Record<string, unknown>;
  public readonly recoverable: boolean;

  constructor(message: string, options: SaverErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'SaverError';
    this.code = options.code ?? ErrorCode.UNKNOWN;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;
    this.recoverable = options.recoverable ?? true;
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      recoverable: this.recoverable,
    };
  }
}

/**
 * Serialized error format for JSON output
 */
export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  severity: ErrorSeverity;
  timestamp: number;
  context?: Record<string, unknown>;
  recoverable: boolean;
}

// ----------------------------------------------------------------------------
// Specific Error Classes
// ----------------------------------------------------------------------------

/**
 * A capture record that cannot be persisted as given
 */
export class CaptureValidationError extends SaverError {
  public readonly issues: string[];

  constructor(issues: string[], context?: Record<string, unknown>) {
    super(`Invalid capture: ${issues.join('; ')}`, {
      code: ErrorCode.CAPTURE_INVALID,
      severity: ErrorSeverity.WARNING,
      context,
    });
    this.name = 'CaptureValidationError';
    this.issues = issues;
  }
}

/**
 * Database open/read/write failure
 */
export class StorageError extends SaverError {
  constructor(
    operation: string,
    message: string,
    options: {
      code?: ErrorCode;
      dbPath?: string;
      cause?: unknown;
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCode.STORAGE_UNAVAILABLE,
      context: { operation, dbPath: options.dbPath },
      cause: options.cause,
    });
    this.name = 'StorageError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends SaverError {
  constructor(
    configPath: string,
    message: string,
    options: {
      code?: ErrorCode;
      cause?: unknown;
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCode.CONFIG_INVALID,
      severity: ErrorSeverity.WARNING,
      context: { configPath },
      cause: options.cause,
    });
    this.name = 'ConfigError';
  }
}
