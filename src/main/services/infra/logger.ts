/**
 * 统一日志服务
 * Leveled, context-tagged console logging with secret redaction
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const SENSITIVE_KEYS = [
  'apikey',
  'api_key',
  'password',
  'token',
  'secret',
  'authorization',
  'credential',
  'private',
];

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Resolve the starting level: SAVER_LOG_LEVEL wins, then NODE_ENV.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.SAVER_LOG_LEVEL?.toLowerCase();
  if (configured && Object.hasOwn(LEVEL_NAMES, configured)) {
    return LEVEL_NAMES[configured];
  }
  return env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let defaultLevel: LogLevel = resolveLogLevel();

/**
 * Change the level used by loggers that have not been given their own.
 */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export class Logger {
  private level: LogLevel | null = null;
  private context?: string;

  constructor(context?: string) {
    this.context = context;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private get effectiveLevel(): LogLevel {
    return this.level ?? defaultLevel;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.effectiveLevel <= LogLevel.DEBUG) {
      this.log('DEBUG', message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.effectiveLevel <= LogLevel.INFO) {
      this.log('INFO', message, args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.effectiveLevel <= LogLevel.WARN) {
      this.log('WARN', message, args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.effectiveLevel > LogLevel.ERROR) return;

    // 检查第一个参数是否是 Error 对象
    const firstArg = args[0];
    if (firstArg instanceof Error) {
      const errorInfo = { errorMessage: firstArg.message, stack: firstArg.stack };
      this.log('ERROR', message, [errorInfo, ...args.slice(1)]);
    } else {
      this.log('ERROR', message, args);
    }
  }

  private log(level: string, message: string, args: unknown[]): void {
    const timestamp = new Date().toISOString();
    const ctx = this.context ? `[${this.context}]` : '';

    // stdout 留给命令输出，日志统一走 stderr
    const logFn = level === 'ERROR' ? console.error : console.warn;

    const sanitizedArgs = args.map((arg) => {
      if (arg instanceof Error) {
        return { errorMessage: arg.message };
      }
      if (isRecord(arg)) {
        return this.sanitize(arg);
      }
      return arg;
    });

    if (sanitizedArgs.length > 0) {
      logFn(`${timestamp} ${level} ${ctx} ${message}`, ...sanitizedArgs);
    } else {
      logFn(`${timestamp} ${level} ${ctx} ${message}`);
    }
  }

  private sanitize(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some((sk) => lowerKey.includes(sk));

      if (isSensitive) {
        result[key] = '***REDACTED***';
      } else if (value instanceof Error) {
        result[key] = value.message;
      } else if (isRecord(value)) {
        result[key] = this.sanitize(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

/**
 * 创建带上下文的 Logger 实例
 * @param context 日志上下文（通常是类名或模块名）
 */
export function createLogger(context: string): Logger {
  return new Logger(context);
}

