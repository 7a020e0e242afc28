// ============================================================================
// CLI Bootstrap - 打开存储，管理生命周期
// ============================================================================

import { InvalidArgumentError } from 'commander';
import { Saver } from '../main/saver';
import { LogLevel, setDefaultLogLevel } from '../main/services/infra/logger';
import { formatErrorForDev, normalizeError, type SaverError } from '../main/errors';
import { jsonOutput, terminalOutput } from './output';
import type { CLIGlobalOptions } from './types';

let saver: Saver | null = null;

/**
 * Open the capture store once per process
 */
export function initializeCLIServices(globalOpts: CLIGlobalOptions): Saver {
  if (saver) return saver;

  // CLI 默认只打印警告以上，--debug 或 SAVER_LOG_LEVEL 可覆盖；
  // .env 中的 SAVER_LOG_LEVEL 由 ConfigService 加载时应用
  if (globalOpts.debug) {
    setDefaultLogLevel(LogLevel.DEBUG);
  } else if (!process.env.SAVER_LOG_LEVEL) {
    setDefaultLogLevel(LogLevel.WARN);
  }

  saver = Saver.open({ configPath: globalOpts.config });

  // --debug 优先于 .env
  if (globalOpts.debug) {
    setDefaultLogLevel(LogLevel.DEBUG);
  }
  return saver;
}

export function getSaver(): Saver {
  if (!saver) {
    throw new Error('CLI services not initialized');
  }
  return saver;
}

export function cleanup(): void {
  if (saver) {
    saver.close();
    saver = null;
  }
}

/**
 * Report a failure in the selected format, release the store and exit 1
 */
export function fail(error: unknown, globalOpts: CLIGlobalOptions, operation: string): never {
  const normalized: SaverError = normalizeError(error, operation);
  if (globalOpts.json) {
    jsonOutput.failure(normalized);
  } else {
    terminalOutput.error(globalOpts.debug ? formatErrorForDev(normalized) : normalized.message);
  }
  cleanup();
  process.exit(1);
}

// ----------------------------------------------------------------------------
// Option parsers
// ----------------------------------------------------------------------------

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return Number.parseInt(value, 10);
}

export function parseScore(value: string): number {
  const score = Number(value);
  if (value.trim() === '' || Number.isNaN(score) || score < 0 || score > 1) {
    throw new InvalidArgumentError('Not a number between 0 and 1.');
  }
  return score;
}

/**
 * Read all of stdin as UTF-8
 */
export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
