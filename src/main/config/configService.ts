// ============================================================================
// Config Service - YAML settings merged over defaults, validated with zod
// ============================================================================

import fs from 'fs';
import path from 'path';
import * as dotenv from 'dotenv';
import * as yaml from 'yaml';
import { z } from 'zod';
import { createLogger, resolveLogLevel, setDefaultLogLevel } from '../services/infra/logger';
import { ConfigError, ErrorCode, logError } from '../errors';
import { CAPTURE, SEARCH, STORAGE } from '../../shared/constants';
import { DEFAULT_SEARCH_WEIGHTS } from '../search/scoring';
import {
  getDataDir,
  getEnvFileCandidates,
  resolveConfigPath,
  resolveDatabasePath,
} from './configPaths';

const logger = createLogger('ConfigService');

// ----------------------------------------------------------------------------
// Schema
// ----------------------------------------------------------------------------

const weight = z.number().min(0).max(1);

export const SaverConfigSchema = z.object({
  capture: z.object({
    saveIntervalSeconds: z.number().positive(),
    minCharsThreshold: z.number().int().nonnegative(),
    enabled: z.boolean(),
  }),
  apps: z.object({
    mode: z.enum(['include', 'exclude']),
    includeList: z.array(z.string()),
    excludeList: z.array(z.string()),
  }),
  storage: z.object({
    databasePath: z.string().min(1),
  }),
  search: z.object({
    defaultLimit: z.number().int().positive(),
    minScore: weight,
    weights: z.object({
      lexicalBase: weight,
      occurrenceBoost: weight,
      occurrenceCap: weight,
      wordCoverageBoost: weight,
      sequenceWeight: weight,
      exactWordWeight: weight,
      partialWordWeight: weight,
    }),
  }),
});

export type SaverConfig = z.infer<typeof SaverConfigSchema>;
export type CaptureSettings = SaverConfig['capture'];
export type AppFilterSettings = SaverConfig['apps'];

export function getDefaultConfig(): SaverConfig {
  return {
    capture: {
      saveIntervalSeconds: CAPTURE.SAVE_INTERVAL_SECONDS,
      minCharsThreshold: CAPTURE.MIN_CHARS_THRESHOLD,
      enabled: true,
    },
    apps: {
      mode: 'include',
      includeList: [
        'Chrome',
        'Safari',
        'Firefox',
        'Visual Studio Code',
        'TextEdit',
        'Notes',
        'Slack',
        'Discord',
        'Terminal',
        'iTerm2',
        'Mail',
      ],
      excludeList: [
        '1Password',
        'Keychain Access',
        'Activity Monitor',
        'System Settings',
        'Calculator',
      ],
    },
    storage: {
      databasePath: STORAGE.DATABASE_FILE,
    },
    search: {
      defaultLimit: SEARCH.DEFAULT_LIMIT,
      minScore: SEARCH.DEFAULT_MIN_SCORE,
      weights: { ...DEFAULT_SEARCH_WEIGHTS },
    },
  };
}

// ----------------------------------------------------------------------------
// Helpers
// ----------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge `override` into `base`; arrays and scalars replace
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return result;
}

// ----------------------------------------------------------------------------
// Config Service
// ----------------------------------------------------------------------------

export interface ConfigServiceOptions {
  /** Explicit config file; otherwise SAVER_CONFIG or <dataDir>/config.yaml */
  configPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Load a .env file into `env` first (default: true) */
  loadEnvFile?: boolean;
}

export class ConfigService {
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath: string;
  private config: SaverConfig;

  constructor(options: ConfigServiceOptions = {}) {
    this.env = options.env ?? process.env;
    if (options.loadEnvFile !== false) {
      this.loadEnvFile();
    }
    this.configPath = resolveConfigPath(options.configPath, this.env);
    this.config = this.loadConfig();
  }

  // 加载 .env 文件
  private loadEnvFile(): void {
    for (const envPath of getEnvFileCandidates(this.env)) {
      if (fs.existsSync(envPath)) {
        const values = dotenv.parse(fs.readFileSync(envPath, 'utf-8'));
        const applied: string[] = [];
        for (const [key, value] of Object.entries(values)) {
          // 已有的环境变量优先
          if (this.env[key] === undefined) {
            this.env[key] = value;
            applied.push(key);
          }
        }
        // logger 在导入时已读取级别，这里重新应用
        if (applied.includes('SAVER_LOG_LEVEL')) {
          setDefaultLogLevel(resolveLogLevel(this.env));
        }
        logger.debug(`Loaded environment from ${envPath}`);
        break;
      }
    }
  }

  /**
   * Read the YAML file. Missing, unreadable or invalid files fall back to
   * defaults.
   */
  private loadConfig(): SaverConfig {
    const defaults = getDefaultConfig();

    if (!fs.existsSync(this.configPath)) {
      logger.debug(`No config file at ${this.configPath}, using defaults`);
      return defaults;
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      logError(
        new ConfigError(this.configPath, 'Failed to parse config file', {
          code: ErrorCode.CONFIG_PARSE,
          cause: error,
        })
      );
      return defaults;
    }

    // 空文件
    if (parsed === null || parsed === undefined) {
      return defaults;
    }
    if (!isRecord(parsed)) {
      logError(new ConfigError(this.configPath, 'Config file must contain a mapping'));
      return defaults;
    }

    const merged = deepMerge(defaults, parsed);
    const validated = SaverConfigSchema.safeParse(merged);
    if (!validated.success) {
      const issues = validated.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      logError(new ConfigError(this.configPath, `Invalid config: ${issues.join('; ')}`));
      return defaults;
    }

    logger.info(`Loaded config from ${this.configPath}`);
    return validated.data;
  }

  getConfig(): SaverConfig {
    return this.config;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getDataDir(): string {
    return getDataDir(this.env);
  }

  /**
   * Absolute database path (SAVER_DB_PATH wins over the config file)
   */
  getDatabasePath(): string {
    return resolveDatabasePath(this.env.SAVER_DB_PATH || this.config.storage.databasePath, this.env);
  }

  /**
   * Write the current settings back as YAML
   */
  save(): void {
    fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
    fs.writeFileSync(this.configPath, yaml.stringify(this.config), 'utf-8');
    logger.info(`Config written to ${this.configPath}`);
  }
}
