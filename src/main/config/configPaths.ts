// ============================================================================
// Configuration Paths
// ============================================================================
// SAVER_DATA_DIR overrides the data directory (default ~/.saver),
// SAVER_CONFIG overrides the config file (default <dataDir>/config.yaml).
// ============================================================================

import * as path from 'path';
import * as os from 'os';
import { STORAGE } from '../../shared/constants';

/**
 * Data directory holding the database and config file
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.SAVER_DATA_DIR || path.join(os.homedir(), STORAGE.DATA_DIR_NAME);
}

/**
 * Config file: explicit argument, then SAVER_CONFIG, then the data directory
 */
export function resolveConfigPath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const configured = explicitPath || env.SAVER_CONFIG;
  if (configured) {
    return path.resolve(configured);
  }
  return path.join(getDataDir(env), STORAGE.CONFIG_FILE);
}

/**
 * Relative database paths are taken relative to the data directory
 */
export function resolveDatabasePath(
  databasePath: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (databasePath === ':memory:' || path.isAbsolute(databasePath)) {
    return databasePath;
  }
  return path.join(getDataDir(env), databasePath);
}

/**
 * Candidate .env files, first existing one wins
 */
export function getEnvFileCandidates(env: NodeJS.ProcessEnv = process.env): string[] {
  return [path.join(process.cwd(), '.env'), path.join(getDataDir(env), '.env')];
}
