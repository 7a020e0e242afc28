// ============================================================================
// Saver - wires config, storage, search and statistics together
// ============================================================================

import { createLogger } from './services/infra/logger';
import type { Result } from './errors';
import type {
  Capture,
  CaptureId,
  CaptureInput,
  SearchOptions,
  SearchResult,
  StatisticsSnapshot,
} from '../shared/types';
import { ConfigService, type ConfigServiceOptions, type SaverConfig } from './config/configService';
import { CaptureStore } from './storage/captureStore';
import { StatisticsAggregator } from './storage/statistics';
import { SearchEngine } from './search/searchEngine';
import { BufferManager } from './capture/bufferManager';
import { CaptureEngine } from './capture/captureEngine';

const logger = createLogger('Saver');

export interface SaverOptions extends ConfigServiceOptions {
  /** Overrides the configured database path */
  dbPath?: string;
  /** Clock for capture timestamps */
  now?: () => number;
}

/**
 * Read-side operations shared by the CLI commands and the search console
 */
export interface CaptureQueries {
  search(query: string, options?: SearchOptions): SearchResult[];
  recent(limit?: number): Capture[];
  statistics(): StatisticsSnapshot;
}

export class Saver implements CaptureQueries {
  readonly store: CaptureStore;
  readonly searchEngine: SearchEngine;
  readonly stats: StatisticsAggregator;

  private constructor(
    readonly configService: ConfigService,
    private readonly now: () => number,
    dbPath: string
  ) {
    const config = configService.getConfig();
    this.store = new CaptureStore({ dbPath, now });
    this.searchEngine = new SearchEngine(this.store, {
      defaultLimit: config.search.defaultLimit,
      defaultMinScore: config.search.minScore,
      weights: config.search.weights,
    });
    this.stats = new StatisticsAggregator(this.store);
  }

  /**
   * Load config and open the store.
   * @throws StorageError when the database cannot be opened
   */
  static open(options: SaverOptions = {}): Saver {
    const configService = new ConfigService(options);
    const dbPath = options.dbPath ?? configService.getDatabasePath();
    const saver = new Saver(configService, options.now ?? Date.now, dbPath);
    saver.store.initialize();
    logger.debug('Saver opened', { dbPath });
    return saver;
  }

  getConfig(): SaverConfig {
    return this.configService.getConfig();
  }

  save(input: CaptureInput): Result<CaptureId> {
    return this.store.save(input);
  }

  search(query: string, options?: SearchOptions): SearchResult[] {
    return this.searchEngine.search(query, options);
  }

  recent(limit?: number): Capture[] {
    return this.store.recent(limit);
  }

  byApp(appName: string, limit?: number): Capture[] {
    return this.store.byApp(appName, limit);
  }

  statistics(): StatisticsSnapshot {
    return this.stats.statistics();
  }

  rebuildIndex(): Result<void> {
    return this.searchEngine.rebuildIndex();
  }

  /**
   * Capture engine bound to this store and the configured app filter
   */
  createCaptureEngine(): CaptureEngine {
    const config = this.getConfig();
    return new CaptureEngine(this.store, {
      capture: config.capture,
      apps: config.apps,
      buffers: new BufferManager(this.now),
    });
  }

  close(): void {
    this.store.close();
  }
}
