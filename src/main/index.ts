// ============================================================================
// Saver - library entry
// ============================================================================

export { Saver, type SaverOptions, type CaptureQueries } from './saver';

export { CaptureStore, type CaptureStoreConfig } from './storage/captureStore';
export { IndexMaintainer } from './storage/indexMaintainer';
export { StatisticsAggregator, emptyStatistics } from './storage/statistics';
export { buildCaptureDraft, countChars, countWords } from './storage/captureModel';

export { SearchEngine, type SearchEngineConfig } from './search/searchEngine';
export { DEFAULT_SEARCH_WEIGHTS, type SearchWeights } from './search/scoring';
export { sequenceRatio } from './search/similarity';
export { extractSnippet } from './search/snippet';

export { BufferManager } from './capture/bufferManager';
export { CaptureEngine, type CaptureEngineOptions } from './capture/captureEngine';

export {
  ConfigService,
  getDefaultConfig,
  type SaverConfig,
  type CaptureSettings,
  type AppFilterSettings,
} from './config/configService';

export * from './errors';
export { createLogger, LogLevel, setDefaultLogLevel } from './services/infra/logger';
export * from '../shared/types';
