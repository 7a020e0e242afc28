// ============================================================================
// Capture Types - 采集记录、搜索结果与统计
// ============================================================================

export type CaptureId = number;

/**
 * 已持久化的采集记录：某个应用在一段时间内输入的文本
 */
export interface Capture {
  id: CaptureId;
  appName: string;
  content: string;
  /** epoch ms */
  startTime: number;
  /** epoch ms */
  endTime: number;
  charCount: number;
  wordCount: number;
  /** epoch ms, assigned by the store on insert */
  createdAt: number;
}

/**
 * 采集输入（由缓冲区 flush 或手动添加产生）
 */
export interface CaptureInput {
  appName: string;
  content: string;
  startTime?: number;
  endTime?: number;
  /** Overrides the count derived from content */
  charCount?: number;
  /** Overrides the count derived from content */
  wordCount?: number;
}

/**
 * Which search stage produced a result
 */
export type MatchType = 'indexed' | 'fuzzy';

/**
 * 搜索结果：完整记录 + 相关度 + 摘要
 */
export interface SearchResult extends Capture {
  /** 0.0 - 1.0 */
  relevanceScore: number;
  snippet: string;
  matchType: MatchType;
}

export interface SearchOptions {
  limit?: number;
  appFilter?: string;
  minScore?: number;
}

/**
 * Per-app aggregate used in the top-apps list
 */
export interface AppStatistics {
  appName: string;
  captureCount: number;
  totalCharacters: number;
  totalWords: number;
  /** epoch ms of the newest capture */
  lastCapture: number;
}

/**
 * 采集统计
 */
export interface StatisticsSnapshot {
  totalCaptures: number;
  uniqueApps: number;
  totalCharacters: number;
  totalWords: number;
  topApps: AppStatistics[];
}
