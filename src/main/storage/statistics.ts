// ============================================================================
// Statistics Aggregator
// ============================================================================

import { tryCatch, unwrapOr } from '../errors';
import { BROWSE } from '../../shared/constants';
import type { AppStatistics, StatisticsSnapshot } from '../../shared/types';
import type { CaptureStore } from './captureStore';

interface TotalsRow {
  total_captures: number;
  unique_apps: number;
  total_characters: number;
  total_words: number;
}

interface AppRow {
  app_name: string;
  capture_count: number;
  total_characters: number;
  total_words: number;
  last_capture: number;
}

export function emptyStatistics(): StatisticsSnapshot {
  return {
    totalCaptures: 0,
    uniqueApps: 0,
    totalCharacters: 0,
    totalWords: 0,
    topApps: [],
  };
}

export class StatisticsAggregator {
  constructor(
    private readonly store: CaptureStore,
    private readonly topN: number = BROWSE.TOP_APPS
  ) {}

  /**
   * Totals plus the most-captured apps; equal counts order alphabetically.
   * Zeroed on storage failure.
   */
  statistics(): StatisticsSnapshot {
    const result = tryCatch('statistics', (): StatisticsSnapshot => {
      const db = this.store.getDb();

      const totals = db
        .prepare<[], TotalsRow>(`
          SELECT
            COUNT(*) AS total_captures,
            COUNT(DISTINCT app_name) AS unique_apps,
            COALESCE(SUM(char_count), 0) AS total_characters,
            COALESCE(SUM(word_count), 0) AS total_words
          FROM captures
        `)
        .get();

      const topApps = db
        .prepare<[number], AppRow>(`
          SELECT
            app_name,
            COUNT(*) AS capture_count,
            SUM(char_count) AS total_characters,
            SUM(word_count) AS total_words,
            MAX(created_at) AS last_capture
          FROM captures
          GROUP BY app_name
          ORDER BY capture_count DESC, app_name ASC
          LIMIT ?
        `)
        .all(this.topN)
        .map(
          (row): AppStatistics => ({
            appName: row.app_name,
            captureCount: row.capture_count,
            totalCharacters: row.total_characters,
            totalWords: row.total_words,
            lastCapture: row.last_capture,
          })
        );

      if (!totals) {
        return emptyStatistics();
      }

      return {
        totalCaptures: totals.total_captures,
        uniqueApps: totals.unique_apps,
        totalCharacters: totals.total_characters,
        totalWords: totals.total_words,
        topApps,
      };
    });

    return unwrapOr(result, emptyStatistics());
  }
}
