// ============================================================================
// Search Engine - FTS5 lookup with fuzzy fallback
// ============================================================================

import { createLogger } from '../services/infra/logger';
import { ErrorCode, err, logError, normalizeError, type Result } from '../errors';
import { SEARCH } from '../../shared/constants';
import type { Capture, CaptureId, SearchOptions, SearchResult } from '../../shared/types';
import { CAPTURE_COLUMNS, rowToCapture, type CaptureRow, type CaptureStore } from '../storage/captureStore';
import { FTS_TABLE } from '../storage/indexMaintainer';
import { buildFtsQuery } from './queryParser';
import { fuzzyScore, lexicalScore, resolveWeights, type SearchWeights } from './scoring';
import { extractSnippet } from './snippet';

const logger = createLogger('SearchEngine');

// ----------------------------------------------------------------------------
// Types
// ----------------------------------------------------------------------------

export interface SearchEngineConfig {
  defaultLimit: number;
  defaultMinScore: number;
  weights: SearchWeights;
}

// ----------------------------------------------------------------------------
// Merge
// ----------------------------------------------------------------------------

/**
 * Sort by score, then recency, then id (all descending)
 */
export function compareResults(a: SearchResult, b: SearchResult): number {
  return (
    b.relevanceScore - a.relevanceScore ||
    b.createdAt - a.createdAt ||
    b.id - a.id
  );
}

/**
 * Drop fuzzy results whose id the index already returned, then rank and cap
 */
export function mergeResults(
  indexed: SearchResult[],
  fuzzy: SearchResult[],
  limit: number
): SearchResult[] {
  const seen = new Set<CaptureId>(indexed.map((result) => result.id));
  const extra = fuzzy.filter((result) => !seen.has(result.id));
  return [...indexed, ...extra].sort(compareResults).slice(0, limit);
}

// ----------------------------------------------------------------------------
// Search Engine
// ----------------------------------------------------------------------------

export class SearchEngine {
  private config: SearchEngineConfig;

  constructor(
    private readonly store: CaptureStore,
    config?: Partial<Omit<SearchEngineConfig, 'weights'>> & { weights?: Partial<SearchWeights> }
  ) {
    this.config = {
      defaultLimit: config?.defaultLimit ?? SEARCH.DEFAULT_LIMIT,
      defaultMinScore: config?.defaultMinScore ?? SEARCH.DEFAULT_MIN_SCORE,
      weights: resolveWeights(config?.weights),
    };
  }

  getWeights(): SearchWeights {
    return { ...this.config.weights };
  }

  /**
   * Ranked results for a free-text query. Empty on blank queries and on any
   * storage failure.
   */
  search(query: string, options: SearchOptions = {}): SearchResult[] {
    if (!query || query.trim().length === 0) {
      return [];
    }

    const limit = Math.floor(options.limit ?? this.config.defaultLimit);
    if (limit <= 0) {
      return [];
    }
    const minScore = options.minScore ?? this.config.defaultMinScore;
    const appFilter = options.appFilter || undefined;

    try {
      const indexed = this.searchIndex(query, limit, appFilter);

      let fuzzy: SearchResult[] = [];
      if (indexed.length < limit) {
        const exclude = indexed.map((result) => result.id);
        fuzzy = this.searchFuzzy(query, limit - indexed.length, minScore, exclude, appFilter);
      }

      const results = mergeResults(indexed, fuzzy, limit);
      logger.debug('Search complete', {
        query,
        indexed: indexed.length,
        fuzzy: fuzzy.length,
        returned: results.length,
      });
      return results;
    } catch (error) {
      logError(normalizeError(error, 'search', ErrorCode.SEARCH_FAILED));
      return [];
    }
  }

  /**
   * Drop and repopulate the full-text index
   */
  rebuildIndex(): Result<void> {
    try {
      return this.store.getIndexMaintainer().rebuild();
    } catch (error) {
      const failure = normalizeError(error, 'rebuildIndex');
      logError(failure);
      return err(failure);
    }
  }

  // --------------------------------------------------------------------------
  // Stage 1: FTS5
  // --------------------------------------------------------------------------

  private searchIndex(query: string, limit: number, appFilter?: string): SearchResult[] {
    const ftsQuery = buildFtsQuery(query);
    if (ftsQuery === null) {
      return [];
    }

    const conditions = [`${FTS_TABLE} MATCH ?`];
    const params: Array<string | number> = [ftsQuery];
    if (appFilter) {
      conditions.push(`${FTS_TABLE}.app_name = ?`);
      params.push(appFilter);
    }
    params.push(limit);

    const rows = this.store
      .getDb()
      .prepare<Array<string | number>, CaptureRow>(`
        SELECT ${qualify('c', CAPTURE_COLUMNS)}
        FROM ${FTS_TABLE}
        JOIN captures c ON c.id = ${FTS_TABLE}.rowid
        WHERE ${conditions.join(' AND ')}
        ORDER BY ${FTS_TABLE}.rank, c.created_at DESC, c.id DESC
        LIMIT ?
      `)
      .all(...params);

    return rows.map((row) =>
      this.toResult(rowToCapture(row), query, lexicalScore(query, row.content, this.config.weights), 'indexed')
    );
  }

  // --------------------------------------------------------------------------
  // Stage 2: fuzzy fallback over recent rows
  // --------------------------------------------------------------------------

  private searchFuzzy(
    query: string,
    remaining: number,
    minScore: number,
    exclude: CaptureId[],
    appFilter?: string
  ): SearchResult[] {
    const conditions = ['id NOT IN (SELECT value FROM json_each(?))'];
    const params: Array<string | number> = [JSON.stringify(exclude)];
    if (appFilter) {
      conditions.push('app_name = ?');
      params.push(appFilter);
    }
    params.push(remaining * SEARCH.FUZZY_SCAN_MULTIPLIER);

    const candidates = this.store
      .getDb()
      .prepare<Array<string | number>, CaptureRow>(`
        SELECT ${CAPTURE_COLUMNS}
        FROM captures
        WHERE ${conditions.join(' AND ')}
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `)
      .all(...params);

    const scored: SearchResult[] = [];
    for (const row of candidates) {
      const score = fuzzyScore(query, row.content, this.config.weights);
      if (score >= minScore) {
        scored.push(this.toResult(rowToCapture(row), query, score, 'fuzzy'));
      }
    }

    return scored.sort(compareResults).slice(0, remaining);
  }

  private toResult(
    capture: Capture,
    query: string,
    relevanceScore: number,
    matchType: SearchResult['matchType']
  ): SearchResult {
    return {
      ...capture,
      relevanceScore,
      snippet: extractSnippet(capture.content, query),
      matchType,
    };
  }
}

function qualify(alias: string, columns: string): string {
  return columns
    .split(',')
    .map((column) => `${alias}.${column.trim()}`)
    .join(', ');
}
