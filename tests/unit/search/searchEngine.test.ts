// ============================================================================
// SearchEngine Tests
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { CaptureStore } from '../../../src/main/storage/captureStore';
import { FTS_TABLE } from '../../../src/main/storage/indexMaintainer';
import {
  SearchEngine,
  compareResults,
  mergeResults,
} from '../../../src/main/search/searchEngine';
import type { SearchResult } from '../../../src/shared/types';
import { BASE_TIME, createClock, openStore, type TestClock } from '../../integration/setup';

function result(id: number, relevanceScore: number, createdAt = BASE_TIME): SearchResult {
  return {
    id,
    appName: 'Notes',
    content: `capture ${id}`,
    startTime: createdAt,
    endTime: createdAt,
    charCount: 9,
    wordCount: 2,
    createdAt,
    relevanceScore,
    snippet: `capture ${id}`,
    matchType: 'indexed',
  };
}

describe('SearchEngine', () => {
  let clock: TestClock;
  let store: CaptureStore;
  let engine: SearchEngine;

  beforeEach(() => {
    clock = createClock();
    store = openStore(clock);
    engine = new SearchEngine(store);
  });

  afterEach(() => {
    store.close();
  });

  // --------------------------------------------------------------------------
  // ranking helpers
  // --------------------------------------------------------------------------
  describe('compareResults / mergeResults', () => {
    it('should order by score, then recency, then id', () => {
      const ordered = [
        result(1, 0.5, BASE_TIME),
        result(2, 0.9, BASE_TIME),
        result(3, 0.5, BASE_TIME + 10),
        result(4, 0.5, BASE_TIME),
      ].sort(compareResults);

      expect(ordered.map((r) => r.id)).toEqual([2, 3, 4, 1]);
    });

    it('should drop fuzzy duplicates of indexed hits and cap the total', () => {
      const merged = mergeResults(
        [result(1, 0.9), result(2, 0.8)],
        [result(2, 0.95), result(3, 0.4), result(4, 0.35)],
        3
      );

      expect(merged.map((r) => [r.id, r.relevanceScore])).toEqual([
        [1, 0.9],
        [2, 0.8],
        [3, 0.4],
      ]);
    });
  });

  // --------------------------------------------------------------------------
  // scenarios
  // --------------------------------------------------------------------------
  describe('search', () => {
    it('should find a single code capture by an identifier', () => {
      store.save({
        appName: 'VSCode',
        content: 'def calculate_fibonacci(n): return n if n<=1 else fibonacci(n-1)+fibonacci(n-2)',
      });

      const results = engine.search('fibonacci');

      expect(results).toHaveLength(1);
      expect(results[0].appName).toBe('VSCode');
      expect(results[0].matchType).toBe('indexed');
      expect(results[0].relevanceScore).toBeGreaterThanOrEqual(0.8);
    });

    it('should match word prefixes across captures', () => {
      store.save({ appName: 'Terminal', content: "git commit -m 'Fix authentication bug'" });
      clock.advance(1000);
      store.save({ appName: 'Terminal', content: 'authentication bug is fixed' });
      clock.advance(1000);
      store.save({ appName: 'Notes', content: 'grocery list' });

      const unfiltered = engine.search('auth');
      const filtered = engine.search('auth', { appFilter: 'Terminal' });

      expect(unfiltered.map((r) => r.id).sort()).toEqual([1, 2]);
      expect(filtered.map((r) => r.id).sort()).toEqual([1, 2]);
      expect(filtered.every((r) => r.appName === 'Terminal')).toBe(true);
    });

    it('should return nothing for an app without captures', () => {
      store.save({ appName: 'Terminal', content: 'authentication bug is fixed' });

      expect(engine.search('authentication')).toHaveLength(1);
      expect(engine.search('authentication', { appFilter: 'NonexistentApp' })).toEqual([]);
    });

    it('should return nothing for an empty or blank query', () => {
      store.save({ appName: 'Notes', content: 'anything at all' });

      expect(engine.search('')).toEqual([]);
      expect(engine.search('   ')).toEqual([]);
    });

    it('should return nothing for a non-positive limit', () => {
      store.save({ appName: 'Notes', content: 'anything at all' });

      expect(engine.search('anything', { limit: 0 })).toEqual([]);
    });

    it('should honour the limit', () => {
      for (let i = 0; i < 5; i++) {
        store.save({ appName: 'Notes', content: `deploy step ${i}` });
        clock.advance(10);
      }

      expect(engine.search('deploy', { limit: 2 })).toHaveLength(2);
    });

    it('should rank repeated matches at least as high as a single match', () => {
      store.save({ appName: 'Notes', content: 'bug bug bug' });
      store.save({ appName: 'Notes', content: 'one bug here' });

      const results = engine.search('bug');
      const triple = results.find((r) => r.content === 'bug bug bug');
      const single = results.find((r) => r.content === 'one bug here');

      expect(triple?.relevanceScore).toBeGreaterThanOrEqual(single?.relevanceScore ?? 1);
      for (const r of results) {
        expect(r.relevanceScore).toBeGreaterThanOrEqual(0);
        expect(r.relevanceScore).toBeLessThanOrEqual(1);
      }
    });

    it('should attach a snippet around the match', () => {
      const content = 'lorem '.repeat(60) + 'kubernetes ' + 'ipsum '.repeat(60);
      store.save({ appName: 'Notes', content });

      const [hit] = engine.search('kubernetes');

      expect(hit.snippet).toContain('kubernetes');
      expect(hit.snippet.startsWith('…')).toBe(true);
      expect(hit.snippet.length).toBeLessThanOrEqual(206);
    });

    it('should treat FTS syntax in the query as plain words', () => {
      store.save({ appName: 'Notes', content: 'NEAR the end' });

      expect(() => engine.search('NEAR( "end')).not.toThrow();
      expect(engine.search('NEAR( "end')).toHaveLength(1);
    });
  });

  // --------------------------------------------------------------------------
  // fuzzy fallback
  // --------------------------------------------------------------------------
  describe('fuzzy fallback', () => {
    it('should find words inside longer words', () => {
      store.save({ appName: 'Notes', content: 'prerender pipeline' });

      const results = engine.search('render');

      expect(results).toHaveLength(1);
      expect(results[0].matchType).toBe('fuzzy');
      expect(results[0].relevanceScore).toBeCloseTo(0.35, 10);
    });

    it('should drop fuzzy candidates under the minimum score', () => {
      store.save({ appName: 'Notes', content: 'fibonacci sequence' });

      expect(engine.search('fibonaci')).toEqual([]);

      const loose = engine.search('fibonaci', { minScore: 0.1 });
      expect(loose).toHaveLength(1);
      expect(loose[0].relevanceScore).toBeCloseTo(0.3 * (16 / 26), 10);
    });

    it('should respect the app filter', () => {
      store.save({ appName: 'Notes', content: 'prerender pipeline' });

      expect(engine.search('render', { appFilter: 'Slack' })).toEqual([]);
    });

    it('should not return an indexed hit twice', () => {
      store.save({ appName: 'Notes', content: 'render the page' });
      store.save({ appName: 'Notes', content: 'prerender pipeline' });

      const results = engine.search('render');

      expect(results.map((r) => [r.id, r.matchType])).toEqual([
        [1, 'indexed'],
        [2, 'fuzzy'],
      ]);
    });

    it('should use configured weights', () => {
      store.save({ appName: 'Notes', content: 'prerender pipeline' });
      const tuned = new SearchEngine(store, { weights: { partialWordWeight: 0 } });

      // 0.3 * 0.5 falls below the default minimum score
      expect(tuned.search('render')).toEqual([]);
      expect(tuned.getWeights().partialWordWeight).toBe(0);
    });
  });

  // --------------------------------------------------------------------------
  // index maintenance
  // --------------------------------------------------------------------------
  describe('rebuildIndex', () => {
    beforeEach(() => {
      store.save({ appName: 'Terminal', content: 'docker compose up' });
      store.save({ appName: 'Terminal', content: 'docker ps' });
    });

    it('should make a cleared index searchable again', () => {
      store.getDb().exec(`DELETE FROM ${FTS_TABLE}`);
      expect(engine.search('docker').filter((r) => r.matchType === 'indexed')).toEqual([]);

      expect(engine.rebuildIndex().ok).toBe(true);

      const index = store.getIndexMaintainer();
      expect(index.indexCount()).toBe(index.captureCount());
      expect(engine.search('docker').map((r) => r.matchType)).toEqual(['indexed', 'indexed']);
    });

    it('should be idempotent', () => {
      engine.rebuildIndex();
      const once = engine.search('docker');
      engine.rebuildIndex();

      expect(engine.search('docker')).toEqual(once);
    });

    it('should fail without throwing once the store is closed', () => {
      store.close();

      expect(engine.rebuildIndex().ok).toBe(false);
      expect(engine.search('docker')).toEqual([]);
    });
  });
});
