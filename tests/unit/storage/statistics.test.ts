// ============================================================================
// StatisticsAggregator Tests
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { CaptureStore } from '../../../src/main/storage/captureStore';
import { StatisticsAggregator, emptyStatistics } from '../../../src/main/storage/statistics';
import { BASE_TIME, createClock, openStore, type TestClock } from '../../integration/setup';

describe('StatisticsAggregator', () => {
  let clock: TestClock;
  let store: CaptureStore;

  beforeEach(() => {
    clock = createClock();
    store = openStore(clock);
  });

  afterEach(() => {
    store.close();
  });

  it('should return zeroed totals for an empty store', () => {
    expect(new StatisticsAggregator(store).statistics()).toEqual(emptyStatistics());
  });

  describe('with captures', () => {
    beforeEach(() => {
      store.save({ appName: 'Slack', content: 'hi there' });
      clock.advance(1000);
      store.save({ appName: 'Notes', content: 'one two' });
      clock.advance(1000);
      store.save({ appName: 'Chrome', content: 'tab' });
      clock.advance(1000);
      store.save({ appName: 'Notes', content: 'three' });
    });

    it('should total captures, apps, characters and words', () => {
      const stats = new StatisticsAggregator(store).statistics();

      expect(stats.totalCaptures).toBe(4);
      expect(stats.uniqueApps).toBe(3);
      expect(stats.totalCharacters).toBe(23);
      expect(stats.totalWords).toBe(6);
    });

    it('should rank apps by count, breaking ties alphabetically', () => {
      const stats = new StatisticsAggregator(store).statistics();

      expect(stats.topApps).toEqual([
        {
          appName: 'Notes',
          captureCount: 2,
          totalCharacters: 12,
          totalWords: 3,
          lastCapture: BASE_TIME + 3000,
        },
        {
          appName: 'Chrome',
          captureCount: 1,
          totalCharacters: 3,
          totalWords: 1,
          lastCapture: BASE_TIME + 2000,
        },
        {
          appName: 'Slack',
          captureCount: 1,
          totalCharacters: 8,
          totalWords: 2,
          lastCapture: BASE_TIME,
        },
      ]);
    });

    it('should cap the top apps list', () => {
      const stats = new StatisticsAggregator(store, 1).statistics();

      expect(stats.topApps.map((app) => app.appName)).toEqual(['Notes']);
      expect(stats.totalCaptures).toBe(4);
    });

    it('should return zeroed totals once the store is closed', () => {
      store.close();

      expect(new StatisticsAggregator(store).statistics()).toEqual(emptyStatistics());
    });
  });
});
