// ============================================================================
// Index Maintainer - keeps the FTS5 projection in step with the captures table
// ============================================================================

import type Database from 'better-sqlite3';
import { createLogger } from '../services/infra/logger';
import { ErrorCode, StorageError, err, ok, normalizeError, logError, type Result } from '../errors';

const logger = createLogger('IndexMaintainer');

export const FTS_TABLE = 'captures_fts';

/**
 * Searchable projection of one capture row (rowid = capture id)
 */
export interface IndexEntry {
  id: number;
  appName: string;
  content: string;
  createdAt: number;
}

const CREATE_FTS_SQL = `
  CREATE VIRTUAL TABLE IF NOT EXISTS ${FTS_TABLE} USING fts5(
    app_name UNINDEXED,
    content,
    created_at UNINDEXED,
    tokenize='unicode61'
  )
`;

export class IndexMaintainer {
  constructor(private readonly db: Database.Database) {}

  /**
   * Create the FTS table if it does not exist yet
   */
  createIndex(): void {
    this.db.exec(CREATE_FTS_SQL);
  }

  /**
   * Insert one entry. Callers run this inside the same transaction as the
   * captures insert.
   */
  insertEntry(entry: IndexEntry): void {
    this.db
      .prepare(`INSERT INTO ${FTS_TABLE} (rowid, app_name, content, created_at) VALUES (?, ?, ?, ?)`)
      .run(entry.id, entry.appName, entry.content, entry.createdAt);
  }

  indexCount(): number {
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${FTS_TABLE}`)
      .get();
    return row?.count ?? 0;
  }

  captureCount(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM captures')
      .get();
    return row?.count ?? 0;
  }

  isConsistent(): boolean {
    return this.indexCount() === this.captureCount();
  }

  /**
   * Startup check: rebuild when entry and row counts disagree.
   * Returns true when a rebuild ran.
   */
  reconcile(): boolean {
    const indexed = this.indexCount();
    const captures = this.captureCount();
    if (indexed === captures) {
      logger.debug('Index consistent', { entries: indexed });
      return false;
    }

    logger.warn('Index out of sync with captures, rebuilding', { entries: indexed, captures });
    const result = this.rebuild();
    if (!result.ok) {
      throw result.error;
    }
    return true;
  }

  /**
   * Drop, recreate and repopulate the FTS table in one transaction
   */
  rebuild(): Result<void> {
    const startedAt = Date.now();
    try {
      const run = this.db.transaction(() => {
        this.db.exec(`DROP TABLE IF EXISTS ${FTS_TABLE}`);
        this.db.exec(CREATE_FTS_SQL);
        this.db.exec(`
          INSERT INTO ${FTS_TABLE} (rowid, app_name, content, created_at)
          SELECT id, app_name, content, created_at FROM captures
        `);
      });
      run();

      logger.info('Index rebuilt', {
        entries: this.indexCount(),
        durationMs: Date.now() - startedAt,
      });
      return ok(undefined);
    } catch (error) {
      const cause = normalizeError(error, 'rebuildIndex');
      const failure = new StorageError('rebuildIndex', `Index rebuild failed: ${cause.message}`, {
        code: ErrorCode.INDEX_REBUILD_FAILED,
        cause,
      });
      logError(failure);
      return err(failure);
    }
  }
}
