// ============================================================================
// Capture Store - SQLite persistence for captures
// Append-only table plus an FTS5 projection written in the same transaction
// ============================================================================

import path from 'path';
import fs from 'fs';
import Database from 'better-sqlite3';
import { createLogger } from '../services/infra/logger';
import {
  ErrorCode,
  StorageError,
  err,
  tryCatch,
  unwrapOr,
  type Result,
} from '../errors';
import { BROWSE, STORAGE } from '../../shared/constants';
import type { Capture, CaptureId, CaptureInput } from '../../shared/types';
import { getDataDir } from '../config/configPaths';
import { buildCaptureDraft } from './captureModel';
import { IndexMaintainer } from './indexMaintainer';

const logger = createLogger('CaptureStore');

// ----------------------------------------------------------------------------
// Types
// ----------------------------------------------------------------------------

export interface CaptureStoreConfig {
  /** Database file, or ':memory:' */
  dbPath: string;
  /** Clock used for createdAt */
  now: () => number;
}

export interface CaptureRow {
  id: number;
  app_name: string;
  content: string;
  start_time: number;
  end_time: number;
  char_count: number;
  word_count: number;
  created_at: number;
}

export const CAPTURE_COLUMNS =
  'id, app_name, content, start_time, end_time, char_count, word_count, created_at';

export function rowToCapture(row: CaptureRow): Capture {
  return {
    id: row.id,
    appName: row.app_name,
    content: row.content,
    startTime: row.start_time,
    endTime: row.end_time,
    charCount: row.char_count,
    wordCount: row.word_count,
    createdAt: row.created_at,
  };
}

export function defaultDatabasePath(): string {
  return path.join(getDataDir(), STORAGE.DATABASE_FILE);
}

// ----------------------------------------------------------------------------
// Capture Store
// ----------------------------------------------------------------------------

export class CaptureStore {
  private db: Database.Database | null = null;
  private index: IndexMaintainer | null = null;
  private config: CaptureStoreConfig;

  constructor(config?: Partial<CaptureStoreConfig>) {
    this.config = {
      dbPath: defaultDatabasePath(),
      now: Date.now,
      ...config,
    };
  }

  // --------------------------------------------------------------------------
  // Initialization
  // --------------------------------------------------------------------------

  /**
   * Open the database, create schema and reconcile the search index.
   * @throws StorageError when the database cannot be opened
   */
  initialize(): void {
    if (this.db) return;

    try {
      if (this.config.dbPath !== ':memory:') {
        const dir = path.dirname(this.config.dbPath);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }

      const db = new Database(this.config.dbPath);
      this.db = db;
      db.pragma('journal_mode = WAL');
      this.createTables(db);

      this.index = new IndexMaintainer(db);
      this.index.createIndex();
      this.index.reconcile();

      logger.info(`CaptureStore initialized at ${this.config.dbPath}`);
    } catch (error) {
      this.close();
      throw new StorageError('initialize', `Failed to open capture database: ${describe(error)}`, {
        code: ErrorCode.STORAGE_UNAVAILABLE,
        dbPath: this.config.dbPath,
        cause: error,
      });
    }
  }

  private createTables(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS captures (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        app_name TEXT NOT NULL,
        content TEXT NOT NULL,
        start_time INTEGER NOT NULL,
        end_time INTEGER NOT NULL,
        char_count INTEGER NOT NULL,
        word_count INTEGER NOT NULL,
        created_at INTEGER NOT NULL
      )
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_captures_app_name ON captures(app_name);
      CREATE INDEX IF NOT EXISTS idx_captures_created_at ON captures(created_at);
    `);
  }

  /**
   * The open connection. Every store-facing component runs its statements
   * through it, one at a time.
   * @throws StorageError when the store is not initialized
   */
  getDb(): Database.Database {
    if (!this.db) {
      throw new StorageError('getDb', 'Database not initialized', {
        code: ErrorCode.STORAGE_NOT_INITIALIZED,
        dbPath: this.config.dbPath,
      });
    }
    return this.db;
  }

  getIndexMaintainer(): IndexMaintainer {
    if (!this.index) {
      throw new StorageError('getIndexMaintainer', 'Database not initialized', {
        code: ErrorCode.STORAGE_NOT_INITIALIZED,
        dbPath: this.config.dbPath,
      });
    }
    return this.index;
  }

  getDbPath(): string {
    return this.config.dbPath;
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  /**
   * Persist one capture together with its index entry
   */
  save(input: CaptureInput): Result<CaptureId> {
    const createdAt = this.config.now();
    const draft = buildCaptureDraft(input, createdAt);
    if (!draft.ok) {
      logger.warn('Rejected capture', { issues: draft.error.issues });
      return err(draft.error);
    }

    return tryCatch('save', () => {
      const db = this.getDb();
      const index = this.getIndexMaintainer();
      const capture = draft.value;

      const insert = db.transaction((): CaptureId => {
        const info = db
          .prepare(`
            INSERT INTO captures (app_name, content, start_time, end_time, char_count, word_count, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?)
          `)
          .run(
            capture.appName,
            capture.content,
            capture.startTime,
            capture.endTime,
            capture.charCount,
            capture.wordCount,
            createdAt
          );

        const id = Number(info.lastInsertRowid);
        index.insertEntry({ id, appName: capture.appName, content: capture.content, createdAt });
        return id;
      });

      const id = insert();
      logger.debug('Capture saved', { id, appName: capture.appName, chars: capture.charCount });
      return id;
    }, ErrorCode.STORAGE_WRITE_FAILED);
  }

  /**
   * Persist each buffered capture independently.
   * @returns number of captures saved
   */
  saveMany(captures: Record<string, CaptureInput>): number {
    let saved = 0;
    for (const [appName, capture] of Object.entries(captures)) {
      const result = this.save(capture);
      if (result.ok) {
        saved++;
      } else {
        logger.warn(`Skipped capture for ${appName}`, { code: ErrorCode[result.error.code] });
      }
    }
    return saved;
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  /**
   * Newest captures first
   */
  recent(limit: number = BROWSE.RECENT_LIMIT): Capture[] {
    const result = tryCatch('recent', () =>
      this.getDb()
        .prepare<[number], CaptureRow>(`
          SELECT ${CAPTURE_COLUMNS} FROM captures
          ORDER BY created_at DESC, id DESC
          LIMIT ?
        `)
        .all(limit)
        .map(rowToCapture)
    );
    return unwrapOr(result, []);
  }

  /**
   * Newest captures of one app first
   */
  byApp(appName: string, limit: number = BROWSE.BY_APP_LIMIT): Capture[] {
    const result = tryCatch('byApp', () =>
      this.getDb()
        .prepare<[string, number], CaptureRow>(`
          SELECT ${CAPTURE_COLUMNS} FROM captures
          WHERE app_name = ?
          ORDER BY created_at DESC, id DESC
          LIMIT ?
        `)
        .all(appName, limit)
        .map(rowToCapture)
    );
    return unwrapOr(result, []);
  }

  get(id: CaptureId): Capture | null {
    const result = tryCatch('get', () => {
      const row = this.getDb()
        .prepare<[number], CaptureRow>(`SELECT ${CAPTURE_COLUMNS} FROM captures WHERE id = ?`)
        .get(id);
      return row ? rowToCapture(row) : null;
    });
    return unwrapOr(result, null);
  }

  count(): number {
    return unwrapOr(
      tryCatch('count', () => this.getIndexMaintainer().captureCount()),
      0
    );
  }

  /**
   * Distinct app names, alphabetical
   */
  appNames(): string[] {
    const result = tryCatch('appNames', () =>
      this.getDb()
        .prepare<[], { app_name: string }>(
          'SELECT DISTINCT app_name FROM captures ORDER BY app_name ASC'
        )
        .all()
        .map((row) => row.app_name)
    );
    return unwrapOr(result, []);
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.index = null;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
