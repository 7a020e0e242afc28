// ============================================================================
// Capture Engine - routes typed text to app buffers and flushes on a timer
// ============================================================================

import { createLogger } from '../services/infra/logger';
import type { CaptureInput } from '../../shared/types';
import type { CaptureStore } from '../storage/captureStore';
import type { AppFilterSettings, CaptureSettings } from '../config/configService';
import { BufferManager } from './bufferManager';

const logger = createLogger('CaptureEngine');

export interface CaptureEngineOptions {
  capture: CaptureSettings;
  apps: AppFilterSettings;
  buffers?: BufferManager;
}

/**
 * Keystroke sources and window polling live outside this class; they call
 * setActiveApp() and handleKeystroke().
 */
export class CaptureEngine {
  private readonly buffers: BufferManager;
  private readonly capture: CaptureSettings;
  private readonly apps: AppFilterSettings;
  private activeApp: string | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly store: CaptureStore,
    options: CaptureEngineOptions
  ) {
    this.capture = options.capture;
    this.apps = options.apps;
    this.buffers = options.buffers ?? new BufferManager();
  }

  /**
   * Include mode captures listed apps only; exclude mode everything else
   */
  shouldCaptureApp(appName: string): boolean {
    if (!appName) return false;
    if (this.apps.mode === 'include') {
      return this.apps.includeList.includes(appName);
    }
    return !this.apps.excludeList.includes(appName);
  }

  setActiveApp(appName: string | null): void {
    if (appName === this.activeApp) return;
    this.activeApp = appName;
    if (appName) {
      logger.debug(`Active app: ${appName}`, { capturing: this.shouldCaptureApp(appName) });
    }
  }

  getActiveApp(): string | null {
    return this.activeApp;
  }

  /**
   * Append typed text to the active app's buffer.
   * @returns whether the text was buffered
   */
  handleKeystroke(text: string): boolean {
    const appName = this.activeApp;
    if (!appName || !this.shouldCaptureApp(appName)) {
      return false;
    }
    this.buffers.addText(appName, text);
    return true;
  }

  getBuffers(): BufferManager {
    return this.buffers;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Persist every buffer holding at least minCharsThreshold characters
   * @returns number of captures saved
   */
  flush(): number {
    const flushed = this.buffers.flushAll();
    const ready: Record<string, CaptureInput> = {};
    for (const [appName, capture] of Object.entries(flushed)) {
      if (capture.content.trim().length >= this.capture.minCharsThreshold) {
        ready[appName] = capture;
      } else {
        logger.debug(`Dropped short buffer for ${appName}`, { chars: capture.content.length });
      }
    }

    if (Object.keys(ready).length === 0) {
      return 0;
    }

    const saved = this.store.saveMany(ready);
    logger.info(`Saved ${saved} captures`, { attempted: Object.keys(ready).length });
    return saved;
  }

  /**
   * Start the periodic flush. Does nothing when capture is disabled.
   */
  start(): boolean {
    if (!this.capture.enabled) {
      logger.warn('Capture is disabled in config');
      return false;
    }
    if (this.running) return true;

    this.running = true;
    const intervalMs = this.capture.saveIntervalSeconds * 1000;
    this.timer = setInterval(() => {
      this.flush();
    }, intervalMs);
    logger.info(`Capture started, saving every ${this.capture.saveIntervalSeconds}s`);
    return true;
  }

  /**
   * Stop the timer and save every non-empty buffer, short ones included
   * @returns captures saved by the final save
   */
  stop(): number {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const wasRunning = this.running;
    this.running = false;

    const saved = this.store.saveMany(this.buffers.flushAll());
    if (wasRunning) {
      logger.info('Capture stopped', { finalSave: saved });
    }
    return saved;
  }
}
