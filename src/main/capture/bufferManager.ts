// ============================================================================
// Buffer Manager - per-app text buffers awaiting the next flush
// ============================================================================

import type { CaptureInput } from '../../shared/types';
import { countChars, countWords } from '../storage/captureModel';

export class BufferManager {
  private buffers: Map<string, string> = new Map();
  private startTimes: Map<string, number> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Append text to an app's buffer; the first text stamps the start time
   */
  addText(appName: string, text: string): void {
    if (!appName) return;

    const existing = this.buffers.get(appName);
    if (existing === undefined) {
      this.buffers.set(appName, text);
      this.startTimes.set(appName, this.now());
    } else {
      this.buffers.set(appName, existing + text);
    }
  }

  getBuffer(appName: string): string | null {
    return this.buffers.get(appName) ?? null;
  }

  /**
   * Snapshot of a buffer as a capture ending now
   */
  getBufferInfo(appName: string): CaptureInput | null {
    const content = this.buffers.get(appName);
    if (content === undefined) return null;

    const endTime = this.now();
    return {
      appName,
      content,
      startTime: Math.min(this.startTimes.get(appName) ?? endTime, endTime),
      endTime,
      charCount: countChars(content),
      wordCount: countWords(content),
    };
  }

  /**
   * Take the buffer's content and start a new interval.
   * Whitespace-only buffers are left alone and yield null.
   */
  flushBuffer(appName: string): CaptureInput | null {
    const info = this.getBufferInfo(appName);
    if (!info || info.content.trim().length === 0) {
      return null;
    }

    this.buffers.set(appName, '');
    this.startTimes.set(appName, this.now());
    return info;
  }

  flushAll(): Record<string, CaptureInput> {
    const flushed: Record<string, CaptureInput> = {};
    for (const appName of Array.from(this.buffers.keys())) {
      const info = this.flushBuffer(appName);
      if (info) {
        flushed[appName] = info;
      }
    }
    return flushed;
  }

  clearBuffer(appName: string): void {
    this.buffers.delete(appName);
    this.startTimes.delete(appName);
  }

  getAllApps(): string[] {
    return Array.from(this.buffers.keys());
  }

  hasContent(appName: string, minChars = 5): boolean {
    const content = this.buffers.get(appName) ?? '';
    return content.trim().length >= minChars;
  }
}
