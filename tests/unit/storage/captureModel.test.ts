// ============================================================================
// Capture Model Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import {
  buildCaptureDraft,
  countChars,
  countWords,
} from '../../../src/main/storage/captureModel';
import { CaptureValidationError, ErrorCode } from '../../../src/main/errors';

describe('captureModel', () => {
  // --------------------------------------------------------------------------
  // counts
  // --------------------------------------------------------------------------
  describe('countWords', () => {
    it('should count maximal whitespace-delimited tokens', () => {
      expect(countWords('  hello   world \n foo ')).toBe(3);
      expect(countWords('one')).toBe(1);
    });

    it('should return 0 for empty or blank content', () => {
      expect(countWords('')).toBe(0);
      expect(countWords(' \t\n ')).toBe(0);
    });
  });

  describe('countChars', () => {
    it('should count code points, not UTF-16 units', () => {
      expect(countChars('héllo')).toBe(5);
      expect(countChars('😀a')).toBe(2);
      expect(countChars('')).toBe(0);
    });
  });

  // --------------------------------------------------------------------------
  // buildCaptureDraft
  // --------------------------------------------------------------------------
  describe('buildCaptureDraft', () => {
    it('should fill times from now and derive counts', () => {
      const result = buildCaptureDraft({ appName: 'Notes', content: 'a b' }, 1000);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({
        appName: 'Notes',
        content: 'a b',
        startTime: 1000,
        endTime: 1000,
        charCount: 3,
        wordCount: 2,
      });
    });

    it('should use endTime as the start when only endTime is given', () => {
      const result = buildCaptureDraft({ appName: 'Notes', content: 'x', endTime: 500 }, 1000);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.startTime).toBe(500);
      expect(result.value.endTime).toBe(500);
    });

    it('should end at now when only startTime is given', () => {
      const result = buildCaptureDraft({ appName: 'Notes', content: 'x', startTime: 200 }, 1000);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.startTime).toBe(200);
      expect(result.value.endTime).toBe(1000);
    });

    it('should keep explicit counts', () => {
      const result = buildCaptureDraft(
        { appName: 'Notes', content: 'a b c', charCount: 42, wordCount: 7 },
        1000
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.charCount).toBe(42);
      expect(result.value.wordCount).toBe(7);
    });

    it('should accept empty content', () => {
      const result = buildCaptureDraft({ appName: 'Notes', content: '' }, 1000);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.charCount).toBe(0);
      expect(result.value.wordCount).toBe(0);
    });

    it('should reject a blank app name', () => {
      const result = buildCaptureDraft({ appName: '   ', content: 'hello' }, 1000);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(CaptureValidationError);
      expect(result.error.code).toBe(ErrorCode.CAPTURE_INVALID);
      expect(result.error.issues).toEqual(['appName: appName must not be empty']);
    });

    it('should reject a start time after the end time', () => {
      const result = buildCaptureDraft(
        { appName: 'Notes', content: 'hello', startTime: 900, endTime: 100 },
        1000
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.issues).toEqual(['startTime: startTime must not be after endTime']);
    });

    it('should reject negative counts', () => {
      const result = buildCaptureDraft({ appName: 'Notes', content: 'hello', charCount: -1 }, 1000);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]).toMatch(/^charCount: /);
    });
  });
});
