// ============================================================================
// Snippet Extraction Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import { extractSnippet } from '../../../src/main/search/snippet';

describe('extractSnippet', () => {
  it('should return short content unchanged', () => {
    const content = 'git commit -m "fix auth"';

    expect(extractSnippet(content, 'auth')).toBe(content);
    expect(extractSnippet('x'.repeat(200), 'x')).toBe('x'.repeat(200));
  });

  it('should centre the window a third before the match', () => {
    const content = 'a'.repeat(300) + ' needle ' + 'b'.repeat(300);

    const snippet = extractSnippet(content, 'needle');

    expect(snippet).toBe('…' + content.slice(235, 435) + '…');
    expect(snippet).toContain('needle');
    expect(snippet.length).toBe(202);
  });

  it('should not prefix an ellipsis when the match is at the start', () => {
    const content = 'needle ' + 'x'.repeat(300);

    expect(extractSnippet(content, 'NEEDLE')).toBe(content.slice(0, 200) + '…');
  });

  it('should keep a full window when the match is near the end', () => {
    const content = 'x'.repeat(300) + 'needle';

    expect(extractSnippet(content, 'needle')).toBe('…' + content.slice(106));
  });

  it('should fall back to the first query word', () => {
    const content = 'y'.repeat(300) + ' needle ' + 'z'.repeat(300);

    expect(extractSnippet(content, 'needle haystack')).toBe('…' + content.slice(235, 435) + '…');
  });

  it('should start at the beginning when nothing matches', () => {
    const content = 'q'.repeat(500);

    expect(extractSnippet(content, 'absent')).toBe('q'.repeat(200) + '…');
  });

  it('should count emoji as single characters at the window edges', () => {
    const after = 'x'.repeat(65) + 'needle' + '😀'.repeat(200);
    const before = '😀'.repeat(100) + 'needle' + 'x'.repeat(200);

    expect(extractSnippet(after, 'needle')).toBe(
      'x'.repeat(65) + 'needle' + '😀'.repeat(129) + '…'
    );
    expect(extractSnippet(before, 'needle')).toBe(
      '…' + '😀'.repeat(66) + 'needle' + 'x'.repeat(128) + '…'
    );
  });

  it('should return emoji content that fits in code points unchanged', () => {
    const content = 'x'.repeat(65) + 'needle' + '😀'.repeat(100);

    expect(extractSnippet(content, 'needle')).toBe(content);
  });

  it('should honour a custom size', () => {
    const content = '0123456789'.repeat(3);

    expect(extractSnippet(content, '5', 9)).toBe('…' + content.slice(2, 11) + '…');
  });
});
