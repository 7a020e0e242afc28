// ============================================================================
// Snippet Extraction
// ============================================================================

import { SEARCH } from '../../shared/constants';
import { escapeRegExp, queryWords } from './queryParser';

/** Code-point offset of the first case-insensitive match, or -1 */
function findCaseInsensitive(content: string, needle: string): number {
  if (!needle) return -1;
  const match = new RegExp(escapeRegExp(needle), 'iu').exec(content);
  return match ? Array.from(content.slice(0, match.index)).length : -1;
}

/**
 * Cut a window of `size` characters around the first match of the query
 * (else of its first word, else the start), one third before the match.
 * Sizes and offsets count code points, so a surrogate pair is never split.
 * Content that already fits is returned unchanged.
 */
export function extractSnippet(
  content: string,
  query: string,
  size: number = SEARCH.SNIPPET_LENGTH
): string {
  const chars = Array.from(content);
  if (chars.length <= size) {
    return content;
  }

  const phrase = query.trim();
  let position = findCaseInsensitive(content, phrase);
  if (position < 0) {
    const [firstWord] = queryWords(phrase);
    position = firstWord ? findCaseInsensitive(content, firstWord) : -1;
  }
  if (position < 0) {
    position = 0;
  }

  let start = Math.max(0, position - Math.floor(size / 3));
  const end = Math.min(chars.length, start + size);
  start = Math.max(0, end - size);

  const prefix = start > 0 ? SEARCH.ELLIPSIS : '';
  const suffix = end < chars.length ? SEARCH.ELLIPSIS : '';
  return `${prefix}${chars.slice(start, end).join('')}${suffix}`;
}
