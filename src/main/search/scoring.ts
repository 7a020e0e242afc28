// ============================================================================
// Relevance Scoring - lexical score for index hits, blended score for fuzzy
// ============================================================================

import { SEARCH } from '../../shared/constants';
import { escapeRegExp, queryWords } from './queryParser';
import { sequenceRatio } from './similarity';

/**
 * Tunable scoring constants
 */
export interface SearchWeights {
  /** Score every index hit starts from */
  lexicalBase: number;
  /** Added per occurrence of the full query */
  occurrenceBoost: number;
  /** Ceiling for the total occurrence boost */
  occurrenceCap: number;
  /** Multiplied by the fraction of query words found in the content */
  wordCoverageBoost: number;
  /** Fuzzy: weight of the whole-string sequence ratio */
  sequenceWeight: number;
  /** Fuzzy: weight of query words present as whole words */
  exactWordWeight: number;
  /** Fuzzy: weight of query words found inside content words */
  partialWordWeight: number;
}

export const DEFAULT_SEARCH_WEIGHTS: Readonly<SearchWeights> = {
  lexicalBase: 0.8,
  occurrenceBoost: 0.1,
  occurrenceCap: 0.2,
  wordCoverageBoost: 0.1,
  sequenceWeight: 0.3,
  exactWordWeight: 0.5,
  partialWordWeight: 0.2,
};

export function resolveWeights(overrides?: Partial<SearchWeights>): SearchWeights {
  return { ...DEFAULT_SEARCH_WEIGHTS, ...overrides };
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Non-overlapping, case-insensitive occurrences of `needle` in `haystack`
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  const matches = haystack.match(new RegExp(escapeRegExp(needle), 'giu'));
  return matches ? matches.length : 0;
}

/**
 * Words of `content` as the fuzzy matcher sees them: lowercased
 * whitespace tokens, plus each token with leading/trailing punctuation removed.
 */
export function contentWords(content: string): Set<string> {
  const words = new Set<string>();
  for (const token of content.toLowerCase().split(/\s+/)) {
    if (!token) continue;
    words.add(token);
    const trimmed = token.replace(/^[^\p{L}\p{N}_]+|[^\p{L}\p{N}_]+$/gu, '');
    if (trimmed) words.add(trimmed);
  }
  return words;
}

/**
 * Score for an FTS hit: base, plus a capped boost per occurrence of the
 * full query, plus coverage of individual query words.
 */
export function lexicalScore(
  query: string,
  content: string,
  weights: SearchWeights = DEFAULT_SEARCH_WEIGHTS
): number {
  const phrase = query.trim();
  let score = weights.lexicalBase;

  const occurrences = countOccurrences(content, phrase);
  score += Math.min(weights.occurrenceCap, occurrences * weights.occurrenceBoost);

  const words = queryWords(phrase);
  if (words.length > 0) {
    const lowered = content.toLowerCase();
    const present = words.filter((word) => lowered.includes(word)).length;
    score += weights.wordCoverageBoost * (present / words.length);
  }

  return clamp01(score);
}

/**
 * Blended similarity for a capture the index did not return
 */
export function fuzzyScore(
  query: string,
  content: string,
  weights: SearchWeights = DEFAULT_SEARCH_WEIGHTS
): number {
  const phrase = query.trim();
  const words = queryWords(phrase);
  if (words.length === 0) return 0;

  const ratio = sequenceRatio(phrase, content);
  const available = contentWords(content);

  const exact = words.filter((word) => available.has(word)).length / words.length;

  const partial =
    words.filter(
      (word) =>
        word.length >= SEARCH.MIN_PARTIAL_LENGTH &&
        Array.from(available).some((candidate) => candidate.includes(word))
    ).length / words.length;

  return clamp01(
    weights.sequenceWeight * ratio +
      weights.exactWordWeight * exact +
      weights.partialWordWeight * partial
  );
}
