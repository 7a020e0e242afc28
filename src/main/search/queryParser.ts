// ============================================================================
// Query Parser - turns free text into an FTS5 MATCH expression
// ============================================================================

import { SEARCH } from '../../shared/constants';

const NON_WORD = /[^\p{L}\p{N}_\s]/gu;
const HAS_TOKEN_CHAR = /[\p{L}\p{N}]/u;

/**
 * Replace everything that is not a letter, digit, underscore or whitespace
 */
export function sanitizeQuery(query: string): string {
  return query.replace(NON_WORD, ' ');
}

/**
 * Sanitized terms long enough to be useful as prefix matches
 */
export function extractTerms(query: string): string[] {
  return sanitizeQuery(query)
    .split(/\s+/)
    .filter((term) => term.length >= SEARCH.MIN_TERM_LENGTH && HAS_TOKEN_CHAR.test(term));
}

/**
 * Lowercased whitespace-delimited words of the raw query, used for scoring
 */
export function queryWords(query: string): string[] {
  return query
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

function quote(text: string): string {
  return `"${text.replace(/"/g, '""')}"`;
}

/**
 * Build `"term1"* OR "term2"*`. When no term survives, the raw query is used
 * as one quoted phrase; null when there is nothing the tokenizer would keep.
 */
export function buildFtsQuery(query: string): string | null {
  const terms = extractTerms(query);
  if (terms.length > 0) {
    return terms.map((term) => `${quote(term)}*`).join(' OR ');
  }

  const raw = query.trim();
  if (!HAS_TOKEN_CHAR.test(raw)) {
    return null;
  }
  return quote(raw);
}

/**
 * Escape a string for use inside a RegExp
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
