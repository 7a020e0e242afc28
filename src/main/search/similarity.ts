// ============================================================================
// Sequence similarity
// ============================================================================

/**
 * Length of the longest common subsequence of `a` and `b`.
 * Two-row DP over the shorter string.
 */
export function longestCommonSubsequence(a: string, b: string): number {
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  if (inner.length === 0) return 0;

  let previous = new Uint32Array(inner.length + 1);
  let current = new Uint32Array(inner.length + 1);

  for (let i = 1; i <= outer.length; i++) {
    const ch = outer.charCodeAt(i - 1);
    for (let j = 1; j <= inner.length; j++) {
      if (ch === inner.charCodeAt(j - 1)) {
        current[j] = previous[j - 1] + 1;
      } else {
        current[j] = current[j - 1] > previous[j] ? current[j - 1] : previous[j];
      }
    }
    [previous, current] = [current, previous];
  }

  return previous[inner.length];
}

/**
 * Case-insensitive similarity in [0, 1]: 2·LCS / (|a| + |b|).
 * Symmetric; two empty strings are identical.
 */
export function sequenceRatio(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const total = left.length + right.length;
  if (total === 0) return 1;
  return (2 * longestCommonSubsequence(left, right)) / total;
}
