/**
 * Edit-distance based string similarity.
 * Every other scorer in the engine is built on these two functions.
 */

/**
 * Levenshtein distance: minimum number of single-character inserts,
 * deletes and substitutions turning `a` into `b`.
 * Compares UTF-16 code units, no normalization.
 */
export function distance(a: string, b: string): number {
  const rows = a.length;
  const cols = b.length;
  if (rows === 0) return cols;
  if (cols === 0) return rows;

  // dp[i][j] = distance between a[0..i) and b[0..j)
  const dp: number[][] = Array.from({ length: rows + 1 }, () =>
    new Array<number>(cols + 1).fill(0),
  );
  for (let i = 0; i <= rows; i++) dp[i][0] = i;
  for (let j = 0; j <= cols; j++) dp[0][j] = j;

  for (let i = 1; i <= rows; i++) {
    for (let j = 1; j <= cols; j++) {
      const substitution = a[i - 1] === b[j - 1] ? 0 : 1;
      dp[i][j] = Math.min(
        dp[i - 1][j] + 1, // delete
        dp[i][j - 1] + 1, // insert
        dp[i - 1][j - 1] + substitution,
      );
    }
  }

  return dp[rows][cols];
}

/**
 * Normalized similarity (0-1): `1 - distance / longer length`.
 * Two empty strings are identical.
 */
export function similarity(a: string, b: string): number {
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) return 1;
  return 1 - distance(a, b) / maxLength;
}
