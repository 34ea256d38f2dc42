/**
 * Optimal one-to-one matching between two identifier collections.
 * Scores every (B, A) pair by hint-trimmed similarity and lets the
 * Hungarian solver pick the cheapest overall assignment.
 */

import { MATCHING_CONFIG } from "../config.js";
import { createDebugLogger } from "../debug.js";
import { variantsOf } from "../text/tokens.js";
import { solveAssignment } from "./hungarian.js";
import { trimmedSimilarity } from "./trim.js";

const debug = createDebugLogger("matching");

/**
 * One B identifier and the A identifier it was assigned.
 */
export interface MatchPair {
  bIndex: number;
  aIndex: number;
  b: string;
  a: string;
  cost: number;
}

/**
 * Spellings of the hint tried for each pair. No hint means no trimming.
 */
export function hintVariants(hint: string): string[] {
  return hint.length > 0 ? variantsOf(hint) : [""];
}

/**
 * Square cost matrix, rows = B, columns = A, padded with PADDING_COST.
 *
 * cost = (1 - best trimmed similarity over hint spellings) * maxLenB / len(b).
 * The length weight keeps short identifiers from matching well by chance.
 * An empty B identifier is weighted as length 1.
 */
export function buildCostMatrix(
  groupA: readonly string[],
  groupB: readonly string[],
  hint: string,
): number[][] {
  const size = Math.max(groupA.length, groupB.length);
  const variants = hintVariants(hint);
  const maxLenB = groupB.reduce((max, b) => Math.max(max, b.length), 0);

  const matrix: number[][] = Array.from({ length: size }, () =>
    new Array<number>(size).fill(MATCHING_CONFIG.PADDING_COST),
  );

  groupB.forEach((b, i) => {
    const weight = maxLenB / Math.max(b.length, 1);
    groupA.forEach((a, j) => {
      let best = 0;
      for (const variant of variants) {
        best = Math.max(best, trimmedSimilarity(b, a, variant));
      }
      matrix[i][j] = (1 - best) * weight;
    });
  });

  return matrix;
}

/**
 * Assign an A identifier to every B identifier (where enough A exist),
 * minimizing total cost. Pairs landing on padding are dropped.
 */
export function findOptimalAssignment(
  groupA: readonly string[],
  groupB: readonly string[],
  hint: string,
): MatchPair[] {
  if (groupA.length === 0 || groupB.length === 0) return [];

  const matrix = buildCostMatrix(groupA, groupB, hint);
  const assignment = solveAssignment(matrix);

  const pairs: MatchPair[] = [];
  groupB.forEach((b, bIndex) => {
    const aIndex = assignment[bIndex];
    if (aIndex < groupA.length) {
      pairs.push({ bIndex, aIndex, b, a: groupA[aIndex], cost: matrix[bIndex][aIndex] });
    }
  });

  debug("findOptimalAssignment:", groupB.length, "x", groupA.length, "->", pairs.length, "pairs");
  return pairs;
}

/**
 * B identifier -> matched A identifier. Duplicate B identifiers collapse to
 * a single key (the last assignment wins); use findOptimalAssignment to
 * keep them apart.
 */
export function findOptimalMatching(
  groupA: readonly string[],
  groupB: readonly string[],
  hint: string,
): Map<string, string> {
  const matching = new Map<string, string>();
  for (const pair of findOptimalAssignment(groupA, groupB, hint)) {
    matching.set(pair.b, pair.a);
  }
  return matching;
}
