/**
 * Common-substring removal and trimmed similarity.
 *
 * Bus signals and module ports usually embed the interface name somewhere
 * ("m_axi_araddr", "AxiMaster_ARADDR", "araddr_axi"). Removing that shared
 * hint first leaves the part that actually distinguishes the signal.
 */

import { MATCHING_CONFIG, REMOVAL_CONFIG } from "../config.js";
import { createDebugLogger } from "../debug.js";
import { similarity } from "../text/edit-distance.js";
import { tokenize, tokenOrders, variantsOf } from "../text/tokens.js";

const debug = createDebugLogger("trim");

/**
 * A region [start, end) of an identifier selected for removal.
 */
export interface Span {
  start: number;
  end: number;
}

function cut(s: string, span: Span): string {
  return s.slice(0, span.start) + s.slice(span.end);
}

/**
 * Lower score is better: early hits, hits flush against either end,
 * and hits with little surrounding context.
 */
function scorePosition(pos: number, hitLength: number, total: number): number {
  const { CONTEXT_WINDOW, BOUNDARY_BONUS } = REMOVAL_CONFIG;
  const before = Math.min(pos, CONTEXT_WINDOW);
  const after = Math.min(total - (pos + hitLength), CONTEXT_WINDOW);

  let score = pos;
  if (before === 0) score -= BOUNDARY_BONUS;
  if (after === 0) score -= BOUNDARY_BONUS;
  return score + before + after;
}

/**
 * Best-placed exact (case-insensitive) occurrence of any spelling of the
 * hint. Ties keep the first occurrence found.
 */
export function findExactVariant(s: string, common: string): Span | null {
  const lower = s.toLowerCase();
  const spellings = variantsOf(common)
    .map((v) => v.toLowerCase())
    .filter((v) => v.length > 0);

  let best: Span | null = null;
  let bestScore = Infinity;

  for (const spelling of spellings) {
    let pos = lower.indexOf(spelling);
    while (pos !== -1) {
      const score = scorePosition(pos, spelling.length, s.length);
      if (score < bestScore) {
        bestScore = score;
        best = { start: pos, end: pos + spelling.length };
      }
      pos = lower.indexOf(spelling, pos + 1);
    }
  }

  return best;
}

/**
 * Credit for the tokens of one ordering found, in order, inside a window.
 * An exact hit is worth 1; otherwise the closest sub-window above
 * FUZZY_TOKEN_THRESHOLD earns FUZZY_TOKEN_CREDIT times its similarity.
 */
function tokenCredit(window: string, tokens: readonly string[]): number {
  const { MIN_TOKEN_LENGTH, FUZZY_TOKEN_THRESHOLD, FUZZY_TOKEN_CREDIT } = REMOVAL_CONFIG;
  let credit = 0;
  let cursor = -1;

  for (const token of tokens) {
    if (token.length < MIN_TOKEN_LENGTH) continue;

    const pos = window.indexOf(token, Math.max(0, cursor));
    if (pos !== -1) {
      credit += 1;
      cursor = pos + token.length;
      continue;
    }

    let bestSim: number = FUZZY_TOKEN_THRESHOLD;
    for (let wpos = 0; wpos < window.length - 1; wpos++) {
      const maxLen = Math.min(token.length + 2, window.length - wpos);
      for (let len = Math.max(MIN_TOKEN_LENGTH, token.length - 1); len <= maxLen; len++) {
        const sim = similarity(window.substring(wpos, wpos + len), token);
        if (sim > bestSim) {
          bestSim = sim;
          cursor = wpos + len;
        }
      }
    }
    if (bestSim > FUZZY_TOKEN_THRESHOLD) {
      credit += bestSim * FUZZY_TOKEN_CREDIT;
    }
  }

  return credit;
}

/**
 * Sliding-window search for the region that best covers the hint's tokens,
 * in original or reversed order. Blends token coverage with how close the
 * window length is to the hint length.
 */
export function findTokenRegion(s: string, common: string): Span | null {
  const {
    MIN_REGION_SEARCH_LENGTH,
    MIN_WINDOW,
    MATCH_RATIO_WEIGHT,
    LENGTH_RATIO_WEIGHT,
    REGION_THRESHOLD,
  } = REMOVAL_CONFIG;

  if (s.length <= MIN_REGION_SEARCH_LENGTH) return null;
  const orders = tokenOrders(tokenize(common));
  const lower = s.toLowerCase();

  let best: Span | null = null;
  let bestScore = 0;

  for (let i = 0; i < s.length; i++) {
    const maxLen = Math.min(s.length - i, common.length * 2);
    for (let len = MIN_WINDOW; len <= maxLen; len++) {
      const window = lower.substring(i, i + len);
      const lengthRatio = 1 - Math.abs(len - common.length) / Math.max(len, common.length);

      for (const tokens of orders) {
        const matchRatio = tokenCredit(window, tokens) / tokens.length;
        const score = matchRatio * MATCH_RATIO_WEIGHT + lengthRatio * LENGTH_RATIO_WEIGHT;
        if (score > bestScore && score > REGION_THRESHOLD) {
          bestScore = score;
          best = { start: i, end: i + len };
        }
      }
    }
  }

  return best;
}

/**
 * Substring most similar to the hint as a whole, above FALLBACK_THRESHOLD.
 */
export function findFuzzySubstring(s: string, common: string): Span | null {
  const { MIN_WINDOW, FALLBACK_EXTRA_LENGTH, FALLBACK_THRESHOLD } = REMOVAL_CONFIG;
  const commonLower = common.toLowerCase();

  let best: Span | null = null;
  let bestSim: number = FALLBACK_THRESHOLD;

  for (let i = 0; i < s.length - 2; i++) {
    const maxLen = Math.min(common.length + FALLBACK_EXTRA_LENGTH, s.length - i);
    for (let len = MIN_WINDOW; len <= maxLen; len++) {
      const sim = similarity(s.substring(i, i + len).toLowerCase(), commonLower);
      if (sim > bestSim) {
        bestSim = sim;
        best = { start: i, end: i + len };
      }
    }
  }

  return best;
}

/**
 * Remove the hint from an identifier: an exact spelling variant first, then
 * a token-covering region, then the most similar substring. Returns the
 * identifier unchanged when nothing clears its threshold.
 */
export function removeCommon(s: string, common: string): string {
  if (common.length === 0 || s.length === 0) return s;

  const exact = findExactVariant(s, common);
  if (exact) return cut(s, exact);

  const region = findTokenRegion(s, common);
  if (region) {
    debug("removeCommon: token region", JSON.stringify(s.slice(region.start, region.end)), "in", s);
    return cut(s, region);
  }

  const fuzzy = findFuzzySubstring(s, common);
  if (fuzzy) {
    debug("removeCommon: fuzzy substring", JSON.stringify(s.slice(fuzzy.start, fuzzy.end)), "in", s);
    return cut(s, fuzzy);
  }

  return s;
}

/**
 * Mask parallel to `s` marking every occurrence of each token
 * (case-insensitive, non-overlapping per token, left to right).
 * Tokens shorter than MIN_TOKEN_LENGTH are ignored.
 */
export function maskCommonTokens(s: string, tokens: readonly string[]): boolean[] {
  const lower = s.toLowerCase();
  const mask = new Array<boolean>(s.length).fill(false);

  for (const token of tokens) {
    if (token.length < REMOVAL_CONFIG.MIN_TOKEN_LENGTH) continue;
    let pos = lower.indexOf(token);
    while (pos !== -1) {
      mask.fill(true, pos, pos + token.length);
      pos = lower.indexOf(token, pos + token.length);
    }
  }

  return mask;
}

/**
 * Characters of `s` whose mask position is unset.
 */
export function unmaskedRemnant(s: string, mask: readonly boolean[]): string {
  let remnant = "";
  for (let i = 0; i < s.length; i++) {
    if (!mask[i]) remnant += s[i];
  }
  return remnant;
}

/**
 * Similarity of two identifiers once the shared hint is taken out of both.
 * Hints of three or more tokens also try masking each token wherever it
 * occurs, which copes with the hint's words being scattered.
 */
export function trimmedSimilarity(s1: string, s2: string, common: string): number {
  const basic = similarity(removeCommon(s1, common), removeCommon(s2, common));

  const tokens = tokenize(common);
  if (tokens.length < MATCHING_CONFIG.MASKING_MIN_TOKENS) return basic;

  const remnant1 = unmaskedRemnant(s1, maskCommonTokens(s1, tokens));
  const remnant2 = unmaskedRemnant(s2, maskCommonTokens(s2, tokens));
  return Math.max(basic, similarity(remnant1, remnant2));
}

/**
 * Remove the first case-insensitive occurrence of `sub`.
 */
export function removeSubstring(s: string, sub: string): string {
  if (sub.length === 0) return s;
  const index = s.toLowerCase().indexOf(sub.toLowerCase());
  if (index === -1) return s;
  return s.slice(0, index) + s.slice(index + sub.length);
}

/**
 * Remove `prefix` if `s` starts with it (case-insensitive).
 */
export function removeCommonPrefix(s: string, prefix: string): string {
  if (s.toLowerCase().startsWith(prefix.toLowerCase())) {
    return s.slice(prefix.length);
  }
  return s;
}
