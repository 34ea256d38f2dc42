/**
 * Candidate marker extraction, clustering and hint resolution.
 *
 * A marker is a substring shared by several identifiers (e.g. "i_axi_" in a
 * port list). Markers group identifiers by their root and let a free-form
 * hint such as an interface name be resolved to the group it refers to.
 */

import { HINT_CONFIG, MARKER_CONFIG } from "../config.js";
import { createDebugLogger } from "../debug.js";
import { similarity } from "../text/edit-distance.js";
import { tokenize, variantsOf } from "../text/tokens.js";

const debug = createDebugLogger("markers");

export const UNKNOWN_GROUP = MARKER_CONFIG.UNKNOWN_GROUP;

/** Groups keyed by marker, or by UNKNOWN_GROUP for unclaimed identifiers */
export type Groups = Map<string, string[]>;

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Count substrings of length >= minLen across identifiers, each counted at
 * most once per identifier, and keep those seen in >= freqThreshold of them.
 * Keys keep the order in which they were first enumerated.
 */
export function extractMarkers(
  identifiers: readonly string[],
  minLen: number,
  freqThreshold: number,
): Map<string, number> {
  assertPositiveInteger("minLen", minLen);
  assertPositiveInteger("freqThreshold", freqThreshold);

  const counts = new Map<string, number>();
  for (const identifier of identifiers) {
    const seen = new Set<string>();
    for (let len = minLen; len <= identifier.length; len++) {
      for (let i = 0; i + len <= identifier.length; i++) {
        const sub = identifier.substring(i, i + len);
        if (seen.has(sub)) continue;
        seen.add(sub);
        counts.set(sub, (counts.get(sub) ?? 0) + 1);
      }
    }
  }

  const markers = new Map<string, number>();
  for (const [sub, count] of counts) {
    if (count >= freqThreshold) markers.set(sub, count);
  }

  debug("extractMarkers:", identifiers.length, "identifiers,", counts.size, "substrings,", markers.size, "kept");
  return markers;
}

/**
 * Markers longest first. The sort is stable, so equal lengths keep their
 * enumeration order.
 */
export function sortMarkers(markers: Iterable<string>): string[] {
  return [...markers].sort((a, b) => b.length - a.length);
}

/**
 * Assign each identifier to the longest marker it starts with.
 * Identifiers no marker prefixes go to UNKNOWN_GROUP.
 */
export function cluster(
  identifiers: readonly string[],
  markers: Iterable<string>,
): Groups {
  const sorted = sortMarkers(markers);
  const groups: Groups = new Map();

  for (const identifier of identifiers) {
    const marker = sorted.find((m) => identifier.startsWith(m)) ?? UNKNOWN_GROUP;
    const members = groups.get(marker);
    if (members) {
      members.push(identifier);
    } else {
      groups.set(marker, [identifier]);
    }
  }

  debug("cluster:", groups.size, "groups");
  return groups;
}

/**
 * First marker (of an already length-sorted list) occurring anywhere in the
 * identifier, or UNKNOWN_GROUP.
 */
export function findBestGroup(identifier: string, sortedMarkers: readonly string[]): string {
  return sortedMarkers.find((m) => identifier.includes(m)) ?? UNKNOWN_GROUP;
}

/**
 * Similarity that credits a hint whose words all appear in the marker,
 * in whatever order or casing convention.
 *
 * Single-token sides fall back to plain (lower-cased) similarity. Otherwise
 * every hint token is paired with its closest marker token; it counts as
 * matched above TOKEN_MATCH_THRESHOLD. The result is the larger of
 * `matchRatio*0.7 + avgMatched*0.3` and the plain similarity.
 */
export function partAwareSimilarity(hint: string, marker: string): number {
  const direct = similarity(hint.toLowerCase(), marker.toLowerCase());

  const hintTokens = tokenize(hint);
  const markerTokens = tokenize(marker);
  if (hintTokens.length <= 1 || markerTokens.length <= 1) return direct;

  let matched = 0;
  let matchedSimilarity = 0;
  for (const hintToken of hintTokens) {
    let best = 0;
    for (const markerToken of markerTokens) {
      best = Math.max(best, similarity(hintToken, markerToken));
    }
    if (best > HINT_CONFIG.TOKEN_MATCH_THRESHOLD) {
      matched++;
      matchedSimilarity += best;
    }
  }

  const matchRatio = matched / hintTokens.length;
  const avgMatched = matched > 0 ? matchedSimilarity / matched : 0;
  const partScore =
    matchRatio * HINT_CONFIG.MATCH_RATIO_WEIGHT + avgMatched * HINT_CONFIG.TOKEN_SIMILARITY_WEIGHT;

  return Math.max(direct, partScore);
}

interface ScoredMarker {
  marker: string;
  score: number;
}

/** Highest score wins; equal scores go to the longer marker. */
function pickBest(candidates: Iterable<ScoredMarker>): ScoredMarker {
  let best: ScoredMarker = { marker: "", score: 0 };
  for (const c of candidates) {
    if (c.score > best.score || (c.score === best.score && c.marker.length > best.marker.length)) {
      best = c;
    }
  }
  return best;
}

function* partAwareScores(hint: string, markers: readonly string[]): Generator<ScoredMarker> {
  for (const variant of variantsOf(hint)) {
    for (const marker of markers) {
      yield { marker, score: partAwareSimilarity(variant, marker) };
    }
  }
}

function* plainScores(hint: string, markers: readonly string[]): Generator<ScoredMarker> {
  const hintLower = hint.toLowerCase();
  for (const marker of markers) {
    yield { marker, score: similarity(hintLower, marker.toLowerCase()) };
  }
}

/**
 * Resolve a free-form hint (e.g. an interface name) to the marker it most
 * plausibly refers to. Returns "" when there are no markers.
 */
export function bestMarkerForHint(hint: string, markers: readonly string[]): string {
  let best = pickBest(partAwareScores(hint, markers));

  if (best.score < HINT_CONFIG.FALLBACK_THRESHOLD) {
    debug("bestMarkerForHint: part-aware score", best.score.toFixed(3), "too low, using plain similarity");
    best = pickBest(plainScores(hint, markers));
  }

  debug("bestMarkerForHint:", JSON.stringify(hint), "->", JSON.stringify(best.marker), best.score.toFixed(3));
  return best.marker;
}

/**
 * Candidate most similar to the target, strictly above threshold.
 */
export function findBestMatchingString(
  target: string,
  candidates: readonly string[],
  threshold = 0,
): string | undefined {
  let bestScore = threshold;
  let bestMatch: string | undefined;
  for (const candidate of candidates) {
    const score = similarity(candidate, target);
    if (score > bestScore) {
      bestScore = score;
      bestMatch = candidate;
    }
  }
  return bestMatch;
}
