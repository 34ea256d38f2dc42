/**
 * Correlation pipeline - binding a bus interface's signals to module ports.
 *
 * The pipeline proceeds through these stages:
 * 1. Marker extraction: substrings shared by several ports
 * 2. Clustering: ports grouped under the longest marker they start with
 * 3. Hint resolution: the interface name resolved to its best marker
 * 4. Candidate filtering: ports of every group whose key contains the marker
 * 5. Matching: optimal assignment of bus signals to candidate ports
 */
import { MARKER_CONFIG } from "../config.js";
import { createDebugLogger } from "../debug.js";
import { bestMarkerForHint, cluster, extractMarkers, sortMarkers, type Groups } from "./markers.js";
import { findOptimalAssignment, type MatchPair } from "./matching.js";

const debug = createDebugLogger("pipeline");

export interface CorrelationInput {
  /** Module port names (the "A" side) */
  ports: readonly string[];
  /** Bus signal names (the "B" side) */
  signals: readonly string[];
  /** Interface or bus instance name used to locate the relevant ports */
  hint: string;
}

/**
 * Pipeline configuration.
 */
export interface CorrelationOptions {
  /** Shortest marker length (default MARKER_CONFIG.MIN_LENGTH) */
  minLength?: number;
  /** Ports a marker must occur in (default MARKER_CONFIG.FREQUENCY_THRESHOLD) */
  frequency?: number;
}

export interface CorrelationResult {
  /** Marker the hint resolved to ("" when the ports share nothing) */
  marker: string;
  /** Port groups found by clustering */
  groups: Groups;
  /** Ports that took part in matching */
  candidates: string[];
  /** Assignment with per-pair cost */
  pairs: MatchPair[];
  /** Bus signal -> module port */
  mapping: Map<string, string>;
}

/**
 * Ports of every group whose key contains the marker (case-insensitive).
 * Falls back to all ports when no group qualifies.
 */
export function selectCandidates(groups: Groups, marker: string, ports: readonly string[]): string[] {
  const needle = marker.toLowerCase();
  const candidates: string[] = [];
  for (const [key, members] of groups) {
    if (key.toLowerCase().includes(needle)) {
      debug("selectCandidates: including group", JSON.stringify(key), members.length, "ports");
      candidates.push(...members);
    }
  }

  if (candidates.length === 0) {
    debug("selectCandidates: no group matched, using all ports");
    return [...ports];
  }
  return candidates;
}

/**
 * Run the pipeline on one module / bus interface pair.
 */
export function correlate(input: CorrelationInput, options: CorrelationOptions = {}): CorrelationResult {
  const { ports, signals, hint } = input;
  const minLength = options.minLength ?? MARKER_CONFIG.MIN_LENGTH;
  const frequency = options.frequency ?? MARKER_CONFIG.FREQUENCY_THRESHOLD;

  debug("Pipeline start:", ports.length, "ports,", signals.length, "signals, hint", JSON.stringify(hint));

  // Stages 1-2
  const markers = extractMarkers(ports, minLength, frequency);
  const groups = cluster(ports, markers.keys());

  // Stage 3
  const marker = bestMarkerForHint(hint, sortMarkers(markers.keys()));

  // Stage 4
  const candidates = selectCandidates(groups, marker, ports);

  // Stage 5
  const pairs = findOptimalAssignment(candidates, signals, marker);
  const mapping = new Map<string, string>();
  for (const pair of pairs) {
    mapping.set(pair.b, pair.a);
  }

  debug("Pipeline complete:", mapping.size, "signals mapped");
  return { marker, groups, candidates, pairs, mapping };
}
