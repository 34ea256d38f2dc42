/**
 * Output formatting for the CLI (terminal tables and JSON).
 */

import type { Groups } from "../core/markers.js";
import type { MatchPair } from "../core/matching.js";
import type { CorrelationResult } from "../core/pipeline.js";
import { c } from "./colors.js";

function padEnd(s: string, width: number): string {
  return s + " ".repeat(Math.max(0, width - s.length));
}

/**
 * One line per B identifier: `b -> a  (cost)`, and `b -> (unmatched)` for
 * identifiers left over when A is the smaller side.
 */
export function formatMatchTable(groupB: readonly string[], pairs: readonly MatchPair[]): string {
  const byIndex = new Map<number, MatchPair>();
  for (const pair of pairs) byIndex.set(pair.bIndex, pair);

  const width = groupB.reduce((max, b) => Math.max(max, b.length), 0);
  const lines = groupB.map((b, i) => {
    const pair = byIndex.get(i);
    if (!pair) {
      return `${padEnd(b, width)} -> ${c.yellow}(unmatched)${c.reset}`;
    }
    return `${padEnd(b, width)} -> ${c.green}${pair.a}${c.reset}  ${c.dim}(${pair.cost.toFixed(3)})${c.reset}`;
  });
  return lines.join("\n");
}

/**
 * Groups with their members, in clustering order.
 */
export function formatGroups(groups: Groups): string {
  const lines: string[] = [];
  for (const [marker, members] of groups) {
    lines.push(`${c.bold}${marker}${c.reset} ${c.dim}(${members.length})${c.reset}`);
    for (const member of members) {
      lines.push(`  ${member}`);
    }
  }
  return lines.join("\n");
}

function mapToObject<V>(map: ReadonlyMap<string, V>): Record<string, V> {
  return Object.fromEntries(map);
}

export function generateMatchJson(
  hint: string,
  pairs: readonly MatchPair[],
  version: string,
): string {
  const mapping = Object.fromEntries(pairs.map((p) => [p.b, p.a]));
  return JSON.stringify({ version, hint, mapping, pairs }, null, 2);
}

export function generateCorrelationJson(result: CorrelationResult, version: string): string {
  return JSON.stringify(
    {
      version,
      marker: result.marker,
      candidates: result.candidates,
      groups: mapToObject(result.groups),
      mapping: mapToObject(result.mapping),
      pairs: result.pairs,
    },
    null,
    2,
  );
}

export function generateClusterJson(
  markers: ReadonlyMap<string, number>,
  groups: Groups,
  version: string,
): string {
  return JSON.stringify({ version, markers: mapToObject(markers), groups: mapToObject(groups) }, null, 2);
}
