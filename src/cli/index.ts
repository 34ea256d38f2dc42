#!/usr/bin/env node

/**
 * CLI entry point using commander.js.
 * Wires identifier list input to the correlation engine.
 */

import { program } from "commander";
import { readFileSync } from "node:fs";
import { MARKER_CONFIG } from "../config.js";
import { createTimer, setDebugEnabled, setVerboseEnabled, verbose } from "../debug.js";
import { extractMarkers, cluster } from "../core/markers.js";
import { findOptimalAssignment, hintVariants } from "../core/matching.js";
import { correlate } from "../core/pipeline.js";
import { trimmedSimilarity } from "../core/trim.js";
import { similarity } from "../text/edit-distance.js";
import { c, logError, logInfo, logWarning } from "./colors.js";
import { readIdentifierList } from "./input.js";
import {
  formatGroups,
  formatMatchTable,
  generateClusterJson,
  generateCorrelationJson,
  generateMatchJson,
} from "./output.js";
import { loadSettingsFile, parseCount, type Settings } from "./settings.js";

// ─── Version ─────────────────────────────────────────────────────────────────

function getVersion(): string {
  // src/cli/index.ts and dist/src/cli/index.js sit at different depths
  for (const rel of ["../../package.json", "../../../package.json"]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(new URL(rel, import.meta.url), "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      // try the next location
    }
  }
  return "unknown";
}

const VERSION = getVersion();

// ─── Options ─────────────────────────────────────────────────────────────────

type GlobalOptions = {
  json?: boolean;
  debug?: boolean;
  verbose?: boolean;
  settings?: string;
};

type HintOption = {
  hint?: string;
};

type MarkerOptions = {
  minLen?: string;
  freq?: string;
};

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

let cachedSettings: Settings | undefined;

function settings(): Settings {
  if (!cachedSettings) {
    const path = globalOptions().settings;
    cachedSettings = path ? loadSettingsFile(path) : {};
  }
  return cachedSettings;
}

function resolveHint(opts: HintOption): string {
  return opts.hint ?? settings().hint ?? "";
}

function resolveMarkerOptions(opts: MarkerOptions): { minLength: number; frequency: number } {
  return {
    minLength: opts.minLen
      ? parseCount(opts.minLen, "--min-len")
      : (settings().minLength ?? MARKER_CONFIG.MIN_LENGTH),
    frequency: opts.freq
      ? parseCount(opts.freq, "--freq")
      : (settings().frequency ?? MARKER_CONFIG.FREQUENCY_THRESHOLD),
  };
}

// ─── Commands ────────────────────────────────────────────────────────────────

async function runMatch(aSource: string, bSource: string, opts: HintOption): Promise<void> {
  if (aSource === "-" && bSource === "-") {
    throw new Error("Cannot read both lists from stdin");
  }
  const timer = createTimer("match");
  const groupA = await readIdentifierList(aSource);
  const groupB = await readIdentifierList(bSource);
  const hint = resolveHint(opts);

  verbose(`Matching ${groupB.length} identifier(s) against ${groupA.length}, hint "${hint}"`);
  if (groupA.length < groupB.length) {
    logWarning(`${groupB.length - groupA.length} identifier(s) will be left unmatched (A has only ${groupA.length})`);
  }

  const pairs = timer.time("assign", () => findOptimalAssignment(groupA, groupB, hint));
  timer.done();

  if (globalOptions().json) {
    console.log(generateMatchJson(hint, pairs, VERSION));
  } else {
    console.log(formatMatchTable(groupB, pairs));
  }
}

async function runBind(portsSource: string, signalsSource: string, opts: HintOption & MarkerOptions): Promise<void> {
  if (portsSource === "-" && signalsSource === "-") {
    throw new Error("Cannot read both lists from stdin");
  }
  const hint = resolveHint(opts);
  if (hint.length === 0) {
    throw new Error("bind needs an interface name (--hint or \"hint\" in the settings file)");
  }
  const timer = createTimer("bind");
  const ports = await readIdentifierList(portsSource);
  const signals = await readIdentifierList(signalsSource);

  const result = timer.time("correlate", () =>
    correlate({ ports, signals, hint }, resolveMarkerOptions(opts)),
  );
  timer.done();

  if (globalOptions().json) {
    console.log(generateCorrelationJson(result, VERSION));
    return;
  }
  logInfo(`Marker for "${hint}": ${result.marker.length > 0 ? `"${result.marker}"` : "(none)"}`);
  logInfo(`Candidate ports: ${result.candidates.length} of ${ports.length}`);
  console.log(formatMatchTable(signals, result.pairs));
}

async function runCluster(source: string, opts: MarkerOptions): Promise<void> {
  const identifiers = await readIdentifierList(source);
  const { minLength, frequency } = resolveMarkerOptions(opts);
  const markers = extractMarkers(identifiers, minLength, frequency);
  const groups = cluster(identifiers, markers.keys());

  if (globalOptions().json) {
    console.log(generateClusterJson(markers, groups, VERSION));
  } else {
    console.log(formatGroups(groups));
  }
}

function runSimilarity(s1: string, s2: string, opts: HintOption): void {
  const hint = resolveHint(opts);
  const plain = similarity(s1, s2);
  let trimmed = 0;
  for (const variant of hintVariants(hint)) {
    trimmed = Math.max(trimmed, trimmedSimilarity(s1, s2, variant));
  }

  if (globalOptions().json) {
    console.log(JSON.stringify({ version: VERSION, s1, s2, hint, similarity: plain, trimmed }, null, 2));
  } else {
    console.log(`${c.bold}similarity${c.reset} ${plain.toFixed(4)}`);
    console.log(`${c.bold}trimmed${c.reset}    ${trimmed.toFixed(4)}`);
  }
}

// ─── Command Setup ───────────────────────────────────────────────────────────

program
  .name("identmatch")
  .description("Correlate identifiers across naming conventions (bus signals to module ports)")
  .version(VERSION, "-v, --version")
  .option("-j, --json", "Output as JSON")
  .option("--verbose", "Show timing info")
  .option("--debug", "Enable granular debug output")
  .option("--settings <file>", "Load defaults (minLength, frequency, hint) from JSON file")
  .hook("preAction", () => {
    const opts = globalOptions();
    if (opts.verbose) setVerboseEnabled(true);
    if (opts.debug) setDebugEnabled(true);
  });

program
  .command("match")
  .description("Match every identifier of list B to one identifier of list A")
  .argument("<a>", "List A file (e.g. module ports), - for stdin")
  .argument("<b>", "List B file (e.g. bus signals), - for stdin")
  .option("-H, --hint <name>", "Substring shared by the identifiers (e.g. interface name)")
  .action(runMatch);

program
  .command("bind")
  .description("Bind bus signals to the module ports belonging to an interface")
  .argument("<ports>", "Module port list file, - for stdin")
  .argument("<signals>", "Bus signal list file, - for stdin")
  .option("-H, --hint <name>", "Interface name used to locate the ports")
  .option("--min-len <n>", `Shortest marker length (default ${MARKER_CONFIG.MIN_LENGTH})`)
  .option("--freq <n>", `Ports a marker must occur in (default ${MARKER_CONFIG.FREQUENCY_THRESHOLD})`)
  .action(runBind);

program
  .command("cluster")
  .description("Extract shared markers and group identifiers by them")
  .argument("<file>", "Identifier list file, - for stdin")
  .option("--min-len <n>", `Shortest marker length (default ${MARKER_CONFIG.MIN_LENGTH})`)
  .option("--freq <n>", `Identifiers a marker must occur in (default ${MARKER_CONFIG.FREQUENCY_THRESHOLD})`)
  .action(runCluster);

program
  .command("similarity")
  .description("Score two identifiers, plain and with the hint trimmed")
  .argument("<s1>")
  .argument("<s2>")
  .option("-H, --hint <name>", "Substring to trim before comparing")
  .action(runSimilarity);

program.addHelpText(
  "after",
  `
${c.bold}Examples${c.reset}
  ${c.dim}# Map AXI bus signals onto a module's ports${c.reset}
  identmatch bind ports.txt axi4_signals.txt --hint m_axi

  ${c.dim}# Plain matching of two lists sharing a prefix${c.reset}
  identmatch match ports.txt signals.txt -H axi --json

  ${c.dim}# Inspect how ports cluster${c.reset}
  identmatch cluster ports.txt --min-len 4
`,
);

// ─── Main ────────────────────────────────────────────────────────────────────

async function main() {
  await program.parseAsync();
}

main().catch((err: unknown) => {
  logError(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
