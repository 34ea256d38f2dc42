/**
 * Settings file support (--settings <file>).
 * Values from the file apply wherever the matching flag was not given.
 */

import { readFileSync } from "node:fs";

export interface Settings {
  /** Shortest marker length */
  minLength?: number;
  /** Identifiers a marker must occur in */
  frequency?: number;
  /** Default hint / interface name */
  hint?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInteger(key: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new Error(`Setting "${key}" must be a positive integer`);
  }
  return value;
}

/**
 * Validate parsed JSON as Settings. Unknown keys are rejected so typos surface.
 */
export function parseSettings(raw: unknown): Settings {
  if (!isRecord(raw)) {
    throw new Error("Settings must be a JSON object");
  }

  const settings: Settings = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "minLength":
        settings.minLength = positiveInteger(key, value);
        break;
      case "frequency":
        settings.frequency = positiveInteger(key, value);
        break;
      case "hint":
        if (typeof value !== "string") {
          throw new Error(`Setting "hint" must be a string`);
        }
        settings.hint = value;
        break;
      default:
        throw new Error(`Unknown setting "${key}"`);
    }
  }
  return settings;
}

export function loadSettingsFile(path: string): Settings {
  const content = readFileSync(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`Invalid JSON in settings file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSettings(raw);
}

/**
 * Parse a numeric command-line option (commander passes strings).
 */
export function parseCount(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}
