/**
 * Identifier list input: files or stdin, one identifier per line.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";

/**
 * Parse a newline-separated identifier list.
 * Surrounding whitespace is trimmed; blank lines and `#` comments are skipped.
 * Duplicates are kept.
 */
export function parseIdentifierList(text: string): string[] {
  const identifiers: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const hash = line.indexOf("#");
    const value = (hash === -1 ? line : line.slice(0, hash)).trim();
    if (value.length > 0) identifiers.push(value);
  }
  return identifiers;
}

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    process.stdin.setEncoding("utf-8");
    process.stdin.on("data", (chunk) => (data += chunk));
    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read an identifier list from a path, or from stdin for "-".
 */
export async function readIdentifierList(source: string): Promise<string[]> {
  if (source === "-") {
    return parseIdentifierList(await readStdin());
  }
  const path = resolve(source);
  if (!existsSync(path)) {
    throw new Error(`File not found: ${source}`);
  }
  return parseIdentifierList(readFileSync(path, "utf-8"));
}
