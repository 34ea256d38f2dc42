/**
 * Identifier tokenization and naming-variant generation.
 * Shared by marker resolution, hint trimming and the matcher so that every
 * component splits and re-spells identifiers the same way.
 */

import { MATCHING_CONFIG } from "../config.js";

const SEPARATOR = "_";

function isUpperAscii(ch: string): boolean {
  return ch >= "A" && ch <= "Z";
}

/**
 * Split an identifier into lower-cased tokens.
 *
 * With an underscore anywhere the split is strictly on `_` (doubled
 * separators yield empty tokens). Otherwise a token starts at every
 * uppercase ASCII letter after the first character.
 * A result of one token or fewer is the whole identifier, lower-cased.
 */
export function tokenize(identifier: string): string[] {
  let tokens: string[];

  if (identifier.includes(SEPARATOR)) {
    tokens = identifier.split(SEPARATOR);
  } else {
    tokens = [];
    let current = "";
    for (let i = 0; i < identifier.length; i++) {
      const ch = identifier[i];
      if (i > 0 && isUpperAscii(ch)) {
        tokens.push(current);
        current = ch;
      } else {
        current += ch;
      }
    }
    if (current.length > 0) tokens.push(current);
  }

  if (tokens.length <= 1) return [identifier.toLowerCase()];
  return tokens.map((t) => t.toLowerCase());
}

function capitalize(token: string): string {
  if (token.length === 0) return token;
  return token[0].toUpperCase() + token.slice(1);
}

/** `axi_lite_slave` */
export function joinSnake(tokens: readonly string[]): string {
  return tokens.join(SEPARATOR);
}

/** `axiLiteSlave` */
export function joinLowerCamel(tokens: readonly string[]): string {
  if (tokens.length === 0) return "";
  return tokens[0] + tokens.slice(1).map(capitalize).join("");
}

/** `AxiLiteSlave` */
export function joinUpperCamel(tokens: readonly string[]): string {
  return tokens.map(capitalize).join("");
}

/**
 * Token orderings searched when an identifier may embed a hint with its
 * words swapped: the original order, plus the reverse for 2-6 tokens.
 */
export function tokenOrders(tokens: readonly string[]): string[][] {
  const orders = [[...tokens]];
  if (tokens.length > 1 && tokens.length <= MATCHING_CONFIG.MAX_TOKENS_FOR_REORDER) {
    orders.push([...tokens].reverse());
  }
  return orders;
}

/**
 * Alternate spellings of an identifier: as written, snake_case, lowerCamel,
 * UpperCamel and, for 2-4 tokens, the same three joins in reversed order.
 * De-duplicated case-insensitively, keeping the first spelling seen.
 */
export function variantsOf(identifier: string): string[] {
  const tokens = tokenize(identifier);
  const spellings = [identifier, joinSnake(tokens), joinLowerCamel(tokens), joinUpperCamel(tokens)];

  if (tokens.length > 1 && tokens.length <= MATCHING_CONFIG.MAX_TOKENS_FOR_REVERSED_SPELLING) {
    const reversed = [...tokens].reverse();
    spellings.push(joinSnake(reversed), joinLowerCamel(reversed), joinUpperCamel(reversed));
  }

  return dedupeCaseInsensitive(spellings);
}

/**
 * Keep the first occurrence of each string, comparing lower-cased.
 */
export function dedupeCaseInsensitive(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(value);
  }
  return result;
}
