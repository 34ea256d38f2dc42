/**
 * Configuration constants for the correlation engine.
 * Centralizes magic numbers for easier tuning and documentation.
 */

/**
 * Marker extraction defaults (used when clustering module ports)
 */
export const MARKER_CONFIG = {
  /** Shortest substring considered as a group marker */
  MIN_LENGTH: 3,
  /** Number of distinct identifiers a marker must occur in */
  FREQUENCY_THRESHOLD: 2,
  /** Group key for identifiers no marker claims */
  UNKNOWN_GROUP: "<unknown>",
} as const;

/**
 * Hint-to-marker resolution thresholds
 */
export const HINT_CONFIG = {
  /** Best token similarity above which a hint token counts as matched */
  TOKEN_MATCH_THRESHOLD: 0.7,
  /** Weight of the matched-token ratio in the part-aware score */
  MATCH_RATIO_WEIGHT: 0.7,
  /** Weight of the average matched-token similarity */
  TOKEN_SIMILARITY_WEIGHT: 0.3,
  /** Below this the part-aware result is discarded for plain similarity */
  FALLBACK_THRESHOLD: 0.4,
} as const;

/**
 * Common-substring removal thresholds
 */
export const REMOVAL_CONFIG = {
  /** Context considered around an exact hit when scoring its position */
  CONTEXT_WINDOW: 5,
  /** Bonus for a hit flush against the start or end of the identifier */
  BOUNDARY_BONUS: 5,
  /** Identifiers this short or shorter skip the token-region search */
  MIN_REGION_SEARCH_LENGTH: 5,
  /** Shortest window / substring examined by the fuzzy searches */
  MIN_WINDOW: 3,
  /** Tokens shorter than this are ignored by region search and masking */
  MIN_TOKEN_LENGTH: 2,
  /** Similarity a fuzzy token hit must exceed */
  FUZZY_TOKEN_THRESHOLD: 0.5,
  /** Credit multiplier for a fuzzy (non-exact) token hit */
  FUZZY_TOKEN_CREDIT: 0.8,
  /** Region score blend */
  MATCH_RATIO_WEIGHT: 0.7,
  LENGTH_RATIO_WEIGHT: 0.3,
  /** Region score a window must exceed to be removed */
  REGION_THRESHOLD: 0.5,
  /** Extra length allowed beyond the hint in the whole-string fallback */
  FALLBACK_EXTRA_LENGTH: 5,
  /** Similarity the whole-string fallback must exceed */
  FALLBACK_THRESHOLD: 0.75,
} as const;

/**
 * Variant generation and matching
 */
export const MATCHING_CONFIG = {
  /** Token counts for which reversed-order spellings are generated */
  MAX_TOKENS_FOR_REVERSED_SPELLING: 4,
  /** Token counts for which reversed token order is searched */
  MAX_TOKENS_FOR_REORDER: 6,
  /** Hints with at least this many tokens also use token masking */
  MASKING_MIN_TOKENS: 3,
  /** Cost of a padding cell in the assignment matrix */
  PADDING_COST: 1,
} as const;
