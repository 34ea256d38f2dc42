/**
 * Public API.
 */
export { distance, similarity } from "./text/edit-distance.js";
export {
  tokenize,
  tokenOrders,
  variantsOf,
  joinSnake,
  joinLowerCamel,
  joinUpperCamel,
  dedupeCaseInsensitive,
} from "./text/tokens.js";
export {
  UNKNOWN_GROUP,
  type Groups,
  extractMarkers,
  sortMarkers,
  cluster,
  findBestGroup,
  partAwareSimilarity,
  bestMarkerForHint,
  findBestMatchingString,
} from "./core/markers.js";
export {
  type Span,
  removeCommon,
  trimmedSimilarity,
  maskCommonTokens,
  unmaskedRemnant,
  removeSubstring,
  removeCommonPrefix,
} from "./core/trim.js";
export { solveAssignment, assignmentCost } from "./core/hungarian.js";
export {
  type MatchPair,
  hintVariants,
  buildCostMatrix,
  findOptimalAssignment,
  findOptimalMatching,
} from "./core/matching.js";
export {
  type CorrelationInput,
  type CorrelationOptions,
  type CorrelationResult,
  correlate,
  selectCandidates,
} from "./core/pipeline.js";
export { MARKER_CONFIG, HINT_CONFIG, REMOVAL_CONFIG, MATCHING_CONFIG } from "./config.js";
