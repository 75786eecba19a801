/**
 * Default configuration values.
 * All values are overridable via config file.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  ACTION_TIMEOUT: 5_000,
  /** How long the primary selector is polled before fallbacks and healing. */
  RESOLVE_TIMEOUT: 2_000,
  RESOLVE_POLL_INTERVAL: 250,
  /** Best-effort load-state wait after an action; a timeout here is tolerated. */
  POST_ACTION_SETTLE: 3_000,
  VISION_TIMEOUT: 60_000,
  MAX_POST_ACTION_WAIT: 30_000,
  LLM_RETRY_WAIT: 5_000,
} as const;

export const LIMITS = {
  MAX_RECORDING_STEPS: 25,
  MAX_RECORDING_FAILURES: 3,
  MAX_CONSOLE_LINES: 30,
  MAX_CONTEXT_NODES: 400,
  MAX_TEXT_CHARS: 300,
  MAX_TEXT_SELECTOR_CHARS: 80,
  MAX_ATTRIBUTE_CHARS: 256,
  MAX_LLM_RETRIES: 3,
} as const;

/**
 * Robustness score per candidate kind. Test attributes sit between ids and
 * names; positional XPath is the last resort.
 */
export const SCORES = {
  ID: 0.95,
  TEST_ATTRIBUTE: 0.9,
  NAME_ATTRIBUTE: 0.85,
  LABEL_ATTRIBUTE: 0.8,
  ATTRIBUTE_COMBINATION_PENALTY: 0.05,
  TEXT_MATCH: 0.6,
  CSS_STRUCTURAL: 0.45,
  XPATH: 0.3,
  DYNAMIC_PENALTY: 0.6,
} as const;

export const HEALING = {
  ENABLED: true,
  SIMILARITY_THRESHOLD: 0.6,
  /** Two candidates closer than this are treated as indistinguishable. */
  AMBIGUITY_MARGIN: 0.02,
  TEXT_WEIGHT: 0.4,
  ATTRIBUTE_WEIGHT: 0.35,
  STRUCTURE_WEIGHT: 0.25,
  PARTIAL_ATTRIBUTE_CREDIT: 0.3,
  /** Similarity matches kept per tree search; rivals for the ambiguity check come from these. */
  MAX_CANDIDATES: 5,
} as const;

/** Thresholds for flagging generated attribute values (see `dom/classify.ts`). */
export const DYNAMIC_VALUE_HEURISTICS = {
  MIN_HASH_LENGTH: 6,
  MIN_DIGIT_RUN: 4,
  /** Shannon entropy in bits per character. */
  ENTROPY_THRESHOLD: 3.75,
  MIN_ENTROPY_LENGTH: 12,
} as const;
