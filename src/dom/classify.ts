import type { Classification } from '../schema/descriptor.js';
import { DYNAMIC_VALUE_HEURISTICS } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

/**
 * Thresholds for the generated-value heuristic. A value is dynamic when any
 * rule fires:
 *   - it matches a known framework id pattern (`ember123`, `:r1f:`, ...)
 *   - it contains a run of at least `minDigitRun` digits
 *   - one of its segments is a hex hash of `minHashLength`+ chars mixing
 *     letters and digits
 *   - it has no separators, mixes letters and digits, is at least
 *     `minEntropyLength` long and its entropy reaches `entropyThreshold`
 */
export interface DynamicValueHeuristics {
  minHashLength: number;
  minDigitRun: number;
  entropyThreshold: number;
  minEntropyLength: number;
}

export const DEFAULT_HEURISTICS: DynamicValueHeuristics = {
  minHashLength: DYNAMIC_VALUE_HEURISTICS.MIN_HASH_LENGTH,
  minDigitRun: DYNAMIC_VALUE_HEURISTICS.MIN_DIGIT_RUN,
  entropyThreshold: DYNAMIC_VALUE_HEURISTICS.ENTROPY_THRESHOLD,
  minEntropyLength: DYNAMIC_VALUE_HEURISTICS.MIN_ENTROPY_LENGTH,
};

// ── Constants ────────────────────────────────────────────────

const FRAMEWORK_ID_PATTERNS: readonly RegExp[] = [
  /^ember\d+$/,
  /^:r[0-9a-z]+:$/,
  /^react-select-\d+/,
  /^mui-\d+/,
  /^radix-/,
  /^headlessui-/,
  /^ext-gen\d+/,
  /^yui_/,
  /^gwt-uid-\d+/,
];

/** Attributes whose values identify an element; a generated value here makes it dynamic. */
const IDENTIFYING_ATTRIBUTES = ['id', 'data-testid', 'name'] as const;

const LABELLING_ATTRIBUTES = ['alt', 'aria-label', 'title', 'id', 'data-testid', 'name'] as const;

// ── Value heuristics ─────────────────────────────────────────

export function shannonEntropy(value: string): number {
  if (value.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const ch of value) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }

  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / value.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export function isDynamicValue(
  value: string,
  heuristics: DynamicValueHeuristics = DEFAULT_HEURISTICS,
): boolean {
  const v = value.trim();
  if (v.length === 0) return false;

  if (FRAMEWORK_ID_PATTERNS.some((re) => re.test(v))) return true;

  const digitRun = new RegExp(`\\d{${String(heuristics.minDigitRun)},}`);
  if (digitRun.test(v)) return true;

  for (const segment of v.split(/[-_:.\s]+/)) {
    if (
      segment.length >= heuristics.minHashLength &&
      /^[0-9a-f]+$/i.test(segment) &&
      /\d/.test(segment) &&
      /[a-f]/i.test(segment)
    ) {
      return true;
    }
  }

  return (
    v.length >= heuristics.minEntropyLength &&
    !/[-_:.\s]/.test(v) &&
    /\d/.test(v) &&
    /[a-z]/i.test(v) &&
    shannonEntropy(v) >= heuristics.entropyThreshold
  );
}

// ── Element classification ───────────────────────────────────

export function classifyElement(
  tag: string,
  attributes: Readonly<Record<string, string>>,
  heuristics: DynamicValueHeuristics = DEFAULT_HEURISTICS,
): Classification {
  if (isVisualOnly(tag, attributes)) return 'visual-only';

  for (const name of IDENTIFYING_ATTRIBUTES) {
    const value = attributes[name];
    if (value !== undefined && isDynamicValue(value, heuristics)) {
      return 'dynamic';
    }
  }

  return 'static';
}

function isVisualOnly(
  tag: string,
  attributes: Readonly<Record<string, string>>,
): boolean {
  if (tag === 'canvas') return true;
  if (tag !== 'svg' && tag !== 'img') return false;

  return !LABELLING_ATTRIBUTES.some((name) => {
    const value = attributes[name];
    return value !== undefined && value.trim().length > 0;
  });
}
