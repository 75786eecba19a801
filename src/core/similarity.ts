import type { ElementDescriptor } from '../schema/descriptor.js';
import { HEALING } from '../config/defaults.js';

// ── Weights ──────────────────────────────────────────────────

export interface SimilarityWeights {
  text: number;
  attributes: number;
  structure: number;
  /** Credit for an attribute present on both sides with different values. */
  partialAttributeCredit: number;
}

export const DEFAULT_WEIGHTS: SimilarityWeights = {
  text: HEALING.TEXT_WEIGHT,
  attributes: HEALING.ATTRIBUTE_WEIGHT,
  structure: HEALING.STRUCTURE_WEIGHT,
  partialAttributeCredit: HEALING.PARTIAL_ATTRIBUTE_CREDIT,
};

/** Attributes that say nothing about which element this is. */
const IGNORED_ATTRIBUTES = new Set(['style', 'class', 'value', 'tabindex']);

// ── Component scores ─────────────────────────────────────────

export function textSimilarity(recorded: string, candidate: string): number {
  const a = recorded.toLowerCase();
  const b = candidate.toLowerCase();
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;
  if (a.includes(b) || b.includes(a)) return 0.7;

  const left = new Set(tokens(a));
  const right = new Set(tokens(b));
  if (left.size === 0 || right.size === 0) return 0;

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

/** Scored over the recorded element's attributes: full credit for equal values, partial for a changed one. */
export function attributeSimilarity(
  recorded: Readonly<Record<string, string>>,
  candidate: Readonly<Record<string, string>>,
  partialCredit: number = DEFAULT_WEIGHTS.partialAttributeCredit,
): number {
  const keys = Object.keys(recorded).filter((k) => !IGNORED_ATTRIBUTES.has(k));
  if (keys.length === 0) {
    const others = Object.keys(candidate).filter((k) => !IGNORED_ATTRIBUTES.has(k));
    return others.length === 0 ? 1 : 0.5;
  }

  let total = 0;
  for (const key of keys) {
    const value = candidate[key];
    if (value === undefined) continue;
    total += value === recorded[key] ? 1 : partialCredit;
  }
  return total / keys.length;
}

/**
 * Ancestry compared from the parent upward, plus the element's own sibling
 * position. Three quarters of the score come from the ancestry.
 */
export function structureSimilarity(
  recorded: ElementDescriptor,
  candidate: ElementDescriptor,
): number {
  const a = recorded.ancestors;
  const b = candidate.ancestors;
  const longest = Math.max(a.length, b.length);

  let ancestry = 1;
  if (longest > 0) {
    let matched = 0;
    for (let i = 1; i <= Math.min(a.length, b.length); i++) {
      const left = a[a.length - i];
      const right = b[b.length - i];
      if (!left || !right || left.tag !== right.tag) break;
      matched += left.position === right.position ? 1 : 0.5;
    }
    ancestry = matched / longest;
  }

  const position = recorded.position === candidate.position ? 1 : 0;
  return 0.75 * ancestry + 0.25 * position;
}

// ── Combined ─────────────────────────────────────────────────

/**
 * 0 when tags differ, or when the recorded element had text and the
 * candidate shares none of it. Otherwise the weighted blend of text,
 * attributes and structure.
 */
export function similarity(
  recorded: ElementDescriptor,
  candidate: ElementDescriptor,
  weights: SimilarityWeights = DEFAULT_WEIGHTS,
): number {
  if (recorded.tag !== candidate.tag) return 0;

  const text = textSimilarity(recorded.text, candidate.text);
  if (recorded.text.length > 0 && text === 0) return 0;

  const score =
    weights.text * text +
    weights.attributes *
      attributeSimilarity(recorded.attributes, candidate.attributes, weights.partialAttributeCredit) +
    weights.structure * structureSimilarity(recorded, candidate);

  return Math.round(score * 1000) / 1000;
}

function tokens(text: string): string[] {
  return text.split(/[^\p{L}\p{N}]+/u).filter((t) => t.length > 0);
}
