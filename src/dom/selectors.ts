import type {
  DOMContextTree,
  ElementDescriptor,
  SelectorCandidate,
  SelectorKind,
} from '../schema/descriptor.js';
import { LIMITS, SCORES } from '../config/defaults.js';
import { DEFAULT_HEURISTICS, isDynamicValue } from './classify.js';
import type { DynamicValueHeuristics } from './classify.js';
import { frameDescriptors } from './tree.js';

// ── Public types ─────────────────────────────────────────────

export interface SynthesisOptions {
  heuristics?: DynamicValueHeuristics | undefined;
}

// ── Constants ────────────────────────────────────────────────

const STABLE_ATTRIBUTES: ReadonlyArray<readonly [string, number]> = [
  ['data-testid', SCORES.TEST_ATTRIBUTE],
  ['data-test', SCORES.TEST_ATTRIBUTE],
  ['data-cy', SCORES.TEST_ATTRIBUTE],
  ['name', SCORES.NAME_ATTRIBUTE],
  ['aria-label', SCORES.LABEL_ATTRIBUTE],
  ['placeholder', SCORES.LABEL_ATTRIBUTE],
  ['title', SCORES.LABEL_ATTRIBUTE],
  ['alt', SCORES.LABEL_ATTRIBUTE],
];

const CSS_IDENTIFIER = /^[A-Za-z_][\w-]*$/;
const CSS_CLASS = /^[A-Za-z_-][\w-]*$/;

// ── Synthesizer ──────────────────────────────────────────────

/**
 * Ranked selector candidates for one element, best first. Uniqueness is
 * checked against the element's own frame in `tree`; nothing crosses a frame
 * boundary. Visual-only elements get none and must go through vision.
 */
export function synthesizeSelectors(
  descriptor: ElementDescriptor,
  tree: DOMContextTree,
  options: SynthesisOptions = {},
): SelectorCandidate[] {
  if (descriptor.classification === 'visual-only') return [];

  const heuristics = options.heuristics ?? DEFAULT_HEURISTICS;
  const peers = frameDescriptors(tree, descriptor.frame);
  const sameTag = peers.filter((p) => p.tag === descriptor.tag);
  const candidates: SelectorCandidate[] = [];

  const push = (kind: SelectorKind, selector: string, score: number): void => {
    candidates.push({ kind, selector, score, frame: descriptor.frame });
  };

  // 1. Stable id
  const id = descriptor.attributes['id'];
  if (
    id !== undefined &&
    id.length > 0 &&
    !isDynamicValue(id, heuristics) &&
    count(peers, (p) => p.attributes['id'] === id) === 1
  ) {
    push('id', cssIdSelector(id), SCORES.ID);
  }

  // 2. Stable attributes, alone or combined
  const stable = STABLE_ATTRIBUTES.filter(([name]) => {
    const value = descriptor.attributes[name];
    return value !== undefined && value.length > 0 && !isDynamicValue(value, heuristics);
  });

  let attributeHit = false;
  for (const [name, score] of stable) {
    const value = descriptor.attributes[name] ?? '';
    if (count(sameTag, (p) => p.attributes[name] === value) === 1) {
      push('css-attribute', attributeSelector(descriptor.tag, [[name, value]]), score);
      attributeHit = true;
    }
  }

  if (!attributeHit && stable.length > 1) {
    const pairs = stable.map(([name]): [string, string] => [
      name,
      descriptor.attributes[name] ?? '',
    ]);
    const matches = count(sameTag, (p) =>
      pairs.every(([name, value]) => p.attributes[name] === value),
    );
    if (matches === 1) {
      const weakest = Math.min(...stable.map(([, score]) => score));
      push(
        'css-attribute',
        attributeSelector(descriptor.tag, pairs),
        weakest - SCORES.ATTRIBUTE_COMBINATION_PENALTY,
      );
    }
  }

  // 3. Unique short text
  const text = descriptor.text;
  if (
    text.length > 0 &&
    text.length <= LIMITS.MAX_TEXT_SELECTOR_CHARS &&
    count(sameTag, (p) => p.text === text) === 1
  ) {
    const literal = xpathLiteral(text);
    push('text-match', `xpath=//${descriptor.tag}[normalize-space(.)=${literal}]`, SCORES.TEXT_MATCH);
  }

  // 4. Stable class combination
  const classes = stableClasses(descriptor, heuristics);
  if (
    classes.length > 0 &&
    count(sameTag, (p) => hasClasses(p, classes)) === 1
  ) {
    push('css-structural', `${descriptor.tag}.${classes.join('.')}`, SCORES.CSS_STRUCTURAL);
  }

  // 5. Positional path from the document root
  const path = structuralPath(descriptor);
  if (path !== null) {
    push('xpath', `xpath=${path}`, SCORES.XPATH);
  }

  const penalty = descriptor.classification === 'dynamic' ? SCORES.DYNAMIC_PENALTY : 1;
  return candidates
    .map((c) => ({ ...c, score: round(c.score * penalty) }))
    .sort((a, b) => b.score - a.score);
}

// ── Structural path ──────────────────────────────────────────

/**
 * Minimal position-qualified XPath: a position appears only where the tag
 * repeats among its siblings. The walk ends at the frame's document element.
 */
export function structuralPath(descriptor: ElementDescriptor): string | null {
  const segments = [
    ...descriptor.ancestors,
    { tag: descriptor.tag, position: descriptor.position },
  ].map((s) => (s.position > 0 ? `${s.tag}[${String(s.position)}]` : s.tag));

  return normalizeXPath(segments);
}

/** Anchor a path at the document root; paths that begin below `body` get `/html/`. */
export function normalizeXPath(segments: readonly string[]): string | null {
  const joined = segments.join('/');
  if (joined.length === 0) return null;
  if (joined.startsWith('/')) return joined;
  if (joined === 'html' || joined.startsWith('html/') || joined.startsWith('html[')) {
    return `/${joined}`;
  }
  if (joined.startsWith('body')) return `/html/${joined}`;
  return `/${joined}`;
}

// ── Selector builders ────────────────────────────────────────

export function cssIdSelector(id: string): string {
  return CSS_IDENTIFIER.test(id) ? `#${id}` : `[id="${escapeCssString(id)}"]`;
}

export function attributeSelector(
  tag: string,
  pairs: ReadonlyArray<readonly [string, string]>,
): string {
  return tag + pairs.map(([name, value]) => `[${name}="${escapeCssString(value)}"]`).join('');
}

/** XPath 1.0 has no escapes; mixed quotes need `concat()`. */
export function xpathLiteral(text: string): string {
  if (!text.includes('"')) return `"${text}"`;
  if (!text.includes("'")) return `'${text}'`;
  const parts = text.split('"').map((part) => `"${part}"`);
  return `concat(${parts.join(`, '"', `)})`;
}

/** Human-readable one-liner describing the candidate for reports. */
export function describeCandidate(candidate: SelectorCandidate): string {
  const frame = candidate.frame !== null ? ` (frame ${candidate.frame})` : '';
  return `${candidate.kind} ${candidate.selector} [${candidate.score.toFixed(2)}]${frame}`;
}

// ── Helpers ──────────────────────────────────────────────────

function escapeCssString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function stableClasses(
  descriptor: ElementDescriptor,
  heuristics: DynamicValueHeuristics,
): string[] {
  const raw = descriptor.attributes['class'];
  if (raw === undefined) return [];
  return raw
    .split(/\s+/)
    .filter((c) => CSS_CLASS.test(c) && !/\d/.test(c) && !isDynamicValue(c, heuristics));
}

function hasClasses(descriptor: ElementDescriptor, classes: readonly string[]): boolean {
  const own = new Set((descriptor.attributes['class'] ?? '').split(/\s+/));
  return classes.every((c) => own.has(c));
}

function count<T>(items: readonly T[], predicate: (item: T) => boolean): number {
  let n = 0;
  for (const item of items) {
    if (predicate(item)) n++;
  }
  return n;
}

function round(score: number): number {
  return Math.round(score * 1000) / 1000;
}
