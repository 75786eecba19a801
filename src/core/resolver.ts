import type {
  ContextNode,
  ElementDescriptor,
  HealingRecord,
  SelectorCandidate,
} from '../schema/index.js';
import type { BrowserDriver, ElementTarget } from '../browser/driver.js';
import { HEALING, TIMEOUTS } from '../config/defaults.js';
import { DEFAULT_HEURISTICS } from '../dom/classify.js';
import type { DynamicValueHeuristics } from '../dom/classify.js';
import { synthesizeSelectors } from '../dom/selectors.js';
import { buildContextTree, flattenFrame } from '../dom/tree.js';
import * as log from '../utils/logger.js';
import {
  AmbiguousMatchError,
  FatalBrowserError,
  SelectorUnresolvedError,
  errorMessage,
} from './errors.js';
import { DEFAULT_WEIGHTS, similarity } from './similarity.js';
import type { SimilarityWeights } from './similarity.js';

// ── Public types ─────────────────────────────────────────────

/** The parts of a Step the resolver reads. It never writes to them. */
export interface ResolvableStep {
  readonly step_id: number;
  readonly selector: string | null;
  readonly frame?: string | null | undefined;
  readonly fallback_selectors?: readonly SelectorCandidate[] | undefined;
  readonly target?: ElementDescriptor | null | undefined;
}

export interface HealingOptions {
  enabled: boolean;
  threshold: number;
  ambiguityMargin: number;
}

export interface ResolveOptions {
  resolveTimeoutMs?: number | undefined;
  pollIntervalMs?: number | undefined;
  healing?: Partial<HealingOptions> | undefined;
  heuristics?: DynamicValueHeuristics | undefined;
  weights?: SimilarityWeights | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

export interface Resolution {
  target: ElementTarget;
  healed: boolean;
  healing: HealingRecord | null;
}

export interface ScoredNode {
  node: ContextNode;
  score: number;
}

// ── Resolution ───────────────────────────────────────────────

/**
 * Find the element a step acts on: the primary selector (polled), then the
 * recorded fallbacks in score order, then a similarity search over a fresh
 * context tree. A selector counts only when it matches exactly one visible
 * element.
 */
export async function resolveStepTarget(
  step: ResolvableStep,
  driver: BrowserDriver,
  options: ResolveOptions = {},
): Promise<Resolution> {
  const frame = step.frame ?? step.target?.frame ?? null;
  const sleep = options.sleep ?? defaultSleep;

  if (step.selector !== null) {
    const primary: ElementTarget = { selector: step.selector, frame };
    const found = await pollUnique(
      driver,
      primary,
      options.resolveTimeoutMs ?? TIMEOUTS.RESOLVE_TIMEOUT,
      options.pollIntervalMs ?? TIMEOUTS.RESOLVE_POLL_INTERVAL,
      sleep,
    );
    if (found) return { target: primary, healed: false, healing: null };
    log.warn(`Step ${String(step.step_id)}: primary selector ${step.selector} did not resolve`);
  }

  const fallbacks = [...(step.fallback_selectors ?? [])].sort((a, b) => b.score - a.score);
  for (const candidate of fallbacks) {
    const target: ElementTarget = { selector: candidate.selector, frame: candidate.frame };
    if (await matchesUniquely(driver, target)) {
      const healing: HealingRecord = {
        from: step.selector,
        to: candidate.selector,
        via: 'fallback',
        similarity: null,
      };
      log.healed(step.step_id, healing);
      return { target, healed: true, healing };
    }
  }

  const healingOptions: HealingOptions = {
    enabled: options.healing?.enabled ?? HEALING.ENABLED,
    threshold: options.healing?.threshold ?? HEALING.SIMILARITY_THRESHOLD,
    ambiguityMargin: options.healing?.ambiguityMargin ?? HEALING.AMBIGUITY_MARGIN,
  };
  if (!healingOptions.enabled || !step.target) {
    throw new SelectorUnresolvedError(step.selector, step.step_id);
  }

  return healByTreeSearch(step, step.target, driver, healingOptions, options);
}

// ── Tree search ──────────────────────────────────────────────

async function healByTreeSearch(
  step: ResolvableStep,
  recorded: ElementDescriptor,
  driver: BrowserDriver,
  healing: HealingOptions,
  options: ResolveOptions,
): Promise<Resolution> {
  const heuristics = options.heuristics ?? DEFAULT_HEURISTICS;
  const tree = await buildContextTree(driver, { heuristics });
  const frameTree = tree.frames.find((f) => f.frame === recorded.frame);
  const nodes = frameTree ? flattenFrame(frameTree).filter((n) => n.relevant) : [];

  const ranked = rankCandidates(recorded, nodes, options.weights ?? DEFAULT_WEIGHTS).filter(
    (c) => c.score >= healing.threshold,
  );

  const best = ranked[0];
  if (!best) throw new SelectorUnresolvedError(step.selector, step.step_id);

  const rivals = ranked.filter((c) => best.score - c.score < healing.ambiguityMargin);
  if (rivals.length > 1) {
    throw new AmbiguousMatchError(
      rivals.map((c) => `${c.node.id} (${c.score.toFixed(3)})`),
      step.step_id,
    );
  }

  for (const candidate of synthesizeSelectors(best.node.descriptor, tree, { heuristics })) {
    const target: ElementTarget = { selector: candidate.selector, frame: candidate.frame };
    if (await matchesUniquely(driver, target)) {
      const record: HealingRecord = {
        from: step.selector,
        to: candidate.selector,
        via: 'tree-search',
        similarity: best.score,
      };
      log.healed(step.step_id, record);
      return { target, healed: true, healing: record };
    }
  }

  throw new SelectorUnresolvedError(step.selector, step.step_id);
}

/** Nodes sharing the recorded tag, scored and sorted best first; at most `limit` of them. */
export function rankCandidates(
  recorded: ElementDescriptor,
  nodes: readonly ContextNode[],
  weights: SimilarityWeights = DEFAULT_WEIGHTS,
  limit: number = HEALING.MAX_CANDIDATES,
): ScoredNode[] {
  return nodes
    .filter((node) => node.descriptor.tag === recorded.tag)
    .map((node) => ({ node, score: similarity(recorded, node.descriptor, weights) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}

// ── Probing ──────────────────────────────────────────────────

export async function matchesUniquely(
  driver: BrowserDriver,
  target: ElementTarget,
): Promise<boolean> {
  try {
    const probes = await driver.query(target);
    return probes.length === 1 && probes[0]?.visible === true;
  } catch (err) {
    if (err instanceof FatalBrowserError) throw err;
    log.detail(`Selector ${target.selector} failed to evaluate: ${errorMessage(err)}`);
    return false;
  }
}

async function pollUnique(
  driver: BrowserDriver,
  target: ElementTarget,
  timeoutMs: number,
  intervalMs: number,
  sleep: (ms: number) => Promise<void>,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    if (await matchesUniquely(driver, target)) return true;
    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    await sleep(Math.min(intervalMs, remaining));
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
