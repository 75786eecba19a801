import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type {
  Evidence,
  ExecutionResult,
  FailurePolicy,
  HealingRecord,
  SelectorState,
  Step,
  StepResult,
  TestCase,
} from '../schema/index.js';
import { EMPTY_EVIDENCE, computeExecutionStatus, formatConsoleEntry } from '../schema/index.js';
import type { BrowserDriver, ElementProbe, ElementTarget } from '../browser/driver.js';
import { withSession } from '../browser/runner.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { DynamicValueHeuristics } from '../dom/classify.js';
import * as log from '../utils/logger.js';
import {
  ActionTimeoutError,
  AssertionMismatchError,
  FatalBrowserError,
  StepError,
  VisionVerificationError,
  errorMessage,
} from './errors.js';
import { resolveStepTarget } from './resolver.js';
import type { HealingOptions } from './resolver.js';
import { verifyVisually } from './verifier.js';
import type { VisionJudge } from './verifier.js';

// ── Public types ─────────────────────────────────────────────

export interface ExecutorTimeouts {
  navigation: number;
  action: number;
  resolve: number;
  resolvePollInterval: number;
  settle: number;
  vision: number;
  maxPostActionWait: number;
}

/** Where failure screenshots go. Returns the path recorded in the evidence. */
export interface EvidenceWriter {
  saveScreenshot(stepId: number, png: Buffer): Promise<string>;
}

export interface ExecutorOptions {
  policy?: FailurePolicy | undefined;
  timeouts?: Partial<ExecutorTimeouts> | undefined;
  healing?: Partial<HealingOptions> | undefined;
  heuristics?: DynamicValueHeuristics | undefined;
  judge?: VisionJudge | undefined;
  evidence?: EvidenceWriter | undefined;
  /** Checked between steps; a running step is never interrupted. */
  signal?: AbortSignal | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  now?: (() => Date) | undefined;
}

export interface RunOptions extends ExecutorOptions {
  headless: boolean;
}

interface StepContext {
  driver: BrowserDriver;
  timeouts: ExecutorTimeouts;
  options: ExecutorOptions;
  sleep: (ms: number) => Promise<void>;
}

/** What is known about a step's target, kept even when the step fails later. */
interface StepTrace {
  resolvedSelector: string | null;
  healing: HealingRecord | null;
}

// ── Constants ────────────────────────────────────────────────

const DEFAULT_TIMEOUTS: ExecutorTimeouts = {
  navigation: TIMEOUTS.NAVIGATION_TIMEOUT,
  action: TIMEOUTS.ACTION_TIMEOUT,
  resolve: TIMEOUTS.RESOLVE_TIMEOUT,
  resolvePollInterval: TIMEOUTS.RESOLVE_POLL_INTERVAL,
  settle: TIMEOUTS.POST_ACTION_SETTLE,
  vision: TIMEOUTS.VISION_TIMEOUT,
  maxPostActionWait: TIMEOUTS.MAX_POST_ACTION_WAIT,
};

/** Failures `continue-on-assertion` is allowed to step past. */
const CONTINUABLE = new Set(['assertion_mismatch', 'vision_verification_failed']);

// ── Test case execution ──────────────────────────────────────

/**
 * Replay a test case against a live driver, one step at a time and in
 * order. After a halting failure or cancellation the remaining steps are
 * reported as skipped and never touch the page.
 */
export async function executeTestCase(
  testCase: TestCase,
  driver: BrowserDriver,
  options: ExecutorOptions = {},
): Promise<ExecutionResult> {
  const now = options.now ?? (() => new Date());
  const policy = options.policy ?? 'fail-fast';
  const startedAt = now();
  const total = testCase.steps.length;

  log.section(`Executing ${testCase.test_name} (${String(total)} steps, ${policy})`);

  const results: StepResult[] = [];
  let haltReason: string | null = null;
  let cancelled = false;

  for (const [index, step] of testCase.steps.entries()) {
    if (haltReason === null && options.signal?.aborted) {
      cancelled = true;
      haltReason = 'execution cancelled';
    }
    if (haltReason !== null) {
      results.push(skippedResult(step, haltReason));
      log.stepResult(index, total, 'skipped', step.description);
      continue;
    }

    log.step(index, total, step.description);
    const result = await executeStep(step, driver, options, {
      captureEvidence: index === total - 1,
    });
    results.push(result);
    log.stepResult(index, total, result.status, step.description);

    if (result.status === 'failed') {
      log.detail(`${result.failureKind ?? 'failed'}: ${result.reason ?? ''}`);
      if (haltsRun(result, policy)) {
        haltReason = `skipped after step ${String(step.step_id)} failed`;
      }
    }
  }

  const finishedAt = now();
  return {
    testName: testCase.test_name,
    status: computeExecutionStatus(results),
    policy,
    cancelled,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
    healedSteps: results.filter((r) => r.status === 'healed-passed').length,
    steps: results,
  };
}

/** Launch a browser, replay the test case, and close the browser. */
export async function runTestCase(
  testCase: TestCase,
  options: RunOptions,
): Promise<ExecutionResult> {
  return withSession({ headless: options.headless }, (session) =>
    executeTestCase(testCase, session, options),
  );
}

function haltsRun(result: StepResult, policy: FailurePolicy): boolean {
  if (policy === 'fail-fast') return true;
  return result.failureKind === null || !CONTINUABLE.has(result.failureKind);
}

// ── Single step ──────────────────────────────────────────────

/**
 * Run one step and report it. Never throws for a step failure; the failure
 * is in the result. Evidence is captured on failure, when the run is
 * cancelled while the step runs (it is then the last one to run), or always
 * when asked.
 */
export async function executeStep(
  step: Step,
  driver: BrowserDriver,
  options: ExecutorOptions = {},
  flags: { captureEvidence?: boolean } = {},
): Promise<StepResult> {
  const ctx: StepContext = {
    driver,
    timeouts: { ...DEFAULT_TIMEOUTS, ...options.timeouts },
    options,
    sleep: options.sleep ?? defaultSleep,
  };
  const trace: StepTrace = { resolvedSelector: null, healing: null };
  const started = Date.now();

  // Console excerpts are per step.
  driver.drainConsole();

  let failure: StepError | null = null;
  try {
    await performStep(step, ctx, trace);
    await afterStep(step, ctx);
  } catch (err) {
    failure = toStepError(err, step.step_id);
  }

  const evidence =
    failure !== null || flags.captureEvidence === true || options.signal?.aborted === true
      ? await captureEvidence(step, ctx)
      : EMPTY_EVIDENCE;

  return {
    stepId: step.step_id,
    action: step.action,
    description: step.description,
    status: failure !== null ? 'failed' : trace.healing !== null ? 'healed-passed' : 'passed',
    failureKind: failure?.kind ?? null,
    reason: failure?.message ?? null,
    resolvedSelector: trace.resolvedSelector,
    healing: trace.healing,
    evidence,
    durationMs: Math.max(0, Date.now() - started),
  };
}

async function performStep(step: Step, ctx: StepContext, trace: StepTrace): Promise<void> {
  const { driver, timeouts } = ctx;

  switch (step.action) {
    case 'navigate':
      await driver.navigate(step.parameters.url, timeouts.navigation);
      return;

    case 'wait_for_load_state':
      await driver.waitForLoadState(step.parameters.state, timeouts.navigation);
      return;

    case 'type': {
      const target = await resolve(step, ctx, trace);
      await driver.fill(target, step.parameters.text, timeouts.action);
      return;
    }

    case 'click': {
      const target = await resolve(step, ctx, trace);
      await driver.click(target, timeouts.action);
      return;
    }

    case 'select': {
      const target = await resolve(step, ctx, trace);
      await driver.selectOption(target, step.parameters, timeouts.action);
      return;
    }

    case 'check':
    case 'uncheck': {
      const target = await resolve(step, ctx, trace);
      await driver.setChecked(target, step.action === 'check', timeouts.action);
      return;
    }

    case 'assert_text_contains': {
      if (step.selector === null && step.target?.classification === 'visual-only') {
        await verifyWithVision(step, ctx);
        return;
      }
      const target = step.selector === null ? null : await resolve(step, ctx, trace);
      const text = normalizeText(await driver.innerText(target, timeouts.action));
      const expected = step.parameters.expected_text;
      if (!text.includes(expected)) {
        throw new AssertionMismatchError(
          `expected text "${expected}" not found in ${target ? target.selector : 'page body'}`,
          expected,
          text,
        );
      }
      return;
    }

    case 'assert_text_equals': {
      const target = await resolve(step, ctx, trace);
      const text = normalizeText(await driver.innerText(target, timeouts.action));
      const expected = normalizeText(step.parameters.expected_text);
      if (text !== expected) {
        throw new AssertionMismatchError(
          `expected "${expected}" but ${target.selector} reads "${text}"`,
          expected,
          text,
        );
      }
      return;
    }

    case 'assert_visible':
      if (step.selector === null) {
        await verifyWithVision(step, ctx);
        return;
      }
      // Resolution only succeeds on a single visible match.
      await resolve(step, ctx, trace);
      return;

    case 'assert_hidden': {
      const target: ElementTarget = { selector: step.selector, frame: step.frame ?? null };
      trace.resolvedSelector = step.selector;
      await waitUntilHidden(target, ctx);
      return;
    }

    case 'assert_passed_verification':
      await verifyWithVision(step, ctx);
      return;

    case 'assert_checked':
    case 'assert_not_checked': {
      const target = await resolve(step, ctx, trace);
      const { checked } = await driver.elementState(target, timeouts.action);
      const expected = step.action === 'assert_checked';
      if (checked !== expected) {
        const actual = checked ? 'checked' : 'not checked';
        throw new AssertionMismatchError(
          `${target.selector} is ${actual}`,
          expected ? 'checked' : 'not checked',
          actual,
        );
      }
      return;
    }

    case 'assert_enabled':
    case 'assert_disabled': {
      const target = await resolve(step, ctx, trace);
      const { enabled } = await driver.elementState(target, timeouts.action);
      const expected = step.action === 'assert_enabled';
      if (enabled !== expected) {
        const actual = enabled ? 'enabled' : 'disabled';
        throw new AssertionMismatchError(
          `${target.selector} is ${actual}`,
          expected ? 'enabled' : 'disabled',
          actual,
        );
      }
      return;
    }

    case 'assert_attribute_equals': {
      const target = await resolve(step, ctx, trace);
      const { attribute_name: name, expected_value: expected } = step.parameters;
      const actual = await driver.getAttribute(target, name, timeouts.action);
      if (actual !== expected) {
        throw new AssertionMismatchError(
          actual === null
            ? `${target.selector} has no ${name} attribute`
            : `expected ${name}="${expected}" but ${target.selector} has ${name}="${actual}"`,
          expected,
          actual ?? '',
        );
      }
      return;
    }

    case 'assert_element_count': {
      const target: ElementTarget = { selector: step.selector, frame: step.frame ?? null };
      trace.resolvedSelector = step.selector;
      const expected = step.parameters.expected_count;
      const probes = await pollMatches(
        target,
        timeouts.resolve,
        ctx,
        (p) => p.length === expected,
      );
      if (probes.length !== expected) {
        throw new AssertionMismatchError(
          `expected ${String(expected)} matches of ${step.selector} but found ${String(probes.length)}`,
          String(expected),
          String(probes.length),
        );
      }
      return;
    }

    case 'wait_for_selector': {
      const target: ElementTarget = { selector: step.selector, frame: step.frame ?? null };
      trace.resolvedSelector = step.selector;
      const state = step.parameters.state ?? 'visible';
      const timeoutMs = step.parameters.timeout_ms ?? timeouts.action;
      const probes = await pollMatches(target, timeoutMs, ctx, (p) => inState(p, state));
      if (!inState(probes, state)) {
        throw new ActionTimeoutError(
          `wait for ${step.selector} to be ${state} timed out after ${String(timeoutMs)}ms`,
          timeoutMs,
        );
      }
      return;
    }
  }
}

async function resolve(step: Step, ctx: StepContext, trace: StepTrace): Promise<ElementTarget> {
  const resolution = await resolveStepTarget(step, ctx.driver, {
    resolveTimeoutMs: ctx.timeouts.resolve,
    pollIntervalMs: ctx.timeouts.resolvePollInterval,
    healing: ctx.options.healing,
    heuristics: ctx.options.heuristics,
    sleep: ctx.sleep,
  });
  trace.resolvedSelector = resolution.target.selector;
  trace.healing = resolution.healing;
  return resolution.target;
}

async function waitUntilHidden(target: ElementTarget, ctx: StepContext): Promise<void> {
  const probes = await pollMatches(target, ctx.timeouts.resolve, ctx, (p) =>
    inState(p, 'hidden'),
  );
  const shown = probes.filter((p) => p.visible).length;
  if (shown > 0) {
    throw new AssertionMismatchError(
      `${target.selector} is still visible (${String(shown)} visible matches)`,
      'hidden',
      'visible',
    );
  }
}

/** Query until `done` holds or the time is up; returns the last matches seen. */
async function pollMatches(
  target: ElementTarget,
  timeoutMs: number,
  ctx: StepContext,
  done: (probes: ElementProbe[]) => boolean,
): Promise<ElementProbe[]> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const probes = await ctx.driver.query(target);
    if (done(probes)) return probes;
    const remaining = deadline - Date.now();
    if (remaining <= 0) return probes;
    await ctx.sleep(Math.min(ctx.timeouts.resolvePollInterval, remaining));
  }
}

function inState(probes: readonly ElementProbe[], state: SelectorState): boolean {
  switch (state) {
    case 'attached':
      return probes.length > 0;
    case 'detached':
      return probes.length === 0;
    case 'visible':
      return probes.some((p) => p.visible);
    case 'hidden':
      return probes.every((p) => !p.visible);
  }
}

async function verifyWithVision(step: Step, ctx: StepContext): Promise<void> {
  const judge = ctx.options.judge;
  if (!judge) {
    throw new VisionVerificationError('no vision judge configured for a visual check');
  }
  const verdict = await verifyVisually({
    step,
    driver: ctx.driver,
    judge,
    timeoutMs: ctx.timeouts.vision,
  });
  if (verdict.verdict === 'fail') {
    throw new VisionVerificationError(verdict.rationale);
  }
}

// ── Post-action waits ────────────────────────────────────────

const SETTLING_ACTIONS = new Set(['navigate', 'type', 'click', 'select', 'check', 'uncheck']);

async function afterStep(step: Step, ctx: StepContext): Promise<void> {
  if (SETTLING_ACTIONS.has(step.action)) {
    try {
      await ctx.driver.waitForLoadState('load', ctx.timeouts.settle);
    } catch (err) {
      if (!(err instanceof ActionTimeoutError)) throw err;
      log.detail(`Page did not settle within ${String(ctx.timeouts.settle)}ms; continuing`);
    }
  }

  const waitMs = Math.min(step.wait_after_secs * 1000, ctx.timeouts.maxPostActionWait);
  if (waitMs > 0) await ctx.sleep(waitMs);
}

// ── Evidence ─────────────────────────────────────────────────

async function captureEvidence(step: Step, ctx: StepContext): Promise<Evidence> {
  const lines = ctx.driver
    .drainConsole()
    .map(formatConsoleEntry)
    .slice(-LIMITS.MAX_CONSOLE_LINES);

  const writer = ctx.options.evidence;
  if (!writer) return { screenshotPath: null, console: lines };

  try {
    const png = await ctx.driver.screenshot();
    return { screenshotPath: await writer.saveScreenshot(step.step_id, png), console: lines };
  } catch (err) {
    log.warn(`Evidence screenshot for step ${String(step.step_id)} failed: ${errorMessage(err)}`);
    return { screenshotPath: null, console: lines };
  }
}

/** Screenshots written as `<dir>/step-<id>.png`. */
export function createEvidenceWriter(dir: string): EvidenceWriter {
  return {
    async saveScreenshot(stepId: number, png: Buffer): Promise<string> {
      await mkdir(dir, { recursive: true });
      const file = path.join(dir, `step-${String(stepId)}.png`);
      await writeFile(file, png);
      return file;
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function skippedResult(step: Step, reason: string): StepResult {
  return {
    stepId: step.step_id,
    action: step.action,
    description: step.description,
    status: 'skipped',
    failureKind: null,
    reason,
    resolvedSelector: null,
    healing: null,
    evidence: EMPTY_EVIDENCE,
    durationMs: 0,
  };
}

function toStepError(err: unknown, stepId: number): StepError {
  if (err instanceof StepError) {
    if (err.stepId !== null) return err;
    const error = new StepError(err.kind, err.message, stepId);
    error.name = err.name;
    return error;
  }
  // Anything the driver did not classify means the page can no longer be trusted.
  return new FatalBrowserError(errorMessage(err), stepId);
}

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
