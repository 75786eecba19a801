import type { Step, TestCase } from '../schema/index.js';
import type { BrowserDriver } from '../browser/driver.js';
import { LIMITS } from '../config/defaults.js';
import type { DynamicValueHeuristics } from '../dom/classify.js';
import { synthesizeSelectors } from '../dom/selectors.js';
import { buildContextTree, findNode } from '../dom/tree.js';
import * as log from '../utils/logger.js';
import { RecorderError } from './errors.js';
import { executeStep } from './executor.js';
import type { ExecutorOptions } from './executor.js';
import type { ActionPlanner } from './planner.js';
import { StepRecorder } from './recorder.js';

// ── Public types ─────────────────────────────────────────────

export interface RecordingConfig {
  url: string;
  feature: string;
  testName: string;
  maxSteps?: number | undefined;
  /** Consecutive rejected or failed proposals before giving up. */
  maxFailures?: number | undefined;
  heuristics?: DynamicValueHeuristics | undefined;
  /** Used to replay each recorded step. */
  executor?: ExecutorOptions | undefined;
  now?: (() => Date) | undefined;
}

// ── Main loop ────────────────────────────────────────────────

/**
 * Drive a live page with a planner and record what it does. Each proposal
 * is recorded, then replayed through the executor so the page moves on; a
 * proposal that fails is discarded and the failure is fed back.
 */
export async function recordTestCase(
  planner: ActionPlanner,
  driver: BrowserDriver,
  config: RecordingConfig,
): Promise<TestCase> {
  const maxSteps = config.maxSteps ?? LIMITS.MAX_RECORDING_STEPS;
  const maxFailures = config.maxFailures ?? LIMITS.MAX_RECORDING_FAILURES;
  const executor: ExecutorOptions = {
    ...config.executor,
    heuristics: config.heuristics ?? config.executor?.heuristics,
  };
  const now = config.now ?? (() => new Date());

  log.section(`Recording ${config.testName}`);

  const recorder = new StepRecorder({
    testName: config.testName,
    featureDescription: config.feature,
    recordedAt: now(),
  });

  const opening = recorder.record({
    action: 'navigate',
    description: `Navigate to ${config.url}`,
    parameters: { url: config.url },
    target: null,
    candidates: [],
  });
  const opened = await executeStep(opening, driver, executor);
  if (opened.status === 'failed') {
    throw new RecorderError(`Could not open ${config.url}: ${opened.reason ?? 'unknown error'}`);
  }

  let failures = 0;
  let lastFailure: string | null = null;

  const reject = (reason: string): void => {
    failures++;
    lastFailure = reason;
    log.warn(`Proposal rejected (${String(failures)}/${String(maxFailures)}): ${reason}`);
    if (failures >= maxFailures) {
      throw new RecorderError(`Recording gave up after ${String(failures)} failed proposals: ${reason}`);
    }
  };

  while (recorder.size < maxSteps) {
    const tree = await buildContextTree(driver, { heuristics: config.heuristics, now });
    const plan = await planner.next({
      feature: config.feature,
      url: driver.currentUrl(),
      tree,
      history: recorder.recordedSteps,
      lastFailure,
    });

    if (plan.done) {
      log.info(`Planner finished: ${plan.reason || 'feature covered'}`);
      break;
    }

    const node = plan.element_id !== null ? findNode(tree, plan.element_id) : undefined;
    if (plan.element_id !== null && !node) {
      reject(`element id ${plan.element_id} does not exist on the current page`);
      continue;
    }

    const candidates = node
      ? synthesizeSelectors(node.descriptor, tree, { heuristics: config.heuristics })
      : [];

    let step: Step;
    try {
      step = recorder.record({
        action: plan.action,
        description: plan.description,
        parameters: plan.parameters,
        target: node ? node.descriptor : null,
        candidates,
        waitAfterSecs: plan.wait_after_secs,
      });
    } catch (err) {
      if (!(err instanceof RecorderError)) throw err;
      reject(err.message);
      continue;
    }

    const result = await executeStep(step, driver, executor);
    if (result.status === 'failed') {
      recorder.discardLast();
      if (result.failureKind === 'fatal_browser_error') {
        throw new RecorderError(`Browser failed while recording: ${result.reason ?? ''}`);
      }
      reject(`step "${step.description}" failed: ${result.reason ?? 'unknown error'}`);
      continue;
    }

    failures = 0;
    lastFailure = null;
  }

  if (recorder.size >= maxSteps) {
    log.warn(`Stopped at the ${String(maxSteps)}-step limit`);
  }

  return recorder.toTestCase();
}
