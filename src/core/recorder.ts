import { ZodError } from 'zod';

import type {
  ElementDescriptor,
  SelectorCandidate,
  Step,
  StepAction,
  TestCase,
} from '../schema/index.js';
import { isAssertion, isElementAction, parseStep, parseTestCase } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { RecorderError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface RecordInput {
  action: StepAction;
  description: string;
  parameters: Record<string, unknown>;
  /** The element acted on, as captured just before the action. */
  target: ElementDescriptor | null;
  candidates: readonly SelectorCandidate[];
  waitAfterSecs?: number | undefined;
}

export interface RecorderMeta {
  testName: string;
  featureDescription: string;
  recordedAt?: Date | undefined;
}

// ── Recorder ─────────────────────────────────────────────────

/**
 * Accumulates steps for one recording session. Steps are frozen once
 * recorded and numbered 1..n without gaps; `discardLast` is the only edit.
 */
export class StepRecorder {
  private readonly steps: Step[] = [];
  private readonly recordedAt: Date;

  constructor(private readonly meta: RecorderMeta) {
    this.recordedAt = meta.recordedAt ?? new Date();
  }

  get size(): number {
    return this.steps.length;
  }

  get recordedSteps(): readonly Step[] {
    return this.steps;
  }

  record(input: RecordInput): Step {
    const candidates = [...input.candidates].sort((a, b) => b.score - a.score);
    const best = candidates[0];

    if (isElementAction(input.action) && (!input.target || !best)) {
      throw new RecorderError(
        `${input.action} needs a target element with at least one selector`,
      );
    }
    if (
      isAssertion(input.action) &&
      input.target &&
      !best &&
      input.target.classification !== 'visual-only'
    ) {
      throw new RecorderError(
        `no selector could be synthesized for the ${input.target.tag} asserted on`,
      );
    }

    const draft: Record<string, unknown> = {
      step_id: this.steps.length + 1,
      description: input.description,
      wait_after_secs: input.waitAfterSecs ?? 0,
      action: input.action,
      parameters: input.parameters,
      selector: best ? best.selector : null,
    };
    if (input.target) {
      draft['frame'] = best ? best.frame : input.target.frame;
      draft['fallback_selectors'] = candidates.slice(1);
      draft['target'] = input.target;
    }

    let step: Step;
    try {
      step = parseStep(draft);
    } catch (err) {
      if (err instanceof ZodError) {
        throw new RecorderError(`invalid ${input.action} step: ${formatIssues(err)}`);
      }
      throw err;
    }

    deepFreeze(step);
    this.steps.push(step);
    log.recorded(step.step_id, step.action, step.selector);
    return step;
  }

  /** Drop the most recent step, e.g. when replaying it failed. */
  discardLast(): Step | undefined {
    return this.steps.pop();
  }

  toTestCase(): TestCase {
    return parseTestCase({
      test_name: this.meta.testName,
      feature_description: this.meta.featureDescription,
      recorded_at: this.recordedAt.toISOString(),
      steps: this.steps,
    });
  }
}

// ── Helpers ──────────────────────────────────────────────────

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}
