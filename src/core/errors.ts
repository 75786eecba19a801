import type { FailureKind } from '../schema/results.js';

// ── Step failures ────────────────────────────────────────────

/**
 * A step-level failure. `kind` is the closed category recorded in the
 * StepResult; `stepId` is filled in by the executor when the error is raised
 * below it (driver, resolver).
 */
export class StepError extends Error {
  readonly kind: FailureKind;
  readonly stepId: number | null;

  constructor(kind: FailureKind, message: string, stepId: number | null = null) {
    super(message);
    this.name = 'StepError';
    this.kind = kind;
    this.stepId = stepId;
  }
}

export class SelectorUnresolvedError extends StepError {
  readonly selector: string | null;

  constructor(selector: string | null, stepId: number | null = null) {
    super('selector_unresolved', 'selector unresolved after healing', stepId);
    this.name = 'SelectorUnresolvedError';
    this.selector = selector;
  }
}

export class AmbiguousMatchError extends StepError {
  readonly candidates: readonly string[];

  constructor(candidates: readonly string[], stepId: number | null = null) {
    super(
      'ambiguous_match',
      `ambiguous match after healing: ${candidates.join(', ')}`,
      stepId,
    );
    this.name = 'AmbiguousMatchError';
    this.candidates = candidates;
  }
}

export class ActionTimeoutError extends StepError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, stepId: number | null = null) {
    super('action_timeout', message, stepId);
    this.name = 'ActionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class AssertionMismatchError extends StepError {
  readonly expected: string;
  readonly actual: string;

  constructor(
    message: string,
    expected: string,
    actual: string,
    stepId: number | null = null,
  ) {
    super('assertion_mismatch', message, stepId);
    this.name = 'AssertionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class VisionVerificationError extends StepError {
  constructor(rationale: string, stepId: number | null = null) {
    super('vision_verification_failed', rationale, stepId);
    this.name = 'VisionVerificationError';
  }
}

export class FatalBrowserError extends StepError {
  constructor(message: string, stepId: number | null = null) {
    super('fatal_browser_error', message, stepId);
    this.name = 'FatalBrowserError';
  }
}

// ── Recording ────────────────────────────────────────────────

export class RecorderError extends Error {
  readonly exitCode = 3;

  constructor(message: string) {
    super(message);
    this.name = 'RecorderError';
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
