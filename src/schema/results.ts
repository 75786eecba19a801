import { z } from 'zod';

import { evidenceSchema } from './capture.js';
import { stepActionSchema } from './step.js';

// ── Vision verdict ────────────────────────────────────────────

export const visionVerdictSchema = z.object({
  verdict: z.enum(['pass', 'fail']),
  rationale: z.string().min(1),
});

export type VisionVerdict = z.infer<typeof visionVerdictSchema>;

// ── Failure kinds ─────────────────────────────────────────────

export const failureKindSchema = z.enum([
  'selector_unresolved',
  'ambiguous_match',
  'action_timeout',
  'assertion_mismatch',
  'vision_verification_failed',
  'fatal_browser_error',
]);

export type FailureKind = z.infer<typeof failureKindSchema>;

// ── StepResult ────────────────────────────────────────────────

export const stepStatusSchema = z.enum(['passed', 'failed', 'healed-passed', 'skipped']);

export type StepStatus = z.infer<typeof stepStatusSchema>;

export const healingRecordSchema = z.object({
  from: z.string().nullable(),
  to: z.string().min(1),
  via: z.enum(['fallback', 'tree-search']),
  similarity: z.number().min(0).max(1).nullable(),
});

export type HealingRecord = z.infer<typeof healingRecordSchema>;

export const stepResultSchema = z.object({
  stepId: z.number().int().positive(),
  action: stepActionSchema,
  description: z.string(),
  status: stepStatusSchema,
  failureKind: failureKindSchema.nullable(),
  reason: z.string().nullable(),
  resolvedSelector: z.string().nullable(),
  healing: healingRecordSchema.nullable(),
  evidence: evidenceSchema,
  durationMs: z.number().int().nonnegative(),
});

export type StepResult = z.infer<typeof stepResultSchema>;

// ── ExecutionResult ───────────────────────────────────────────

export const failurePolicySchema = z.enum(['fail-fast', 'continue-on-assertion']);

export type FailurePolicy = z.infer<typeof failurePolicySchema>;

export const executionStatusSchema = z.enum(['passed', 'failed']);

export type ExecutionStatus = z.infer<typeof executionStatusSchema>;

export const executionResultSchema = z.object({
  testName: z.string().min(1),
  status: executionStatusSchema,
  policy: failurePolicySchema,
  cancelled: z.boolean(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  healedSteps: z.number().int().nonnegative(),
  steps: z.array(stepResultSchema),
});

export type ExecutionResult = z.infer<typeof executionResultSchema>;

// ── Deterministic aggregate ──────────────────────────────────
// Healed steps count as passing; any failed or skipped step fails the run.

export function computeExecutionStatus(
  steps: readonly StepResult[],
): ExecutionStatus {
  for (const step of steps) {
    if (step.status === 'failed' || step.status === 'skipped') return 'failed';
  }
  return 'passed';
}

export function isPassing(status: StepStatus): boolean {
  return status === 'passed' || status === 'healed-passed';
}

// ── Validators ────────────────────────────────────────────────

export function parseVisionVerdict(data: unknown): VisionVerdict {
  return visionVerdictSchema.parse(data);
}

export function parseExecutionResult(data: unknown): ExecutionResult {
  return executionResultSchema.parse(data);
}
