import type {
  ExecutionResult,
  ExecutionStatus,
  StepResult,
  StepStatus,
} from '../schema/index.js';

// ── JSON contract ────────────────────────────────────────────

export const JSON_OUTPUT_VERSION = '1';

export interface JsonOutputStep {
  stepId: number;
  action: string;
  description: string;
  status: StepStatus;
  failureKind: string | null;
  reason: string | null;
  selector: string | null;
  healedFrom: string | null;
  healedVia: string | null;
  similarity: number | null;
  screenshotPath: string | null;
  console: string[];
  durationMs: number;
}

export interface JsonOutput {
  version: string;
  testName: string;
  status: ExecutionStatus;
  policy: string;
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  exitCode: number;
  counts: Record<StepStatus, number>;
  steps: JsonOutputStep[];
}

// ── JSON generator ───────────────────────────────────────────

export function exitCodeFor(result: ExecutionResult): number {
  return result.status === 'passed' ? 0 : 1;
}

export function countStatuses(steps: readonly StepResult[]): Record<StepStatus, number> {
  const counts: Record<StepStatus, number> = {
    passed: 0,
    'healed-passed': 0,
    failed: 0,
    skipped: 0,
  };
  for (const step of steps) counts[step.status]++;
  return counts;
}

export function generateJSON(result: ExecutionResult): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    testName: result.testName,
    status: result.status,
    policy: result.policy,
    cancelled: result.cancelled,
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    durationMs: result.durationMs,
    exitCode: exitCodeFor(result),
    counts: countStatuses(result.steps),
    steps: result.steps.map(stepToJSON),
  };
}

function stepToJSON(sr: StepResult): JsonOutputStep {
  return {
    stepId: sr.stepId,
    action: sr.action,
    description: sr.description,
    status: sr.status,
    failureKind: sr.failureKind,
    reason: sr.reason,
    selector: sr.resolvedSelector,
    healedFrom: sr.healing?.from ?? null,
    healedVia: sr.healing?.via ?? null,
    similarity: sr.healing?.similarity ?? null,
    screenshotPath: sr.evidence.screenshotPath,
    console: sr.evidence.console,
    durationMs: sr.durationMs,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: unknown): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(result: ExecutionResult): string {
  const lines: string[] = [];
  const counts = countStatuses(result.steps);

  // Header + metadata
  lines.push(`# Test Report: ${result.testName}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Result** | **${result.status.toUpperCase()}** ${statusIcon(result.status)} |`);
  lines.push(`| **Policy** | ${result.policy} |`);
  lines.push(`| **Started** | ${result.startedAt} |`);
  lines.push(`| **Finished** | ${result.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(result.durationMs)} |`);
  lines.push(
    `| **Steps** | ${String(counts.passed)} passed, ${String(counts['healed-passed'])} healed, ${String(counts.failed)} failed, ${String(counts.skipped)} skipped |`,
  );
  if (result.cancelled) {
    lines.push(`| **Cancelled** | yes |`);
  }
  lines.push('');

  // Step summary table
  lines.push(`## Steps`);
  lines.push('');
  lines.push(`| # | Action | Description | Status | Selector | Reason |`);
  lines.push(`|---|--------|-------------|--------|----------|--------|`);

  for (const sr of result.steps) {
    lines.push(
      `| ${String(sr.stepId)} | ${sr.action} | ${escapeMarkdownCell(sr.description)} | ${statusIcon(sr.status)} | ${sr.resolvedSelector ? `\`${escapeMarkdownCell(sr.resolvedSelector)}\`` : ''} | ${escapeMarkdownCell(sr.reason ?? '')} |`,
    );
  }
  lines.push('');

  // Healing
  const healed = result.steps.filter((sr) => sr.healing !== null);
  if (healed.length > 0) {
    lines.push(`## Healed Selectors`);
    lines.push('');
    for (const sr of healed) {
      if (!sr.healing) continue;
      const score =
        sr.healing.similarity !== null ? ` (similarity ${sr.healing.similarity.toFixed(3)})` : '';
      lines.push(
        `- Step ${String(sr.stepId)}: \`${sr.healing.from ?? '(none)'}\` → \`${sr.healing.to}\` via ${sr.healing.via}${score}`,
      );
    }
    lines.push('');
  }

  // Evidence
  const withEvidence = result.steps.filter(
    (sr) => sr.evidence.screenshotPath !== null || sr.evidence.console.length > 0,
  );
  if (withEvidence.length > 0) {
    lines.push(`## Evidence`);
    lines.push('');
    for (const sr of withEvidence) {
      lines.push(`### Step ${String(sr.stepId)}: ${sr.description}`);
      lines.push('');
      if (sr.evidence.screenshotPath !== null) {
        lines.push(`![screenshot](${sr.evidence.screenshotPath})`);
        lines.push('');
      }
      if (sr.evidence.console.length > 0) {
        lines.push(`**Console:**`);
        lines.push('');
        for (const line of sr.evidence.console) {
          lines.push(`- ${line}`);
        }
        lines.push('');
      }
    }
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function statusIcon(status: StepStatus | ExecutionStatus): string {
  switch (status) {
    case 'passed':
      return '[PASS]';
    case 'healed-passed':
      return '[HEALED]';
    case 'failed':
      return '[FAIL]';
    case 'skipped':
      return '[SKIP]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
