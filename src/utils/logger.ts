/**
 * Live execution logger for flowheal.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 */

import type { HealingRecord, StepStatus, VisionVerdict } from '../schema/results.js';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function step(index: number, total: number, description: string): void {
  write(`📋 [${String(index + 1)}/${String(total)}] ${description}`);
}

const STATUS_ICONS: Record<StepStatus, string> = {
  passed: '✅',
  'healed-passed': '🩹',
  failed: '❌',
  skipped: '⏭️ ',
};

export function stepResult(
  index: number,
  total: number,
  status: StepStatus,
  description: string,
): void {
  write(`${STATUS_ICONS[status]} [${String(index + 1)}/${String(total)}] ${description}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function healed(stepId: number, record: HealingRecord): void {
  const score = record.similarity !== null ? ` (similarity ${record.similarity.toFixed(3)})` : '';
  write(
    `🩹 Step ${String(stepId)} healed via ${record.via}: ${record.from ?? '(none)'} → ${record.to}${score}`,
  );
}

export function recorded(stepId: number, action: string, selector: string | null): void {
  write(`📝 Recorded step ${String(stepId)}: ${action}${selector ? ` ${selector}` : ''}`);
}

export function vision(verdict: VisionVerdict): void {
  const icon = verdict.verdict === 'pass' ? '👁️ ' : '🙈';
  write(`${icon} Vision ${verdict.verdict}: ${verdict.rationale}`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}
