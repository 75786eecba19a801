import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Step, VisionVerdict } from '../schema/index.js';
import { visionVerdictSchema } from '../schema/index.js';
import type { BrowserDriver } from '../browser/driver.js';
import type { LLMClient } from '../llm/index.js';
import { parseModelJSON, renderTemplate } from '../llm/json.js';
import { TIMEOUTS } from '../config/defaults.js';
import { buildContextTree, formatContextTree } from '../dom/tree.js';
import * as log from '../utils/logger.js';
import { StepError, VisionVerificationError, errorMessage } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface VisionRequest {
  /** What the step expects to be true, in plain language. */
  expectation: string;
  screenshot: Buffer;
  url: string;
  /** Relevant DOM excerpt, for orientation. */
  context: string;
}

export interface VisionJudge {
  judge(request: VisionRequest): Promise<VisionVerdict>;
}

export interface VerifyInput {
  step: Step;
  driver: BrowserDriver;
  judge: VisionJudge;
  timeoutMs?: number | undefined;
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

const CONTEXT_NODES = 120;

// ── Main entry ───────────────────────────────────────────────

/**
 * Judge a step from a screenshot. Returns the verdict as given; the caller
 * decides what a `fail` means. Throws `VisionVerificationError` on timeout.
 */
export async function verifyVisually(input: VerifyInput): Promise<VisionVerdict> {
  const { step, driver, judge } = input;
  const timeoutMs = input.timeoutMs ?? TIMEOUTS.VISION_TIMEOUT;

  const screenshot = await driver.screenshot();
  const tree = await buildContextTree(driver);

  const verdict = await withTimeout(
    judgeSafely(judge, {
      expectation: describeExpectation(step),
      screenshot,
      url: driver.currentUrl(),
      context: formatContextTree(tree, { maxNodes: CONTEXT_NODES }),
    }),
    timeoutMs,
    () => new VisionVerificationError('vision verification timed out', step.step_id),
  );

  log.vision(verdict);
  return verdict;
}

async function judgeSafely(judge: VisionJudge, request: VisionRequest): Promise<VisionVerdict> {
  try {
    return await judge.judge(request);
  } catch (err) {
    if (err instanceof StepError) throw err;
    throw new VisionVerificationError(`vision judge failed: ${errorMessage(err)}`);
  }
}

export function describeExpectation(step: Step): string {
  switch (step.action) {
    case 'assert_text_contains':
    case 'assert_text_equals':
      return `${step.description}\nThe page must show the text: "${step.parameters.expected_text}"`;
    case 'assert_visible':
      return `${step.description}\nThe element described must be visible on the page.`;
    default:
      return step.description;
  }
}

/** Race `promise` against a timer; the timer never outlives the race. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

// ── LLM-backed judge ─────────────────────────────────────────

export function createLLMVisionJudge(client: LLMClient): VisionJudge {
  return {
    async judge(request: VisionRequest): Promise<VisionVerdict> {
      log.llm('Vision judge evaluating screenshot...');
      const systemPrompt = await buildSystemPrompt(request);
      const raw = await client.generateWithImage(
        systemPrompt,
        request.expectation,
        request.screenshot.toString('base64'),
        'image/png',
      );

      const firstAttempt = parseVerdict(raw);
      if (firstAttempt.ok) return firstAttempt.value;

      // Repair: one retry
      log.warn(`Vision reply unusable, attempting repair: ${firstAttempt.error}`);
      const repairPrompt = await buildRepairPrompt(raw, firstAttempt.error);
      const repaired = await client.generate(systemPrompt, repairPrompt);

      const secondAttempt = parseVerdict(repaired);
      if (secondAttempt.ok) return secondAttempt.value;

      return {
        verdict: 'fail',
        rationale: `vision judge gave no usable verdict: ${secondAttempt.error}`,
      };
    },
  };
}

type VerdictResult =
  | { ok: true; value: VisionVerdict }
  | { ok: false; error: string };

/** JSON verdict, or a reply that opens with a bare YES / NO. */
export function parseVerdict(raw: string): VerdictResult {
  const plain = /^\s*(YES|NO)\b[\s:.,-]*([\s\S]*)$/i.exec(raw);
  if (plain?.[1]) {
    const verdict = plain[1].toUpperCase() === 'YES' ? 'pass' : 'fail';
    const rationale = (plain[2] ?? '').trim();
    return {
      ok: true,
      value: { verdict, rationale: rationale.length > 0 ? rationale : plain[1].toUpperCase() },
    };
  }

  return parseModelJSON(raw, visionVerdictSchema);
}

// ── Template rendering ───────────────────────────────────────

async function buildSystemPrompt(request: VisionRequest): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'verifier.txt'), 'utf-8');
  return renderTemplate(template, { url: request.url, context: request.context });
}

async function buildRepairPrompt(previousOutput: string, error: string): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'verifier_repair.txt'), 'utf-8');
  return renderTemplate(template, { error, previousOutput });
}
