import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import type { DOMContextTree, Step } from '../schema/index.js';
import { stepActionSchema } from '../schema/index.js';
import type { LLMClient } from '../llm/index.js';
import { parseModelJSON, renderTemplate } from '../llm/json.js';
import { formatContextTree } from '../dom/tree.js';
import * as log from '../utils/logger.js';
import { RecorderError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface PlannerContext {
  feature: string;
  url: string;
  tree: DOMContextTree;
  history: readonly Step[];
  /** Why the previous proposal could not be recorded, if it could not. */
  lastFailure: string | null;
}

export const plannedActionSchema = z.union([
  z.object({
    done: z.literal(true),
    reason: z.string().default(''),
  }),
  z.object({
    done: z.literal(false),
    action: stepActionSchema,
    element_id: z.string().min(1).nullable().default(null),
    description: z.string().min(1),
    parameters: z.record(z.unknown()).default({}),
    wait_after_secs: z.number().nonnegative().default(0),
  }),
]);

export type PlannedAction = z.infer<typeof plannedActionSchema>;

/** Proposes the next step of a recording; it never touches the page. */
export interface ActionPlanner {
  next(context: PlannerContext): Promise<PlannedAction>;
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── LLM-backed planner ───────────────────────────────────────

export function createLLMPlanner(client: LLMClient): ActionPlanner {
  return {
    async next(context: PlannerContext): Promise<PlannedAction> {
      log.llm(`Planner choosing step ${String(context.history.length + 1)}...`);
      const systemPrompt = await buildSystemPrompt(context);
      const raw = await client.generate(systemPrompt, context.feature);

      const firstAttempt = parseModelJSON(raw, plannedActionSchema);
      if (firstAttempt.ok) return firstAttempt.value;

      // Repair: one retry with the repair prompt
      log.warn(`Planner parse failed, attempting repair: ${firstAttempt.error}`);
      const repairPrompt = await buildRepairPrompt(raw, firstAttempt.error);
      const repaired = await client.generate(systemPrompt, repairPrompt);

      const secondAttempt = parseModelJSON(repaired, plannedActionSchema);
      if (secondAttempt.ok) return secondAttempt.value;

      throw new RecorderError(
        `Planner failed after repair attempt: ${secondAttempt.error}`,
      );
    },
  };
}

// ── Template rendering ───────────────────────────────────────

async function buildSystemPrompt(context: PlannerContext): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'recorder.txt'), 'utf-8');

  const history = context.history
    .map((s) => `${String(s.step_id)}. [${s.action}] ${s.description}${s.selector ? ` (${s.selector})` : ''}`)
    .join('\n');

  return renderTemplate(template, {
    feature: context.feature,
    url: context.url,
    history: history || '(none)',
    lastFailure: context.lastFailure ?? '(none, the previous step succeeded)',
    elements: formatContextTree(context.tree),
  });
}

async function buildRepairPrompt(previousOutput: string, error: string): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'recorder_repair.txt'), 'utf-8');
  return renderTemplate(template, { error, previousOutput });
}
