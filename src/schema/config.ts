import { z } from 'zod';

import { failurePolicySchema } from './results.js';

// ── Timeouts block (milliseconds) ───────────────────────────

export const timeoutsConfigSchema = z
  .object({
    navigation: z.number().int().positive(),
    action: z.number().int().positive(),
    resolve: z.number().int().nonnegative(),
    settle: z.number().int().nonnegative(),
    vision: z.number().int().positive(),
    maxPostActionWait: z.number().int().nonnegative(),
  })
  .partial();

export type TimeoutsConfig = z.infer<typeof timeoutsConfigSchema>;

// ── Healing block ───────────────────────────────────────────

export const healingConfigSchema = z
  .object({
    enabled: z.boolean(),
    threshold: z.number().min(0).max(1),
    ambiguityMargin: z.number().min(0).max(1),
  })
  .partial();

export type HealingConfig = z.infer<typeof healingConfigSchema>;

// ── Dynamic-value classifier block ──────────────────────────

export const classifierConfigSchema = z
  .object({
    minHashLength: z.number().int().positive(),
    minDigitRun: z.number().int().positive(),
    entropyThreshold: z.number().positive(),
    minEntropyLength: z.number().int().positive(),
  })
  .partial();

export type ClassifierConfig = z.infer<typeof classifierConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  headless: z.boolean().optional().default(false),
  outputDir: z.string().min(1).optional().default('tests'),
  evidenceDir: z.string().min(1).optional().default('.artifacts'),
  failurePolicy: failurePolicySchema.optional().default('fail-fast'),
  maxSteps: z.number().int().positive().optional(),
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
  timeouts: timeoutsConfigSchema.optional(),
  healing: healingConfigSchema.optional(),
  classifier: classifierConfigSchema.optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
