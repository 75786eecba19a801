import { z } from 'zod';

// ── Console entry ────────────────────────────────────────────

export const consoleLevelSchema = z.enum(['log', 'info', 'warn', 'error', 'debug']);

export type ConsoleLevel = z.infer<typeof consoleLevelSchema>;

export const consoleEntrySchema = z.object({
  level: consoleLevelSchema,
  text: z.string(),
});

export type ConsoleEntry = z.infer<typeof consoleEntrySchema>;

// ── Evidence (per step) ──────────────────────────────────────

export const evidenceSchema = z.object({
  screenshotPath: z.string().min(1).nullable(),
  console: z.array(z.string()),
});

export type Evidence = z.infer<typeof evidenceSchema>;

export const EMPTY_EVIDENCE: Evidence = { screenshotPath: null, console: [] };

export function formatConsoleEntry(entry: ConsoleEntry): string {
  return `[${entry.level}] ${entry.text}`;
}
