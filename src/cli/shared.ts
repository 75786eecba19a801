import type { ConfigOverrides, RuntimeConfig } from '../config/index.js';
import { loadConfigFileOrDefaults, resolveRuntimeConfig } from '../config/index.js';
import type { VisionJudge } from '../core/index.js';
import { createLLMVisionJudge } from '../core/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient } from '../llm/index.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  PASSED: 0,
  FAILED: 1,
  RECORDING_FAILED: 3,
  USAGE: 4,
} as const;

// ── Config ───────────────────────────────────────────────────

export const DEFAULT_CONFIG_PATH = '.flowheal.yaml';

export async function loadRuntimeConfig(
  configPath: string,
  overrides: ConfigOverrides,
): Promise<RuntimeConfig> {
  const file = await loadConfigFileOrDefaults(configPath);
  return resolveRuntimeConfig(file, overrides);
}

/** Config file provider/model override the environment. */
export function createClient(config: RuntimeConfig): LLMClient {
  return createLLMClient(loadLLMConfig({ provider: config.provider, model: config.model }));
}

/**
 * A vision judge whose LLM client is only created on first use, so runs
 * without visual checks need no API key.
 */
export function createLazyJudge(config: RuntimeConfig): VisionJudge {
  let judge: VisionJudge | undefined;
  return {
    judge(request) {
      judge ??= createLLMVisionJudge(createClient(config));
      return judge.judge(request);
    },
  };
}

export function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
