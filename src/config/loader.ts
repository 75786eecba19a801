import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import type { FailurePolicy } from '../schema/results.js';
import type { DynamicValueHeuristics } from '../dom/classify.js';
import { DYNAMIC_VALUE_HEURISTICS, HEALING, LIMITS, TIMEOUTS } from './defaults.js';

// ── Public types ────────────────────────────────────────────

export interface RuntimeConfig {
  headless: boolean;
  outputDir: string;
  evidenceDir: string;
  failurePolicy: FailurePolicy;
  maxSteps: number;
  provider: FileConfig['provider'];
  model: string | undefined;
  timeouts: {
    navigation: number;
    action: number;
    resolve: number;
    settle: number;
    vision: number;
    maxPostActionWait: number;
  };
  healing: {
    enabled: boolean;
    threshold: number;
    ambiguityMargin: number;
  };
  classifier: DynamicValueHeuristics;
}

export interface ConfigOverrides {
  headless?: boolean | undefined;
  outputDir?: string | undefined;
  evidenceDir?: string | undefined;
  failurePolicy?: FailurePolicy | undefined;
  maxSteps?: number | undefined;
  healingEnabled?: boolean | undefined;
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.flowheal.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : (parseYaml(raw) ?? {});

  return fileConfigSchema.parse(parsed);
}

/** Like `loadConfigFile`, but a missing file yields the defaults. */
export async function loadConfigFileOrDefaults(
  configPath: string,
): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (isMissingFile(err)) return fileConfigSchema.parse({});
    throw err;
  }
}

/** CLI flags override the file, the file overrides the defaults. */
export function resolveRuntimeConfig(
  file: FileConfig,
  overrides: ConfigOverrides = {},
): RuntimeConfig {
  return {
    headless: overrides.headless ?? file.headless,
    outputDir: overrides.outputDir ?? file.outputDir,
    evidenceDir: overrides.evidenceDir ?? file.evidenceDir,
    failurePolicy: overrides.failurePolicy ?? file.failurePolicy,
    maxSteps: overrides.maxSteps ?? file.maxSteps ?? LIMITS.MAX_RECORDING_STEPS,
    provider: file.provider,
    model: file.model,
    timeouts: {
      navigation: file.timeouts?.navigation ?? TIMEOUTS.NAVIGATION_TIMEOUT,
      action: file.timeouts?.action ?? TIMEOUTS.ACTION_TIMEOUT,
      resolve: file.timeouts?.resolve ?? TIMEOUTS.RESOLVE_TIMEOUT,
      settle: file.timeouts?.settle ?? TIMEOUTS.POST_ACTION_SETTLE,
      vision: file.timeouts?.vision ?? TIMEOUTS.VISION_TIMEOUT,
      maxPostActionWait:
        file.timeouts?.maxPostActionWait ?? TIMEOUTS.MAX_POST_ACTION_WAIT,
    },
    healing: {
      enabled: overrides.healingEnabled ?? file.healing?.enabled ?? HEALING.ENABLED,
      threshold: file.healing?.threshold ?? HEALING.SIMILARITY_THRESHOLD,
      ambiguityMargin: file.healing?.ambiguityMargin ?? HEALING.AMBIGUITY_MARGIN,
    },
    classifier: {
      minHashLength:
        file.classifier?.minHashLength ?? DYNAMIC_VALUE_HEURISTICS.MIN_HASH_LENGTH,
      minDigitRun:
        file.classifier?.minDigitRun ?? DYNAMIC_VALUE_HEURISTICS.MIN_DIGIT_RUN,
      entropyThreshold:
        file.classifier?.entropyThreshold ??
        DYNAMIC_VALUE_HEURISTICS.ENTROPY_THRESHOLD,
      minEntropyLength:
        file.classifier?.minEntropyLength ??
        DYNAMIC_VALUE_HEURISTICS.MIN_ENTROPY_LENGTH,
    },
  };
}

// ── Helpers ─────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
