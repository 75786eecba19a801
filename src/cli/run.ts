import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import type { ExecutionResult, FailurePolicy, TestCase } from '../schema/index.js';
import { failurePolicySchema } from '../schema/index.js';
import type { RuntimeConfig } from '../config/index.js';
import { createEvidenceWriter, runTestCase } from '../core/index.js';
import { exitCodeFor, generateJSON, generateMarkdown, serializeJSON, countStatuses } from '../report/index.js';
import { createFileStore, loadTestCaseFile } from '../store/index.js';
import type { TestCaseStore } from '../store/index.js';
import * as log from '../utils/logger.js';
import {
  DEFAULT_CONFIG_PATH,
  EXIT_CODES,
  createLazyJudge,
  describeError,
  loadRuntimeConfig,
} from './shared.js';

interface RunCommandOptions {
  json?: true;
  policy?: string;
  heal: boolean;
  evidenceDir?: string;
  outputDir?: string;
  headless?: true;
  config: string;
}

interface LoadedTest {
  id: string;
  testCase: TestCase;
  store: TestCaseStore;
}

// ── Test lookup ──────────────────────────────────────────────
// A path to a JSON file is loaded directly; anything else is an id in the output dir.

async function loadTest(ref: string, config: RuntimeConfig): Promise<LoadedTest> {
  if (ref.endsWith('.json') || existsSync(ref)) {
    const file = path.resolve(ref);
    return {
      id: path.basename(file, '.json'),
      testCase: await loadTestCaseFile(file),
      store: createFileStore(path.dirname(file)),
    };
  }

  const store = createFileStore(path.resolve(config.outputDir));
  return { id: ref, testCase: await store.loadTestCase(ref), store };
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(result: ExecutionResult): void {
  const counts = countStatuses(result.steps);

  process.stderr.write(`\n--- flowheal result ---\n`);
  process.stderr.write(`Test:    ${result.testName}\n`);
  process.stderr.write(`Result:  ${result.status.toUpperCase()}${result.cancelled ? ' (cancelled)' : ''}\n`);
  process.stderr.write(
    `Steps:   ${String(counts.passed)} passed, ${String(counts['healed-passed'])} healed, ${String(counts.failed)} failed, ${String(counts.skipped)} skipped\n`,
  );
  process.stderr.write(`Time:    ${(result.durationMs / 1000).toFixed(1)}s\n\n`);
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Replay a recorded test case, healing selectors that drifted')
    .argument('<test>', 'Test id in the output directory, or a path to a test case JSON file')
    .option('--json', 'Output JSON to stdout')
    .option('--policy <policy>', 'Failure policy: fail-fast or continue-on-assertion')
    .option('--no-heal', 'Disable similarity-based healing')
    .option('--evidence-dir <dir>', 'Directory for screenshots and reports')
    .option('--output-dir <dir>', 'Directory test cases are loaded from')
    .option('--headless', 'Run browser headless')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (ref: string, opts: RunCommandOptions) => {
      // 1. Config and test case; any problem here is a usage error
      let config: RuntimeConfig;
      let loaded: LoadedTest;
      try {
        let policy: FailurePolicy | undefined;
        if (opts.policy !== undefined) {
          policy = failurePolicySchema.parse(opts.policy);
        }
        config = await loadRuntimeConfig(opts.config, {
          headless: opts.headless,
          evidenceDir: opts.evidenceDir,
          outputDir: opts.outputDir,
          failurePolicy: policy,
          healingEnabled: opts.heal ? undefined : false,
        });
        loaded = await loadTest(ref, config);
      } catch (err) {
        process.stderr.write(`Error: ${describeError(err)}\n`);
        process.exitCode = EXIT_CODES.USAGE;
        return;
      }

      // 2. Replay, cancellable with Ctrl-C between steps
      const controller = new AbortController();
      const onInterrupt = (): void => {
        log.warn('Interrupted; finishing the current step');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const evidenceDir = path.resolve(config.evidenceDir, loaded.id);
        const result = await runTestCase(loaded.testCase, {
          headless: config.headless,
          policy: config.failurePolicy,
          timeouts: config.timeouts,
          healing: config.healing,
          heuristics: config.classifier,
          judge: createLazyJudge(config),
          evidence: createEvidenceWriter(evidenceDir),
          signal: controller.signal,
        });

        // 3. Artifacts
        await mkdir(evidenceDir, { recursive: true });
        await writeFile(path.join(evidenceDir, 'report.md'), generateMarkdown(result), 'utf-8');
        await loaded.store.saveExecutionResult(loaded.id, result);

        if (opts.json) {
          process.stdout.write(serializeJSON(generateJSON(result)) + '\n');
        }
        printSummary(result);
        process.exitCode = exitCodeFor(result);
      } catch (err) {
        process.stderr.write(`Error: ${describeError(err)}\n`);
        process.exitCode = EXIT_CODES.USAGE;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}
