import path from 'node:path';

import type { Command } from 'commander';

import type { RuntimeConfig } from '../config/index.js';
import { withSession } from '../browser/index.js';
import { RecorderError, createLLMPlanner, recordTestCase } from '../core/index.js';
import { createFileStore, toTestId } from '../store/index.js';
import * as log from '../utils/logger.js';
import {
  DEFAULT_CONFIG_PATH,
  EXIT_CODES,
  createClient,
  createLazyJudge,
  describeError,
  loadRuntimeConfig,
  parsePositiveInt,
} from './shared.js';

interface RecordOptions {
  name?: string;
  outputDir?: string;
  maxSteps?: string;
  headless?: true;
  config: string;
}

// ── Command registration ─────────────────────────────────────

export function registerRecordCommand(program: Command): void {
  program
    .command('record')
    .description('Record a test case by letting the planner drive the page')
    .argument('<url>', 'Page to start recording on')
    .argument('<feature>', 'Natural language description of the feature under test')
    .option('--name <name>', 'Test name (defaults to the feature description)')
    .option('--output-dir <dir>', 'Directory test cases are saved to')
    .option('--max-steps <n>', 'Maximum steps to record')
    .option('--headless', 'Run browser headless')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (url: string, feature: string, opts: RecordOptions) => {
      let config: RuntimeConfig;
      try {
        config = await loadRuntimeConfig(opts.config, {
          headless: opts.headless,
          outputDir: opts.outputDir,
          maxSteps:
            opts.maxSteps !== undefined
              ? parsePositiveInt(opts.maxSteps, '--max-steps')
              : undefined,
        });
      } catch (err) {
        process.stderr.write(`Config error: ${describeError(err)}\n`);
        process.exitCode = EXIT_CODES.USAGE;
        return;
      }

      const testName = opts.name ?? feature;
      const id = toTestId(testName);

      try {
        const planner = createLLMPlanner(createClient(config));
        const testCase = await withSession({ headless: config.headless }, (driver) =>
          recordTestCase(planner, driver, {
            url,
            feature,
            testName,
            maxSteps: config.maxSteps,
            heuristics: config.classifier,
            executor: {
              timeouts: config.timeouts,
              healing: config.healing,
              judge: createLazyJudge(config),
            },
          }),
        );

        const store = createFileStore(path.resolve(config.outputDir));
        const file = await store.saveTestCase(id, testCase);
        log.info(`Recorded ${String(testCase.steps.length)} steps to ${file}`);
        process.stdout.write(file + '\n');
        process.exitCode = EXIT_CODES.PASSED;
      } catch (err) {
        process.stderr.write(`Recording failed: ${describeError(err)}\n`);
        process.exitCode =
          err instanceof RecorderError ? err.exitCode : EXIT_CODES.RECORDING_FAILED;
      }
    });
}
