#!/usr/bin/env node

/**
 * flowheal CLI entry point.
 * Thin wrapper; all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import * as log from '../utils/logger.js';
import { registerRecordCommand, registerRunCommand } from './index.js';

const program = new Command();

program
  .name('flowheal')
  .description(
    'Record browser test flows once, replay them deterministically, and heal selectors when the page drifts.',
  )
  .version('0.1.0');

registerRecordCommand(program);
registerRunCommand(program);

program.parseAsync().catch((err: unknown) => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 4;
});
