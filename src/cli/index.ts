/**
 * CLI module; a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRecordCommand } from './record.js';
export { registerRunCommand } from './run.js';
export { EXIT_CODES } from './shared.js';
