/**
 * Report generation module.
 * Deterministic; no LLM calls.
 * Turns an ExecutionResult into markdown and JSON artifacts.
 */

export {
  generateMarkdown,
  generateJSON,
  serializeJSON,
  countStatuses,
  exitCodeFor,
  JSON_OUTPUT_VERSION,
} from './reporter.js';
export type { JsonOutput, JsonOutputStep } from './reporter.js';
