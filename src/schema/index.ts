/**
 * Zod schemas for recorded test cases, element descriptors, run results and
 * the config file. Stored flows and LLM replies are parsed through these.
 */

export * from './descriptor.js';
export * from './step.js';
export * from './capture.js';
export * from './results.js';
export * from './config.js';
