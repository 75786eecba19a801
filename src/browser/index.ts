/**
 * Browser module.
 * Playwright-backed driver behind the BrowserDriver contract; no LLM calls.
 */

export type { BrowserDriver, ElementProbe, ElementState, ElementTarget } from './driver.js';
export { launchSession, withSession } from './runner.js';
export type { RunnerConfig, BrowserSession } from './runner.js';
export { attachCapture } from './capture.js';
export type { CaptureCollector } from './capture.js';
