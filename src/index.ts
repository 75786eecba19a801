/**
 * flowheal library entry.
 */

export * from './schema/index.js';
export * from './dom/index.js';
export * from './browser/index.js';
export * from './core/index.js';
export * from './report/index.js';
export * from './store/index.js';
export {
  TIMEOUTS,
  LIMITS,
  SCORES,
  HEALING,
  DYNAMIC_VALUE_HEURISTICS,
  loadConfigFile,
  loadConfigFileOrDefaults,
  resolveRuntimeConfig,
} from './config/index.js';
export type { RuntimeConfig, ConfigOverrides } from './config/index.js';
export {
  createLLMClient,
  createAnthropicClient,
  createOpenAIClient,
  createMockClient,
  loadLLMConfig,
} from './llm/index.js';
export type { LLMClient, LLMConfig, ImageMimeType } from './llm/index.js';
