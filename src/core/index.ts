/**
 * Core module.
 * Recording, deterministic replay, self-healing resolution and vision checks.
 * Browser access goes through the BrowserDriver contract only.
 */

export * from './errors.js';
export { StepRecorder } from './recorder.js';
export type { RecordInput, RecorderMeta } from './recorder.js';
export {
  executeTestCase,
  executeStep,
  runTestCase,
  createEvidenceWriter,
} from './executor.js';
export type {
  ExecutorOptions,
  ExecutorTimeouts,
  EvidenceWriter,
  RunOptions,
} from './executor.js';
export { resolveStepTarget, rankCandidates, matchesUniquely } from './resolver.js';
export type {
  HealingOptions,
  Resolution,
  ResolvableStep,
  ResolveOptions,
  ScoredNode,
} from './resolver.js';
export {
  similarity,
  textSimilarity,
  attributeSimilarity,
  structureSimilarity,
  DEFAULT_WEIGHTS,
} from './similarity.js';
export type { SimilarityWeights } from './similarity.js';
export {
  verifyVisually,
  createLLMVisionJudge,
  parseVerdict,
  describeExpectation,
  withTimeout,
} from './verifier.js';
export type { VisionJudge, VisionRequest, VerifyInput } from './verifier.js';
export { createLLMPlanner, plannedActionSchema } from './planner.js';
export type { ActionPlanner, PlannedAction, PlannerContext } from './planner.js';
export { recordTestCase } from './recordingLoop.js';
export type { RecordingConfig } from './recordingLoop.js';
