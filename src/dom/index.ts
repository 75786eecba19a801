/**
 * DOM module.
 * Element descriptors, selector synthesis and the per-capture context tree.
 * Pure functions over snapshots; the only page access is `buildContextTree`.
 */

export { collectFrameSnapshot, isRenderedVisible, readElementState } from './snapshot.js';
export type {
  RawElementNode,
  RawFrameSnapshot,
  SnapshotOptions,
  ElementState,
  VisibilityOptions,
} from './snapshot.js';
export {
  classifyElement,
  isDynamicValue,
  shannonEntropy,
  DEFAULT_HEURISTICS,
} from './classify.js';
export type { DynamicValueHeuristics } from './classify.js';
export { describeFrame, buildElementDescriptors, siblingPositions } from './descriptor.js';
export {
  synthesizeSelectors,
  structuralPath,
  normalizeXPath,
  cssIdSelector,
  attributeSelector,
  xpathLiteral,
  describeCandidate,
} from './selectors.js';
export type { SynthesisOptions } from './selectors.js';
export {
  buildContextTree,
  assembleContextTree,
  flattenTree,
  flattenFrame,
  frameDescriptors,
  findNode,
  formatContextTree,
} from './tree.js';
export type { ContextTreeOptions, FormatOptions } from './tree.js';
