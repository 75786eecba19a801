import type {
  Ancestor,
  BoundingBox,
  ContextNode,
  ElementDescriptor,
} from '../schema/descriptor.js';
import { classifyElement, DEFAULT_HEURISTICS } from './classify.js';
import type { DynamicValueHeuristics } from './classify.js';
import type { RawElementNode, RawFrameSnapshot } from './snapshot.js';

// ── Frame → descriptor tree ──────────────────────────────────

/**
 * Project one raw frame snapshot into context nodes. Every element gets a
 * descriptor (structure stays intact); `relevant` marks the surface worth
 * showing to a planner: visible, and interactive, carrying its own text, or
 * visual-only.
 */
export function describeFrame(
  snapshot: RawFrameSnapshot,
  frameIndex: number,
  heuristics: DynamicValueHeuristics = DEFAULT_HEURISTICS,
): ContextNode | null {
  if (!snapshot.root) return null;

  let counter = 0;

  function visit(
    raw: RawElementNode,
    ancestors: Ancestor[],
    position: number,
  ): ContextNode {
    const descriptor: ElementDescriptor = {
      tag: raw.tag,
      attributes: { ...raw.attributes },
      text: raw.text,
      bbox: sanitizeBox(raw.bbox),
      ancestors,
      position,
      classification: classifyElement(raw.tag, raw.attributes, heuristics),
      frame: snapshot.frame,
    };

    const id = `${String(frameIndex)}:${String(counter)}`;
    counter++;

    const lineage: Ancestor[] = [...ancestors, { tag: raw.tag, position }];
    const positions = siblingPositions(raw.children);
    const children = raw.children.map((child, i) =>
      visit(child, lineage, positions[i] ?? 0),
    );

    return {
      id,
      descriptor,
      relevant: isRelevant(raw, descriptor),
      children,
    };
  }

  return visit(snapshot.root, [], 0);
}

/** The relevant surface of every frame, in document order. */
export function buildElementDescriptors(
  frames: readonly RawFrameSnapshot[],
  heuristics: DynamicValueHeuristics = DEFAULT_HEURISTICS,
): ElementDescriptor[] {
  const out: ElementDescriptor[] = [];

  frames.forEach((frame, index) => {
    const root = describeFrame(frame, index, heuristics);
    const stack = root ? [root] : [];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      if (node.relevant) out.push(node.descriptor);
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child) stack.push(child);
      }
    }
  });

  return out;
}

// ── Helpers ──────────────────────────────────────────────────

/** 1-based index among same-tag siblings, 0 where the tag occurs once. */
export function siblingPositions(children: readonly { tag: string }[]): number[] {
  const totals = new Map<string, number>();
  for (const child of children) {
    totals.set(child.tag, (totals.get(child.tag) ?? 0) + 1);
  }

  const seen = new Map<string, number>();
  return children.map((child) => {
    const index = (seen.get(child.tag) ?? 0) + 1;
    seen.set(child.tag, index);
    return (totals.get(child.tag) ?? 0) > 1 ? index : 0;
  });
}

function isRelevant(raw: RawElementNode, descriptor: ElementDescriptor): boolean {
  if (!raw.visible) return false;
  if (raw.interactive) return true;
  if (descriptor.classification === 'visual-only') return true;
  if (raw.text.length === 0) return false;
  // Text that a single child already carries belongs to that child.
  return !raw.children.some((child) => child.text === raw.text);
}

function sanitizeBox(box: RawElementNode['bbox']): BoundingBox {
  const finite = (n: number): number => (Number.isFinite(n) ? n : 0);
  return {
    x: finite(box.x),
    y: finite(box.y),
    width: Math.max(0, finite(box.width)),
    height: Math.max(0, finite(box.height)),
  };
}
