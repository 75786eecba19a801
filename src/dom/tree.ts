import type {
  ContextNode,
  DOMContextTree,
  ElementDescriptor,
  FrameTree,
} from '../schema/descriptor.js';
import type { BrowserDriver } from '../browser/driver.js';
import { LIMITS } from '../config/defaults.js';
import { DEFAULT_HEURISTICS } from './classify.js';
import type { DynamicValueHeuristics } from './classify.js';
import { describeFrame } from './descriptor.js';
import type { RawFrameSnapshot } from './snapshot.js';

// ── Public types ─────────────────────────────────────────────

export interface ContextTreeOptions {
  heuristics?: DynamicValueHeuristics | undefined;
  /** Injected for deterministic tests. */
  now?: (() => Date) | undefined;
}

export interface FormatOptions {
  maxNodes?: number | undefined;
}

// ── Builders ─────────────────────────────────────────────────

/** Snapshot the live page and assemble one disconnected tree per frame. */
export async function buildContextTree(
  driver: BrowserDriver,
  options: ContextTreeOptions = {},
): Promise<DOMContextTree> {
  const frames = await driver.snapshot();
  const now = options.now ?? (() => new Date());
  return assembleContextTree(frames, driver.currentUrl(), now(), options.heuristics);
}

export function assembleContextTree(
  frames: readonly RawFrameSnapshot[],
  url: string,
  capturedAt: Date,
  heuristics: DynamicValueHeuristics = DEFAULT_HEURISTICS,
): DOMContextTree {
  return {
    capturedAt: capturedAt.toISOString(),
    url,
    frames: frames.map(
      (snapshot, index): FrameTree => ({
        frame: snapshot.frame,
        url: snapshot.url,
        root: describeFrame(snapshot, index, heuristics),
      }),
    ),
  };
}

// ── Traversal ────────────────────────────────────────────────

/** Pre-order walk of one frame. */
export function flattenFrame(frame: FrameTree): ContextNode[] {
  const out: ContextNode[] = [];
  const stack = frame.root ? [frame.root] : [];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    out.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
  }
  return out;
}

export function flattenTree(tree: DOMContextTree): ContextNode[] {
  return tree.frames.flatMap(flattenFrame);
}

/** Every descriptor of the first frame with the given key. */
export function frameDescriptors(
  tree: DOMContextTree,
  frame: string | null,
): ElementDescriptor[] {
  const match = tree.frames.find((f) => f.frame === frame);
  return match ? flattenFrame(match).map((n) => n.descriptor) : [];
}

export function findNode(tree: DOMContextTree, id: string): ContextNode | undefined {
  return flattenTree(tree).find((n) => n.id === id);
}

// ── Formatting ───────────────────────────────────────────────

/**
 * Indented listing of the relevant nodes, one per line:
 * `[0:12] <input name="username" type="text"> Username`.
 */
export function formatContextTree(
  tree: DOMContextTree,
  options: FormatOptions = {},
): string {
  const maxNodes = options.maxNodes ?? LIMITS.MAX_CONTEXT_NODES;
  const lines: string[] = [];
  let emitted = 0;
  let omitted = 0;

  for (const frame of tree.frames) {
    lines.push(frame.frame === null ? `# frame: main (${frame.url})` : `# frame: ${frame.frame}`);

    const visit = (node: ContextNode, depth: number): void => {
      let childDepth = depth;
      if (node.relevant) {
        if (emitted < maxNodes) {
          lines.push('  '.repeat(depth) + formatNode(node));
          emitted++;
        } else {
          omitted++;
        }
        childDepth = depth + 1;
      }
      for (const child of node.children) visit(child, childDepth);
    };

    if (frame.root) visit(frame.root, 0);
  }

  if (omitted > 0) lines.push(`... ${String(omitted)} more elements omitted`);
  return lines.join('\n');
}

const LISTED_ATTRIBUTES = [
  'id',
  'name',
  'type',
  'data-testid',
  'role',
  'aria-label',
  'placeholder',
  'href',
  'value',
  'alt',
] as const;

function formatNode(node: ContextNode): string {
  const d = node.descriptor;
  const attrs = LISTED_ATTRIBUTES.flatMap((name) => {
    const value = d.attributes[name];
    return value !== undefined ? [`${name}="${value}"`] : [];
  });
  const open = attrs.length > 0 ? `<${d.tag} ${attrs.join(' ')}>` : `<${d.tag}>`;
  const flag = d.classification === 'static' ? '' : ` (${d.classification})`;
  const text = d.text.length > 0 ? ` ${d.text.slice(0, LIMITS.MAX_TEXT_SELECTOR_CHARS)}` : '';
  return `[${node.id}] ${open}${text}${flag}`;
}
