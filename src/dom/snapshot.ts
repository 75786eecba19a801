// ── Raw snapshot types ───────────────────────────────────────

export interface RawElementNode {
  tag: string;
  attributes: Record<string, string>;
  text: string;
  bbox: { x: number; y: number; width: number; height: number };
  visible: boolean;
  interactive: boolean;
  children: RawElementNode[];
}

export interface RawFrameSnapshot {
  /** `null` for the top-level document. */
  frame: string | null;
  url: string;
  root: RawElementNode | null;
}

export interface SnapshotOptions {
  /** False where the DOM has no layout engine (every box is empty). */
  layout: boolean;
  maxTextChars: number;
  maxAttributeChars: number;
}

export interface VisibilityOptions {
  layout: boolean;
}

export interface ElementState {
  checked: boolean;
  enabled: boolean;
}

// ── Browser-context extraction ───────────────────────────────
// These functions are serialized and executed inside the browser.
// They must NOT reference any outer-scope variables.

/**
 * Walk one frame's document into a raw element tree. Whitespace in text is
 * collapsed the way XPath `normalize-space()` does, so text selectors built
 * from it match the same string. Shadow roots are not entered.
 */
export function collectFrameSnapshot(
  doc: Document,
  options: SnapshotOptions,
): RawElementNode | null {
  const skipped = new Set(['head', 'script', 'style', 'noscript', 'template']);
  const interactiveTags = new Set(['button', 'select', 'textarea', 'summary', 'option']);
  const interactiveRoles = new Set([
    'button',
    'link',
    'checkbox',
    'radio',
    'menuitem',
    'tab',
    'switch',
    'option',
    'combobox',
    'textbox',
    'searchbox',
    'slider',
    'spinbutton',
  ]);
  const view = doc.defaultView;

  function normalize(text: string): string {
    return text.replace(/[ \t\r\n]+/g, ' ').trim();
  }

  function attributesOf(el: Element): Record<string, string> {
    const out: Record<string, string> = {};
    for (const attr of Array.from(el.attributes)) {
      const name = attr.name.toLowerCase();
      if (name === 'style' || name.startsWith('on')) continue;
      if (attr.value.length > options.maxAttributeChars) continue;
      out[name] = attr.value.trim();
    }
    return out;
  }

  function styleVisible(el: Element, tag: string): boolean {
    if (el.hasAttribute('hidden')) return false;
    if (tag === 'input' && (el.getAttribute('type') ?? '').toLowerCase() === 'hidden') {
      return false;
    }
    if (!view) return true;
    const style = view.getComputedStyle(el);
    return (
      style.display !== 'none' &&
      style.visibility !== 'hidden' &&
      style.visibility !== 'collapse'
    );
  }

  function isInteractive(el: Element, tag: string): boolean {
    if (interactiveTags.has(tag)) return true;
    if (tag === 'a' && el.hasAttribute('href')) return true;
    if (tag === 'input') {
      return (el.getAttribute('type') ?? '').toLowerCase() !== 'hidden';
    }
    const role = el.getAttribute('role');
    if (role !== null && interactiveRoles.has(role.toLowerCase())) return true;
    if (el.hasAttribute('onclick')) return true;
    if (el.getAttribute('contenteditable') === 'true') return true;
    const tabindex = el.getAttribute('tabindex');
    return tabindex !== null && Number(tabindex) >= 0;
  }

  function visit(el: Element, parentVisible: boolean): RawElementNode {
    const tag = el.tagName.toLowerCase();
    const shown = parentVisible && styleVisible(el, tag);
    const rect = el.getBoundingClientRect();
    const hasBox = rect.width > 0 && rect.height > 0;

    const children: RawElementNode[] = [];
    for (const child of Array.from(el.children)) {
      if (skipped.has(child.tagName.toLowerCase())) continue;
      children.push(visit(child, shown));
    }

    return {
      tag,
      attributes: attributesOf(el),
      text: normalize(el.textContent ?? '').slice(0, options.maxTextChars),
      bbox: {
        x: Math.round(rect.x),
        y: Math.round(rect.y),
        width: Math.round(rect.width),
        height: Math.round(rect.height),
      },
      visible: shown && (!options.layout || hasBox),
      interactive: isInteractive(el, tag),
      children,
    };
  }

  const root = doc.documentElement;
  return root ? visit(root, true) : null;
}

/**
 * Whether an element is rendered: no hidden ancestor, not `display:none`
 * anywhere up the chain, not `visibility:hidden`, and (with layout) a
 * non-empty box.
 */
export function isRenderedVisible(
  el: Element,
  options: VisibilityOptions,
): boolean {
  const view = el.ownerDocument.defaultView;
  const tag = el.tagName.toLowerCase();

  if (tag === 'input' && (el.getAttribute('type') ?? '').toLowerCase() === 'hidden') {
    return false;
  }

  let current: Element | null = el;
  while (current) {
    if (current.hasAttribute('hidden')) return false;
    if (view && view.getComputedStyle(current).display === 'none') return false;
    current = current.parentElement;
  }

  if (view) {
    const visibility = view.getComputedStyle(el).visibility;
    if (visibility === 'hidden' || visibility === 'collapse') return false;
  }

  if (!options.layout) return true;
  const rect = el.getBoundingClientRect();
  return rect.width > 0 && rect.height > 0;
}

/**
 * Checked and enabled state of one element. Native inputs report their
 * `checked` property; anything else falls back to `aria-checked`.
 */
export function readElementState(el: Element): ElementState {
  const checked =
    'checked' in el && typeof el.checked === 'boolean'
      ? el.checked
      : el.getAttribute('aria-checked') === 'true';
  const enabled = !el.matches(':disabled') && el.getAttribute('aria-disabled') !== 'true';
  return { checked, enabled };
}
