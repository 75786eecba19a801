import { JSDOM, VirtualConsole } from 'jsdom';

import type { ConsoleEntry, ConsoleLevel, LoadState, SelectParameters } from '../../src/schema/index.js';
import type {
  BrowserDriver,
  ElementProbe,
  ElementState,
  ElementTarget,
} from '../../src/browser/driver.js';
import { ActionTimeoutError, FatalBrowserError } from '../../src/core/errors.js';
import {
  collectFrameSnapshot,
  isRenderedVisible,
  readElementState,
} from '../../src/dom/snapshot.js';
import type { RawFrameSnapshot } from '../../src/dom/snapshot.js';
import { LIMITS } from '../../src/config/defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface JsdomDriver extends BrowserDriver {
  /** The loaded document, for tests that change the page directly. */
  page(): Document;
  /** Make `waitForLoadState(state)` time out from now on. */
  stallLoadState(state: LoadState): void;
  readonly closed: boolean;
}

export const PLACEHOLDER_PNG = Buffer.from('placeholder-png');

const CONSOLE_LEVELS: readonly ConsoleLevel[] = ['log', 'info', 'warn', 'error', 'debug'];
/** `XPathResult.ORDERED_NODE_SNAPSHOT_TYPE` */
const ORDERED_NODE_SNAPSHOT_TYPE = 7;
const SKIPPED_TEXT = new Set(['script', 'style', 'noscript', 'template', 'head']);

// ── Factory ──────────────────────────────────────────────────

/**
 * In-process BrowserDriver over jsdom. `pages` maps URLs to HTML; inline
 * scripts run. There is no layout, so visibility is decided by the hidden
 * attribute and computed `display` / `visibility` only.
 */
export function createJsdomDriver(pages: Readonly<Record<string, string>>): JsdomDriver {
  let dom: JSDOM | null = null;
  let entries: ConsoleEntry[] = [];
  let closed = false;
  const stalled = new Set<LoadState>();

  const virtualConsole = new VirtualConsole();
  for (const level of CONSOLE_LEVELS) {
    virtualConsole.on(level, (...args: unknown[]) => {
      entries.push({ level, text: args.map(String).join(' ') });
    });
  }
  virtualConsole.on('jsdomError', (error: Error) => {
    entries.push({ level: 'error', text: error.message });
  });

  function current(): JSDOM {
    if (closed) throw new FatalBrowserError('Target page, context or browser has been closed');
    if (!dom) throw new FatalBrowserError('no page loaded');
    return dom;
  }

  function documentFor(frame: string | null): Document {
    if (frame !== null) throw new FatalBrowserError(`frame not found: ${frame}`);
    return current().window.document;
  }

  function find(target: ElementTarget): Element[] {
    const doc = documentFor(target.frame);
    const win = current().window;

    if (!target.selector.startsWith('xpath=')) {
      return Array.from(doc.querySelectorAll(target.selector));
    }

    const result = doc.evaluate(
      target.selector.slice('xpath='.length),
      doc,
      null,
      ORDERED_NODE_SNAPSHOT_TYPE,
      null,
    );
    const out: Element[] = [];
    for (let i = 0; i < result.snapshotLength; i++) {
      const node = result.snapshotItem(i);
      if (node instanceof win.Element) out.push(node);
    }
    return out;
  }

  function single(target: ElementTarget, operation: string, timeoutMs: number): Element {
    const matches = find(target).filter((el) => isRenderedVisible(el, { layout: false }));
    const [only] = matches;
    if (!only || matches.length > 1) {
      throw new ActionTimeoutError(
        `${operation} ${target.selector}: ${String(matches.length)} visible matches`,
        timeoutMs,
      );
    }
    return only;
  }

  return {
    page(): Document {
      return current().window.document;
    },

    get closed(): boolean {
      return closed;
    },

    stallLoadState(state: LoadState): void {
      stalled.add(state);
    },

    async navigate(url: string, timeoutMs: number): Promise<void> {
      const html = pages[url];
      if (html === undefined) {
        throw new ActionTimeoutError(`navigate to ${url} timed out after ${String(timeoutMs)}ms`, timeoutMs);
      }
      dom?.window.close();
      dom = new JSDOM(html, { url, runScripts: 'dangerously', virtualConsole });
    },

    async waitForLoadState(state: LoadState, timeoutMs: number): Promise<void> {
      current();
      if (stalled.has(state)) {
        throw new ActionTimeoutError(`wait for ${state} timed out after ${String(timeoutMs)}ms`, timeoutMs);
      }
    },

    async query(target: ElementTarget): Promise<ElementProbe[]> {
      return find(target).map((el) => ({
        visible: isRenderedVisible(el, { layout: false }),
        text: normalize(el.textContent ?? ''),
      }));
    },

    async click(target: ElementTarget, timeoutMs: number): Promise<void> {
      const el = single(target, 'click', timeoutMs);
      const win = current().window;
      if (el instanceof win.HTMLElement) {
        el.click();
      } else {
        el.dispatchEvent(new win.MouseEvent('click', { bubbles: true, cancelable: true }));
      }
    },

    async fill(target: ElementTarget, text: string, timeoutMs: number): Promise<void> {
      const el = single(target, 'fill', timeoutMs);
      const win = current().window;
      if (!(el instanceof win.HTMLInputElement) && !(el instanceof win.HTMLTextAreaElement)) {
        throw new ActionTimeoutError(`fill ${target.selector}: not a text field`, timeoutMs);
      }
      el.value = text;
      el.dispatchEvent(new win.Event('input', { bubbles: true }));
      el.dispatchEvent(new win.Event('change', { bubbles: true }));
    },

    async selectOption(
      target: ElementTarget,
      option: SelectParameters,
      timeoutMs: number,
    ): Promise<void> {
      const el = single(target, 'select', timeoutMs);
      const win = current().window;
      if (!(el instanceof win.HTMLSelectElement)) {
        throw new ActionTimeoutError(`select ${target.selector}: not a select`, timeoutMs);
      }
      const options = Array.from(el.options);
      const index = options.findIndex(
        (o, i) =>
          (option.option_label !== undefined && normalize(o.text) === option.option_label) ||
          (option.option_value !== undefined && o.value === option.option_value) ||
          option.option_index === i,
      );
      if (index === -1) {
        throw new ActionTimeoutError(`select ${target.selector}: no such option`, timeoutMs);
      }
      el.selectedIndex = index;
      el.dispatchEvent(new win.Event('change', { bubbles: true }));
    },

    async setChecked(target: ElementTarget, checked: boolean, timeoutMs: number): Promise<void> {
      const el = single(target, 'check', timeoutMs);
      const win = current().window;
      if (!(el instanceof win.HTMLInputElement)) {
        throw new ActionTimeoutError(`check ${target.selector}: not an input`, timeoutMs);
      }
      if (el.checked !== checked) el.click();
    },

    async elementState(target: ElementTarget, timeoutMs: number): Promise<ElementState> {
      return readElementState(single(target, 'read state of', timeoutMs));
    },

    async getAttribute(
      target: ElementTarget,
      name: string,
      timeoutMs: number,
    ): Promise<string | null> {
      return single(target, `read ${name} of`, timeoutMs).getAttribute(name);
    },

    async innerText(target: ElementTarget | null, timeoutMs: number): Promise<string> {
      const el = target ? single(target, 'read text of', timeoutMs) : documentFor(null).body;
      return normalize(renderedText(el));
    },

    async snapshot(): Promise<RawFrameSnapshot[]> {
      const win = current().window;
      return [
        {
          frame: null,
          url: win.location.href,
          root: collectFrameSnapshot(win.document, {
            layout: false,
            maxTextChars: LIMITS.MAX_TEXT_CHARS,
            maxAttributeChars: LIMITS.MAX_ATTRIBUTE_CHARS,
          }),
        },
      ];
    },

    async screenshot(): Promise<Buffer> {
      current();
      return PLACEHOLDER_PNG;
    },

    drainConsole(): ConsoleEntry[] {
      const drained = entries;
      entries = [];
      return drained;
    },

    currentUrl(): string {
      return dom ? dom.window.location.href : 'about:blank';
    },

    async close(): Promise<void> {
      dom?.window.close();
      closed = true;
    },
  };
}

// ── Text ─────────────────────────────────────────────────────

/** Text of visible descendants only, approximating `innerText`. */
function renderedText(el: Element): string {
  if (SKIPPED_TEXT.has(el.tagName.toLowerCase())) return '';
  if (!isRenderedVisible(el, { layout: false })) return '';

  const parts: string[] = [];
  for (const child of Array.from(el.childNodes)) {
    if (isElement(child)) parts.push(renderedText(child));
    else if (child.nodeType === child.TEXT_NODE) parts.push(child.textContent ?? '');
  }
  return parts.join(' ');
}

function isElement(node: Node): node is Element {
  return node.nodeType === node.ELEMENT_NODE;
}

function normalize(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
