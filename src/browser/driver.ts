import type { ConsoleEntry } from '../schema/capture.js';
import type { LoadState, SelectParameters } from '../schema/step.js';
import type { ElementState, RawFrameSnapshot } from '../dom/snapshot.js';

export type { ElementState } from '../dom/snapshot.js';

// ── Capability contract ──────────────────────────────────────

/** A selector scoped to one frame; `frame: null` is the top-level document. */
export interface ElementTarget {
  selector: string;
  frame: string | null;
}

/** What a query sees of each match, without holding on to it. */
export interface ElementProbe {
  visible: boolean;
  text: string;
}

/**
 * Everything the engine needs from a browser. Selectors are CSS unless
 * prefixed with `xpath=`. Element operations expect the target to match
 * exactly one element; callers resolve first.
 *
 * Implementations throw `ActionTimeoutError` when a wait expires and
 * `FatalBrowserError` when the page or browser is gone.
 */
export interface BrowserDriver {
  navigate(url: string, timeoutMs: number): Promise<void>;
  waitForLoadState(state: LoadState, timeoutMs: number): Promise<void>;
  query(target: ElementTarget): Promise<ElementProbe[]>;
  click(target: ElementTarget, timeoutMs: number): Promise<void>;
  fill(target: ElementTarget, text: string, timeoutMs: number): Promise<void>;
  selectOption(
    target: ElementTarget,
    option: SelectParameters,
    timeoutMs: number,
  ): Promise<void>;
  setChecked(target: ElementTarget, checked: boolean, timeoutMs: number): Promise<void>;
  elementState(target: ElementTarget, timeoutMs: number): Promise<ElementState>;
  /** `null` when the attribute is absent. */
  getAttribute(target: ElementTarget, name: string, timeoutMs: number): Promise<string | null>;
  /** Rendered text of the target, or of the page body when `target` is null. */
  innerText(target: ElementTarget | null, timeoutMs: number): Promise<string>;
  snapshot(): Promise<RawFrameSnapshot[]>;
  screenshot(): Promise<Buffer>;
  /** Console entries since the previous drain. */
  drainConsole(): ConsoleEntry[];
  currentUrl(): string;
  close(): Promise<void>;
}
