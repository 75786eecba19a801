import { chromium, errors } from 'playwright';
import type { Frame, Locator, Page } from 'playwright';

import type { ConsoleEntry, LoadState, SelectParameters } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import { ActionTimeoutError, FatalBrowserError, errorMessage } from '../core/errors.js';
import { collectFrameSnapshot, readElementState } from '../dom/snapshot.js';
import type { RawElementNode, RawFrameSnapshot, SnapshotOptions } from '../dom/snapshot.js';
import * as log from '../utils/logger.js';
import { attachCapture } from './capture.js';
import type { BrowserDriver, ElementProbe, ElementState, ElementTarget } from './driver.js';

// ── Public types ─────────────────────────────────────────────

export interface RunnerConfig {
  headless: boolean;
  viewport?: { width: number; height: number } | undefined;
}

export interface BrowserSession extends BrowserDriver {
  readonly page: Page;
}

// ── Constants ────────────────────────────────────────────────

const DEFAULT_VIEWPORT = { width: 1280, height: 800 };

const SNAPSHOT_OPTIONS: SnapshotOptions = {
  layout: true,
  maxTextChars: LIMITS.MAX_TEXT_CHARS,
  maxAttributeChars: LIMITS.MAX_ATTRIBUTE_CHARS,
};

const CLOSED_PATTERN = /Target (page, context or browser )?(has been )?closed|Browser has been closed/i;

// ── Session launcher ─────────────────────────────────────────

/** One browser process, one context, one page. Close it on every exit path. */
export async function launchSession(config: RunnerConfig): Promise<BrowserSession> {
  const browser = await chromium.launch({ headless: config.headless });
  const context = await browser.newContext({
    viewport: config.viewport ?? DEFAULT_VIEWPORT,
  });
  const page = await context.newPage();
  const capture = attachCapture(page);

  function frameFor(key: string | null): Frame {
    if (key === null) return page.mainFrame();
    const frame = page.frames().find((f) => frameKey(page, f) === key);
    if (!frame) throw new FatalBrowserError(`frame not found: ${key}`);
    return frame;
  }

  function locate(target: ElementTarget): Locator {
    return frameFor(target.frame).locator(target.selector);
  }

  return {
    page,

    async navigate(url: string, timeoutMs: number): Promise<void> {
      await guard(`navigate to ${url}`, timeoutMs, async () => {
        await page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
      });
    },

    async waitForLoadState(state: LoadState, timeoutMs: number): Promise<void> {
      await guard(`wait for ${state}`, timeoutMs, async () => {
        await page.waitForLoadState(state, { timeout: timeoutMs });
      });
    },

    async query(target: ElementTarget): Promise<ElementProbe[]> {
      return guard(`query ${target.selector}`, 0, async () => {
        const locator = locate(target);
        const total = await locator.count();
        const probes: ElementProbe[] = [];
        for (let i = 0; i < total; i++) {
          const match = locator.nth(i);
          probes.push({
            visible: await match.isVisible(),
            text: ((await match.textContent()) ?? '').replace(/\s+/g, ' ').trim(),
          });
        }
        return probes;
      });
    },

    async click(target: ElementTarget, timeoutMs: number): Promise<void> {
      await guard(`click ${target.selector}`, timeoutMs, async () => {
        await locate(target).click({ timeout: timeoutMs });
      });
    },

    async fill(target: ElementTarget, text: string, timeoutMs: number): Promise<void> {
      await guard(`fill ${target.selector}`, timeoutMs, async () => {
        await locate(target).fill(text, { timeout: timeoutMs });
      });
    },

    async selectOption(
      target: ElementTarget,
      option: SelectParameters,
      timeoutMs: number,
    ): Promise<void> {
      await guard(`select in ${target.selector}`, timeoutMs, async () => {
        await locate(target).selectOption(
          {
            ...(option.option_label !== undefined ? { label: option.option_label } : {}),
            ...(option.option_value !== undefined ? { value: option.option_value } : {}),
            ...(option.option_index !== undefined ? { index: option.option_index } : {}),
          },
          { timeout: timeoutMs },
        );
      });
    },

    async setChecked(
      target: ElementTarget,
      checked: boolean,
      timeoutMs: number,
    ): Promise<void> {
      await guard(`set checked on ${target.selector}`, timeoutMs, async () => {
        await locate(target).setChecked(checked, { timeout: timeoutMs });
      });
    },

    async elementState(target: ElementTarget, timeoutMs: number): Promise<ElementState> {
      return guard(`read state of ${target.selector}`, timeoutMs, async () =>
        locate(target).evaluate(readElementState, undefined, { timeout: timeoutMs }),
      );
    },

    async getAttribute(
      target: ElementTarget,
      name: string,
      timeoutMs: number,
    ): Promise<string | null> {
      return guard(`read ${name} of ${target.selector}`, timeoutMs, async () =>
        locate(target).getAttribute(name, { timeout: timeoutMs }),
      );
    },

    async innerText(target: ElementTarget | null, timeoutMs: number): Promise<string> {
      const label = target ? target.selector : 'body';
      return guard(`read text of ${label}`, timeoutMs, async () => {
        const locator = target ? locate(target) : page.locator('body');
        return locator.innerText({ timeout: timeoutMs });
      });
    },

    async snapshot(): Promise<RawFrameSnapshot[]> {
      const out: RawFrameSnapshot[] = [];
      for (const frame of page.frames()) {
        const key = frameKey(page, frame);
        try {
          out.push({ frame: key, url: frame.url(), root: await snapshotFrame(frame) });
        } catch (err) {
          if (key === null) throw translate(err, 'snapshot', 0);
          // Child frames detach mid-capture; the rest of the page is still usable.
          log.warn(`Skipped frame ${key}: ${errorMessage(err)}`);
        }
      }
      return out;
    },

    async screenshot(): Promise<Buffer> {
      return guard('screenshot', 0, () => page.screenshot({ fullPage: true }));
    },

    drainConsole(): ConsoleEntry[] {
      return capture.flush();
    },

    currentUrl(): string {
      return page.url();
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}

/** Run `fn` against a fresh session; the browser is closed whatever happens. */
export async function withSession<T>(
  config: RunnerConfig,
  fn: (session: BrowserSession) => Promise<T>,
): Promise<T> {
  const session = await launchSession(config);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

// ── Frames ───────────────────────────────────────────────────

function frameKey(page: Page, frame: Frame): string | null {
  if (frame === page.mainFrame()) return null;
  return frame.name() || frame.url();
}

async function snapshotFrame(frame: Frame): Promise<RawElementNode | null> {
  const handle = await frame.evaluateHandle(() => document);
  try {
    return await handle.evaluate(collectFrameSnapshot, SNAPSHOT_OPTIONS);
  } finally {
    await handle.dispose();
  }
}

// ── Error translation ────────────────────────────────────────

async function guard<T>(
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw translate(err, operation, timeoutMs);
  }
}

function translate(err: unknown, operation: string, timeoutMs: number): Error {
  if (err instanceof ActionTimeoutError || err instanceof FatalBrowserError) return err;
  if (err instanceof errors.TimeoutError) {
    return new ActionTimeoutError(
      `${operation} timed out after ${String(timeoutMs)}ms`,
      timeoutMs,
    );
  }
  const message = errorMessage(err);
  if (CLOSED_PATTERN.test(message)) {
    return new FatalBrowserError(`${operation}: ${message}`);
  }
  return err instanceof Error ? err : new Error(message);
}
