import { describe, it, expect, vi } from 'vitest';

import type { Step } from '../schema/index.js';
import { parseStep } from '../schema/index.js';
import type { BrowserDriver } from '../browser/driver.js';
import { LOGIN_URL, loginPage } from '../../test/support/dom.js';
import { createJsdomDriver } from '../../test/support/jsdomDriver.js';
import type { JsdomDriver } from '../../test/support/jsdomDriver.js';
import { executeStep } from './executor.js';
import type { EvidenceWriter, ExecutorOptions } from './executor.js';

const noSleep = async (): Promise<void> => {};
const options: ExecutorOptions = { timeouts: { resolve: 0 }, sleep: noSleep };

const memoryWriter: EvidenceWriter = {
  async saveScreenshot(stepId: number): Promise<string> {
    return `memory://step-${String(stepId)}.png`;
  },
};

function step(fields: Record<string, unknown>): Step {
  return parseStep({ step_id: 1, description: 'step', wait_after_secs: 0, parameters: {}, ...fields });
}

async function openLogin(): Promise<JsdomDriver> {
  const driver = createJsdomDriver({ [LOGIN_URL]: loginPage() });
  await driver.navigate(LOGIN_URL, 1000);
  return driver;
}

describe('executeStep: navigation and waits', () => {
  it('reports a page that never loads as a timeout', async () => {
    const driver = createJsdomDriver({});
    const result = await executeStep(
      step({ action: 'navigate', parameters: { url: 'https://nowhere.test/' }, selector: null }),
      driver,
      options,
    );
    expect(result.status).toBe('failed');
    expect(result.failureKind).toBe('action_timeout');
    expect(result.reason).toBe('navigate to https://nowhere.test/ timed out after 30000ms');
    expect(result.evidence).toEqual({ screenshotPath: null, console: [] });
  });

  it('fails an explicit load-state wait that times out', async () => {
    const driver = await openLogin();
    driver.stallLoadState('networkidle');
    const result = await executeStep(
      step({ action: 'wait_for_load_state', parameters: { state: 'networkidle' }, selector: null }),
      driver,
      { ...options, timeouts: { resolve: 0, navigation: 500 } },
    );
    expect(result.failureKind).toBe('action_timeout');
    expect(result.reason).toBe('wait for networkidle timed out after 500ms');
  });

  it('tolerates a page that does not settle after an action', async () => {
    const driver = await openLogin();
    driver.stallLoadState('load');
    const result = await executeStep(
      step({ action: 'click', selector: '#submit' }),
      driver,
      options,
    );
    expect(result.status).toBe('passed');
    expect(result.resolvedSelector).toBe('#submit');
  });

  it('waits after a step, capped by the configured maximum', async () => {
    const driver = await openLogin();
    const sleep = vi.fn(async (_ms: number) => {});
    await executeStep(
      step({ action: 'click', selector: '#submit', wait_after_secs: 2 }),
      driver,
      { ...options, sleep },
    );
    await executeStep(
      step({ action: 'click', selector: '#submit', wait_after_secs: 2 }),
      driver,
      { sleep, timeouts: { resolve: 0, maxPostActionWait: 500 } },
    );
    expect(sleep.mock.calls).toEqual([[2000], [500]]);
  });
});

describe('executeStep: assertions', () => {
  it('searches the visible page text when no element is named', async () => {
    const driver = await openLogin();
    const passed = await executeStep(
      step({ action: 'assert_text_contains', parameters: { expected_text: 'Username' }, selector: null }),
      driver,
      options,
    );
    const failed = await executeStep(
      step({ action: 'assert_text_contains', parameters: { expected_text: 'Congratulations student' }, selector: null }),
      driver,
      options,
    );
    expect(passed.status).toBe('passed');
    expect(failed.failureKind).toBe('assertion_mismatch');
    expect(failed.reason).toBe('expected text "Congratulations student" not found in page body');
  });

  it('compares element text exactly after collapsing whitespace', async () => {
    const driver = await openLogin();
    const passed = await executeStep(
      step({ action: 'assert_text_equals', parameters: { expected_text: '  Submit ' }, selector: '#submit' }),
      driver,
      options,
    );
    const failed = await executeStep(
      step({ action: 'assert_text_equals', parameters: { expected_text: 'Send' }, selector: '#submit' }),
      driver,
      options,
    );
    expect(passed.status).toBe('passed');
    expect(failed.reason).toBe('expected "Send" but #submit reads "Submit"');
  });

  it('checks that an element is hidden', async () => {
    const driver = await openLogin();
    const hidden = await executeStep(
      step({ action: 'assert_hidden', selector: '#error' }),
      driver,
      options,
    );
    const shown = await executeStep(
      step({ action: 'assert_hidden', selector: '#submit' }),
      driver,
      options,
    );
    expect(hidden.status).toBe('passed');
    expect(shown.failureKind).toBe('assertion_mismatch');
    expect(shown.reason).toBe('#submit is still visible (1 visible matches)');
  });

  it('fails a visual check when no judge is configured', async () => {
    const driver = await openLogin();
    const result = await executeStep(
      step({ action: 'assert_passed_verification', selector: null }),
      driver,
      options,
    );
    expect(result.failureKind).toBe('vision_verification_failed');
    expect(result.reason).toBe('no vision judge configured for a visual check');
  });

  it('fails assert_visible on an element that is not shown', async () => {
    const driver = await openLogin();
    const result = await executeStep(
      step({ action: 'assert_visible', selector: '#result' }),
      driver,
      options,
    );
    expect(result.failureKind).toBe('selector_unresolved');
  });
});

const SETTINGS_URL = 'https://app.test/settings';
const SETTINGS_PAGE = `<!DOCTYPE html>
<html><body>
<form id="settings">
<label><input type="checkbox" id="terms" name="terms"> Accept the terms</label>
<label><input type="checkbox" id="news" name="news" checked> Send me news</label>
<button type="button" id="save" disabled>Save</button>
<a id="help" href="/help" target="_blank">Help</a>
<ul><li class="item">One</li><li class="item">Two</li><li class="item" hidden>Three</li></ul>
<p id="status" hidden>Saved</p>
</form>
<script>
document.getElementById('terms').addEventListener('change', function (event) {
  document.getElementById('save').disabled = !event.target.checked;
});
</script>
</body></html>`;

async function openSettings(): Promise<JsdomDriver> {
  const driver = createJsdomDriver({ [SETTINGS_URL]: SETTINGS_PAGE });
  await driver.navigate(SETTINGS_URL, 1000);
  return driver;
}

describe('executeStep: element state assertions', () => {
  it('checks whether a box is checked', async () => {
    const driver = await openSettings();
    const checked = await executeStep(step({ action: 'assert_checked', selector: '#news' }), driver, options);
    const notChecked = await executeStep(
      step({ action: 'assert_not_checked', selector: '#terms' }),
      driver,
      options,
    );
    const wrong = await executeStep(step({ action: 'assert_checked', selector: '#terms' }), driver, options);

    expect(checked.status).toBe('passed');
    expect(notChecked.status).toBe('passed');
    expect(wrong.failureKind).toBe('assertion_mismatch');
    expect(wrong.reason).toBe('#terms is not checked');
  });

  it('sees the state a previous step changed', async () => {
    const driver = await openSettings();
    const disabledBefore = await executeStep(
      step({ action: 'assert_disabled', selector: '#save' }),
      driver,
      options,
    );
    const enabledTooEarly = await executeStep(
      step({ action: 'assert_enabled', selector: '#save' }),
      driver,
      options,
    );
    await executeStep(step({ action: 'check', selector: '#terms' }), driver, options);
    const checked = await executeStep(step({ action: 'assert_checked', selector: '#terms' }), driver, options);
    const enabledAfter = await executeStep(
      step({ action: 'assert_enabled', selector: '#save' }),
      driver,
      options,
    );

    expect(disabledBefore.status).toBe('passed');
    expect(enabledTooEarly.reason).toBe('#save is disabled');
    expect(checked.status).toBe('passed');
    expect(enabledAfter.status).toBe('passed');
  });

  it('heals the target of a state assertion', async () => {
    const driver = await openSettings();
    const result = await executeStep(
      step({
        action: 'assert_checked',
        selector: '#newsletter',
        fallback_selectors: [
          { kind: 'css-attribute', selector: 'input[name="news"]', score: 0.85, frame: null },
        ],
      }),
      driver,
      options,
    );
    expect(result.status).toBe('healed-passed');
    expect(result.resolvedSelector).toBe('input[name="news"]');
  });

  it('compares an attribute value', async () => {
    const driver = await openSettings();
    const equal = await executeStep(
      step({
        action: 'assert_attribute_equals',
        parameters: { attribute_name: 'href', expected_value: '/help' },
        selector: '#help',
      }),
      driver,
      options,
    );
    const different = await executeStep(
      step({
        action: 'assert_attribute_equals',
        parameters: { attribute_name: 'target', expected_value: '_self' },
        selector: '#help',
      }),
      driver,
      options,
    );
    const missing = await executeStep(
      step({
        action: 'assert_attribute_equals',
        parameters: { attribute_name: 'rel', expected_value: 'noopener' },
        selector: '#help',
      }),
      driver,
      options,
    );

    expect(equal.status).toBe('passed');
    expect(different.reason).toBe('expected target="_self" but #help has target="_blank"');
    expect(missing.reason).toBe('#help has no rel attribute');
    expect(missing.failureKind).toBe('assertion_mismatch');
  });

  it('counts every match of a selector, hidden ones included', async () => {
    const driver = await openSettings();
    const exact = await executeStep(
      step({ action: 'assert_element_count', parameters: { expected_count: 3 }, selector: 'li.item' }),
      driver,
      options,
    );
    const off = await executeStep(
      step({ action: 'assert_element_count', parameters: { expected_count: 2 }, selector: 'li.item' }),
      driver,
      options,
    );

    expect(exact.status).toBe('passed');
    expect(exact.resolvedSelector).toBe('li.item');
    expect(off.failureKind).toBe('assertion_mismatch');
    expect(off.reason).toBe('expected 2 matches of li.item but found 3');
  });
});

describe('executeStep: waiting for a selector', () => {
  it('passes once the element reaches the state', async () => {
    const driver = await openSettings();
    const sleep = vi.fn(async (_ms: number) => {
      driver.page().getElementById('status')?.removeAttribute('hidden');
    });
    const result = await executeStep(
      step({
        action: 'wait_for_selector',
        parameters: { state: 'visible', timeout_ms: 5000 },
        selector: '#status',
      }),
      driver,
      { ...options, sleep },
    );

    expect(result.status).toBe('passed');
    expect(sleep.mock.calls).toEqual([[250]]);
  });

  it('accepts an element that is already hidden', async () => {
    const driver = await openSettings();
    const result = await executeStep(
      step({ action: 'wait_for_selector', parameters: { state: 'hidden' }, selector: '#status' }),
      driver,
      options,
    );
    expect(result.status).toBe('passed');
  });

  it('times out when the element never shows', async () => {
    const driver = await openSettings();
    const result = await executeStep(
      step({ action: 'wait_for_selector', parameters: { timeout_ms: 1 }, selector: '#status' }),
      driver,
      options,
    );
    expect(result.failureKind).toBe('action_timeout');
    expect(result.reason).toBe('wait for #status to be visible timed out after 1ms');
  });
});

describe('executeStep: failures and evidence', () => {
  it('captures console output and a screenshot when a step fails', async () => {
    const driver = await openLogin();
    await executeStep(
      step({ action: 'type', parameters: { text: 'bob' }, selector: '#username' }),
      driver,
      options,
    );
    const result = await executeStep(
      step({ step_id: 3, action: 'click', selector: '#submit' }),
      driver,
      { ...options, evidence: memoryWriter },
      { captureEvidence: true },
    );
    expect(result.status).toBe('passed');
    expect(result.evidence).toEqual({
      screenshotPath: 'memory://step-3.png',
      console: ['[error] sign-in rejected for bob'],
    });
  });

  it('keeps only the console output of the current step', async () => {
    const driver = await openLogin();
    await executeStep(step({ action: 'click', selector: '#submit' }), driver, options);
    const result = await executeStep(
      step({ action: 'assert_visible', selector: '#missing' }),
      driver,
      options,
    );
    expect(result.evidence.console).toEqual([]);
  });

  it('records a screenshot failure as a missing path', async () => {
    const driver = await openLogin();
    const broken: BrowserDriver = {
      ...driver,
      screenshot: async () => {
        throw new Error('capture failed');
      },
    };
    const result = await executeStep(
      step({ action: 'assert_visible', selector: '#missing' }),
      broken,
      { ...options, evidence: memoryWriter },
    );
    expect(result.status).toBe('failed');
    expect(result.evidence.screenshotPath).toBeNull();
  });

  it('treats unclassified driver errors as fatal', async () => {
    const driver = await openLogin();
    const broken: BrowserDriver = {
      ...driver,
      click: async () => {
        throw new Error('socket hang up');
      },
    };
    const result = await executeStep(
      step({ step_id: 5, action: 'click', selector: '#submit' }),
      broken,
      options,
    );
    expect(result.failureKind).toBe('fatal_browser_error');
    expect(result.reason).toBe('socket hang up');
    expect(result.stepId).toBe(5);
  });
});
