import { describe, it, expect } from 'vitest';

import { byId, loginPage, treeFromHtml } from '../../test/support/dom.js';
import { synthesizeSelectors } from '../dom/selectors.js';
import { RecorderError } from './errors.js';
import { StepRecorder } from './recorder.js';

const RECORDED_AT = new Date('2026-01-15T10:00:00.000Z');

function newRecorder(): StepRecorder {
  return new StepRecorder({
    testName: 'sign-in',
    featureDescription: 'Sign in with valid credentials',
    recordedAt: RECORDED_AT,
  });
}

describe('StepRecorder', () => {
  const tree = treeFromHtml(loginPage(), 'https://app.test/login');
  const username = byId(tree, 'username').descriptor;
  const candidates = synthesizeSelectors(username, tree);

  it('numbers steps from one and picks the best selector', () => {
    const recorder = newRecorder();
    recorder.record({
      action: 'navigate',
      description: 'Open the sign-in page',
      parameters: { url: 'https://app.test/login' },
      target: null,
      candidates: [],
    });
    const typed = recorder.record({
      action: 'type',
      description: 'Type the username',
      parameters: { text: 'student' },
      target: username,
      candidates: [...candidates].reverse(),
    });

    expect(typed.step_id).toBe(2);
    expect(typed.selector).toBe('#username');
    expect(typed.fallback_selectors?.map((c) => c.selector)).toEqual([
      'input[name="username"]',
      'xpath=/html/body/main/form/div[1]/input',
    ]);
    expect(typed.target).toEqual(username);
    expect(typed.frame).toBeNull();
  });

  it('freezes recorded steps', () => {
    const recorder = newRecorder();
    const step = recorder.record({
      action: 'click',
      description: 'Submit',
      parameters: {},
      target: username,
      candidates,
    });
    expect(Object.isFrozen(step)).toBe(true);
    expect(Object.isFrozen(step.fallback_selectors)).toBe(true);
  });

  it('refuses an element action without a selector', () => {
    const recorder = newRecorder();
    expect(() =>
      recorder.record({
        action: 'click',
        description: 'Click nothing',
        parameters: {},
        target: username,
        candidates: [],
      }),
    ).toThrow(RecorderError);
    expect(recorder.size).toBe(0);
  });

  it('records a visual-only assertion without a selector', () => {
    const chartTree = treeFromHtml('<html><body><canvas></canvas></body></html>');
    const canvas = chartTree.frames[0]?.root?.children[0]?.children[0]?.descriptor;
    expect(canvas?.classification).toBe('visual-only');

    const recorder = newRecorder();
    const step = recorder.record({
      action: 'assert_visible',
      description: 'The chart is drawn',
      parameters: {},
      target: canvas ?? null,
      candidates: [],
    });
    expect(step.selector).toBeNull();
    expect(step.fallback_selectors).toEqual([]);
  });

  it('turns schema violations into recorder errors', () => {
    const recorder = newRecorder();
    expect(() =>
      recorder.record({
        action: 'type',
        description: 'Type',
        parameters: {},
        target: username,
        candidates,
      }),
    ).toThrow(/invalid type step: parameters\.text/);
  });

  it('discards the last step and keeps numbering contiguous', () => {
    const recorder = newRecorder();
    const nav = {
      action: 'navigate' as const,
      description: 'Open',
      parameters: { url: 'https://app.test/login' },
      target: null,
      candidates: [],
    };
    recorder.record(nav);
    recorder.record(nav);
    expect(recorder.discardLast()?.step_id).toBe(2);
    expect(recorder.record(nav).step_id).toBe(2);

    const testCase = recorder.toTestCase();
    expect(testCase.recorded_at).toBe('2026-01-15T10:00:00.000Z');
    expect(testCase.steps.map((s) => s.step_id)).toEqual([1, 2]);
  });
});
