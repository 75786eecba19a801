import { describe, it, expect } from 'vitest';

import type { DOMContextTree } from '../schema/index.js';
import { LOGIN_URL, loginPage } from '../../test/support/dom.js';
import { createJsdomDriver } from '../../test/support/jsdomDriver.js';
import { flattenTree } from '../dom/tree.js';
import { RecorderError } from './errors.js';
import type { ActionPlanner, PlannedAction, PlannerContext } from './planner.js';
import { recordTestCase } from './recordingLoop.js';
import type { RecordingConfig } from './recordingLoop.js';

const noSleep = async (): Promise<void> => {};

const baseConfig: RecordingConfig = {
  url: LOGIN_URL,
  feature: 'Sign in with valid credentials',
  testName: 'sign-in',
  executor: { timeouts: { resolve: 0 }, sleep: noSleep },
  now: () => new Date('2026-01-15T10:00:00.000Z'),
};

type Script = (context: PlannerContext) => PlannedAction;

/** Plays back fixed proposals and keeps what it was shown. */
function scriptedPlanner(script: readonly Script[]): ActionPlanner & { seen: PlannerContext[] } {
  const seen: PlannerContext[] = [];
  return {
    seen,
    async next(context) {
      const turn = script[seen.length];
      // History is the recorder's live list; keep it as it was at this turn.
      seen.push({ ...context, history: [...context.history] });
      return turn ? turn(context) : { done: true, reason: 'script finished' };
    },
  };
}

function idOf(tree: DOMContextTree, predicate: (attrs: Record<string, string>) => boolean): string {
  const node = flattenTree(tree).find((n) => predicate(n.descriptor.attributes));
  if (!node) throw new Error('element missing from the page');
  return node.id;
}

function act(
  action: Extract<PlannedAction, { done: false }>,
  pick: ((attrs: Record<string, string>) => boolean) | null,
): Script {
  return (context) => ({
    ...action,
    element_id: pick ? idOf(context.tree, pick) : null,
  });
}

const typeUsername = act(
  { done: false, action: 'type', element_id: null, description: 'Type the username', parameters: { text: 'student' }, wait_after_secs: 0 },
  (a) => a['id'] === 'username',
);
const typePassword = act(
  { done: false, action: 'type', element_id: null, description: 'Type the password', parameters: { text: 'Password123' }, wait_after_secs: 0 },
  (a) => a['id'] === 'password',
);
const submit = act(
  { done: false, action: 'click', element_id: null, description: 'Submit the form', parameters: {}, wait_after_secs: 0 },
  (a) => a['id'] === 'submit',
);
const checkWelcome = act(
  {
    done: false,
    action: 'assert_text_contains',
    element_id: null,
    description: 'The welcome message is shown',
    parameters: { expected_text: 'Congratulations student' },
    wait_after_secs: 0,
  },
  (a) => a['class'] === 'welcome',
);
const missingElement: Script = () => ({
  done: false,
  action: 'click',
  element_id: '9:99',
  description: 'Click something that is not there',
  parameters: {},
  wait_after_secs: 0,
});

function loginDriver() {
  return createJsdomDriver({ [LOGIN_URL]: loginPage() });
}

describe('recordTestCase', () => {
  it('records a sign-in flow step by step', async () => {
    const planner = scriptedPlanner([typeUsername, typePassword, submit, checkWelcome]);
    const testCase = await recordTestCase(planner, loginDriver(), baseConfig);

    expect(testCase.test_name).toBe('sign-in');
    expect(testCase.recorded_at).toBe('2026-01-15T10:00:00.000Z');
    expect(testCase.steps.map((s) => [s.step_id, s.action, s.selector])).toEqual([
      [1, 'navigate', null],
      [2, 'type', '#username'],
      [3, 'type', '#password'],
      [4, 'click', '#submit'],
      [5, 'assert_text_contains', 'xpath=//p[normalize-space(.)="Congratulations student. You successfully logged in!"]'],
    ]);
    expect(testCase.steps[0]?.parameters).toEqual({ url: LOGIN_URL });
  });

  it('shows the planner what has been recorded so far', async () => {
    const planner = scriptedPlanner([typeUsername]);
    await recordTestCase(planner, loginDriver(), baseConfig);

    expect(planner.seen.map((c) => c.history.length)).toEqual([1, 2]);
    expect(planner.seen[0]?.url).toBe(LOGIN_URL);
    expect(planner.seen[0]?.feature).toBe('Sign in with valid credentials');
  });

  it('feeds a rejected proposal back and carries on', async () => {
    const planner = scriptedPlanner([missingElement, typeUsername]);
    const testCase = await recordTestCase(planner, loginDriver(), baseConfig);

    expect(planner.seen[1]?.lastFailure).toBe('element id 9:99 does not exist on the current page');
    expect(planner.seen[2]?.lastFailure).toBeNull();
    expect(testCase.steps).toHaveLength(2);
  });

  it('discards a step that fails when replayed', async () => {
    const clickHiddenError = act(
      { done: false, action: 'click', element_id: null, description: 'Click the error', parameters: {}, wait_after_secs: 0 },
      (a) => a['id'] === 'error',
    );
    const planner = scriptedPlanner([clickHiddenError, typeUsername]);
    const testCase = await recordTestCase(planner, loginDriver(), baseConfig);

    expect(planner.seen[1]?.lastFailure).toBe(
      'step "Click the error" failed: selector unresolved after healing',
    );
    expect(testCase.steps.map((s) => s.description)).toEqual([
      `Navigate to ${LOGIN_URL}`,
      'Type the username',
    ]);
  });

  it('gives up after repeated failures', async () => {
    const planner = scriptedPlanner([missingElement, missingElement, missingElement]);
    await expect(recordTestCase(planner, loginDriver(), baseConfig)).rejects.toThrow(
      'Recording gave up after 3 failed proposals: element id 9:99 does not exist on the current page',
    );
  });

  it('stops at the step limit', async () => {
    const planner = scriptedPlanner([typeUsername, typePassword, submit]);
    const testCase = await recordTestCase(planner, loginDriver(), { ...baseConfig, maxSteps: 2 });
    expect(testCase.steps.map((s) => s.action)).toEqual(['navigate', 'type']);
    expect(planner.seen).toHaveLength(1);
  });

  it('fails when the start page cannot be opened', async () => {
    const planner = scriptedPlanner([]);
    const error = await recordTestCase(planner, createJsdomDriver({}), baseConfig).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(RecorderError);
    expect(error).toHaveProperty(
      'message',
      `Could not open ${LOGIN_URL}: navigate to ${LOGIN_URL} timed out after 30000ms`,
    );
  });
});
