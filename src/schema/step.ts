import { z } from 'zod';

import { elementDescriptorSchema, selectorCandidateSchema } from './descriptor.js';

// ── Action discriminator ──────────────────────────────────────

export const stepActionSchema = z.enum([
  'navigate',
  'type',
  'click',
  'select',
  'check',
  'uncheck',
  'assert_text_contains',
  'assert_text_equals',
  'assert_visible',
  'assert_hidden',
  'assert_passed_verification',
  'assert_checked',
  'assert_not_checked',
  'assert_enabled',
  'assert_disabled',
  'assert_attribute_equals',
  'assert_element_count',
  'wait_for_load_state',
  'wait_for_selector',
]);

export type StepAction = z.infer<typeof stepActionSchema>;

export const loadStateSchema = z.enum(['load', 'domcontentloaded', 'networkidle']);

export type LoadState = z.infer<typeof loadStateSchema>;

export const selectorStateSchema = z.enum(['attached', 'detached', 'visible', 'hidden']);

export type SelectorState = z.infer<typeof selectorStateSchema>;

// ── Shared fields ─────────────────────────────────────────────

const baseFields = {
  step_id: z.number().int().positive(),
  description: z.string().min(1),
  wait_after_secs: z.number().nonnegative(),
  frame: z.string().nullable().optional(),
  fallback_selectors: z.array(selectorCandidateSchema).optional(),
  target: elementDescriptorSchema.nullable().optional(),
};

const noParameters = z.object({}).strict();
const elementSelector = z.string().min(1);
const optionalSelector = z.string().min(1).nullable();

// ── Individual step schemas ───────────────────────────────────

export const navigateStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('navigate'),
    parameters: z.object({ url: z.string().min(1) }).strict(),
    selector: z.null(),
  })
  .strict();

export const typeStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('type'),
    parameters: z.object({ text: z.string() }).strict(),
    selector: elementSelector,
  })
  .strict();

export const clickStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('click'),
    parameters: noParameters,
    selector: elementSelector,
  })
  .strict();

export const selectParametersSchema = z
  .object({
    option_label: z.string().optional(),
    option_value: z.string().optional(),
    option_index: z.number().int().nonnegative().optional(),
  })
  .strict()
  .refine(
    (p) =>
      p.option_label !== undefined ||
      p.option_value !== undefined ||
      p.option_index !== undefined,
    { message: 'select needs option_label, option_value or option_index' },
  );

export type SelectParameters = z.infer<typeof selectParametersSchema>;

export const selectStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('select'),
    parameters: selectParametersSchema,
    selector: elementSelector,
  })
  .strict();

export const checkStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('check'),
    parameters: noParameters,
    selector: elementSelector,
  })
  .strict();

export const uncheckStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('uncheck'),
    parameters: noParameters,
    selector: elementSelector,
  })
  .strict();

export const assertTextContainsStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('assert_text_contains'),
    parameters: z.object({ expected_text: z.string().min(1) }).strict(),
    selector: optionalSelector,
  })
  .strict();

export const assertTextEqualsStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('assert_text_equals'),
    parameters: z.object({ expected_text: z.string() }).strict(),
    selector: elementSelector,
  })
  .strict();

export const assertVisibleStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('assert_visible'),
    parameters: noParameters,
    selector: optionalSelector,
  })
  .strict();

export const assertHiddenStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('assert_hidden'),
    parameters: noParameters,
    selector: elementSelector,
  })
  .strict();

export const assertPassedVerificationStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('assert_passed_verification'),
    parameters: noParameters,
    selector: z.null(),
  })
  .strict();

const elementStateAssertion = <A extends string>(action: A) =>
  z
    .object({
      ...baseFields,
      action: z.literal(action),
      parameters: noParameters,
      selector: elementSelector,
    })
    .strict();

export const assertCheckedStepSchema = elementStateAssertion('assert_checked');
export const assertNotCheckedStepSchema = elementStateAssertion('assert_not_checked');
export const assertEnabledStepSchema = elementStateAssertion('assert_enabled');
export const assertDisabledStepSchema = elementStateAssertion('assert_disabled');

export const assertAttributeEqualsStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('assert_attribute_equals'),
    parameters: z
      .object({ attribute_name: z.string().min(1), expected_value: z.string() })
      .strict(),
    selector: elementSelector,
  })
  .strict();

/** Counts every match of the selector, visible or not. Never healed. */
export const assertElementCountStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('assert_element_count'),
    parameters: z.object({ expected_count: z.number().int().nonnegative() }).strict(),
    selector: elementSelector,
  })
  .strict();

export const waitForLoadStateStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('wait_for_load_state'),
    parameters: z.object({ state: loadStateSchema }).strict(),
    selector: z.null(),
  })
  .strict();

export const waitForSelectorStepSchema = z
  .object({
    ...baseFields,
    action: z.literal('wait_for_selector'),
    parameters: z
      .object({
        state: selectorStateSchema.optional(),
        timeout_ms: z.number().int().positive().optional(),
      })
      .strict(),
    selector: elementSelector,
  })
  .strict();

// ── Union schema ──────────────────────────────────────────────

export const stepSchema = z.discriminatedUnion('action', [
  navigateStepSchema,
  typeStepSchema,
  clickStepSchema,
  selectStepSchema,
  checkStepSchema,
  uncheckStepSchema,
  assertTextContainsStepSchema,
  assertTextEqualsStepSchema,
  assertVisibleStepSchema,
  assertHiddenStepSchema,
  assertPassedVerificationStepSchema,
  assertCheckedStepSchema,
  assertNotCheckedStepSchema,
  assertEnabledStepSchema,
  assertDisabledStepSchema,
  assertAttributeEqualsStepSchema,
  assertElementCountStepSchema,
  waitForLoadStateStepSchema,
  waitForSelectorStepSchema,
]);

export type Step = z.infer<typeof stepSchema>;

export type NavigateStep = z.infer<typeof navigateStepSchema>;
export type TypeStep = z.infer<typeof typeStepSchema>;
export type ClickStep = z.infer<typeof clickStepSchema>;
export type SelectStep = z.infer<typeof selectStepSchema>;
export type AssertTextContainsStep = z.infer<typeof assertTextContainsStepSchema>;
export type AssertPassedVerificationStep = z.infer<typeof assertPassedVerificationStepSchema>;
export type WaitForLoadStateStep = z.infer<typeof waitForLoadStateStepSchema>;
export type WaitForSelectorStep = z.infer<typeof waitForSelectorStepSchema>;

/** Fields every recorded step carries, whatever its action. */
export type StepBase = Omit<Step, 'action' | 'parameters' | 'selector'>;

// ── Action traits ─────────────────────────────────────────────

const ELEMENT_ACTIONS: ReadonlySet<StepAction> = new Set([
  'type',
  'click',
  'select',
  'check',
  'uncheck',
  'wait_for_selector',
]);

const ASSERTION_ACTIONS: ReadonlySet<StepAction> = new Set([
  'assert_text_contains',
  'assert_text_equals',
  'assert_visible',
  'assert_hidden',
  'assert_passed_verification',
  'assert_checked',
  'assert_not_checked',
  'assert_enabled',
  'assert_disabled',
  'assert_attribute_equals',
  'assert_element_count',
]);

/** Actions that always act on a resolved element. */
export function isElementAction(action: StepAction): boolean {
  return ELEMENT_ACTIONS.has(action);
}

export function isAssertion(action: StepAction): boolean {
  return ASSERTION_ACTIONS.has(action);
}

// ── TestCase ──────────────────────────────────────────────────

export const testCaseSchema = z
  .object({
    test_name: z.string().min(1),
    feature_description: z.string(),
    recorded_at: z.string().datetime({ offset: true }),
    steps: z.array(stepSchema),
  })
  .strict()
  .superRefine((testCase, ctx) => {
    testCase.steps.forEach((step, index) => {
      if (step.step_id !== index + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', index, 'step_id'],
          message: `step_id must be ${String(index + 1)} (contiguous from 1), got ${String(step.step_id)}`,
        });
      }
    });
  });

export type TestCase = z.infer<typeof testCaseSchema>;

// ── Parser / serializer ───────────────────────────────────────

export function parseTestCase(data: unknown): TestCase {
  return testCaseSchema.parse(data);
}

export function parseTestCaseJSON(raw: string): TestCase {
  const parsed: unknown = JSON.parse(raw);
  return parseTestCase(parsed);
}

export function parseStep(data: unknown): Step {
  return stepSchema.parse(data);
}

/**
 * Canonical JSON form of a test case. Key order follows the schema, so
 * `serializeTestCase(parseTestCaseJSON(serializeTestCase(t)))` is stable.
 */
export function serializeTestCase(testCase: TestCase): string {
  return JSON.stringify(testCaseSchema.parse(testCase), null, 2);
}
