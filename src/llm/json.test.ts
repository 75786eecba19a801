import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { extractJSON, parseModelJSON, renderTemplate } from './json.js';

describe('extractJSON', () => {
  it('takes the body of a fenced block', () => {
    expect(extractJSON('Sure:\n```json\n{"a": 1}\n```\nDone.')).toBe('{"a": 1}');
  });

  it('takes the outermost object from surrounding prose', () => {
    expect(extractJSON('The answer is {"a": {"b": 2}} as requested')).toBe('{"a": {"b": 2}}');
  });

  it('returns trimmed text when there is no object', () => {
    expect(extractJSON('  nothing here  ')).toBe('nothing here');
  });
});

describe('parseModelJSON', () => {
  const schema = z.object({ verdict: z.enum(['pass', 'fail']) });

  it('validates the extracted object', () => {
    expect(parseModelJSON('{"verdict":"pass"}', schema)).toEqual({ ok: true, value: { verdict: 'pass' } });
  });

  it('reports malformed JSON', () => {
    const result = parseModelJSON('{"verdict":', schema);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatch(/^Invalid JSON: /);
  });

  it('reports schema violations', () => {
    expect(parseModelJSON('{"verdict":"maybe"}', schema).ok).toBe(false);
  });
});

describe('renderTemplate', () => {
  it('fills known placeholders and leaves unknown ones', () => {
    expect(renderTemplate('{{a}} and {{b}}', { a: 'x' })).toBe('x and {{b}}');
  });

  it('does not expand placeholders inside values', () => {
    expect(renderTemplate('{{a}}', { a: '{{b}}', b: 'no' })).toBe('{{b}}');
  });
});
