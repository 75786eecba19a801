import type { ZodType, ZodTypeDef } from 'zod';

// ── JSON extraction + validation ─────────────────────────────

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/** Strip markdown fences and surrounding prose from a model reply. */
export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

export function parseModelJSON<T>(
  raw: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ParseResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: result.error.message };
  }
  return { ok: true, value: result.data };
}

/** Fill `{{name}}` placeholders; unknown placeholders are left as they are. */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, name: string) => values[name] ?? match);
}
