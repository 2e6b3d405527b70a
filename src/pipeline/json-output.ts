import type { ZodType, ZodTypeDef } from 'zod';

const FENCE_RE = /```(?:json)?\s*\n([\s\S]*?)\n```/;

/**
 * Pulls the JSON object out of a model answer: the first fenced block, or
 * the span from the first `{` to the last `}`. Undefined when nothing
 * parses or the value fails the schema.
 */
export function parseJsonAnswer<T>(text: string, schema: ZodType<T, ZodTypeDef, unknown>): T | undefined {
  const fenced = FENCE_RE.exec(text)?.[1];
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  const candidates = [fenced, start !== -1 && end > start ? text.slice(start, end + 1) : undefined];

  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    let json: unknown;
    try {
      json = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = schema.safeParse(json);
    if (result.success) return result.data;
  }
  return undefined;
}
