export type JsonTextShape = 'object' | 'array';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

function extractFirstJsonSlice(
  text: string,
  shape: JsonTextShape,
): string | null {
  if (text.length === 0) {
    return null;
  }

  const fenced = text.match(FENCED_BLOCK);
  const source = fenced ? fenced[1] : text;

  const regex = shape === 'array' ? /\[[\s\S]*\]/ : /\{[\s\S]*\}/;
  const match = source.match(regex);
  return match ? match[0] : null;
}

/**
 * Best-effort JSON parsing from model output.
 *
 * Models sometimes wrap JSON in a markdown fence or a sentence of prose, so
 * the first object/array slice is extracted before `JSON.parse`. Returns
 * `undefined` when nothing parses; never throws.
 */
export function safeJsonParseFromText(
  text: string,
  shape: JsonTextShape,
): unknown {
  const candidates = [text.trim(), extractFirstJsonSlice(text, shape)];

  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    try {
      return JSON.parse(candidate);
    } catch {
      // try the next candidate
    }
  }

  return undefined;
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
