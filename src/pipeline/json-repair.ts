// src/pipeline/json-repair.ts

/**
 * Best-effort recovery of structured output from free-form model text.
 *
 * Models are asked for bare JSON but regularly wrap it in prose or
 * ```json fences. These helpers find the first balanced object/array and
 * decode it. They never guess at broken JSON: a truncated or malformed
 * candidate is reported as a failure, and callers decide whether that is
 * terminal (reply generation) or recoverable (tags, rebuttal, evaluation).
 */

export type JsonExtraction<T> =
  | { ok: true; value: T; source: string }
  | { ok: false; reason: 'not_found' | 'unbalanced' | 'invalid_json' | 'wrong_shape' };

const FENCE_LINE = /^\s*```[\w-]*\s*$/gm;

/** Remove ``` / ```json fence lines, keeping whatever sits between them. */
export function stripCodeFences(text: string): string {
  return text.replace(FENCE_LINE, '').replace(/```/g, '').trim();
}

/**
 * End index (inclusive) of the balanced span opening at `start`, or -1.
 * Brackets inside JSON strings are ignored.
 */
function balancedEnd(text: string, start: number, open: string, close: string): number {
  let depth = 0;
  let inStr = false;
  let esc = false;

  for (let j = start; j < text.length; j++) {
    const ch = text[j];
    if (inStr) {
      if (esc) esc = false;
      else if (ch === '\\') esc = true;
      else if (ch === '"') inStr = false;
      continue;
    }
    if (ch === '"') {
      inStr = true;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return j;
    }
  }
  return -1;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode the first top-level `{…}` object in `text`.
 * Only the first opening brace is considered: an object that fails to
 * decode is not skipped in favour of a later one.
 */
export function extractJsonObject(text: string): JsonExtraction<Record<string, unknown>> {
  const cleaned = stripCodeFences(text);
  const start = cleaned.indexOf('{');
  if (start === -1) return { ok: false, reason: 'not_found' };

  const end = balancedEnd(cleaned, start, '{', '}');
  if (end === -1) return { ok: false, reason: 'unbalanced' };

  const source = cleaned.slice(start, end + 1);
  let value: unknown;
  try {
    value = JSON.parse(source);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }
  if (!isPlainObject(value)) return { ok: false, reason: 'wrong_shape' };
  return { ok: true, value, source };
}

/**
 * Decode the first well-formed `[…]` array in `text`, trying each opening
 * bracket in turn (prose such as "[note]" before the real list is skipped).
 */
export function extractJsonArray(text: string): JsonExtraction<unknown[]> {
  const cleaned = stripCodeFences(text);
  let sawCandidate = false;

  for (let start = cleaned.indexOf('['); start !== -1; start = cleaned.indexOf('[', start + 1)) {
    sawCandidate = true;
    const end = balancedEnd(cleaned, start, '[', ']');
    if (end === -1) continue;
    const source = cleaned.slice(start, end + 1);
    try {
      const value: unknown = JSON.parse(source);
      if (Array.isArray(value)) return { ok: true, value, source };
    } catch {
      // next candidate
    }
  }
  return { ok: false, reason: sawCandidate ? 'invalid_json' : 'not_found' };
}
