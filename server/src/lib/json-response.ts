/**
 * Helpers for turning a model's text completion into a JSON value.
 */

const FENCE_OPEN_RE = /^`{3,}[ \t]*(?:[A-Za-z][\w+.-]*)?[ \t]*\r?\n?/;
const FENCE_CLOSE_RE = /\r?\n?[ \t]*`{3,}$/;

/**
 * Remove a surrounding markdown code fence (```json ... ```), including the
 * optional language tag, and trim. Text without a leading fence is returned
 * trimmed and otherwise untouched.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  return trimmed.replace(FENCE_OPEN_RE, '').replace(FENCE_CLOSE_RE, '').trim();
}

export type JsonParseResult =
  | { ok: true; data: unknown }
  | { ok: false; reason: string };

export function parseJson(text: string): JsonParseResult {
  try {
    const data: unknown = JSON.parse(text);
    return { ok: true, data };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}
