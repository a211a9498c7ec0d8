/**
 * Response Parser
 *
 * Pulls one JSON object out of a model reply. Replies arrive as bare JSON,
 * fenced JSON (```json ... ```), or JSON wrapped in a sentence or two.
 */

import { MalformedResponse, err, ok, type Result } from '../errors';

export type JsonObject = { [key: string]: unknown };

const LEADING_FENCE = /^```[a-zA-Z0-9_-]*[ \t]*\r?\n?/;
const TRAILING_FENCE = /\r?\n?```$/;
const EMBEDDED_FENCE = /```[a-zA-Z0-9_-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```/;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Remove a code fence wrapping the whole reply.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();
}

type Decoded = { ok: true; value: unknown } | { ok: false };

function decode(candidate: string): Decoded {
  try {
    const value: unknown = JSON.parse(candidate);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Prose fallbacks, used only when the unfenced reply is not JSON at all: a
 * fenced block inside surrounding prose, then the span from the first "{"
 * to the last "}".
 */
function proseCandidates(text: string, stripped: string): string[] {
  const found: string[] = [];

  const fenced = EMBEDDED_FENCE.exec(text);
  if (fenced?.[1] !== undefined) {
    found.push(fenced[1].trim());
  }

  const start = stripped.indexOf('{');
  const end = stripped.lastIndexOf('}');
  if (start !== -1 && end > start) {
    found.push(stripped.slice(start, end + 1));
  }

  return found;
}

export function parseJsonObject(text: string): Result<JsonObject> {
  if (typeof text !== 'string' || text.trim() === '') {
    return err(new MalformedResponse('Model reply is empty', ''));
  }

  const stripped = stripCodeFence(text);
  const whole = decode(stripped);
  if (whole.ok) {
    // Valid JSON that is not an object (array, primitive, null) is malformed
    return isJsonObject(whole.value)
      ? ok(whole.value)
      : err(new MalformedResponse('Model reply is JSON but not an object', text));
  }

  for (const candidate of proseCandidates(text, stripped)) {
    const decoded = decode(candidate);
    if (decoded.ok && isJsonObject(decoded.value)) {
      return ok(decoded.value);
    }
  }

  return err(new MalformedResponse('Model reply does not contain a JSON object', text));
}

/**
 * Parse a model reply into an object, or {} when there is none.
 */
export function parseResponse(text: string): JsonObject {
  const result = parseJsonObject(text);
  return result.ok ? result.value : {};
}
