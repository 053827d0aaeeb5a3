/**
 * Locating the JSON object in a completion reply.
 *
 * JSON mode normally yields a bare object. Some providers still fence it,
 * lead with a sentence, or stop mid-object when they hit their token limit.
 */

import { isRecord } from "./config.js";

export type JsonObjectParse = { ok: true; value: Record<string, unknown> } | { ok: false; reason: string };

const FENCE = /```[a-z]*[ \t]*\r?\n?([\s\S]*?)```/gi;

/** Bodies of fenced blocks, or the whole reply when it has none. */
function unfence(text: string): string[] {
  const bodies = [...text.matchAll(FENCE)].map((m) => (m[1] ?? "").trim());
  return bodies.length > 0 ? bodies : [text.trim()];
}

interface ObjectSpan {
  start: number;
  /** Undefined when the text ends before the object closes. */
  end: number | undefined;
}

/**
 * Top-level `{...}` spans. Strings are only tracked inside an object, so
 * quotes in surrounding prose do not matter. Brackets are matched as a
 * stack; a mismatch abandons the span and scanning resumes after its brace.
 */
function objectSpans(text: string): ObjectSpan[] {
  const spans: ObjectSpan[] = [];
  const closers: string[] = [];
  let start = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (closers.length === 0) {
      if (ch === "{") {
        start = i;
        closers.push("}");
      }
      continue;
    }
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") closers.push("}");
    else if (ch === "[") closers.push("]");
    else if (ch === "}" || ch === "]") {
      if (closers[closers.length - 1] !== ch) {
        closers.length = 0;
        i = start;
        continue;
      }
      closers.pop();
      if (closers.length === 0) spans.push({ start, end: i + 1 });
    }
  }

  if (closers.length > 0) spans.push({ start, end: undefined });
  return spans;
}

function asObject(candidate: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return undefined;
  }
  return isRecord(parsed) ? parsed : undefined;
}

/** The whole body when it is an object, else the first complete object inside it. */
export function parseJsonObject(text: string): JsonObjectParse {
  let truncated = false;
  for (const body of unfence(text)) {
    if (body.length === 0) continue;
    const whole = asObject(body);
    if (whole) return { ok: true, value: whole };

    for (const span of objectSpans(body)) {
      if (span.end === undefined) {
        truncated = true;
        continue;
      }
      const value = asObject(body.slice(span.start, span.end));
      if (value) return { ok: true, value };
    }
  }
  return {
    ok: false,
    reason: truncated ? "content ends inside an unterminated JSON object" : "content is not a JSON object",
  };
}
