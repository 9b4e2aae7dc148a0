/**
 * Tolerant parsing for JSON-like script payloads.
 *
 * State objects embedded in listing pages are often JavaScript literals
 * rather than strict JSON: single-quoted strings, trailing commas, comments,
 * HTML comment wrappers or a trailing semicolon. Parsing is attempted on the
 * raw text, then on a repaired copy, then on the first balanced {...} slice.
 */
import type { JsonValue } from '../types/json.types';

function tryParse(text: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Read a quoted string starting at `start` and return it as a double-quoted
 * JSON literal together with the index just past the closing quote.
 */
function readQuoted(text: string, start: number): { literal: string; end: number } {
  const quote = text[start];
  let literal = '"';
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\' && i + 1 < text.length) {
      const next = text[i + 1];
      // \' is not a valid JSON escape
      literal += next === "'" ? "'" : ch + next;
      i += 2;
      continue;
    }
    if (ch === quote) {
      return { literal: literal + '"', end: i + 1 };
    }
    if (ch === '"') {
      literal += '\\"';
    } else if (ch === '\n') {
      literal += '\\n';
    } else {
      literal += ch;
    }
    i += 1;
  }
  return { literal: literal + '"', end: text.length };
}

/**
 * Strip comments, convert single-quoted strings and drop trailing commas,
 * leaving string contents untouched.
 */
export function repairJsonText(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === '"' || ch === "'") {
      const { literal, end } = readQuoted(text, i);
      out += literal;
      i = end;
      continue;
    }

    if (ch === '/' && next === '/') {
      const newline = text.indexOf('\n', i);
      i = newline === -1 ? text.length : newline;
      continue;
    }

    if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      i = close === -1 ? text.length : close + 2;
      continue;
    }

    if (ch === ',') {
      let j = i + 1;
      while (j < text.length && /\s/.test(text[j])) j += 1;
      if (text[j] === '}' || text[j] === ']') {
        i += 1;
        continue;
      }
    }

    out += ch;
    i += 1;
  }
  return out;
}

/**
 * Return the first balanced {...} substring at or after `startPos`.
 */
export function findBalancedBraces(text: string, startPos = 0): string | null {
  const open = text.indexOf('{', startPos);
  if (open === -1) return null;

  let depth = 0;
  let inString: string | null = null;
  let escaped = false;

  for (let j = open; j < text.length; j += 1) {
    const ch = text[j];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\') {
      escaped = true;
      continue;
    }
    if (ch === '"' || ch === "'") {
      if (inString === null) inString = ch;
      else if (inString === ch) inString = null;
      continue;
    }
    if (inString !== null) continue;
    if (ch === '{') depth += 1;
    else if (ch === '}') {
      depth -= 1;
      if (depth === 0) return text.slice(open, j + 1);
    }
  }
  return null;
}

function unwrap(text: string): string {
  return text
    .trim()
    .replace(/^<!--/, '')
    .replace(/-->$/, '')
    .trim()
    .replace(/;+$/, '')
    .trim();
}

/**
 * Parse JSON or a JSON-like literal. Returns null when every attempt fails.
 */
export function parseLooseJson(text: string): JsonValue | null {
  const body = unwrap(text);
  if (!body) return null;

  const direct = tryParse(body);
  if (direct !== undefined) return direct;

  const repaired = tryParse(repairJsonText(body));
  if (repaired !== undefined) return repaired;

  const slice = findBalancedBraces(body);
  if (slice) {
    const sliced = tryParse(repairJsonText(slice));
    if (sliced !== undefined) return sliced;
  }

  return null;
}
