// Single-pass reader for one top-level key of a flat JSON object

import type { ChangeValue } from '@plinth/protocol';

export type ScanResult =
  | { kind: 'found'; value: ChangeValue }
  | { kind: 'absent' }
  | { kind: 'fallback' };

const FALLBACK: ScanResult = { kind: 'fallback' };
const ABSENT: ScanResult = { kind: 'absent' };

const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const HEX4 = /[0-9a-fA-F]{4}/y;

type StringToken = {
  /** Index just past the closing quote */
  end: number;
  escaped: boolean;
};

function skipWhitespace(text: string, pos: number): number {
  while (pos < text.length) {
    const ch = text.charCodeAt(pos);
    // space, tab, line feed, carriage return
    if (ch !== 0x20 && ch !== 0x09 && ch !== 0x0a && ch !== 0x0d) {
      break;
    }
    pos++;
  }
  return pos;
}

function scanString(text: string, start: number): StringToken | null {
  let escaped = false;
  let pos = start + 1;

  while (pos < text.length) {
    const ch = text.charCodeAt(pos);

    if (ch === 0x22) {
      return { end: pos + 1, escaped };
    }
    if (ch < 0x20) {
      return null;
    }
    if (ch === 0x5c) {
      escaped = true;
      const next = text[pos + 1];
      if (next === 'u') {
        HEX4.lastIndex = pos + 2;
        if (!HEX4.test(text)) {
          return null;
        }
        pos += 6;
        continue;
      }
      if (next === undefined || !'"\\/bfnrt'.includes(next)) {
        return null;
      }
      pos += 2;
      continue;
    }
    pos++;
  }

  return null;
}

type ValueToken = {
  value: ChangeValue;
  end: number;
};

function scanScalar(text: string, pos: number): ValueToken | null {
  const ch = text[pos];

  if (ch === '"') {
    const token = scanString(text, pos);
    if (token === null) {
      return null;
    }
    if (!token.escaped) {
      return { value: text.slice(pos + 1, token.end - 1), end: token.end };
    }
    const decoded: unknown = JSON.parse(text.slice(pos, token.end));
    return typeof decoded === 'string' ? { value: decoded, end: token.end } : null;
  }

  if (text.startsWith('true', pos)) {
    return { value: true, end: pos + 4 };
  }
  if (text.startsWith('false', pos)) {
    return { value: false, end: pos + 5 };
  }
  if (text.startsWith('null', pos)) {
    return { value: null, end: pos + 4 };
  }

  NUMBER.lastIndex = pos;
  const match = NUMBER.exec(text);
  if (match === null) {
    return null;
  }
  return { value: Number(match[0]), end: pos + match[0].length };
}

/**
 * Find the value of `key` in a JSON object without materializing it.
 *
 * Only flat objects with unescaped keys are scanned. Anything else (an
 * escaped key, a nested object or array, malformed text) yields
 * `fallback` and the caller must parse the whole blob. Like `JSON.parse`,
 * the last occurrence of a duplicated key wins.
 */
export function scanTopLevelValue(text: string, key: string): ScanResult {
  let pos = skipWhitespace(text, 0);
  if (text[pos] !== '{') {
    return FALLBACK;
  }
  pos = skipWhitespace(text, pos + 1);

  let result: ScanResult = ABSENT;

  if (text[pos] === '}') {
    pos++;
  } else {
    for (;;) {
      if (text[pos] !== '"') {
        return FALLBACK;
      }
      const keyToken = scanString(text, pos);
      if (keyToken === null || keyToken.escaped) {
        return FALLBACK;
      }
      const name = text.slice(pos + 1, keyToken.end - 1);

      pos = skipWhitespace(text, keyToken.end);
      if (text[pos] !== ':') {
        return FALLBACK;
      }
      pos = skipWhitespace(text, pos + 1);

      const valueToken = scanScalar(text, pos);
      if (valueToken === null) {
        return FALLBACK;
      }
      if (name === key) {
        result = { kind: 'found', value: valueToken.value };
      }

      pos = skipWhitespace(text, valueToken.end);
      if (text[pos] === ',') {
        pos = skipWhitespace(text, pos + 1);
        continue;
      }
      if (text[pos] === '}') {
        pos++;
        break;
      }
      return FALLBACK;
    }
  }

  return skipWhitespace(text, pos) === text.length ? result : FALLBACK;
}
