import { CR, LF } from '../specs.js';
import type { TextSpan } from '../types.js';

const SPACE = 0x20;
const HTAB = 0x09;

const UPPER_A = 0x41;
const UPPER_Z = 0x5a;

function toLowerAscii(code: number): number {
  return code >= UPPER_A && code <= UPPER_Z ? code | 0x20 : code;
}

export function isWhitespace(code: number): boolean {
  return code === SPACE || code === HTAB || code === CR || code === LF;
}

export function equalsAsciiIgnoreCase(
  expected: string,
  buffer: string,
  start: number,
  length: number,
): boolean {
  if (expected.length !== length) {
    return false;
  }
  for (let i = 0; i < length; i++) {
    if (toLowerAscii(expected.charCodeAt(i)) !== toLowerAscii(buffer.charCodeAt(start + i))) {
      return false;
    }
  }
  return true;
}

export function trimSpan(buffer: string, span: TextSpan): TextSpan {
  let start = span.start;
  let end = span.start + span.length;

  while (start < end && isWhitespace(buffer.charCodeAt(start))) {
    start++;
  }
  while (end > start && isWhitespace(buffer.charCodeAt(end - 1))) {
    end--;
  }

  return { start, length: end - start };
}

export function indexOfCode(
  buffer: string,
  code: number,
  start: number,
  length: number,
): number {
  const end = start + length;
  for (let i = start; i < end; i++) {
    if (buffer.charCodeAt(i) === code) {
      return i;
    }
  }
  return -1;
}
