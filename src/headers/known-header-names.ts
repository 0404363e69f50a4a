import { readFileSync } from 'node:fs';

import { equalsAsciiIgnoreCase } from '../utils/chars.js';

const KNOWN_HEADER_NAMES_FILE = new URL('../../data/known-header-names.json', import.meta.url);

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function loadKnownHeaderNames(): readonly string[] {
  const parsed: unknown = JSON.parse(readFileSync(KNOWN_HEADER_NAMES_FILE, 'utf8'));
  if (!isStringArray(parsed)) {
    throw new TypeError(`Known header names file must hold an array of strings: ${KNOWN_HEADER_NAMES_FILE.pathname}`);
  }
  return Object.freeze(parsed);
}

const NAMES = loadKnownHeaderNames();

// names bucketed by length, so a span is only compared against candidates that can match
const NAMES_BY_LENGTH = new Map<number, string[]>();
const NAMES_BY_LOWER = new Map<string, string>();

for (const name of NAMES) {
  const bucket = NAMES_BY_LENGTH.get(name.length);
  if (bucket) {
    bucket.push(name);
  } else {
    NAMES_BY_LENGTH.set(name.length, [name]);
  }
  NAMES_BY_LOWER.set(name.toLowerCase(), name);
}

function requireKnown(name: string): string {
  const canonical = NAMES_BY_LOWER.get(name.toLowerCase());
  if (canonical === undefined) {
    throw new TypeError(`"${name}" is missing from the known header names table`);
  }
  return canonical;
}

export const KnownHeaderNames = Object.freeze({
  Connection: requireKnown('Connection'),
  ContentEncoding: requireKnown('Content-Encoding'),
  ContentLength: requireKnown('Content-Length'),
  ContentType: requireKnown('Content-Type'),
  Date: requireKnown('Date'),
  Expect: requireKnown('Expect'),
  Expires: requireKnown('Expires'),
  SetCookie: requireKnown('Set-Cookie'),
  TransferEncoding: requireKnown('Transfer-Encoding'),
});

/**
 * Resolves `buffer[start, start + length)` to the canonical spelling of a known
 * header name, comparing ASCII case-insensitively without slicing the buffer.
 */
export function tryGetKnownHeaderName(
  buffer: string,
  start: number,
  length: number,
): string | null {
  const candidates = NAMES_BY_LENGTH.get(length);
  if (!candidates) {
    return null;
  }
  for (const candidate of candidates) {
    if (equalsAsciiIgnoreCase(candidate, buffer, start, length)) {
      return candidate;
    }
  }
  return null;
}

export function getKnownHeaderName(name: string): string | null {
  return tryGetKnownHeaderName(name, 0, name.length);
}

export function isKnownHeaderName(name: string): boolean {
  return NAMES_BY_LOWER.has(name.toLowerCase());
}
