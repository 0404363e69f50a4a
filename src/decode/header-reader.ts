import { KnownHeaderNames, tryGetKnownHeaderName } from '../headers/known-header-names.js';
import { COLON, CR, LF } from '../specs.js';
import type { HeaderField, TextSpan } from '../types.js';
import { equalsAsciiIgnoreCase, indexOfCode, trimSpan } from '../utils/chars.js';

const CRLF_LENGTH = 2;

const GZIP = 'gzip';
const DEFLATE = 'deflate';
const KNOWN_CONTENT_ENCODINGS = [GZIP, DEFLATE] as const;

export interface HeaderReaderState {
  readonly buffer: string;
  readonly end: number;
  position: number;
}

export function validateParameters(
  buffer: string,
  start: number,
  length: number,
): void {
  if (typeof buffer !== 'string') {
    throw new TypeError('buffer must be a string');
  }

  if (!Number.isInteger(start) || start < 0) {
    throw new TypeError('start must be a non-negative integer');
  }

  if (!Number.isInteger(length) || length < 0) {
    throw new TypeError('length must be a non-negative integer');
  }

  if (start + length > buffer.length) {
    throw new RangeError(`start (${start}) + length (${length}) exceeds buffer length (${buffer.length})`);
  }
}

export function createHeaderReader(
  buffer: string,
  start = 0,
  length = buffer.length - start,
): HeaderReaderState {
  validateParameters(buffer, start, length);
  return {
    buffer,
    end: start + length,
    position: start,
  };
}

/**
 * Reads the next line terminated by CRLF. A lone CR is kept as line content.
 * The unterminated tail of the buffer, if any, is returned once as a last line.
 */
export function readLine(reader: HeaderReaderState): TextSpan | null {
  const { buffer, end } = reader;
  let cursor = reader.position;

  while (cursor < end) {
    if (
      buffer.charCodeAt(cursor) === CR &&
      cursor + 1 < end &&
      buffer.charCodeAt(cursor + 1) === LF
    ) {
      const span = { start: reader.position, length: cursor - reader.position };
      reader.position = cursor + CRLF_LENGTH;
      return span;
    }
    cursor++;
  }

  if (cursor > reader.position) {
    const span = { start: reader.position, length: cursor - reader.position };
    reader.position = cursor;
    return span;
  }

  return null;
}

function getHeaderValue(name: string, buffer: string, value: TextSpan): string {
  if (value.length === 0) {
    return '';
  }

  if (name === KnownHeaderNames.ContentEncoding) {
    for (const encoding of KNOWN_CONTENT_ENCODINGS) {
      if (equalsAsciiIgnoreCase(encoding, buffer, value.start, value.length)) {
        return encoding;
      }
    }
  }

  return buffer.slice(value.start, value.start + value.length);
}

/**
 * Reads the next `name: value` pair, skipping blank lines and lines without a
 * colon. Known names resolve to their canonical spelling.
 */
export function readHeader(reader: HeaderReaderState): HeaderField | null {
  const { buffer } = reader;
  let line = readLine(reader);

  while (line) {
    if (line.length === 0) {
      line = readLine(reader);
      continue;
    }

    const colonIndex = indexOfCode(buffer, COLON, line.start, line.length);
    if (colonIndex === -1) {
      line = readLine(reader);
      continue;
    }

    const nameLength = colonIndex - line.start;
    const name = tryGetKnownHeaderName(buffer, line.start, nameLength)
      ?? buffer.slice(line.start, colonIndex);

    const value = trimSpan(buffer, {
      start: colonIndex + 1,
      length: line.start + line.length - colonIndex - 1,
    });

    return [name, getHeaderValue(name, buffer, value)];
  }

  return null;
}

export function readHeaders(reader: HeaderReaderState): HeaderField[] {
  const fields: HeaderField[] = [];
  let field = readHeader(reader);
  while (field) {
    fields.push(field);
    field = readHeader(reader);
  }
  return fields;
}
