import { formatHttpDate, parseHttpDate } from '../date/index.js';
import type { HeaderParseResult, HeaderValueParser, ParsedHeaderValue } from '../types.js';
import { parseInteger } from '../utils/number.js';

const TOKEN_REGEX = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const INVALID_CHARS_REGEX = /[\r\n]/;

const createError = <T extends ParsedHeaderValue>(reason: string): HeaderParseResult<T> => ({
  valid: false,
  reason,
});

const createSuccess = <T extends ParsedHeaderValue>(value: T[]): HeaderParseResult<T> => ({
  valid: true,
  value,
});

function isString(value: ParsedHeaderValue): value is string {
  return typeof value === 'string';
}

/**
 * Comma separated tokens, compared case-insensitively (`Connection`,
 * `Transfer-Encoding`, ...). Empty list members are skipped, so an empty
 * value parses to no tokens at all.
 */
export const tokenListParser: HeaderValueParser<string> = {
  parse(input) {
    if (INVALID_CHARS_REGEX.test(input)) {
      return createError('header value contains CR/LF');
    }
    const tokens: string[] = [];
    for (const part of input.split(',')) {
      const token = part.trim();
      if (!token) {
        continue;
      }
      if (!TOKEN_REGEX.test(token)) {
        return createError(`invalid token: "${token}"`);
      }
      tokens.push(token);
    }
    return createSuccess(tokens);
  },
  isValue: isString,
  equals(a, b) {
    return a.toLowerCase() === b.toLowerCase();
  },
  format(value) {
    return value;
  },
};

export const integerParser: HeaderValueParser<number> = {
  parse(input) {
    const value = parseInteger(input.trim());
    if (value === null) {
      return createError(`invalid integer: "${input}"`);
    }
    return createSuccess([value]);
  },
  isValue(value): value is number {
    return typeof value === 'number';
  },
  equals(a, b) {
    return a === b;
  },
  format(value) {
    return `${value}`;
  },
};

export const httpDateParser: HeaderValueParser<Date> = {
  parse(input) {
    const date = parseHttpDate(input);
    if (!date) {
      return createError(`invalid HTTP date: "${input}"`);
    }
    return createSuccess([date]);
  },
  isValue(value): value is Date {
    return value instanceof Date && !Number.isNaN(value.getTime());
  },
  equals(a, b) {
    return a.getTime() === b.getTime();
  },
  format: formatHttpDate,
};

export const rawStringParser: HeaderValueParser<string> = {
  parse(input) {
    if (INVALID_CHARS_REGEX.test(input)) {
      return createError('header value contains CR/LF');
    }
    return createSuccess([input.trim()]);
  },
  isValue: isString,
  equals(a, b) {
    return a === b;
  },
  format(value) {
    return value;
  },
};

const TOKEN_LIST_HEADERS = [
  'accept-encoding', 'accept-ranges', 'allow', 'connection', 'content-encoding',
  'content-language', 'expect', 'te', 'trailer', 'transfer-encoding', 'upgrade', 'vary',
] as const;

const INTEGER_HEADERS = ['age', 'content-length', 'max-forwards'] as const;

const DATE_HEADERS = [
  'date', 'expires', 'if-modified-since', 'if-unmodified-since', 'last-modified',
] as const;

export type HeaderParserTable = ReadonlyMap<string, HeaderValueParser<ParsedHeaderValue>>;

function buildDefaultParsers(): HeaderParserTable {
  const parsers = new Map<string, HeaderValueParser<ParsedHeaderValue>>();
  for (const name of TOKEN_LIST_HEADERS) {
    parsers.set(name, tokenListParser);
  }
  for (const name of INTEGER_HEADERS) {
    parsers.set(name, integerParser);
  }
  for (const name of DATE_HEADERS) {
    parsers.set(name, httpDateParser);
  }
  return parsers;
}

export const DEFAULT_HEADER_PARSERS: HeaderParserTable = buildDefaultParsers();

export function createParserTable(
  overrides: Record<string, HeaderValueParser<ParsedHeaderValue>> = {},
): HeaderParserTable {
  const parsers = new Map(DEFAULT_HEADER_PARSERS);
  for (const [name, parser] of Object.entries(overrides)) {
    parsers.set(name.toLowerCase(), parser);
  }
  return parsers;
}

export function getHeaderParser(
  parsers: HeaderParserTable,
  name: string,
): HeaderValueParser<ParsedHeaderValue> {
  return parsers.get(name.toLowerCase()) ?? rawStringParser;
}
