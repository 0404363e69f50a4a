import { HeaderParseError } from '../errors.js';
import { CRLF, HEADER_VALUE_SEPARATOR } from '../specs.js';
import type { HeaderParseResult, HeaderValueParser, ParsedHeaderValue } from '../types.js';
import { createParserTable, getHeaderParser, type HeaderParserTable } from './header-parsers.js';

const HEADER_NAME_REGEX = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

// Set-Cookie cannot be folded into one comma separated line
const UNFOLDABLE_HEADERS = new Set(['set-cookie']);

interface HeaderEntry {
  name: string;
  // a scalar, or a list of two or more values
  value: ParsedHeaderValue | ParsedHeaderValue[];
}

export interface HeaderStoreOptions {
  parsers?: Record<string, HeaderValueParser<ParsedHeaderValue>>;
}

function valuesEqual(
  parser: HeaderValueParser<ParsedHeaderValue>,
  a: ParsedHeaderValue,
  b: ParsedHeaderValue,
): boolean {
  return parser.isValue(a) && parser.isValue(b) && parser.equals(a, b);
}

function toList(entry: HeaderEntry): readonly ParsedHeaderValue[] {
  return Array.isArray(entry.value) ? entry.value : [entry.value];
}

export function isValidHeaderName(name: string): boolean {
  return typeof name === 'string' && HEADER_NAME_REGEX.test(name);
}

/**
 * Parsed header values of one message, keyed case-insensitively by name.
 *
 * The store is not synchronized: fill it from one place, then share it for
 * reading.
 */
export class HeaderStore {
  private readonly entries = new Map<string, HeaderEntry>();
  private readonly parsers: HeaderParserTable;

  constructor(options: HeaderStoreOptions = {}) {
    this.parsers = createParserTable(options.parsers);
  }

  get size(): number {
    return this.entries.size;
  }

  getParser(name: string): HeaderValueParser<ParsedHeaderValue> {
    return getHeaderParser(this.parsers, name);
  }

  /**
   * Parses `rawValue` with the grammar registered for `name` and appends every
   * resulting value. Throws {@link HeaderParseError} and leaves the store
   * untouched when the name or value is rejected.
   */
  add(name: string, rawValue: string): void {
    const result = this.parse(name, rawValue);
    if (!result.valid) {
      throw new HeaderParseError(result.reason);
    }
    this.appendAll(name, result.value);
  }

  tryAdd(name: string, rawValue: string): boolean {
    const result = this.parse(name, rawValue);
    if (!result.valid) {
      return false;
    }
    this.appendAll(name, result.value);
    return true;
  }

  remove(name: string): boolean {
    return this.entries.delete(name.toLowerCase());
  }

  contains(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  clear(): void {
    this.entries.clear();
  }

  containsParsedValue(name: string, value: ParsedHeaderValue): boolean {
    const entry = this.entries.get(name.toLowerCase());
    if (!entry) {
      return false;
    }
    const parser = this.getParser(name);
    return toList(entry).some((item) => valuesEqual(parser, item, value));
  }

  getParsedValues(name: string): ParsedHeaderValue | ParsedHeaderValue[] | null {
    const entry = this.entries.get(name.toLowerCase());
    if (!entry) {
      return null;
    }
    return Array.isArray(entry.value) ? [...entry.value] : entry.value;
  }

  addParsedValue(name: string, value: ParsedHeaderValue): void {
    if (!isValidHeaderName(name)) {
      throw new TypeError(`Invalid header name: "${name}"`);
    }
    if (!this.getParser(name).isValue(value)) {
      throw new TypeError(`Value of type ${typeof value} does not fit header "${name}"`);
    }

    const key = name.toLowerCase();
    const entry = this.entries.get(key);
    if (!entry) {
      this.entries.set(key, { name, value });
    } else if (Array.isArray(entry.value)) {
      entry.value.push(value);
    } else {
      entry.value = [entry.value, value];
    }
  }

  removeParsedValue(name: string, value: ParsedHeaderValue): boolean {
    const key = name.toLowerCase();
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }

    const parser = this.getParser(name);
    if (!Array.isArray(entry.value)) {
      if (!valuesEqual(parser, entry.value, value)) {
        return false;
      }
      this.entries.delete(key);
      return true;
    }

    const index = entry.value.findIndex((item) => valuesEqual(parser, item, value));
    if (index === -1) {
      return false;
    }
    entry.value.splice(index, 1);
    const [only] = entry.value;
    if (entry.value.length === 1 && only !== undefined) {
      entry.value = only;
    }
    return true;
  }

  getValues(name: string): string[] {
    const entry = this.entries.get(name.toLowerCase());
    if (!entry) {
      return [];
    }
    const parser = this.getParser(name);
    return toList(entry).map((item) => parser.format(item));
  }

  /**
   * Joins the formatted values of `name` with `", "`. When `excludedValue` is
   * given, the first member equal to it is left out.
   */
  getHeaderString(name: string, excludedValue?: ParsedHeaderValue): string {
    const entry = this.entries.get(name.toLowerCase());
    if (!entry) {
      return '';
    }

    const parser = this.getParser(name);
    const parts: string[] = [];
    let excluded = excludedValue === undefined;
    for (const item of toList(entry)) {
      if (!excluded && excludedValue !== undefined && valuesEqual(parser, item, excludedValue)) {
        excluded = true;
        continue;
      }
      parts.push(parser.format(item));
    }
    return parts.join(HEADER_VALUE_SEPARATOR);
  }

  *[Symbol.iterator](): IterableIterator<[name: string, values: string[]]> {
    for (const entry of this.entries.values()) {
      yield [entry.name, this.getValues(entry.name)];
    }
  }

  toString(): string {
    let result = '';
    for (const [name, values] of this) {
      if (UNFOLDABLE_HEADERS.has(name.toLowerCase())) {
        for (const value of values) {
          result += `${name}: ${value}${CRLF}`;
        }
      } else {
        result += `${name}: ${values.join(HEADER_VALUE_SEPARATOR)}${CRLF}`;
      }
    }
    return result;
  }

  private parse(name: string, rawValue: string): HeaderParseResult<ParsedHeaderValue> {
    if (!isValidHeaderName(name)) {
      return { valid: false, reason: `Invalid header name: "${name}"` };
    }
    if (typeof rawValue !== 'string') {
      return { valid: false, reason: `Value of header "${name}" is not a string` };
    }
    const result = this.getParser(name).parse(rawValue);
    if (!result.valid) {
      return { valid: false, reason: `Invalid value for header "${name}": ${result.reason}` };
    }
    return result;
  }

  private appendAll(name: string, values: readonly ParsedHeaderValue[]): void {
    for (const value of values) {
      this.addParsedValue(name, value);
    }
  }
}
