export type ParsedHeaderValue = string | number | Date;

export type HeaderField = [name: string, value: string];

export interface TextSpan {
  start: number;
  length: number;
}

export type HeaderParseResult<T extends ParsedHeaderValue> =
  | { valid: true; value: T[] }
  | { valid: false; reason: string };

export interface HeaderValueParser<T extends ParsedHeaderValue> {
  parse(input: string): HeaderParseResult<T>;
  isValue(value: ParsedHeaderValue): value is T;
  equals(a: T, b: T): boolean;
  format(value: T): string;
}

export interface HeaderBlockLimits {
  maxHeaderCount: number;
}
