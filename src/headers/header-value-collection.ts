import { HeaderOperationError } from '../errors.js';
import type { HeaderValueParser, ParsedHeaderValue } from '../types.js';
import type { HeaderStore } from './header-store.js';

export type HeaderValueValidator<T extends ParsedHeaderValue> = (
  collection: HeaderValueCollection<T>,
  item: T,
) => void;

export interface HeaderValueCollectionOptions<T extends ParsedHeaderValue> {
  /**
   * A value the RFC singles out for the header (`close` for `Connection`,
   * `chunked` for `Transfer-Encoding`, `100-continue` for `Expect`). Its
   * presence in the store backs {@link HeaderValueCollection.isSpecialValueSet}.
   */
  specialValue?: T;
  validator?: HeaderValueValidator<T>;
}

/**
 * Live view over the values of one header in a {@link HeaderStore}. Holds no
 * values itself: every read goes to the store, so changing the header while an
 * iteration is running interleaves in an unspecified way.
 *
 * `parser` must be the parser `store` has registered for `headerName`.
 */
export class HeaderValueCollection<T extends ParsedHeaderValue> implements Iterable<T> {
  readonly isReadOnly = false;

  private readonly headerName: string;
  private readonly store: HeaderStore;
  private readonly parser: HeaderValueParser<T>;
  private readonly specialValue: T | undefined;
  private readonly validator: HeaderValueValidator<T> | undefined;

  constructor(
    headerName: string,
    store: HeaderStore,
    parser: HeaderValueParser<T>,
    options: HeaderValueCollectionOptions<T> = {},
  ) {
    if (store.getParser(headerName) !== parser) {
      throw new TypeError(`parser does not match the one registered for header "${headerName}"`);
    }
    this.headerName = headerName;
    this.store = store;
    this.parser = parser;
    this.specialValue = options.specialValue;
    this.validator = options.validator;
  }

  get count(): number {
    const storeValue = this.store.getParsedValues(this.headerName);
    if (storeValue === null) {
      return 0;
    }
    return Array.isArray(storeValue) ? storeValue.length : 1;
  }

  get isSpecialValueSet(): boolean {
    if (this.specialValue === undefined) {
      return false;
    }
    return this.store.containsParsedValue(this.headerName, this.specialValue);
  }

  add(item: T): void {
    this.checkValue(item);
    this.store.addParsedValue(this.headerName, item);
  }

  parseAdd(input: string): void {
    this.store.add(this.headerName, input);
  }

  tryParseAdd(input: string): boolean {
    return this.store.tryAdd(this.headerName, input);
  }

  clear(): void {
    this.store.remove(this.headerName);
  }

  contains(item: T): boolean {
    this.checkValue(item);
    return this.store.containsParsedValue(this.headerName, item);
  }

  remove(item: T): boolean {
    this.checkValue(item);
    return this.store.removeParsedValue(this.headerName, item);
  }

  /**
   * Copies the values into `destination` starting at `offset`. `offset` may
   * equal `destination.length` only when there is nothing to copy.
   */
  copyTo(destination: T[], offset: number): void {
    if (!Array.isArray(destination)) {
      throw new TypeError('destination must be an array');
    }
    if (!Number.isInteger(offset) || offset < 0 || offset > destination.length) {
      throw new RangeError(`offset (${offset}) is outside destination bounds (0..${destination.length})`);
    }

    const values = [...this];
    if (values.length > destination.length - offset) {
      throw new RangeError(
        `destination is too small: ${values.length} values from offset ${offset} into length ${destination.length}`,
      );
    }
    for (let i = 0; i < values.length; i++) {
      const value = values[i];
      if (value !== undefined) {
        destination[offset + i] = value;
      }
    }
  }

  setSpecialValue(): void {
    const specialValue = this.requireSpecialValue();
    if (!this.store.containsParsedValue(this.headerName, specialValue)) {
      this.store.addParsedValue(this.headerName, specialValue);
    }
  }

  removeSpecialValue(): void {
    this.store.removeParsedValue(this.headerName, this.requireSpecialValue());
  }

  *[Symbol.iterator](): IterableIterator<T> {
    const storeValue = this.store.getParsedValues(this.headerName);
    if (storeValue === null) {
      return;
    }
    const values = Array.isArray(storeValue) ? storeValue : [storeValue];
    for (const value of values) {
      if (this.parser.isValue(value)) {
        yield value;
      }
    }
  }

  toString(): string {
    return this.store.getHeaderString(this.headerName);
  }

  toStringWithoutSpecial(): string {
    if (this.specialValue === undefined || !this.isSpecialValueSet) {
      return this.toString();
    }
    return this.store.getHeaderString(this.headerName, this.specialValue);
  }

  private requireSpecialValue(): T {
    if (this.specialValue === undefined) {
      throw new HeaderOperationError(`Header "${this.headerName}" has no special value`);
    }
    return this.specialValue;
  }

  private checkValue(item: T): void {
    if (item === null || item === undefined) {
      throw new TypeError('item must not be null or undefined');
    }
    if (this.validator) {
      this.validator(this, item);
    }
  }
}
