import { InvalidHeaderValueError, InvalidRequestError } from '../errors/spamd.errors';
import { HEADER_NAME_PATTERN } from '../constants/protocol.constant';

export type HeaderEntry = [name: string, value: string];

/**
 * Read-only view of a header list, as exposed on requests and responses.
 */
export interface ReadonlyHeaders extends Iterable<HeaderEntry> {
  readonly size: number;
  get(name: string): string | undefined;
  getAll(name: string): string[];
  has(name: string): boolean;
  entries(): HeaderEntry[];
  toRecord(): Record<string, string>;
}

export type HeaderInit = ReadonlyHeaders | Iterable<readonly [string, string]> | Record<string, string>;

const FORBIDDEN_VALUE_CHARS = /[\r\n]/;

function isIterable(init: HeaderInit): init is Iterable<readonly [string, string]> {
  return Symbol.iterator in init;
}

/**
 * Ordered header list with case-insensitive lookups.
 *
 * Names keep the casing they were added with, so the wire output is deterministic.
 * Validation happens on insertion: a name may only hold letters, digits, `-` and `_`,
 * and a value may not contain CR or LF.
 */
export class SpamdHeaders implements ReadonlyHeaders {
  private readonly list: HeaderEntry[] = [];

  constructor(init?: HeaderInit) {
    if (!init) return;

    const entries = isIterable(init) ? init : Object.entries(init);
    for (const [name, value] of entries) {
      this.append(name, value);
    }
  }

  static assertValidName(name: string): void {
    if (name.trim().length === 0) {
      throw new InvalidRequestError('Header name must not be empty');
    }
    if (!HEADER_NAME_PATTERN.test(name)) {
      throw new InvalidRequestError(`Header name "${JSON.stringify(name).slice(1, -1)}" contains a forbidden character`);
    }
  }

  static assertValidValue(name: string, value: string): void {
    if (FORBIDDEN_VALUE_CHARS.test(value)) {
      throw new InvalidHeaderValueError(name);
    }
  }

  get size(): number {
    return this.list.length;
  }

  append(name: string, value: string): this {
    SpamdHeaders.assertValidName(name);
    SpamdHeaders.assertValidValue(name, value);
    this.list.push([name, value]);
    return this;
  }

  /**
   * Replaces the first header with this name in place and drops any others.
   * Appends when the header is not present yet.
   */
  set(name: string, value: string): this {
    SpamdHeaders.assertValidName(name);
    SpamdHeaders.assertValidValue(name, value);

    const key = name.toLowerCase();
    const first = this.list.findIndex(([existing]) => existing.toLowerCase() === key);
    if (first === -1) {
      this.list.push([name, value]);
      return this;
    }

    this.list[first] = [name, value];
    for (let i = this.list.length - 1; i > first; i--) {
      if (this.list[i][0].toLowerCase() === key) {
        this.list.splice(i, 1);
      }
    }
    return this;
  }

  get(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.list.find(([existing]) => existing.toLowerCase() === key)?.[1];
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.list.filter(([existing]) => existing.toLowerCase() === key).map(([, value]) => value);
  }

  /**
   * Returns the name exactly as it was added, or undefined when absent.
   */
  nameOf(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.list.find(([existing]) => existing.toLowerCase() === key)?.[0];
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  delete(name: string): boolean {
    const key = name.toLowerCase();
    const before = this.list.length;
    for (let i = this.list.length - 1; i >= 0; i--) {
      if (this.list[i][0].toLowerCase() === key) {
        this.list.splice(i, 1);
      }
    }
    return this.list.length !== before;
  }

  entries(): HeaderEntry[] {
    return this.list.map(([name, value]) => [name, value]);
  }

  /**
   * Plain object keyed by the original names. Later duplicates overwrite earlier ones.
   */
  toRecord(): Record<string, string> {
    return Object.fromEntries(this.list);
  }

  clone(): SpamdHeaders {
    return new SpamdHeaders(this.list);
  }

  [Symbol.iterator](): Iterator<HeaderEntry> {
    return this.entries()[Symbol.iterator]();
  }
}
