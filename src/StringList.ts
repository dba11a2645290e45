// StringList implementation

import { compareStrings } from './compare.ts';
import { indexOutOfRange } from './errors.ts';
import { compilePattern } from './patterns.ts';
import type { FilterFunction, PatternInput } from './types.ts';

/**
 * An ordered, mutable list of strings. Duplicates are allowed.
 *
 * Items live in a plain array owned by the list. Seed iterables are copied,
 * and so is the array on copy(), so two lists never share storage.
 * Not safe to mutate while another caller is iterating it.
 */
export class StringList {
  private _items: string[];

  constructor(items: Iterable<string> = []) {
    this._items = [...items];
  }

  static from(items: Iterable<string>): StringList {
    return new StringList(items);
  }

  get [Symbol.toStringTag]() { return 'StringList'; }

  get length(): number {
    return this._items.length;
  }

  // Read-only view of the backing array; it changes as the list does
  get items(): readonly string[] {
    return this._items;
  }

  item(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this._items.length) {
      throw indexOutOfRange('item', index, this._items.length - 1);
    }
    return this._items[index];
  }

  toArray(): string[] {
    return [...this._items];
  }

  copy(): StringList {
    return new StringList(this._items);
  }

  /**
   * Render as `["a","b"]`. Items are quoted but not escaped.
   */
  toString(): string {
    return '[' + this._items.map((value) => '"' + value + '"').join(',') + ']';
  }

  append(value: string): void {
    this._items.push(value);
  }

  /**
   * Insert `value` so it ends up at `index`, moving later items back by one.
   * `index` may equal `length`, which appends. Anything outside `[0, length]`
   * throws an IndexSizeError and leaves the list as it was.
   *
   * Shifts every later item, so this is O(n).
   */
  insert(value: string, index: number): void {
    if (!Number.isInteger(index) || index < 0 || index > this._items.length) {
      throw indexOutOfRange('insert', index, this._items.length);
    }
    this._items.splice(index, 0, value);
  }

  /**
   * Remove the first occurrence of `value`, keeping the order of the rest.
   * O(n): every later item moves forward. Prefer removeUnordered() when
   * order doesn't matter. Does nothing if `value` isn't present.
   */
  remove(value: string): void {
    const index = this._items.indexOf(value);
    if (index < 0) {
      return;
    }
    this._items.splice(index, 1);
  }

  /**
   * Remove the first occurrence of `value` by moving the last item into its
   * slot. O(1), but the order of the remaining items changes.
   * Does nothing if `value` isn't present.
   */
  removeUnordered(value: string): void {
    const index = this._items.indexOf(value);
    if (index < 0) {
      return;
    }
    const last = this._items.length - 1;
    this._items[index] = this._items[last];
    this._items.length = last;
  }

  /**
   * Sort in place, ascending by code point.
   */
  sort(): this {
    this._items.sort(compareStrings);
    return this;
  }

  indexOf(value: string): number {
    return this._items.indexOf(value);
  }

  contains(value: string): boolean {
    return this._items.includes(value);
  }

  isEqual(other: StringList): boolean {
    if (this._items.length !== other._items.length) {
      return false;
    }
    for (let i = 0; i < this._items.length; i++) {
      if (this._items[i] !== other._items[i]) {
        return false;
      }
    }
    return true;
  }

  isEmpty(): boolean {
    return this._items.length === 0;
  }

  join(separator: string): string {
    return this._items.join(separator);
  }

  /**
   * Build a new list, roughly like a list comprehension.
   *
   * `fn` runs once per index, in ascending order, and is handed the items as
   * they were when filter() started, even if it mutates this list. Every call
   * that returns `[true, value]` appends `value` to the result.
   */
  filter(fn: FilterFunction): StringList {
    const source: readonly string[] = [...this._items];
    const result = new StringList();
    for (let i = 0; i < source.length; i++) {
      const [keep, value] = fn(i, source);
      if (keep) {
        result._items.push(value);
      }
    }
    return result;
  }

  /**
   * New list of the items `pattern` matches somewhere. The match doesn't
   * have to cover the whole item.
   * Throws the RegExp constructor's SyntaxError for an invalid pattern.
   */
  matchFilter(pattern: PatternInput): StringList {
    const re = compilePattern(pattern, false);
    const result = new StringList();
    for (const value of this._items) {
      if (re.test(value)) {
        result._items.push(value);
      }
    }
    return result;
  }

  /**
   * New list with every match of `pattern` in each item replaced by
   * `replacement`, which may use `$1`, `$<name>`, `$&` and `$$`.
   * Items without a match are copied unchanged.
   * Throws the RegExp constructor's SyntaxError for an invalid pattern.
   */
  replaceAllFilter(pattern: PatternInput, replacement: string): StringList {
    const re = compilePattern(pattern, true);
    const result = new StringList();
    for (const value of this._items) {
      result._items.push(value.replace(re, replacement));
    }
    return result;
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this._items[Symbol.iterator]();
  }
}
