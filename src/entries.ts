/**
 * Ordered key-value storage shared by tables and the document root.
 * Lookups are exact, case-sensitive and return the first match.
 */

import { TomlAccessError } from './errors.js';
import { TomlKeyValue } from './key-value.js';
import { OwnedNode } from './ownership.js';
import type { TomlInput } from './value.js';
import { toValue } from './value.js';

export type TryGetResult<T> = { found: true; value: T } | { found: false; value: undefined };

export abstract class KeyValueContainer extends OwnedNode implements Iterable<TomlKeyValue> {
  private readonly entries: TomlKeyValue[] = [];

  get keyValues(): readonly TomlKeyValue[] {
    this.assertLive();
    return this.entries;
  }

  get size(): number {
    return this.keyValues.length;
  }

  [Symbol.iterator](): Iterator<TomlKeyValue> {
    return this.keyValues[Symbol.iterator]();
  }

  add(key: string, input: TomlInput): this {
    const value = toValue(input);
    // the new entry adopts the value before this container adopts the entry
    this.assertValueAdoptable(value);
    return this.addKeyValue(new TomlKeyValue(key, value));
  }

  addKeyValue(keyValue: TomlKeyValue): this {
    this.adopt(keyValue);
    this.entries.push(keyValue);
    return this;
  }

  containsKey(key: string): boolean {
    return this.find(key) !== undefined;
  }

  tryGetValue(key: string): TryGetResult<TomlKeyValue> {
    const value = this.find(key);
    return value === undefined ? { found: false, value: undefined } : { found: true, value };
  }

  getValue(key: string): TomlKeyValue {
    const value = this.find(key);
    if (value === undefined) {
      throw new TomlAccessError('MissingKey', `Key \`${key}\` is missing in ${this.label}`);
    }
    return value;
  }

  private find(key: string): TomlKeyValue | undefined {
    return this.keyValues.find((kv) => kv.key === key);
  }

  protected releaseChildren(): void {
    for (const kv of this.entries) this.releaseOwned(kv);
    this.entries.length = 0;
  }
}
