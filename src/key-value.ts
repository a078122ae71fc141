/**
 * One `key = value` entry. Owns its value.
 */

import type { TomlArray } from './array.js';
import { OwnedNode } from './ownership.js';
import { stringifyKeyValue } from './stringify.js';
import type { TomlTable } from './table.js';
import type { TimeSpan } from './time.js';
import type { TomlInput, TomlValue, TomlValueKind } from './value.js';
import {
  asArray,
  asBoolean,
  asDateTime,
  asNumber,
  asTable,
  asText,
  asTimeSpan,
  toValue,
} from './value.js';

export class TomlKeyValue extends OwnedNode {
  readonly key: string;
  private readonly entry: TomlValue;

  constructor(key: string, value: TomlValue) {
    super();
    if (key.length === 0) {
      throw new RangeError('Key must not be empty');
    }
    this.key = key;
    this.adoptValue(value);
    this.entry = value;
  }

  static of(key: string, input: TomlInput): TomlKeyValue {
    return new TomlKeyValue(key, toValue(input));
  }

  protected get label(): string {
    return `Key \`${this.key}\``;
  }

  get value(): TomlValue {
    this.assertLive();
    return this.entry;
  }

  get kind(): TomlValueKind {
    return this.value.kind;
  }

  get text(): string {
    return asText(this.value);
  }

  get number(): number {
    return asNumber(this.value);
  }

  get boolean(): boolean {
    return asBoolean(this.value);
  }

  get dateTime(): Date {
    return asDateTime(this.value);
  }

  get timeSpan(): TimeSpan {
    return asTimeSpan(this.value);
  }

  get array(): TomlArray {
    return asArray(this.value);
  }

  get table(): TomlTable {
    return asTable(this.value);
  }

  toString(): string {
    this.assertLive();
    return stringifyKeyValue(this);
  }

  protected releaseChildren(): void {
    this.releaseValue(this.entry);
  }
}
