/**
 * Ordered, growable list of TOML values. Owns every element.
 */

import { TomlAccessError } from './errors.js';
import { OwnedNode } from './ownership.js';
import { stringifyArray } from './stringify.js';
import type { TomlInput, TomlValue } from './value.js';
import { numberValue, toValue } from './value.js';

export class TomlArray extends OwnedNode implements Iterable<TomlValue> {
  readonly kind = 'array' as const;
  private readonly elements: TomlValue[] = [];

  protected get label(): string {
    return 'Array';
  }

  static fromNumbers(numbers: Iterable<number>): TomlArray {
    const array = new TomlArray();
    for (const n of numbers) array.push(numberValue(n));
    return array;
  }

  /** Takes ownership of every array or table the values carry. */
  static fromValues(values: Iterable<TomlValue>): TomlArray {
    const array = new TomlArray();
    for (const v of values) array.push(v);
    return array;
  }

  get length(): number {
    this.assertLive();
    return this.elements.length;
  }

  at(index: number): TomlValue {
    this.assertLive();
    const value = this.elements[index];
    if (value === undefined) {
      throw new TomlAccessError('IndexOutOfRange', `Index ${index} is out of range for array of length ${this.elements.length}`);
    }
    return value;
  }

  values(): readonly TomlValue[] {
    this.assertLive();
    return this.elements;
  }

  [Symbol.iterator](): Iterator<TomlValue> {
    return this.values()[Symbol.iterator]();
  }

  add(input: TomlInput): this {
    return this.push(toValue(input));
  }

  push(value: TomlValue): this {
    this.assertLive();
    this.adoptValue(value);
    this.elements.push(value);
    return this;
  }

  toString(): string {
    this.assertLive();
    return stringifyArray(this);
  }

  protected releaseChildren(): void {
    for (const element of this.elements) this.releaseValue(element);
    this.elements.length = 0;
  }
}
