/**
 * TOML value model. A value is exactly one of seven variants; array and table
 * variants own their container.
 */

import type { TomlArray } from './array.js';
import { TomlAccessError } from './errors.js';
import type { TomlTable } from './table.js';
import { TimeSpan, isRepresentableDate } from './time.js';

export type TomlValueKind = TomlValue['kind'];

export type TomlValue =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'number'; readonly number: number }
  | { readonly kind: 'boolean'; readonly boolean: boolean }
  | { readonly kind: 'dateTime'; readonly dateTime: Date }
  | { readonly kind: 'timeSpan'; readonly timeSpan: TimeSpan }
  | { readonly kind: 'array'; readonly array: TomlArray }
  | { readonly kind: 'table'; readonly table: TomlTable };

/** Plain inputs accepted wherever a value is added programmatically. */
export type TomlInput = string | number | boolean | Date | TimeSpan | TomlArray | TomlTable;

export type ValueOf<K extends TomlValueKind> = Extract<TomlValue, { kind: K }>;

export function textValue(text: string): ValueOf<'text'> {
  return { kind: 'text', text };
}

export function numberValue(number: number): ValueOf<'number'> {
  return { kind: 'number', number };
}

export function booleanValue(boolean: boolean): ValueOf<'boolean'> {
  return { kind: 'boolean', boolean };
}

export function dateTimeValue(dateTime: Date): ValueOf<'dateTime'> {
  if (!isRepresentableDate(dateTime)) {
    throw new RangeError(`Date-time must be a valid date between years 0 and 9999`);
  }
  // the tree keeps its own Date instance
  return { kind: 'dateTime', dateTime: new Date(dateTime.getTime()) };
}

export function timeSpanValue(timeSpan: TimeSpan): ValueOf<'timeSpan'> {
  return { kind: 'timeSpan', timeSpan };
}

export function arrayValue(array: TomlArray): ValueOf<'array'> {
  return { kind: 'array', array };
}

export function tableValue(table: TomlTable): ValueOf<'table'> {
  return { kind: 'table', table };
}

export function toValue(input: TomlInput): TomlValue {
  switch (typeof input) {
    case 'string':
      return textValue(input);
    case 'number':
      return numberValue(input);
    case 'boolean':
      return booleanValue(input);
  }
  if (input instanceof Date) return dateTimeValue(input);
  if (input instanceof TimeSpan) return timeSpanValue(input);
  return input.kind === 'array' ? arrayValue(input) : tableValue(input);
}

export function isText(v: TomlValue): v is ValueOf<'text'> {
  return v.kind === 'text';
}

export function isNumber(v: TomlValue): v is ValueOf<'number'> {
  return v.kind === 'number';
}

export function isBoolean(v: TomlValue): v is ValueOf<'boolean'> {
  return v.kind === 'boolean';
}

export function isDateTime(v: TomlValue): v is ValueOf<'dateTime'> {
  return v.kind === 'dateTime';
}

export function isTimeSpan(v: TomlValue): v is ValueOf<'timeSpan'> {
  return v.kind === 'timeSpan';
}

export function isArray(v: TomlValue): v is ValueOf<'array'> {
  return v.kind === 'array';
}

export function isTable(v: TomlValue): v is ValueOf<'table'> {
  return v.kind === 'table';
}

function mismatch(expected: TomlValueKind, v: TomlValue): never {
  throw new TomlAccessError('TypeMismatch', `Expected value of kind \`${expected}\`, but got \`${v.kind}\``);
}

export function asText(v: TomlValue): string {
  return isText(v) ? v.text : mismatch('text', v);
}

export function asNumber(v: TomlValue): number {
  return isNumber(v) ? v.number : mismatch('number', v);
}

export function asBoolean(v: TomlValue): boolean {
  return isBoolean(v) ? v.boolean : mismatch('boolean', v);
}

export function asDateTime(v: TomlValue): Date {
  return isDateTime(v) ? new Date(v.dateTime.getTime()) : mismatch('dateTime', v);
}

export function asTimeSpan(v: TomlValue): TimeSpan {
  return isTimeSpan(v) ? v.timeSpan : mismatch('timeSpan', v);
}

export function asArray(v: TomlValue): TomlArray {
  return isArray(v) ? v.array : mismatch('array', v);
}

export function asTable(v: TomlValue): TomlTable {
  return isTable(v) ? v.table : mismatch('table', v);
}

export function assertNever(v: never): never {
  throw new TypeError(`Unknown value kind: ${JSON.stringify(v)}`);
}
