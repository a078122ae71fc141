import { describe, expect, it } from 'vitest';
import { TomlArray } from '../src/array.js';
import { TomlAccessError } from '../src/errors.js';
import { TomlKeyValue } from '../src/key-value.js';
import { TomlTable } from '../src/table.js';
import { TimeSpan } from '../src/time.js';
import {
  asDateTime,
  asNumber,
  dateTimeValue,
  isTable,
  numberValue,
  textValue,
  toValue,
} from '../src/value.js';

describe('toValue', () => {
  it('tags each plain input with its kind', () => {
    expect(toValue('x')).toEqual({ kind: 'text', text: 'x' });
    expect(toValue(1.5)).toEqual({ kind: 'number', number: 1.5 });
    expect(toValue(false)).toEqual({ kind: 'boolean', boolean: false });
    expect(toValue(new Date(0)).kind).toBe('dateTime');
    expect(toValue(new TimeSpan(1)).kind).toBe('timeSpan');
    expect(toValue(new TomlArray()).kind).toBe('array');
    expect(isTable(toValue(new TomlTable('t')))).toBe(true);
  });

  it('rejects dates the text form cannot carry', () => {
    expect(() => dateTimeValue(new Date(NaN))).toThrow(RangeError);
    expect(() => dateTimeValue(new Date(Date.UTC(10000, 0, 1)))).toThrow(RangeError);
  });

  it('keeps date-times isolated from caller mutation', () => {
    const input = new Date(Date.UTC(1979, 4, 27));
    const value = dateTimeValue(input);
    input.setUTCFullYear(2000);
    const out = asDateTime(value);
    out.setUTCFullYear(2001);
    expect(asDateTime(value).getUTCFullYear()).toBe(1979);
  });
});

describe('accessors', () => {
  it('fail with TypeMismatch on the wrong kind', () => {
    let caught: unknown;
    try {
      asNumber(textValue('x'));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TomlAccessError);
    expect(caught).toMatchObject({
      code: 'TypeMismatch',
      message: 'Expected value of kind `number`, but got `text`',
    });
  });

  it('read through a key-value', () => {
    const kv = new TomlKeyValue('port', numberValue(8080));
    expect(kv.kind).toBe('number');
    expect(kv.number).toBe(8080);
    expect(() => kv.table).toThrow('Expected value of kind `table`, but got `number`');
  });

  it('refuse empty keys', () => {
    expect(() => new TomlKeyValue('', numberValue(1))).toThrow(RangeError);
  });
});

describe('TomlArray', () => {
  it('keeps elements in insertion order', () => {
    const array = TomlArray.fromNumbers([3, 1, 2]).add('x').add(true);
    expect(array.length).toBe(5);
    expect([...array].map((v) => v.kind)).toEqual(['number', 'number', 'number', 'text', 'boolean']);
    expect(asNumber(array.at(1))).toBe(1);
  });

  it('fails on an index out of range', () => {
    const array = TomlArray.fromNumbers([1, 2, 3]);
    expect(() => array.at(5)).toThrow('Index 5 is out of range for array of length 3');
    expect(() => array.at(-1)).toThrow(TomlAccessError);
  });

  it('serializes inline', () => {
    const nested = TomlArray.fromValues([textValue('a b'), numberValue(2)]);
    expect(TomlArray.fromNumbers([1]).add(nested).toString()).toBe('[1, ["a b", 2]]');
  });
});
