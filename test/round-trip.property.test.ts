import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { TomlDocument } from '../src/document.js';
import { parse } from '../src/index.js';
import { TomlTable } from '../src/table.js';
import { TimeSpan } from '../src/time.js';
import type { TomlInput, TomlValue } from '../src/value.js';
import { toValue } from '../src/value.js';

const LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ_'.split('');
const KEY_CHARS = [...LETTERS, ...'0123456789-'.split('')];

const keyArb = fc
  .tuple(fc.constantFrom(...LETTERS), fc.array(fc.constantFrom(...KEY_CHARS), { maxLength: 11 }))
  .map(([head, tail]) => head + tail.join(''));

const scalarArb: fc.Arbitrary<TomlInput> = fc.oneof(
  fc.string().filter((s) => !(s.includes('"') && s.includes("'"))),
  fc.double(),
  fc.boolean(),
  fc.date({
    min: new Date('0000-01-01T00:00:00.000Z'),
    max: new Date('9999-12-31T23:59:59.999Z'),
    noInvalidDate: true,
  }),
  fc.integer({ min: -1_000_000_000_000, max: 1_000_000_000_000 }).map((micros) => new TimeSpan(micros / 1000))
);

const entriesArb = fc.uniqueArray(fc.tuple(keyArb, scalarArb), {
  selector: ([key]) => key,
  maxLength: 12,
});

function sameValue(actual: TomlValue, expected: TomlValue): boolean {
  switch (expected.kind) {
    case 'text':
      return actual.kind === 'text' && actual.text === expected.text;
    case 'number':
      return actual.kind === 'number' && Object.is(actual.number, expected.number);
    case 'boolean':
      return actual.kind === 'boolean' && actual.boolean === expected.boolean;
    case 'dateTime':
      return actual.kind === 'dateTime' && actual.dateTime.getTime() === expected.dateTime.getTime();
    case 'timeSpan':
      return actual.kind === 'timeSpan' && actual.timeSpan.equals(expected.timeSpan);
    default:
      return false;
  }
}

describe('round trip', () => {
  it('reads back every scalar entry with the same kind and value', () => {
    fc.assert(
      fc.property(entriesArb, (entries) => {
        const document = TomlDocument.create();
        for (const [key, input] of entries) document.add(key, input);
        const reread = parse(document.toString());
        expect(reread.size).toBe(entries.length);
        for (const [key, input] of entries) {
          expect(sameValue(reread.getValue(key).value, toValue(input))).toBe(true);
        }
      })
    );
  });

  it('reads back scalar entries inside a table', () => {
    fc.assert(
      fc.property(keyArb, entriesArb, (name, entries) => {
        const table = new TomlTable(name);
        for (const [key, input] of entries) table.add(key, input);
        const reread = parse(TomlDocument.create().add(table).toString()).getTable(name);
        expect(reread.keyValues.map((kv) => kv.key)).toEqual(entries.map(([key]) => key));
      })
    );
  });

  it('strips whitespace before `=` from any bare key', () => {
    fc.assert(
      fc.property(keyArb, fc.stringOf(fc.constantFrom(' ', '\t'), { maxLength: 4 }), (key, gap) => {
        expect(parse(`${key}${gap}= 1`).containsKey(key)).toBe(true);
      })
    );
  });
});
