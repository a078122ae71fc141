import { describe, expect, it } from 'vitest';
import { TomlArray } from '../src/array.js';
import { TomlDocument } from '../src/document.js';
import { TomlStateError } from '../src/errors.js';
import { TomlTable } from '../src/table.js';
import { asArray } from '../src/value.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('ownership', () => {
  it('releases the whole tree with its root', () => {
    const document = TomlDocument.parse('a = [1, [2]]\n[t]\nb = { c = 3 }');
    const outer = document.getValue('a').array;
    const inner = asArray(outer.at(1));
    const table = document.getTable('t');
    const inline = table.getValue('b').table;

    document.dispose();

    expect(document.isDisposed).toBe(true);
    expect(outer.isDisposed).toBe(true);
    expect(inner.isDisposed).toBe(true);
    expect(table.isDisposed).toBe(true);
    expect(inline.isDisposed).toBe(true);
  });

  it('rejects use and a second release after dispose', () => {
    const document = TomlDocument.create().add('a', 1);
    document.dispose();
    expect(thrown(() => document.getValue('a'))).toMatchObject({
      code: 'UseAfterRelease',
      message: 'document has been disposed',
    });
    expect(thrown(() => document.dispose())).toBeInstanceOf(TomlStateError);
  });

  it('releases an owned node only through its container', () => {
    const array = new TomlArray();
    TomlDocument.create().add('list', array);
    expect(array.isOwned).toBe(true);
    expect(thrown(() => array.dispose())).toMatchObject({ code: 'AlreadyOwned' });
    expect(array.isDisposed).toBe(false);
  });

  it('refuses to attach a node to a second container', () => {
    const array = new TomlArray();
    const document = TomlDocument.create().add('x', array);
    expect(thrown(() => document.add('y', array))).toMatchObject({
      code: 'AlreadyOwned',
      message: 'Array already belongs to another container',
    });
    expect(document.size).toBe(1);
  });

  it('refuses cycles', () => {
    const self = new TomlArray();
    expect(thrown(() => self.add(self))).toMatchObject({
      code: 'AlreadyOwned',
      message: 'Array cannot contain itself',
    });

    const outer = new TomlArray();
    const inner = new TomlArray();
    outer.add(inner);
    expect(thrown(() => inner.add(outer))).toMatchObject({ code: 'AlreadyOwned' });
    expect(inner.length).toBe(0);

    const table = new TomlTable('t');
    expect(thrown(() => table.add('self', table))).toMatchObject({
      code: 'AlreadyOwned',
      message: 'table `t` cannot contain itself',
    });
    expect(table.isOwned).toBe(false);
    expect(TomlDocument.create().add(table).tables).toEqual([table]);
  });

  it('leaves the value unattached when the container is disposed', () => {
    const inner = new TomlArray();
    const disposed = TomlDocument.create();
    disposed.dispose();
    expect(thrown(() => disposed.add('k', inner))).toMatchObject({ code: 'UseAfterRelease' });
    expect(inner.isOwned).toBe(false);
    const document = TomlDocument.create().add('k', inner);
    expect(document.getValue('k').array).toBe(inner);
  });

  it('refuses a disposed node', () => {
    const array = new TomlArray();
    array.dispose();
    expect(thrown(() => TomlDocument.create().add('x', array))).toMatchObject({ code: 'UseAfterRelease' });
  });
});
