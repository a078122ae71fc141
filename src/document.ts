/**
 * TOML document root: top-level key-values plus `[name]` tables.
 */

import { KeyValueContainer } from './entries.js';
import type { TryGetResult } from './entries.js';
import { TomlAccessError, TomlError } from './errors.js';
import type { ParseOptions, StringifyOptions } from './options.js';
import { resolveParseOptions } from './options.js';
import { parseInto } from './parser.js';
import { stringifyDocument } from './stringify.js';
import type { TomlTable } from './table.js';
import type { TomlInput } from './value.js';

export type ParseResult = { success: true; document: TomlDocument } | { success: false; error: TomlError };

/** Anything that accepts text chunks, such as a Node `Writable`. */
export interface TextSink {
  write(chunk: string): unknown;
}

export class TomlDocument extends KeyValueContainer {
  private readonly tableList: TomlTable[] = [];

  protected get label(): string {
    return 'document';
  }

  /** An empty document for building in memory. */
  static create(): TomlDocument {
    return new TomlDocument();
  }

  /** Parse TOML text. Throws `TomlParseError` on malformed input. */
  static parse(text: string, options?: ParseOptions): TomlDocument {
    return parseInto(new TomlDocument(), text, options);
  }

  /**
   * Parse TOML text without throwing for malformed input. A failed parse
   * yields no document; the reason is returned and passed to `options.log`.
   */
  static tryParse(text: string, options?: ParseOptions): ParseResult {
    try {
      return { success: true, document: TomlDocument.parse(text, options) };
    } catch (error) {
      if (!(error instanceof TomlError)) throw error;
      resolveParseOptions(options).log(`TOML parse failed: ${error.toString()}`);
      return { success: false, error };
    }
  }

  get tables(): readonly TomlTable[] {
    this.assertLive();
    return this.tableList;
  }

  add(table: TomlTable): this;
  add(key: string, input: TomlInput): this;
  add(keyOrTable: string | TomlTable, input?: TomlInput): this {
    if (typeof keyOrTable !== 'string') return this.addTable(keyOrTable);
    if (input === undefined) {
      throw new TypeError(`No value given for key \`${keyOrTable}\``);
    }
    return super.add(keyOrTable, input);
  }

  addTable(table: TomlTable): this {
    this.adopt(table);
    this.tableList.push(table);
    return this;
  }

  containsTable(name: string): boolean {
    return this.findTable(name) !== undefined;
  }

  tryGetTable(name: string): TryGetResult<TomlTable> {
    const value = this.findTable(name);
    return value === undefined ? { found: false, value: undefined } : { found: true, value };
  }

  getTable(name: string): TomlTable {
    const table = this.findTable(name);
    if (table === undefined) {
      throw new TomlAccessError('MissingTable', `Table \`${name}\` is missing in document`);
    }
    return table;
  }

  private findTable(name: string): TomlTable | undefined {
    return this.tables.find((t) => t.name === name);
  }

  toString(options?: StringifyOptions): string {
    this.assertLive();
    return stringifyDocument(this, options);
  }

  /** Writes the serialized document to `sink` as a single chunk. */
  writeTo(sink: TextSink, options?: StringifyOptions): void {
    sink.write(this.toString(options));
  }

  protected override releaseChildren(): void {
    super.releaseChildren();
    for (const table of this.tableList) this.releaseOwned(table);
    this.tableList.length = 0;
  }
}
