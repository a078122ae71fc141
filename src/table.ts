/**
 * A named table: `[name]` followed by its key-values, or an inline `{ ... }`
 * value. The name is fixed at construction.
 */

import { KeyValueContainer } from './entries.js';
import type { StringifyOptions } from './options.js';
import { stringifyTable } from './stringify.js';

export class TomlTable extends KeyValueContainer {
  readonly kind = 'table' as const;
  readonly name: string;

  constructor(name: string) {
    super();
    this.name = name;
  }

  protected get label(): string {
    return this.name ? `table \`${this.name}\`` : 'inline table';
  }

  /** Header form: `[name]` then one entry per line. */
  toString(options?: StringifyOptions): string {
    this.assertLive();
    return stringifyTable(this, options);
  }
}
