/**
 * Parse and stringify options with their defaults.
 */

import { DEFAULT_MAX_INPUT_LENGTH } from './lexer.js';

export type LoggerFn = (message: string) => void;

export type DuplicateKeyPolicy = 'allow' | 'reject';

export interface ParseOptions {
  /** Max nesting depth of arrays and inline tables (default 256) */
  maxDepth?: number;
  /** Max input length in characters (default 1_000_000) */
  maxInputLength?: number;
  /**
   * `allow` (default) keeps every entry; lookups return the first one.
   * `reject` fails the parse with `DuplicateKey`.
   */
  duplicateKeys?: DuplicateKeyPolicy;
  /** Receives diagnostics: duplicate keys kept, and the reason a `tryParse` failed. */
  log?: LoggerFn;
}

export interface StringifyOptions {
  /** Line separator (default "\n") */
  newline?: string;
}

export const DEFAULT_MAX_DEPTH = 256;

const silent: LoggerFn = () => {};

export function resolveParseOptions(options: ParseOptions = {}): Required<ParseOptions> {
  return {
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    maxInputLength: options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH,
    duplicateKeys: options.duplicateKeys ?? 'allow',
    log: options.log ?? silent,
  };
}
