/**
 * Parse TOML text into an owned document tree and serialize it back.
 */

import { TomlDocument } from './document.js';
import type { ParseResult } from './document.js';
import type { ParseOptions, StringifyOptions } from './options.js';
import { stringifyDocument } from './stringify.js';

export { TomlArray } from './array.js';
export { TomlDocument } from './document.js';
export type { ParseResult, TextSink } from './document.js';
export type { TryGetResult } from './entries.js';
export {
  TomlAccessError,
  TomlEncodeError,
  TomlError,
  TomlParseError,
  TomlStateError,
} from './errors.js';
export type {
  SourcePosition,
  TomlAccessErrorCode,
  TomlEncodeErrorCode,
  TomlErrorCode,
  TomlParseErrorCode,
  TomlStateErrorCode,
} from './errors.js';
export { TomlKeyValue } from './key-value.js';
export { Lexer, TokenKind } from './lexer.js';
export type { LexerOptions, Token } from './lexer.js';
export { DEFAULT_MAX_DEPTH } from './options.js';
export type { DuplicateKeyPolicy, LoggerFn, ParseOptions, StringifyOptions } from './options.js';
export { TomlTable } from './table.js';
export { TimeSpan } from './time.js';
export {
  arrayValue,
  asArray,
  asBoolean,
  asDateTime,
  asNumber,
  asTable,
  asText,
  asTimeSpan,
  booleanValue,
  dateTimeValue,
  isArray,
  isBoolean,
  isDateTime,
  isNumber,
  isTable,
  isText,
  isTimeSpan,
  numberValue,
  tableValue,
  textValue,
  timeSpanValue,
  toValue,
} from './value.js';
export type { TomlInput, TomlValue, TomlValueKind, ValueOf } from './value.js';

export function parse(text: string, options?: ParseOptions): TomlDocument {
  return TomlDocument.parse(text, options);
}

export function tryParse(text: string, options?: ParseOptions): ParseResult {
  return TomlDocument.tryParse(text, options);
}

export function stringify(document: TomlDocument, options?: StringifyOptions): string {
  return stringifyDocument(document, options);
}
