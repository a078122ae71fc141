/**
 * TOML tree to text. Text is written bare where it reads back unchanged and
 * quoted otherwise; no escape sequences are produced.
 */

import type { TomlArray } from './array.js';
import type { TomlDocument } from './document.js';
import { TomlEncodeError } from './errors.js';
import { isAmbiguousText } from './infer.js';
import type { TomlKeyValue } from './key-value.js';
import type { StringifyOptions } from './options.js';
import type { TomlTable } from './table.js';
import { formatDateTime, formatTimeSpan } from './time.js';
import type { TomlValue } from './value.js';
import { assertNever } from './value.js';

const STRUCTURAL_RE = /[#=,[\]{}"'\r\n\uFEFF]/;

function needsQuote(s: string): boolean {
  if (s.length === 0) return true;
  if (s.includes(' ')) return true;
  if (s.trim() !== s) return true;
  return STRUCTURAL_RE.test(s);
}

function quote(s: string): string {
  if (!s.includes('"')) return `"${s}"`;
  if (!s.includes("'")) return `'${s}'`;
  throw new TomlEncodeError('Unrepresentable', `Text ${JSON.stringify(s)} contains both quote characters`);
}

export function formatText(s: string): string {
  return needsQuote(s) || isAmbiguousText(s) ? quote(s) : s;
}

export function formatKey(key: string): string {
  return needsQuote(key) ? quote(key) : key;
}

export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return 'nan';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  if (Object.is(n, -0)) return '-0';
  return String(n);
}

export function stringifyValue(value: TomlValue): string {
  switch (value.kind) {
    case 'text':
      return formatText(value.text);
    case 'number':
      return formatNumber(value.number);
    case 'boolean':
      return value.boolean ? 'true' : 'false';
    case 'dateTime':
      return formatDateTime(value.dateTime);
    case 'timeSpan':
      return formatTimeSpan(value.timeSpan);
    case 'array':
      return stringifyArray(value.array);
    case 'table':
      return stringifyInlineTable(value.table);
    default:
      return assertNever(value);
  }
}

export function stringifyArray(array: TomlArray): string {
  return `[${array.values().map(stringifyValue).join(', ')}]`;
}

export function stringifyInlineTable(table: TomlTable): string {
  if (table.size === 0) return '{}';
  return `{ ${table.keyValues.map((kv) => stringifyKeyValue(kv)).join(', ')} }`;
}

export function stringifyKeyValue(keyValue: TomlKeyValue): string {
  return `${formatKey(keyValue.key)} = ${stringifyValue(keyValue.value)}`;
}

function tableLines(table: TomlTable): string[] {
  return [`[${formatKey(table.name)}]`, ...table.keyValues.map((kv) => stringifyKeyValue(kv))];
}

export function stringifyTable(table: TomlTable, options: StringifyOptions = {}): string {
  const newline = options.newline ?? '\n';
  return tableLines(table).join(newline);
}

/**
 * Serialize a document: top-level entries first, then each table, separated
 * by a blank line. Non-empty output ends with a newline.
 */
export function stringifyDocument(document: TomlDocument, options: StringifyOptions = {}): string {
  const newline = options.newline ?? '\n';
  const lines = document.keyValues.map((kv) => stringifyKeyValue(kv));
  for (const table of document.tables) {
    if (lines.length > 0) lines.push('');
    lines.push(...tableLines(table));
  }
  return lines.length > 0 ? lines.join(newline) + newline : '';
}
