/**
 * Scalar type inference for untyped (bare) text. One order is used for every
 * container: number, boolean, duration, offset date-time, local date-time,
 * and text when nothing else matches.
 */

import { parseDateTime, parseTimeSpan } from './time.js';
import type { TomlValue } from './value.js';
import { booleanValue, dateTimeValue, numberValue, textValue, timeSpanValue } from './value.js';

const DECIMAL_RE = /^[+-]?(?:\d(?:_?\d)*)?(?:\.\d(?:_?\d)*)?(?:[eE][+-]?\d(?:_?\d)*)?$/;
const RADIX_RE = /^(0x[\da-fA-F](?:_?[\da-fA-F])*|0o[0-7](?:_?[0-7])*|0b[01](?:_?[01])*)$/;
const SPECIAL_RE = /^([+-])?(inf|nan)$/;

export function parseNumber(text: string): number | undefined {
  const special = SPECIAL_RE.exec(text);
  if (special) {
    if (special[2] === 'nan') return NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }
  if (RADIX_RE.test(text)) {
    return Number(text.replace(/_/g, ''));
  }
  // the pattern admits "", "+" and "." alone; at least one digit is required
  if (!/\d/.test(text) || !DECIMAL_RE.test(text)) return undefined;
  const mantissa = text.split(/[eE]/)[0] ?? '';
  if (!/\d/.test(mantissa)) return undefined;
  const n = Number(text.replace(/_/g, ''));
  return Number.isNaN(n) ? undefined : n;
}

export function parseBoolean(text: string): boolean | undefined {
  const lower = text.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  return undefined;
}

/** Classifies trimmed bare text. */
export function inferScalar(text: string): TomlValue {
  const number = parseNumber(text);
  if (number !== undefined) return numberValue(number);

  const boolean = parseBoolean(text);
  if (boolean !== undefined) return booleanValue(boolean);

  const span = parseTimeSpan(text);
  if (span !== undefined) return timeSpanValue(span);

  const offsetDateTime = parseDateTime(text, { offset: true });
  if (offsetDateTime !== undefined) return dateTimeValue(offsetDateTime);

  const localDateTime = parseDateTime(text, { offset: false });
  if (localDateTime !== undefined) return dateTimeValue(localDateTime);

  return textValue(text);
}

/** True when bare text would read back as something other than text. */
export function isAmbiguousText(text: string): boolean {
  return inferScalar(text).kind !== 'text';
}
