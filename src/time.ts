/**
 * Date-time and duration values: text codecs and the TimeSpan type.
 */

const MICROS_PER_MILLI = 1_000;
const MICROS_PER_SECOND = 1_000_000;
const MICROS_PER_MINUTE = 60 * MICROS_PER_SECOND;
const MICROS_PER_HOUR = 60 * MICROS_PER_MINUTE;
const MICROS_PER_DAY = 24 * MICROS_PER_HOUR;

/** `[-][d.]hh:mm[:ss[.fraction]]` */
const TIME_SPAN_RE = /^(-)?(?:(\d+)\.)?(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,7}))?)?$/;

/** `YYYY-MM-DD[(T| )hh:mm[:ss[.fraction]]][Z|±hh:mm]` */
const DATE_TIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?([Zz]|[+-]\d{2}:\d{2})?$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** Fraction digits (any count) to whole microseconds, truncating past six digits. */
function fractionToMicros(digits: string | undefined): number {
  if (!digits) return 0;
  return parseInt(digits.slice(0, 6).padEnd(6, '0'), 10);
}

function daysInMonth(year: number, month: number): number {
  const last = new Date(0);
  last.setUTCFullYear(year, month, 0);
  return last.getUTCDate();
}

/**
 * A signed duration with microsecond resolution.
 */
export class TimeSpan {
  readonly milliseconds: number;

  constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new RangeError(`TimeSpan must be finite, got ${milliseconds}`);
    }
    this.milliseconds = Math.round(milliseconds * MICROS_PER_MILLI) / MICROS_PER_MILLI;
  }

  static fromParts(parts: {
    days?: number;
    hours?: number;
    minutes?: number;
    seconds?: number;
    milliseconds?: number;
  }): TimeSpan {
    const ms =
      (parts.days ?? 0) * 86_400_000 +
      (parts.hours ?? 0) * 3_600_000 +
      (parts.minutes ?? 0) * 60_000 +
      (parts.seconds ?? 0) * 1_000 +
      (parts.milliseconds ?? 0);
    return new TimeSpan(ms);
  }

  get totalMicroseconds(): number {
    return Math.round(this.milliseconds * MICROS_PER_MILLI);
  }

  equals(other: TimeSpan): boolean {
    return this.totalMicroseconds === other.totalMicroseconds;
  }

  toString(): string {
    return formatTimeSpan(this);
  }
}

export function parseTimeSpan(text: string): TimeSpan | undefined {
  const m = TIME_SPAN_RE.exec(text);
  if (!m) return undefined;
  const [, sign, days, hours, minutes, seconds, fraction]: (string | undefined)[] = m;
  const h = Number(hours);
  const min = Number(minutes);
  const s = seconds === undefined ? 0 : Number(seconds);
  if (h > 23 || min > 59 || s > 59) return undefined;
  const micros =
    Number(days ?? 0) * MICROS_PER_DAY +
    h * MICROS_PER_HOUR +
    min * MICROS_PER_MINUTE +
    s * MICROS_PER_SECOND +
    fractionToMicros(fraction);
  if (!Number.isFinite(micros)) return undefined;
  return new TimeSpan(((sign ? -1 : 1) * micros) / MICROS_PER_MILLI);
}

export function formatTimeSpan(span: TimeSpan): string {
  const total = span.totalMicroseconds;
  let rest = Math.abs(total);
  const days = Math.floor(rest / MICROS_PER_DAY);
  rest -= days * MICROS_PER_DAY;
  const hours = Math.floor(rest / MICROS_PER_HOUR);
  rest -= hours * MICROS_PER_HOUR;
  const minutes = Math.floor(rest / MICROS_PER_MINUTE);
  rest -= minutes * MICROS_PER_MINUTE;
  const seconds = Math.floor(rest / MICROS_PER_SECOND);
  const micros = rest - seconds * MICROS_PER_SECOND;

  let out = total < 0 ? '-' : '';
  if (days > 0) out += `${days}.`;
  out += `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
  if (micros > 0) out += `.${pad(micros, 6).replace(/0+$/, '')}`;
  return out;
}

export interface DateTimeParseOptions {
  /** When true only text carrying `Z` or a numeric offset matches; when false only text without one. */
  offset: boolean;
}

/**
 * Parses an RFC 3339-style date or date-time. Local forms (no offset) are read
 * as UTC wall-clock time; offset forms are converted to UTC.
 */
export function parseDateTime(text: string, options: DateTimeParseOptions): Date | undefined {
  const m = DATE_TIME_RE.exec(text);
  if (!m) return undefined;
  const [, year, month, day, hours, minutes, seconds, fraction, offset]: (string | undefined)[] = m;
  if ((offset !== undefined) !== options.offset) return undefined;
  if (offset !== undefined && hours === undefined) return undefined;

  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hours ?? 0);
  const min = Number(minutes ?? 0);
  const s = Number(seconds ?? 0);
  if (mo < 1 || mo > 12 || d < 1 || h > 23 || min > 59 || s > 59) return undefined;
  if (d > daysInMonth(y, mo)) return undefined;

  const ms = Math.floor(fractionToMicros(fraction) / MICROS_PER_MILLI);
  const date = new Date(0);
  date.setUTCFullYear(y, mo - 1, d);
  date.setUTCHours(h, min, s, ms);

  if (offset !== undefined && offset !== 'Z' && offset !== 'z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    const offH = Number(offset.slice(1, 3));
    const offM = Number(offset.slice(4, 6));
    if (offH > 23 || offM > 59) return undefined;
    date.setTime(date.getTime() - sign * (offH * 60 + offM) * 60_000);
  }
  return isRepresentableDate(date) ? date : undefined;
}

export function formatDateTime(date: Date): string {
  const year = date.getUTCFullYear();
  const ms = date.getUTCMilliseconds();
  const base =
    `${pad(year, 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return ms > 0 ? `${base}.${pad(ms, 3)}Z` : `${base}Z`;
}

/** Years the text form can carry. */
export function isRepresentableDate(date: Date): boolean {
  const time = date.getTime();
  if (Number.isNaN(time)) return false;
  const year = date.getUTCFullYear();
  return year >= 0 && year <= 9999;
}
