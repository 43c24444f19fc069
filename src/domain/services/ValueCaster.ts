import type { ColumnDefinition } from '../model/ColumnSchema.js';
import { decimalShape } from '../model/ColumnSchema.js';
import type { CastResult } from '../model/CastResult.js';
import { castOk, castFailed } from '../model/CastResult.js';
import { isEmptyValue } from '../model/Record.js';
import type { TypedValue } from '../model/TypedTable.js';

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;
const UTC_OFFSET = /^([+-])(\d{2}):?(\d{2})?$/;
const EPOCH_TEXT = /^[+-]?\d+(?:\.\d+)?$/;
const INTEGER_TEXT = /^([+-]?\d+)(?:\.0*)?$/;
const DECIMAL_TEXT = /^([+-])?(?:(\d+)(?:\.(\d*))?|\.(\d+))$/;
const EXPONENT_TEXT = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/;

const MAX_SAFE_BIGINT = BigInt(Number.MAX_SAFE_INTEGER);

/** Epoch magnitudes below which a value is read as seconds, milliseconds, microseconds. Above: nanoseconds. */
const EPOCH_SECONDS_LIMIT = 1e11;
const EPOCH_MILLIS_LIMIT = 1e14;
const EPOCH_MICROS_LIMIT = 1e17;

/**
 * Cast a source value to the column's semantic type.
 *
 * Empty values become `null`, or a `REQUIRED` error when the column is required.
 */
export function castValue(column: ColumnDefinition, value: unknown): CastResult<TypedValue> {
  if (isEmptyValue(value)) {
    return column.required
      ? castFailed(column.name, 'REQUIRED', `Column '${column.name}' is required`, value)
      : castOk(null);
  }

  switch (column.type) {
    case 'timestamp':
      return castTimestamp(column.name, value);
    case 'integer':
      return castInteger(column.name, value);
    case 'decimal':
      return castDecimal(column, value);
    case 'text':
      return castText(column, value);
  }
}

/**
 * Accepts `Date` objects, ISO-8601 strings (UTC unless an offset is given), and
 * epoch values whose unit is inferred from their magnitude.
 */
export function castTimestamp(field: string, value: unknown): CastResult<Date> {
  let date: Date | null = null;

  if (value instanceof Date) {
    date = new Date(value.getTime());
  } else if (typeof value === 'number') {
    date = Number.isFinite(value) ? fromEpoch(value) : null;
  } else if (typeof value === 'bigint') {
    date = fromEpochBigInt(value);
  } else if (typeof value === 'string') {
    const text = value.trim();
    const match = ISO_TIMESTAMP.exec(text);
    if (match) {
      date = fromIsoMatch(match);
    } else if (EPOCH_TEXT.test(text)) {
      date = fromEpoch(Number(text));
    }
  }

  if (date === null || Number.isNaN(date.getTime())) {
    return castFailed(field, 'TYPE_MISMATCH', `Column '${field}' must be a valid timestamp`, value);
  }
  return castOk(date);
}

/** Accepts integral numbers, bigints and integer strings. A zero fraction (`'3.0'`) is tolerated. */
export function castInteger(field: string, value: unknown): CastResult<number> {
  let parsed: number | null = null;

  if (typeof value === 'number') {
    parsed = Number.isInteger(value) ? value : null;
  } else if (typeof value === 'bigint') {
    if (value > MAX_SAFE_BIGINT || value < -MAX_SAFE_BIGINT) {
      return outOfRange(field, value);
    }
    parsed = Number(value);
  } else if (typeof value === 'string') {
    const digits = INTEGER_TEXT.exec(value.trim())?.[1];
    parsed = digits === undefined ? null : Number(digits);
  }

  if (parsed === null) {
    return castFailed(field, 'TYPE_MISMATCH', `Column '${field}' must be an integer`, value);
  }
  if (!Number.isSafeInteger(parsed)) {
    return outOfRange(field, value);
  }
  return castOk(parsed === 0 ? 0 : parsed);
}

/**
 * Render a number, bigint or decimal string as fixed-point text with exactly
 * `scale` fraction digits, rounding half away from zero on the decimal digits.
 */
export function castDecimal(column: ColumnDefinition, value: unknown): CastResult<string> {
  const field = column.name;
  let text: string | null = null;

  if (typeof value === 'number') {
    text = Number.isFinite(value) ? expandExponent(String(value)) : null;
  } else if (typeof value === 'bigint') {
    text = value.toString();
  } else if (typeof value === 'string') {
    text = value.trim();
  }

  const match = text === null ? null : DECIMAL_TEXT.exec(text);
  if (!match) {
    return castFailed(field, 'TYPE_MISMATCH', `Column '${field}' must be a decimal number`, value);
  }

  const [, sign, intDigits, fracDigits, fracOnly] = match;
  const { precision, scale } = decimalShape(column);
  const fixed = toFixedPoint(sign === '-', intDigits ?? '', fracDigits ?? fracOnly ?? '', scale);

  if (fixed.integerDigits > precision - scale) {
    return outOfRange(field, value);
  }
  return castOk(fixed.text);
}

/** Strings pass through (trimmed when the column asks for it); scalars are stringified. */
export function castText(column: ColumnDefinition, value: unknown): CastResult<string> {
  if (typeof value === 'string') {
    return castOk(column.trim ? value.trim() : value);
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return castOk(String(value));
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return castOk(value.toISOString());
  }
  return castFailed(column.name, 'TYPE_MISMATCH', `Column '${column.name}' must be text`, value);
}

function outOfRange<T>(field: string, value: unknown): CastResult<T> {
  return castFailed(field, 'OUT_OF_RANGE', `Column '${field}' value is out of range`, value);
}

function fromEpoch(value: number): Date {
  const magnitude = Math.abs(value);
  if (magnitude < EPOCH_SECONDS_LIMIT) return new Date(value * 1000);
  if (magnitude < EPOCH_MILLIS_LIMIT) return new Date(value);
  if (magnitude < EPOCH_MICROS_LIMIT) return new Date(value / 1000);
  return new Date(value / 1e6);
}

function fromEpochBigInt(value: bigint): Date {
  const magnitude = value < 0n ? -value : value;
  if (magnitude < BigInt(EPOCH_SECONDS_LIMIT)) return new Date(Number(value) * 1000);
  if (magnitude < BigInt(EPOCH_MILLIS_LIMIT)) return new Date(Number(value));
  if (magnitude < BigInt(EPOCH_MICROS_LIMIT)) return new Date(Number(value / 1000n));
  return new Date(Number(value / 1_000_000n));
}

function fromIsoMatch(match: RegExpExecArray): Date | null {
  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, zone] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText ?? 0);
  const minute = Number(minuteText ?? 0);
  const second = Number(secondText ?? 0);
  const millis = Number((fraction ?? '').padEnd(3, '0').slice(0, 3));

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const offsetMinutes = parseOffsetMinutes(zone);
  if (offsetMinutes === null) return null;

  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  utc.setUTCHours(hour, minute, second, millis);
  return new Date(utc.getTime() - offsetMinutes * 60_000);
}

function parseOffsetMinutes(zone: string | undefined): number | null {
  if (zone === undefined || zone.toUpperCase() === 'Z') return 0;

  const match = UTC_OFFSET.exec(zone);
  if (!match) return null;

  const [, sign, hours, minutes] = match;
  const total = Number(hours) * 60 + Number(minutes ?? 0);
  return sign === '-' ? -total : total;
}

/** `String(1.5e-7)` → `'0.00000015'`; numbers without an exponent are returned unchanged. */
function expandExponent(text: string): string {
  const match = EXPONENT_TEXT.exec(text);
  if (!match) return text;

  const [, sign, intPart = '', fracPart = '', exponentText] = match;
  const digits = intPart + fracPart;
  const point = intPart.length + Number(exponentText);

  if (point <= 0) return `${sign ?? ''}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign ?? ''}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign ?? ''}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function toFixedPoint(
  negative: boolean,
  intDigits: string,
  fracDigits: string,
  scale: number,
): { text: string; integerDigits: number } {
  let kept = intDigits + fracDigits.slice(0, scale).padEnd(scale, '0');
  if (fracDigits.length > scale && fracDigits.charCodeAt(scale) >= 53) {
    kept = incrementDigits(kept);
  }

  const intPart = kept.slice(0, kept.length - scale).replace(/^0+/, '') || '0';
  const fracPart = kept.slice(kept.length - scale);
  const isZero = intPart === '0' && /^0*$/.test(fracPart);
  const sign = negative && !isZero ? '-' : '';

  return {
    text: scale > 0 ? `${sign}${intPart}.${fracPart}` : `${sign}${intPart}`,
    integerDigits: intPart === '0' ? 0 : intPart.length,
  };
}

function incrementDigits(digits: string): string {
  let result = '';
  let carry = true;

  for (let i = digits.length - 1; i >= 0; i--) {
    const digit: number = digits.charCodeAt(i) - 48 + (carry ? 1 : 0);
    carry = digit === 10;
    result = String(carry ? 0 : digit) + result;
  }

  return carry ? `1${result}` : result;
}
