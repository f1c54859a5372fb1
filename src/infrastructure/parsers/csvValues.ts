import type { ColumnType } from '../../domain/model/ColumnType.js';
import type { CellValue } from '../../domain/model/Row.js';

/** Types a single non-empty CSV value can be classified as. */
export type ValueKind = Extract<ColumnType, 'boolean' | 'int64' | 'float64' | 'date' | 'timestamp' | 'utf8'>;

const BOOLEAN_PATTERN = /^(true|false)$/i;
const INTEGER_PATTERN = /^-?\d+$/;
const FLOAT_PATTERN = /^-?(?:(?:\d*\.\d+|\d+\.\d*)(?:[eE][-+]?\d+)?|\d+[eE][-+]?\d+)$/;
const DATE_PATTERN = /^\d{4}-\d\d-\d\d$/;
const TIMESTAMP_PATTERN = /^\d{4}-\d\d-\d\d[T ]\d\d:\d\d:\d\d(?:\.\d{1,9})?Z?$/;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/** Classify one value. Empty values carry no type information and return `null`. */
export function classifyValue(value: string): ValueKind | null {
  if (value === '') return null;
  if (BOOLEAN_PATTERN.test(value)) return 'boolean';
  if (INTEGER_PATTERN.test(value)) return 'int64';
  if (FLOAT_PATTERN.test(value)) return 'float64';
  if (DATE_PATTERN.test(value)) return 'date';
  if (TIMESTAMP_PATTERN.test(value)) return 'timestamp';
  return 'utf8';
}

/**
 * Column type for the set of kinds seen in a column: nothing seen is `null`,
 * integers mixed with floats widen to `float64`, dates mixed with timestamps
 * widen to `timestamp`, any other mix is `utf8`.
 */
export function mergeKinds(kinds: ReadonlySet<ValueKind>): ColumnType {
  if (kinds.size === 0) return 'null';
  const only = (...allowed: ValueKind[]): boolean => [...kinds].every((kind) => allowed.includes(kind));
  if (kinds.size === 1) {
    const [kind] = kinds;
    return kind ?? 'null';
  }
  if (only('int64', 'float64')) return 'float64';
  if (only('date', 'timestamp')) return 'timestamp';
  return 'utf8';
}

/** Thrown by `decodeCell()`; the caller adds row and column. */
export class CellDecodeError extends Error {
  readonly name = 'CellDecodeError';
}

function decodeInt32(value: string): number {
  if (!INTEGER_PATTERN.test(value)) {
    throw new CellDecodeError(`cannot parse '${value}' as int32`);
  }
  const parsed = Number(value);
  if (parsed < INT32_MIN || parsed > INT32_MAX) {
    throw new CellDecodeError(`'${value}' is out of range for int32`);
  }
  return parsed;
}

function decodeInt64(value: string): bigint {
  if (!INTEGER_PATTERN.test(value)) {
    throw new CellDecodeError(`cannot parse '${value}' as int64`);
  }
  const parsed = BigInt(value);
  if (parsed < INT64_MIN || parsed > INT64_MAX) {
    throw new CellDecodeError(`'${value}' is out of range for int64`);
  }
  return parsed;
}

function decodeTimestamp(value: string, type: 'date' | 'timestamp'): Date {
  let iso: string;
  if (DATE_PATTERN.test(value)) {
    iso = `${value}T00:00:00Z`;
  } else if (type === 'timestamp' && TIMESTAMP_PATTERN.test(value)) {
    iso = value.replace(' ', 'T');
    if (!iso.endsWith('Z')) iso += 'Z';
  } else {
    throw new CellDecodeError(`cannot parse '${value}' as ${type}`);
  }
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    throw new CellDecodeError(`'${value}' is not a valid ${type}`);
  }
  return date;
}

/** Decode one value for a column of the given type. Empty values decode to `null`. */
export function decodeCell(value: string, type: ColumnType): CellValue {
  if (value === '') return null;
  switch (type) {
    case 'int32':
      return decodeInt32(value);
    case 'int64':
      return decodeInt64(value);
    case 'float32':
    case 'float64':
      if (!INTEGER_PATTERN.test(value) && !FLOAT_PATTERN.test(value)) {
        throw new CellDecodeError(`cannot parse '${value}' as ${type}`);
      }
      return Number(value);
    case 'boolean':
      if (!BOOLEAN_PATTERN.test(value)) {
        throw new CellDecodeError(`cannot parse '${value}' as boolean`);
      }
      return value.toLowerCase() === 'true';
    case 'date':
    case 'timestamp':
      return decodeTimestamp(value, type);
    case 'utf8':
    case 'null':
      return value;
  }
}
