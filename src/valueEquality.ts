import type { IntrospectedType } from './model';

const INTEGER_TYPES: ReadonlySet<IntrospectedType> = new Set(['integer', 'bigint', 'smallint']);
const TEMPORAL_TYPES: ReadonlySet<IntrospectedType> = new Set(['timestamp', 'timestamptz', 'date']);

/**
 * Compare a stored value with an incoming one. Drivers hand back numerics as
 * strings and timestamps as Dates, so the column type decides how the two
 * are compared.
 *
 * Integer and decimal columns compare exactly; only `float` goes through
 * `Number`. Strings are read as instants only for temporal columns.
 */
export function valuesEqual(a: unknown, b: unknown, type?: IntrospectedType): boolean {
  // Handle null/undefined
  if ((a === null || a === undefined) && (b === null || b === undefined)) return true;
  if (a === null || a === undefined || b === null || b === undefined) return false;

  if (type !== undefined && INTEGER_TYPES.has(type)) {
    const x = toBigIntIfPossible(a);
    const y = toBigIntIfPossible(b);
    if (x !== null && y !== null) return x === y;
  }

  if (type === 'decimal') {
    const x = toDecimalString(a);
    const y = toDecimalString(b);
    if (x !== null && y !== null) return x === y;
  }

  if (type === 'float') {
    const x = toNumberIfPossible(a);
    const y = toNumberIfPossible(b);
    if (x !== null && y !== null) return x === y;
  }

  // Handle dates - normalize to epoch milliseconds for comparison
  const temporal = type !== undefined && TEMPORAL_TYPES.has(type);
  const aDate = toDateIfPossible(a, temporal);
  const bDate = toDateIfPossible(b, temporal);
  if (aDate !== null && bDate !== null) {
    return aDate.getTime() === bDate.getTime();
  }

  // Handle objects/arrays (deep equality via JSON)
  if (typeof a === 'object' && typeof b === 'object') {
    return JSON.stringify(a) === JSON.stringify(b);
  }

  return a === b;
}

function toBigIntIfPossible(value: unknown): bigint | null {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') return Number.isInteger(value) ? BigInt(value) : null;
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return BigInt(value.trim());
  return null;
}

/** `'019.900'` and `19.9` both become `'19.9'`; anything else is `null`. */
function toDecimalString(value: unknown): string | null {
  let text: string;
  if (typeof value === 'bigint') {
    text = value.toString();
  } else if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    text = String(value);
  } else if (typeof value === 'string') {
    text = value.trim();
  } else {
    return null;
  }

  const match = /^([+-]?)(\d*)(?:\.(\d*))?$/.exec(text);
  if (match === null) return null;
  const digits = match[2] ?? '';
  const decimals = match[3] ?? '';
  if (digits === '' && decimals === '') return null;

  const whole = digits.replace(/^0+/, '') || '0';
  const fraction = decimals.replace(/0+$/, '');
  const sign = match[1] === '-' && (whole !== '0' || fraction !== '') ? '-' : '';
  return fraction === '' ? `${sign}${whole}` : `${sign}${whole}.${fraction}`;
}

function toNumberIfPossible(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isNaN(n) ? null : n;
  }
  return null;
}

function toDateIfPossible(value: unknown, temporal: boolean): Date | null {
  if (value instanceof Date) {
    return value;
  }
  if (temporal && typeof value === 'string' && /^\d{4}-\d{2}-\d{2}/.test(value)) {
    const date = new Date(value);
    if (!isNaN(date.getTime())) {
      return date;
    }
  }
  return null;
}

/**
 * A JSON-safe rendering of a column value, as stored in audit entries.
 */
export function toJsonValue(value: unknown): unknown {
  if (value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  return value;
}
