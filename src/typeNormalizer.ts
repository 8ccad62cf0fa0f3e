import type { ColumnDefinition, IndexDefinition, IntrospectedType } from './model';

/**
 * Canonical spellings for PostgreSQL types, defaults and index predicates,
 * so that a declared schema and an introspected schema compare as equal.
 *
 * Every function here is pure and idempotent.
 */

const TYPE_ALIASES: ReadonlyMap<string, string> = new Map([
  ['int', 'integer'],
  ['int4', 'integer'],
  ['integer', 'integer'],
  ['serial', 'integer'],
  ['serial4', 'integer'],
  ['int8', 'bigint'],
  ['bigint', 'bigint'],
  ['bigserial', 'bigint'],
  ['serial8', 'bigint'],
  ['int2', 'smallint'],
  ['smallint', 'smallint'],
  ['float8', 'double precision'],
  ['double', 'double precision'],
  ['double precision', 'double precision'],
  ['float4', 'real'],
  ['real', 'real'],
  ['bool', 'boolean'],
  ['boolean', 'boolean'],
  ['varchar', 'varchar'],
  ['character varying', 'varchar'],
  ['char', 'char'],
  ['character', 'char'],
  ['bpchar', 'char'],
  ['text', 'text'],
  ['numeric', 'numeric'],
  ['decimal', 'numeric'],
  ['timestamptz', 'timestamptz'],
  ['timestamp with time zone', 'timestamptz'],
  ['timestamp', 'timestamp'],
  ['timestamp without time zone', 'timestamp'],
  ['date', 'date'],
  ['json', 'json'],
  ['jsonb', 'jsonb'],
  ['uuid', 'uuid'],
]);

const LOGICAL_TYPES: ReadonlyMap<string, IntrospectedType> = new Map([
  ['integer', 'integer'],
  ['bigint', 'bigint'],
  ['smallint', 'smallint'],
  ['numeric', 'decimal'],
  ['double precision', 'float'],
  ['real', 'float'],
  ['boolean', 'boolean'],
  ['varchar', 'string'],
  ['char', 'string'],
  ['text', 'text'],
  ['timestamp', 'timestamp'],
  ['timestamptz', 'timestamptz'],
  ['date', 'date'],
  ['json', 'json'],
  ['jsonb', 'json'],
  ['uuid', 'uuid'],
  ['text[]', 'text_array'],
]);

interface ParsedType {
  readonly base: string;
  readonly modifiers: readonly number[];
  readonly array: boolean;
}

function parseNativeType(raw: string): ParsedType {
  let s = raw.trim().toLowerCase().replace(/\s+/g, ' ');
  let array = false;

  if (s.endsWith('[]')) {
    array = true;
    s = s.slice(0, -2).trim();
  } else if (s.startsWith('_')) {
    // udt_name spelling of array types, e.g. _text
    array = true;
    s = s.slice(1);
  }

  let modifiers: number[] = [];
  const modifierMatch = /\(([^)]*)\)/.exec(s);
  if (modifierMatch) {
    modifiers = modifierMatch[1]
      .split(',')
      .map(part => Number.parseInt(part.trim(), 10))
      .filter(n => !Number.isNaN(n));
    s = (s.slice(0, modifierMatch.index) + s.slice(modifierMatch.index + modifierMatch[0].length))
      .replace(/\s+/g, ' ')
      .trim();
  }

  let base = TYPE_ALIASES.get(s) ?? s;

  // float(p) is real up to 24 bits of precision, double precision beyond
  if (s === 'float') {
    base = modifiers.length > 0 && modifiers[0] <= 24 ? 'real' : 'double precision';
    modifiers = [];
  }

  return { base, modifiers, array };
}

/**
 * Map a native type spelling to its canonical form, e.g. `FLOAT8` and
 * `DOUBLE PRECISION` both become `double precision`.
 */
export function normalizeNativeType(raw: string): string {
  const { base, modifiers, array } = parseNativeType(raw);
  const modifierStr = modifiers.length > 0 ? `(${modifiers.join(',')})` : '';
  return `${base}${modifierStr}${array ? '[]' : ''}`;
}

export function isKnownNativeType(raw: string): boolean {
  return logicalTypeOf(raw) !== 'unknown';
}

export function logicalTypeOf(nativeType: string): IntrospectedType {
  const { base, array } = parseNativeType(nativeType);
  return LOGICAL_TYPES.get(array ? `${base}[]` : base) ?? 'unknown';
}

/**
 * Length, precision and scale carried by a type's modifiers.
 */
export function typeModifiers(nativeType: string): { maxLength?: number; precision?: number; scale?: number } {
  const { base, modifiers } = parseNativeType(nativeType);
  if (modifiers.length === 0) return {};
  if (base === 'varchar' || base === 'char') {
    return { maxLength: modifiers[0] };
  }
  if (base === 'numeric') {
    return { precision: modifiers[0], scale: modifiers[1] ?? 0 };
  }
  return {};
}

// === Defaults ===

const BOOLEAN_LITERALS: ReadonlyMap<string, string> = new Map([
  ['t', 'true'],
  ['true', 'true'],
  ['1', 'true'],
  ['f', 'false'],
  ['false', 'false'],
  ['0', 'false'],
]);

const TRAILING_CAST = /::\s*[a-z_][a-z0-9_ ]*(\([^)]*\))?(\[\])?\s*$/i;

function lowercaseOutsideLiterals(text: string): string {
  return text
    .split("'")
    .map((part, i) => (i % 2 === 0 ? part.toLowerCase() : part))
    .join("'");
}

/**
 * Canonical default expression. When `nativeType` is boolean, `0`/`1` and
 * `f`/`t` collapse to `false`/`true` as well.
 */
export function normalizeDefault(raw: string | null | undefined, nativeType?: string): string | null {
  if (raw === null || raw === undefined) return null;
  let value = raw.trim();
  if (value === '') return null;

  // Casts and parentheses can nest either way round
  let previous: string;
  do {
    previous = value;
    value = stripOuterParens(value.replace(TRAILING_CAST, '').trim());
  } while (value !== previous);
  value = lowercaseOutsideLiterals(value).replace(/\s+/g, ' ');

  if (value === 'current_timestamp' || value === 'transaction_timestamp()') {
    value = 'now()';
  }

  const quotedNumber = /^'(-?\d+(?:\.\d+)?)'$/.exec(value);
  if (quotedNumber) {
    value = quotedNumber[1];
  }

  const isBooleanColumn = nativeType === undefined || normalizeNativeType(nativeType) === 'boolean';
  const unquoted = value.replace(/^'(.*)'$/, '$1').toLowerCase();
  const booleanLiteral = BOOLEAN_LITERALS.get(unquoted);
  if (booleanLiteral !== undefined) {
    const numeric = unquoted === '0' || unquoted === '1';
    if (isBooleanColumn || !numeric) {
      value = booleanLiteral;
    }
  }

  return value;
}

// === Predicates ===

/**
 * Index of the parenthesis closing the one at `open`, ignoring parentheses
 * inside string literals. -1 when unbalanced.
 */
function matchingParen(text: string, open: number): number {
  let depth = 0;
  let inLiteral = false;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === "'") {
      inLiteral = !inLiteral;
    } else if (!inLiteral && ch === '(') {
      depth++;
    } else if (!inLiteral && ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function stripOuterParens(text: string): string {
  let result = text.trim();
  while (result.startsWith('(') && matchingParen(result, 0) === result.length - 1) {
    result = result.slice(1, -1).trim();
  }
  return result;
}

/**
 * Canonical partial-index predicate: whitespace collapsed and balanced outer
 * parentheses removed. Inner parenthesized terms are kept, so
 * `((a IS NULL) AND (b = 1))` becomes `(a IS NULL) AND (b = 1)`.
 */
export function normalizePredicate(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  const collapsed = raw.replace(/\s+/g, ' ').trim();
  if (collapsed === '') return null;
  const stripped = stripOuterParens(collapsed);
  return stripped === '' ? null : stripped;
}

// === Definitions ===

export function normalizeColumn(column: ColumnDefinition): ColumnDefinition {
  const nativeType = normalizeNativeType(column.nativeType);
  return {
    ...column,
    nativeType,
    default: normalizeDefault(column.default, nativeType),
  };
}

export function normalizeIndex(index: IndexDefinition): IndexDefinition {
  return {
    ...index,
    method: index.method.toLowerCase(),
    predicate: normalizePredicate(index.predicate),
  };
}
