// ============================================================================
// @resp3-value/core — Value Constructors
// ============================================================================
//
// Byte payloads given as strings are UTF-8 encoded into a fresh buffer the
// value owns. Payloads given as Uint8Array are borrowed views: they are not
// copied, and must not be mutated while the value is in use. Call
// `ownBytes()` first when the value has to outlive its source buffer.
// ============================================================================

import type { TableOptionsInput } from './config.js';
import { equals } from './equality.js';
import { UnsupportedVariantError, ValueConstructionError } from './errors.js';
import { inspect } from './inspect.js';
import { hash } from './structural_hash.js';
import { HashTable } from './table.js';
import type { KeyStrategy } from './table.js';
import { PREFIX, UNMODELED_PREFIX, VALUE_KINDS, VerbatimFormat } from './types.js';
import type {
  ArrayValue,
  BlobErrorValue,
  BlobStringValue,
  BooleanValue,
  ByteInput,
  MapValue,
  NullValue,
  NumberValue,
  SetValue,
  SimpleErrorValue,
  SimpleStringValue,
  Value,
  ValueKind,
  ValueTable,
  VerbatimStringValue,
  WireError,
} from './types.js';

const sharedTextEncoder = new TextEncoder();

const CR = 0x0d;
const LF = 0x0a;
const SPACE = 0x20;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/** Convert a payload to bytes. Strings are encoded, byte arrays borrowed. */
export function toBytes(input: ByteInput): Uint8Array {
  return typeof input === 'string' ? sharedTextEncoder.encode(input) : input;
}

/** Owned copy of a borrowed view. */
export function ownBytes(view: Uint8Array): Uint8Array {
  return view.slice();
}

function assertNoLineBreak(kind: ValueKind, field: string, bytes: Uint8Array): void {
  if (bytes.includes(CR) || bytes.includes(LF)) {
    throw new ValueConstructionError(kind, `${field} must not contain CR or LF`);
  }
}

function wireError(kind: ValueKind, code: ByteInput, message: ByteInput): WireError {
  const error = { code: toBytes(code), message: toBytes(message) };
  if (error.code.includes(SPACE)) {
    throw new ValueConstructionError(kind, 'error code must not contain a space');
  }
  return error;
}

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export function blobString(bytes: ByteInput): BlobStringValue {
  return { kind: 'BlobString', bytes: toBytes(bytes) };
}

/**
 * @throws {ValueConstructionError} If the payload contains CR or LF
 */
export function simpleString(bytes: ByteInput): SimpleStringValue {
  const payload = toBytes(bytes);
  assertNoLineBreak('SimpleString', 'payload', payload);
  return { kind: 'SimpleString', bytes: payload };
}

/**
 * Single-line error, framed as `-<code> <message>\r\n`.
 *
 * @throws {ValueConstructionError} If code or message contain CR or LF, or code contains a space
 */
export function simpleError(code: ByteInput, message: ByteInput): SimpleErrorValue {
  const error = wireError('SimpleError', code, message);
  assertNoLineBreak('SimpleError', 'code', error.code);
  assertNoLineBreak('SimpleError', 'message', error.message);
  return { kind: 'SimpleError', error };
}

/**
 * Signed 64-bit integer. Negative values are allowed.
 *
 * @throws {ValueConstructionError} If `n` is not an integer in the int64 range
 *   (or, for `number`, not a safe integer)
 */
export function number(n: number | bigint): NumberValue {
  if (typeof n === 'number') {
    if (!Number.isSafeInteger(n)) {
      throw new ValueConstructionError('Number', `${n} is not a safe integer; pass a bigint`);
    }
    return { kind: 'Number', value: BigInt(n) };
  }
  if (n < INT64_MIN || n > INT64_MAX) {
    throw new ValueConstructionError('Number', `${n} is outside the signed 64-bit range`);
  }
  return { kind: 'Number', value: n };
}

const NULL: NullValue = Object.freeze({ kind: 'Null' });

export function nullValue(): NullValue {
  return NULL;
}

export function boolean(value: boolean): BooleanValue {
  return { kind: 'Boolean', value };
}

/**
 * Length-prefixed error, framed as `!<len>\r\n<code> <message>\r\n`.
 * The message may span lines.
 */
export function blobError(code: ByteInput, message: ByteInput): BlobErrorValue {
  return { kind: 'BlobError', error: wireError('BlobError', code, message) };
}

export function verbatimString(format: VerbatimFormat, bytes: ByteInput): VerbatimStringValue {
  if (format !== VerbatimFormat.Text && format !== VerbatimFormat.Markdown) {
    throw new ValueConstructionError('VerbatimString', `unknown format ${String(format)}`);
  }
  return { kind: 'VerbatimString', verbatim: { format, bytes: toBytes(bytes) } };
}

// ---------------------------------------------------------------------------
// Composites
// ---------------------------------------------------------------------------

export function array(items: readonly Value[]): ArrayValue {
  return { kind: 'Array', items: Object.freeze([...items]) };
}

/** Ordered set. Element order is kept and takes part in equality. */
export function set(items: readonly Value[]): SetValue {
  return { kind: 'Set', items: Object.freeze([...items]) };
}

/** Key identity for tables keyed by values. */
export const valueKeyStrategy: KeyStrategy<Value> = {
  hash,
  equals,
  describe: inspect,
};

/**
 * Empty table keyed by structural value identity. Duplicate keys overwrite
 * unless `options.duplicateKeys` is `'reject'`.
 */
export function createValueTable(options?: TableOptionsInput): ValueTable {
  return new HashTable<Value, Value>(valueKeyStrategy, options);
}

/**
 * Run `fn` with a fresh table and release the table when `fn` returns or
 * throws. Values built on the table must not escape `fn`.
 *
 * @example
 * ```ts
 * const len = withValueTable((table) => {
 *   table.set(simpleString('first'), number(1));
 *   return encodedLength(map(table));
 * });
 * ```
 */
export function withValueTable<T>(fn: (table: ValueTable) => T, options?: TableOptionsInput): T {
  const table = createValueTable(options);
  try {
    return fn(table);
  } finally {
    table.release();
  }
}

/**
 * Map value.
 *
 * Given a table, the table is frozen and wrapped without copying; the caller
 * still owns it and releases it. Given entries, a new table is built with
 * the `'reject'` duplicate-key policy unless `options` says otherwise.
 *
 * A given table must be keyed by `valueKeyStrategy`, as tables from
 * `createValueTable` are.
 *
 * @throws {MapKeyCollisionError} On a structurally duplicate key under `'reject'`
 * @throws {ValueConstructionError} If a given table uses another key strategy
 */
export function map(
  entries: ValueTable | Iterable<readonly [Value, Value]>,
  options?: TableOptionsInput,
): MapValue {
  if (entries instanceof HashTable) {
    if (!entries.usesStrategy(valueKeyStrategy)) {
      throw new ValueConstructionError('Map', 'table must be keyed by valueKeyStrategy');
    }
    return { kind: 'Map', entries: entries.freeze() };
  }
  const table = createValueTable({ duplicateKeys: 'reject', ...options });
  for (const [key, value] of entries) {
    table.set(key, value);
  }
  return { kind: 'Map', entries: table.freeze() };
}

// ---------------------------------------------------------------------------
// Prefix bytes
// ---------------------------------------------------------------------------

export function prefixOf(kind: ValueKind): number {
  return PREFIX[kind];
}

const KIND_BY_PREFIX = new Map<number, ValueKind>(
  VALUE_KINDS.map((kind): [number, ValueKind] => [PREFIX[kind], kind]),
);

/**
 * Kind announced by a wire prefix byte.
 *
 * @throws {UnsupportedVariantError} For RESP3 kinds not modeled here and for unknown bytes
 */
export function kindFromPrefix(byte: number): ValueKind {
  const kind = KIND_BY_PREFIX.get(byte);
  if (kind !== undefined) return kind;

  const unmodeled = UNMODELED_PREFIX.get(byte);
  if (unmodeled !== undefined) {
    throw new UnsupportedVariantError(unmodeled, 'not modeled');
  }
  throw new UnsupportedVariantError(
    `0x${byte.toString(16).padStart(2, '0')}`,
    'unknown prefix byte',
  );
}
