// ============================================================================
// @resp3-value/core — Type Definitions & Wire Constants
// ============================================================================
//
// The closed set of RESP3 value kinds modeled by this package, their wire
// prefix bytes, and the payload shapes each kind carries.
// ============================================================================

import type { HashTable } from './table.js';

/**
 * Wire prefix byte for each modeled kind.
 *
 * ```
 * $ BlobString    + SimpleString   - SimpleError   : Number
 * _ Null          # Boolean        ! BlobError     = VerbatimString
 * * Array         ~ Set            % Map
 * ```
 */
export const PREFIX = {
  BlobString: 0x24,
  SimpleString: 0x2b,
  SimpleError: 0x2d,
  Number: 0x3a,
  Null: 0x5f,
  Boolean: 0x23,
  BlobError: 0x21,
  VerbatimString: 0x3d,
  Array: 0x2a,
  Set: 0x7e,
  Map: 0x25,
} as const;

/** One of the modeled RESP3 kinds. */
export type ValueKind = keyof typeof PREFIX;

/** Every modeled kind, in prefix-table order. */
export const VALUE_KINDS: readonly ValueKind[] = [
  'BlobString',
  'SimpleString',
  'SimpleError',
  'Number',
  'Null',
  'Boolean',
  'BlobError',
  'VerbatimString',
  'Array',
  'Set',
  'Map',
];

/**
 * RESP3 kinds the protocol documents but this package does not model.
 * Keyed by prefix byte.
 */
export const UNMODELED_PREFIX: ReadonlyMap<number, string> = new Map([
  [0x2c, 'Double'],
  [0x7c, 'Attribute'],
  [0x3e, 'Push'],
  [0x48, 'Hello'],
  [0x28, 'BigNumber'],
]);

/** Format of a verbatim string. The ordinal takes part in hashing. */
export enum VerbatimFormat {
  /** Plain text, wire tag `txt` */
  Text = 0,
  /** Markdown, wire tag `mkd` */
  Markdown = 1,
}

/** 3-byte wire tag of each verbatim format. */
export const VERBATIM_TAG: Readonly<Record<VerbatimFormat, string>> = {
  [VerbatimFormat.Text]: 'txt',
  [VerbatimFormat.Markdown]: 'mkd',
};

/** Error payload shared by SimpleError and BlobError: `<code> <message>`. */
export interface WireError {
  readonly code: Uint8Array;
  readonly message: Uint8Array;
}

/** Verbatim string payload: `<tag>:<bytes>`. */
export interface VerbatimString {
  readonly format: VerbatimFormat;
  readonly bytes: Uint8Array;
}

/** Backing table of a Map value. Keys are compared structurally. */
export type ValueTable = HashTable<Value, Value>;

export interface BlobStringValue {
  readonly kind: 'BlobString';
  readonly bytes: Uint8Array;
}

export interface SimpleStringValue {
  readonly kind: 'SimpleString';
  readonly bytes: Uint8Array;
}

export interface SimpleErrorValue {
  readonly kind: 'SimpleError';
  readonly error: WireError;
}

export interface NumberValue {
  readonly kind: 'Number';
  /** Signed 64-bit integer */
  readonly value: bigint;
}

export interface NullValue {
  readonly kind: 'Null';
}

export interface BooleanValue {
  readonly kind: 'Boolean';
  readonly value: boolean;
}

export interface BlobErrorValue {
  readonly kind: 'BlobError';
  readonly error: WireError;
}

export interface VerbatimStringValue {
  readonly kind: 'VerbatimString';
  readonly verbatim: VerbatimString;
}

export interface ArrayValue {
  readonly kind: 'Array';
  readonly items: readonly Value[];
}

/** Ordered sequence; equality and hashing are order-sensitive. */
export interface SetValue {
  readonly kind: 'Set';
  readonly items: readonly Value[];
}

export interface MapValue {
  readonly kind: 'Map';
  readonly entries: ValueTable;
}

/**
 * A RESP3 value. Switch on `kind` to reach the payload.
 */
export type Value =
  | BlobStringValue
  | SimpleStringValue
  | SimpleErrorValue
  | NumberValue
  | NullValue
  | BooleanValue
  | BlobErrorValue
  | VerbatimStringValue
  | ArrayValue
  | SetValue
  | MapValue;

/** Input accepted wherever a byte payload is expected. */
export type ByteInput = string | Uint8Array;
