// ============================================================================
// @resp3-value/core — Structural Equality
// ============================================================================
//
// Deep, kind-aware comparison. Values of different kinds are never equal
// (`:0` is not `#f`). Array and Set compare element-wise in order; Map
// compares by key lookup, so insertion order does not matter.
// ============================================================================

import { UnsupportedVariantError } from './errors.js';
import { describeTag } from './inspect.js';
import type { Value, ValueTable, WireError } from './types.js';

/**
 * Byte-for-byte comparison of two sequences.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function errorsEqual(a: WireError, b: WireError): boolean {
  return bytesEqual(a.code, b.code) && bytesEqual(a.message, b.message);
}

function sequencesEqual(a: readonly Value[], b: readonly Value[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!equals(a[i], b[i])) return false;
  }
  return true;
}

/**
 * Every entry of `a` has an equal-valued counterpart in `b`. With equal
 * sizes and unique keys on both sides this is full equality.
 */
function tablesEqual(a: ValueTable, b: ValueTable): boolean {
  if (a === b) return true;
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    const other = b.get(key);
    if (other === undefined || !equals(value, other)) return false;
  }
  return true;
}

/**
 * Structural equality of two values.
 *
 * @example
 * ```ts
 * equals(number(0), boolean(false));                 // → false
 * equals(array([number(1)]), array([number(1)]));    // → true
 * ```
 */
export function equals(a: Value, b: Value): boolean {
  if (a === b) return true;

  switch (a.kind) {
    case 'BlobString':
      return b.kind === 'BlobString' && bytesEqual(a.bytes, b.bytes);
    case 'SimpleString':
      return b.kind === 'SimpleString' && bytesEqual(a.bytes, b.bytes);
    case 'SimpleError':
      return b.kind === 'SimpleError' && errorsEqual(a.error, b.error);
    case 'BlobError':
      return b.kind === 'BlobError' && errorsEqual(a.error, b.error);
    case 'Number':
      return b.kind === 'Number' && a.value === b.value;
    case 'Null':
      return b.kind === 'Null';
    case 'Boolean':
      return b.kind === 'Boolean' && a.value === b.value;
    case 'VerbatimString':
      return (
        b.kind === 'VerbatimString' &&
        a.verbatim.format === b.verbatim.format &&
        bytesEqual(a.verbatim.bytes, b.verbatim.bytes)
      );
    case 'Array':
      return b.kind === 'Array' && sequencesEqual(a.items, b.items);
    case 'Set':
      return b.kind === 'Set' && sequencesEqual(a.items, b.items);
    case 'Map':
      return b.kind === 'Map' && tablesEqual(a.entries, b.entries);
    default: {
      const unknown: never = a;
      throw new UnsupportedVariantError(describeTag(unknown));
    }
  }
}
