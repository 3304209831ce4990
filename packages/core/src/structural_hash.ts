// ============================================================================
// @resp3-value/core — Structural Hashing
// ============================================================================
//
// One 32-bit hash per value, consistent with `equals`:
//
//   equals(a, b)  ⇒  hash(a) === hash(b)
//
// Layout: finalize(mix(mix(0, prefixByte), childHash)), where childHash
// depends on the kind. Array and Set fold their children in order (their
// equality is order-sensitive). Map hashes each pair on its own and folds
// the pair hashes in ascending numeric order, because Map equality ignores
// insertion order.
// ============================================================================

import { UnsupportedVariantError } from './errors.js';
import { finalize, hashBytes, hashInt64, mix } from './hashing.js';
import { describeTag } from './inspect.js';
import { PREFIX } from './types.js';
import type { Value, ValueTable, WireError } from './types.js';

function hashError(error: WireError): number {
  return finalize(mix(hashBytes(error.code), hashBytes(error.message)));
}

function hashSequence(items: readonly Value[]): number {
  let acc = 0;
  for (const item of items) {
    acc = mix(acc, hash(item));
  }
  return finalize(acc);
}

function hashTable(entries: ValueTable): number {
  const pairHashes: number[] = [];
  for (const [key, value] of entries) {
    pairHashes.push(finalize(mix(mix(0, hash(key)), hash(value))));
  }
  pairHashes.sort((x, y) => x - y);

  let acc = 0;
  for (const h of pairHashes) {
    acc = mix(acc, h);
  }
  return finalize(acc);
}

function childHash(value: Value): number {
  switch (value.kind) {
    case 'BlobString':
    case 'SimpleString':
      return hashBytes(value.bytes);
    case 'SimpleError':
    case 'BlobError':
      return hashError(value.error);
    case 'Number':
      return hashInt64(value.value);
    case 'Null':
      return 0;
    case 'Boolean':
      return value.value ? 1 : 0;
    case 'VerbatimString':
      return finalize(mix(value.verbatim.format, hashBytes(value.verbatim.bytes)));
    case 'Array':
    case 'Set':
      return hashSequence(value.items);
    case 'Map':
      return hashTable(value.entries);
    default: {
      const unknown: never = value;
      throw new UnsupportedVariantError(describeTag(unknown));
    }
  }
}

/**
 * Unsigned 32-bit structural hash of `value`.
 */
export function hash(value: Value): number {
  const tagged = mix(0, PREFIX[value.kind]);
  return finalize(mix(tagged, childHash(value)));
}
