// ============================================================================
// @resp3-value/core — Encoded Length
// ============================================================================
//
// Exact number of bytes a value occupies on the wire, so callers can size a
// buffer before writing. Framing per kind:
//
//   $<len>\r\n<bytes>\r\n            +<bytes>\r\n
//   -<code> <message>\r\n            :<decimal>\r\n
//   _\r\n                            #t\r\n | #f\r\n
//   !<len>\r\n<code> <message>\r\n   =<len>\r\n<tag>:<bytes>\r\n
//   *<count>\r\n<element>...         ~<count>\r\n<element>...
//   %<pairs>\r\n<key><value>...
// ============================================================================

import { InvalidDigitCountError, UnsupportedVariantError } from './errors.js';
import { describeTag } from './inspect.js';
import type { Value, ValueTable } from './types.js';

/** Prefix byte + CRLF. */
const FRAME = 3;
/** Bytes of `<tag>:` in a verbatim string payload. */
const VERBATIM_HEADER = 4;

/**
 * Number of characters needed to print `n` in base 10, sign included.
 *
 * `digits(0) === 1`, `digits(-12) === 3`.
 *
 * @throws {InvalidDigitCountError} If `n` is a non-integer number
 */
export function digits(n: number | bigint): number {
  if (typeof n === 'number') {
    if (!Number.isInteger(n)) throw new InvalidDigitCountError(n);
    if (Number.isSafeInteger(n)) return digitsOfSafe(n);
    n = BigInt(n);
  }

  if (n === 0n) return 1;
  let count = 0;
  let rest = n;
  if (rest < 0n) {
    count++;
    rest = -rest;
  }
  while (rest > 0n) {
    count++;
    rest /= 10n;
  }
  return count;
}

function digitsOfSafe(n: number): number {
  if (n === 0) return 1;
  let count = 0;
  let rest = n;
  if (rest < 0) {
    count++;
    rest = -rest;
  }
  while (rest > 0) {
    count++;
    rest = Math.floor(rest / 10);
  }
  return count;
}

/**
 * Bytes of a length-prefixed payload: prefix, `<len>`, CRLF, payload, CRLF.
 */
function blobLength(payload: number): number {
  return FRAME + 2 + digits(payload) + payload;
}

/**
 * Bytes of a sequence header plus every element.
 */
function sequenceLength(items: readonly Value[]): number {
  let total = FRAME + digits(items.length);
  for (const item of items) {
    total += encodedLength(item);
  }
  return total;
}

function mapLength(entries: ValueTable): number {
  let total = FRAME + digits(entries.size);
  for (const [key, value] of entries) {
    total += encodedLength(key) + encodedLength(value);
  }
  return total;
}

/**
 * Exact on-wire byte count of `value`.
 *
 * @example
 * ```ts
 * encodedLength(blobString('helloworld')); // → 17  ($10\r\nhelloworld\r\n)
 * encodedLength(number(1234));             // → 7   (:1234\r\n)
 * ```
 */
export function encodedLength(value: Value): number {
  switch (value.kind) {
    case 'BlobString':
      return blobLength(value.bytes.length);
    case 'SimpleString':
      return FRAME + value.bytes.length;
    case 'SimpleError':
      // code + ' ' + message
      return FRAME + value.error.code.length + 1 + value.error.message.length;
    case 'Number':
      return FRAME + digits(value.value);
    case 'Null':
      return FRAME;
    case 'Boolean':
      return FRAME + 1;
    case 'BlobError':
      return blobLength(value.error.code.length + 1 + value.error.message.length);
    case 'VerbatimString':
      return blobLength(VERBATIM_HEADER + value.verbatim.bytes.length);
    case 'Array':
    case 'Set':
      return sequenceLength(value.items);
    case 'Map':
      return mapLength(value.entries);
    default: {
      const unknown: never = value;
      throw new UnsupportedVariantError(describeTag(unknown));
    }
  }
}
