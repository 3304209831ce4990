// ============================================================================
// @resp3-value/core — One-at-a-Time String Hashing
// ============================================================================
//
// Jenkins-style one-at-a-time hash over raw bytes. All arithmetic is done
// modulo 2^32; every function returns an unsigned 32-bit integer.
//
// Not cryptographic. Do not use where adversarial collisions matter.
// ============================================================================

/** Scratch buffer for 64-bit integers, reused across calls. */
const scratchAB = new ArrayBuffer(8);
const scratchDV = new DataView(scratchAB);
const scratchU8 = new Uint8Array(scratchAB);

/**
 * Fold one input word into the accumulator.
 *
 * @param acc - Current accumulator (unsigned 32-bit)
 * @param input - Byte or 32-bit word to mix in
 */
export function mix(acc: number, input: number): number {
  let r = (acc + input) >>> 0;
  r = (r + (r << 10)) >>> 0;
  r = (r ^ (r >>> 6)) >>> 0;
  return r;
}

/**
 * Final avalanche step applied once after all input has been mixed.
 */
export function finalize(hash: number): number {
  let r = (hash + (hash << 3)) >>> 0;
  r = (r ^ (r >>> 11)) >>> 0;
  r = (r + (r << 15)) >>> 0;
  return r;
}

/**
 * Hash a byte sequence.
 *
 * @example
 * ```ts
 * hashBytes(new TextEncoder().encode('a')); // → 0xca2e9442
 * ```
 */
export function hashBytes(bytes: Uint8Array): number {
  let acc = 0;
  for (let i = 0; i < bytes.length; i++) {
    acc = mix(acc, bytes[i]);
  }
  return finalize(acc);
}

/**
 * Hash a signed 64-bit integer through its 8-byte little-endian form.
 */
export function hashInt64(n: bigint): number {
  scratchDV.setBigInt64(0, n, true);
  return hashBytes(scratchU8);
}
