// ============================================================================
// @resp3-value/core — Error Types
// ============================================================================

/**
 * Base error class for all RESP3 value errors.
 */
export class Resp3Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'Resp3Error';
  }
}

// ---------------------------------------------------------------------------
// Length Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a decimal digit count is requested for something that is not
 * an integer (fractions, NaN, ±Infinity).
 */
export class InvalidDigitCountError extends Resp3Error {
  public readonly value: number;

  constructor(value: number) {
    super(`Cannot count decimal digits of ${value}: expected an integer.`);
    this.name = 'InvalidDigitCountError';
    this.value = value;
  }
}

// ---------------------------------------------------------------------------
// Model Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a RESP3 kind is documented by the protocol but not modeled
 * here (Double, Attribute, Push, Hello, BigNumber), or when a tag is not a
 * RESP3 kind at all.
 */
export class UnsupportedVariantError extends Resp3Error {
  public readonly variant: string;

  constructor(variant: string, detail?: string) {
    super(`Unsupported RESP3 variant "${variant}"${detail ? `: ${detail}` : '.'}`);
    this.name = 'UnsupportedVariantError';
    this.variant = variant;
  }
}

/**
 * Thrown when a constructor receives a payload that cannot be framed on the
 * wire (out-of-range numbers, CR/LF inside simple strings, ...).
 */
export class ValueConstructionError extends Resp3Error {
  public readonly kind: string;
  public readonly reason: string;

  constructor(kind: string, reason: string) {
    super(`Invalid ${kind}: ${reason}`);
    this.name = 'ValueConstructionError';
    this.kind = kind;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Table Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a key structurally equal to an existing key is inserted into
 * a table whose duplicate-key policy is `'reject'`.
 */
export class MapKeyCollisionError extends Resp3Error {
  public readonly keyDescription: string;

  constructor(keyDescription: string) {
    super(`Duplicate map key ${keyDescription}.`);
    this.name = 'MapKeyCollisionError';
    this.keyDescription = keyDescription;
  }
}

/**
 * Thrown on mutation of a frozen table.
 */
export class TableFrozenError extends Resp3Error {
  constructor(operation: 'set' | 'delete' | 'clear') {
    super(`Cannot ${operation} on a frozen table.`);
    this.name = 'TableFrozenError';
  }
}

/**
 * Thrown on any access to a table after `release()`.
 */
export class TableReleasedError extends Resp3Error {
  constructor() {
    super('Table has been released.');
    this.name = 'TableReleasedError';
  }
}
