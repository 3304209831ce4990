// ============================================================================
// @resp3-value/core — Public API
// ============================================================================

// Value model
export { PREFIX, VALUE_KINDS, UNMODELED_PREFIX, VERBATIM_TAG, VerbatimFormat } from './types.js';
export type {
  Value,
  ValueKind,
  ValueTable,
  ByteInput,
  WireError,
  VerbatimString,
  BlobStringValue,
  SimpleStringValue,
  SimpleErrorValue,
  NumberValue,
  NullValue,
  BooleanValue,
  BlobErrorValue,
  VerbatimStringValue,
  ArrayValue,
  SetValue,
  MapValue,
} from './types.js';

// Constructors
export {
  blobString,
  simpleString,
  simpleError,
  number,
  nullValue,
  boolean,
  blobError,
  verbatimString,
  array,
  set,
  map,
  toBytes,
  ownBytes,
  prefixOf,
  kindFromPrefix,
  createValueTable,
  withValueTable,
  valueKeyStrategy,
} from './value.js';
export { validateValue } from './validate.js';

// Derived operations
export { encodedLength, digits } from './length.js';
export { equals, bytesEqual } from './equality.js';
export { hash } from './structural_hash.js';
export { inspect } from './inspect.js';

// Hashing primitives
export { mix, finalize, hashBytes, hashInt64 } from './hashing.js';

// Tables
export { HashTable } from './table.js';
export type { KeyStrategy } from './table.js';
export { resolveTableOptions, tableOptionsSchema, duplicateKeyPolicySchema } from './config.js';
export type { TableOptions, TableOptionsInput, DuplicateKeyPolicy } from './config.js';

// Errors
export {
  Resp3Error,
  InvalidDigitCountError,
  UnsupportedVariantError,
  ValueConstructionError,
  MapKeyCollisionError,
  TableFrozenError,
  TableReleasedError,
} from './errors.js';

// Logging
export { onLog, setLogLevel, getLogLevel, isDebugEnabled } from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';
