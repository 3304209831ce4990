// ============================================================================
// @resp3-value/core — Input Validation
// ============================================================================
//
// Turns an untrusted object tree (deserialized config, data from another
// module that bypassed the constructors) into a well-formed Value, failing
// fast on unmodeled kinds, malformed payloads, cycles and runaway nesting.
// ============================================================================

import { UnsupportedVariantError, ValueConstructionError } from './errors.js';
import { HashTable } from './table.js';
import { UNMODELED_PREFIX, VALUE_KINDS, VerbatimFormat } from './types.js';
import type { ByteInput, Value, ValueKind } from './types.js';
import {
  array,
  blobError,
  blobString,
  boolean,
  map,
  nullValue,
  number,
  set,
  simpleError,
  simpleString,
  verbatimString,
} from './value.js';

const MAX_DEPTH = 512;

const UNMODELED_NAMES = new Set(UNMODELED_PREFIX.values());

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate an untrusted value tree and rebuild it through the constructors.
 * Byte payloads may be strings or Uint8Array; Map entries may be a table or
 * an array of `[key, value]` pairs.
 *
 * @throws {UnsupportedVariantError} For unknown or unmodeled kinds
 * @throws {ValueConstructionError} For malformed payloads, cycles or nesting deeper than 512
 */
export function validateValue(input: unknown): Value {
  return _validate(input, '$', new WeakSet<object>(), 0);
}

function kindOf(node: Record<string, unknown>, path: string): ValueKind {
  const raw = node.kind;
  if (typeof raw !== 'string') {
    throw new UnsupportedVariantError(String(raw), `missing kind tag at ${path}`);
  }
  const kind = VALUE_KINDS.find((k) => k === raw);
  if (kind !== undefined) return kind;
  if (UNMODELED_NAMES.has(raw)) {
    throw new UnsupportedVariantError(raw, `not modeled (at ${path})`);
  }
  throw new UnsupportedVariantError(raw, `unknown kind at ${path}`);
}

function bytesField(
  node: Record<string, unknown>,
  field: string,
  kind: ValueKind,
  path: string,
): ByteInput {
  const value = node[field];
  if (typeof value === 'string' || value instanceof Uint8Array) return value;
  throw new ValueConstructionError(kind, `${path}.${field} must be a string or Uint8Array`);
}

function recordField(
  node: Record<string, unknown>,
  field: string,
  kind: ValueKind,
  path: string,
): Record<string, unknown> {
  const value = node[field];
  if (isRecord(value)) return value;
  throw new ValueConstructionError(kind, `${path}.${field} must be an object`);
}

function _validate(input: unknown, path: string, seen: WeakSet<object>, depth: number): Value {
  if (!isRecord(input)) {
    throw new UnsupportedVariantError(
      input === null ? 'null' : typeof input,
      `expected a value object at ${path}`,
    );
  }

  const kind = kindOf(input, path);

  if (depth > MAX_DEPTH) {
    throw new ValueConstructionError(
      kind,
      `maximum nesting depth (${MAX_DEPTH}) exceeded at ${path}. Possible circular reference.`,
    );
  }

  switch (kind) {
    case 'BlobString':
      return blobString(bytesField(input, 'bytes', kind, path));
    case 'SimpleString':
      return simpleString(bytesField(input, 'bytes', kind, path));
    case 'SimpleError':
    case 'BlobError': {
      const error = recordField(input, 'error', kind, path);
      const code = bytesField(error, 'code', kind, `${path}.error`);
      const message = bytesField(error, 'message', kind, `${path}.error`);
      return kind === 'SimpleError' ? simpleError(code, message) : blobError(code, message);
    }
    case 'Number': {
      const value = input.value;
      if (typeof value !== 'number' && typeof value !== 'bigint') {
        throw new ValueConstructionError(kind, `${path}.value must be a number or bigint`);
      }
      return number(value);
    }
    case 'Null':
      return nullValue();
    case 'Boolean': {
      const value = input.value;
      if (typeof value !== 'boolean') {
        throw new ValueConstructionError(kind, `${path}.value must be a boolean`);
      }
      return boolean(value);
    }
    case 'VerbatimString': {
      const verbatim = recordField(input, 'verbatim', kind, path);
      const format = verbatim.format;
      if (format !== VerbatimFormat.Text && format !== VerbatimFormat.Markdown) {
        throw new ValueConstructionError(kind, `${path}.verbatim.format must be Text or Markdown`);
      }
      return verbatimString(format, bytesField(verbatim, 'bytes', kind, `${path}.verbatim`));
    }
    case 'Array':
    case 'Set': {
      const items = input.items;
      if (!Array.isArray(items)) {
        throw new ValueConstructionError(kind, `${path}.items must be an array`);
      }
      enter(input, kind, path, seen);
      const children = items.map((item, i) => _validate(item, `${path}[${i}]`, seen, depth + 1));
      seen.delete(input);
      return kind === 'Array' ? array(children) : set(children);
    }
    case 'Map': {
      const pairs = entryPairs(input.entries, path);
      enter(input, kind, path, seen);
      const validated = pairs.map(
        ([key, value], i): [Value, Value] => [
          _validate(key, `${path}.entries[${i}].key`, seen, depth + 1),
          _validate(value, `${path}.entries[${i}].value`, seen, depth + 1),
        ],
      );
      seen.delete(input);
      return map(validated);
    }
  }
}

function enter(node: object, kind: ValueKind, path: string, seen: WeakSet<object>): void {
  if (seen.has(node)) {
    throw new ValueConstructionError(kind, `circular reference detected at ${path}`);
  }
  seen.add(node);
}

function entryPairs(entries: unknown, path: string): [unknown, unknown][] {
  if (entries instanceof HashTable) {
    const pairs: [unknown, unknown][] = [];
    for (const [key, value] of entries) pairs.push([key, value]);
    return pairs;
  }
  if (Array.isArray(entries)) {
    return entries.map((pair: unknown, i): [unknown, unknown] => {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw new ValueConstructionError('Map', `${path}.entries[${i}] must be a [key, value] pair`);
      }
      return [pair[0], pair[1]];
    });
  }
  throw new ValueConstructionError('Map', `${path}.entries must be a table or an array of pairs`);
}
