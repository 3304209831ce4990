// ============================================================================
// @resp3-value/core — Human-Readable Rendering
// ============================================================================
//
// One-line rendering of a value for logs and error messages. Not a wire
// format: strings are JSON-quoted and composites are bracketed.
//
//   $"hello"  +"OK"  -ERR unknown  :42  _  #t  !SYNTAX bad  =txt:"hi"
//   *[:1, :2]  ~[+"a"]  %{+"first" => :1}
// ============================================================================

import { UnsupportedVariantError } from './errors.js';
import { VERBATIM_TAG } from './types.js';
import type { Value, WireError } from './types.js';

const sharedTextDecoder = new TextDecoder();

function text(bytes: Uint8Array): string {
  return sharedTextDecoder.decode(bytes);
}

function quoted(bytes: Uint8Array): string {
  return JSON.stringify(text(bytes));
}

function errorText(error: WireError): string {
  return `${text(error.code)} ${text(error.message)}`;
}

/**
 * Render `value` on one line.
 *
 * @example
 * ```ts
 * inspect(array([number(1), simpleString('OK')])); // → '*[:1, +"OK"]'
 * ```
 */
export function inspect(value: Value): string {
  switch (value.kind) {
    case 'BlobString':
      return `$${quoted(value.bytes)}`;
    case 'SimpleString':
      return `+${quoted(value.bytes)}`;
    case 'SimpleError':
      return `-${errorText(value.error)}`;
    case 'Number':
      return `:${value.value}`;
    case 'Null':
      return '_';
    case 'Boolean':
      return value.value ? '#t' : '#f';
    case 'BlobError':
      return `!${errorText(value.error)}`;
    case 'VerbatimString':
      return `=${VERBATIM_TAG[value.verbatim.format]}:${quoted(value.verbatim.bytes)}`;
    case 'Array':
      return `*[${value.items.map(inspect).join(', ')}]`;
    case 'Set':
      return `~[${value.items.map(inspect).join(', ')}]`;
    case 'Map': {
      const pairs: string[] = [];
      for (const [key, entry] of value.entries) {
        pairs.push(`${inspect(key)} => ${inspect(entry)}`);
      }
      return `%{${pairs.join(', ')}}`;
    }
    default: {
      const unknown: never = value;
      throw new UnsupportedVariantError(describeTag(unknown));
    }
  }
}

/** Best-effort tag name of a value that escaped the type system. */
export function describeTag(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return typeof value;
}
