import { describe, expect, it } from 'vitest';
import { equals } from '../equality.js';
import { finalize, hashBytes, hashInt64, mix } from '../hashing.js';
import { hash } from '../structural_hash.js';
import { PREFIX, VerbatimFormat } from '../types.js';
import {
  array,
  blobString,
  boolean,
  createValueTable,
  map,
  nullValue,
  number,
  set,
  simpleError,
  simpleString,
  verbatimString,
} from '../value.js';

const bytes = (s: string) => new TextEncoder().encode(s);

describe('structural hash', () => {
  describe('reference vectors', () => {
    it('scalars', () => {
      expect(hash(nullValue())).toBe(2274370347);
      expect(hash(boolean(true))).toBe(1123344009);
      expect(hash(boolean(false))).toBe(1295643411);
      expect(hash(number(1234))).toBe(333245304);
      expect(hash(number(0))).toBe(3663819608);
      expect(hash(simpleString('OK'))).toBe(208571640);
      expect(hash(blobString('OK'))).toBe(1339329631);
      expect(hash(simpleError('ERR', 'unknown command'))).toBe(1723814009);
      expect(hash(verbatimString(VerbatimFormat.Text, 'Some string'))).toBe(2977001015);
      expect(hash(verbatimString(VerbatimFormat.Markdown, 'Some string'))).toBe(3269940186);
    });

    it('composites', () => {
      const nums = [number(1), number(2), number(3)];
      expect(hash(array(nums))).toBe(3721440683);
      expect(hash(set(nums))).toBe(4107744636);
      expect(hash(array([]))).toBe(1900720968);
      expect(hash(map([]))).toBe(4107648984);
      expect(
        hash(
          map([
            [simpleString('first'), number(1)],
            [simpleString('second'), number(2)],
          ]),
        ),
      ).toBe(3004514592);
    });
  });

  describe('layout', () => {
    it('tags the child hash with the prefix byte', () => {
      const child = hashInt64(7n);
      expect(hash(number(7))).toBe(finalize(mix(mix(0, PREFIX.Number), child)));
    });

    it('hashes string kinds by their bytes', () => {
      expect(hash(blobString('abc'))).toBe(
        finalize(mix(mix(0, PREFIX.BlobString), hashBytes(bytes('abc')))),
      );
    });

    it('folds array children in order', () => {
      const a = number(1);
      const b = number(2);
      const fold = finalize(mix(mix(0, hash(a)), hash(b)));
      expect(hash(array([a, b]))).toBe(finalize(mix(mix(0, PREFIX.Array), fold)));
    });
  });

  describe('consistency with equals', () => {
    it('gives equal hashes to equal values built separately', () => {
      const build = () =>
        array([
          simpleString('key'),
          set([number(-1), nullValue()]),
          map([[array([boolean(true)]), blobString('v')]]),
        ]);
      const a = build();
      const b = build();
      expect(equals(a, b)).toBe(true);
      expect(hash(a)).toBe(hash(b));
    });

    it('is independent of map insertion order', () => {
      const forward = createValueTable();
      const backward = createValueTable();
      for (let i = 0; i < 10; i++) {
        forward.set(number(i), simpleString(`v${i}`));
        backward.set(number(9 - i), simpleString(`v${9 - i}`));
      }
      expect(hash(map(forward))).toBe(hash(map(backward)));
    });

    it('separates kinds with the same payload', () => {
      expect(hash(blobString('OK'))).not.toBe(hash(simpleString('OK')));
      expect(hash(array([number(1)]))).not.toBe(hash(set([number(1)])));
    });

    it('is order-sensitive for sequences', () => {
      expect(hash(array([number(1), number(2)]))).not.toBe(hash(array([number(2), number(1)])));
    });

    it('returns the same hash on repeated calls', () => {
      const v = map([[simpleString('a'), array([number(1)])]]);
      expect(hash(v)).toBe(hash(v));
    });
  });
});
