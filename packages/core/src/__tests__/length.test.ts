import { describe, expect, it } from 'vitest';
import { InvalidDigitCountError } from '../errors.js';
import { digits, encodedLength } from '../length.js';
import { VerbatimFormat } from '../types.js';
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
  withValueTable,
} from '../value.js';

/** Byte length of a literal wire string. */
function wire(literal: string): number {
  return new TextEncoder().encode(literal).length;
}

describe('digits', () => {
  it('counts zero as one digit', () => {
    expect(digits(0)).toBe(1);
    expect(digits(0n)).toBe(1);
  });

  it('counts positive integers', () => {
    expect(digits(7)).toBe(1);
    expect(digits(10)).toBe(2);
    expect(digits(99)).toBe(2);
    expect(digits(100)).toBe(3);
    expect(digits(1234)).toBe(4);
  });

  it('includes the sign byte for negatives', () => {
    expect(digits(-1)).toBe(2);
    expect(digits(-12)).toBe(3);
    expect(digits(-100n)).toBe(4);
  });

  it('handles the int64 extremes', () => {
    expect(digits(9223372036854775807n)).toBe(19);
    expect(digits(-9223372036854775808n)).toBe(20);
  });

  it('handles integral numbers beyond the safe range', () => {
    expect(digits(2 ** 60)).toBe(String(2n ** 60n).length);
  });

  it('rejects non-integers', () => {
    expect(() => digits(1.5)).toThrow(InvalidDigitCountError);
    expect(() => digits(Number.NaN)).toThrow(InvalidDigitCountError);
    expect(() => digits(Number.POSITIVE_INFINITY)).toThrow(InvalidDigitCountError);
  });
});

describe('encodedLength', () => {
  describe('scalar kinds', () => {
    it('BlobString', () => {
      expect(encodedLength(blobString('helloworld'))).toBe(17);
      expect(encodedLength(blobString('helloworld'))).toBe(wire('$10\r\nhelloworld\r\n'));
    });

    it('BlobString with a two-digit length boundary', () => {
      const payload = 'x'.repeat(9);
      expect(encodedLength(blobString(payload))).toBe(wire(`$9\r\n${payload}\r\n`));
      const longer = 'x'.repeat(10);
      expect(encodedLength(blobString(longer))).toBe(wire(`$10\r\n${longer}\r\n`));
    });

    it('BlobString counts UTF-8 bytes, not characters', () => {
      // 'café' is 5 bytes in UTF-8
      expect(encodedLength(blobString('café'))).toBe(wire('$5\r\ncafé\r\n'));
      expect(encodedLength(blobString('café'))).toBe(11);
    });

    it('SimpleString', () => {
      expect(encodedLength(simpleString('hello world'))).toBe(14);
      expect(encodedLength(simpleString('hello world'))).toBe(wire('+hello world\r\n'));
    });

    it('SimpleError', () => {
      const err = simpleError('ERR', 'this is the error description');
      expect(encodedLength(err)).toBe(wire('-ERR this is the error description\r\n'));
      expect(encodedLength(err)).toBe(36);
    });

    it('Number', () => {
      expect(encodedLength(number(1234))).toBe(7);
      expect(encodedLength(number(1234))).toBe(wire(':1234\r\n'));
      expect(encodedLength(number(0))).toBe(wire(':0\r\n'));
    });

    it('negative Number includes the sign', () => {
      expect(encodedLength(number(-12))).toBe(wire(':-12\r\n'));
      expect(encodedLength(number(-9223372036854775808n))).toBe(
        wire(':-9223372036854775808\r\n'),
      );
    });

    it('Null', () => {
      expect(encodedLength(nullValue())).toBe(3);
      expect(encodedLength(nullValue())).toBe(wire('_\r\n'));
    });

    it('Boolean', () => {
      expect(encodedLength(boolean(true))).toBe(4);
      expect(encodedLength(boolean(true))).toBe(wire('#t\r\n'));
      expect(encodedLength(boolean(false))).toBe(wire('#f\r\n'));
    });

    it('BlobError', () => {
      const err = blobError('SYNTAX', 'invalid syntax');
      expect(encodedLength(err)).toBe(wire('!21\r\nSYNTAX invalid syntax\r\n'));
      expect(encodedLength(err)).toBe(28);
    });

    it('BlobError counts the separator in the length prefix', () => {
      // code + message = 9 bytes, payload with the space = 10 bytes
      const err = blobError('ERR', 'abcdef');
      expect(encodedLength(err)).toBe(wire('!10\r\nERR abcdef\r\n'));
    });

    it('VerbatimString', () => {
      const text = verbatimString(VerbatimFormat.Text, 'Some string');
      expect(encodedLength(text)).toBe(wire('=15\r\ntxt:Some string\r\n'));
      expect(encodedLength(text)).toBe(22);

      const md = verbatimString(VerbatimFormat.Markdown, '# Title');
      expect(encodedLength(md)).toBe(wire('=11\r\nmkd:# Title\r\n'));
    });
  });

  describe('zero-length payloads', () => {
    it('handles every empty variant', () => {
      expect(encodedLength(blobString(''))).toBe(wire('$0\r\n\r\n'));
      expect(encodedLength(simpleString(''))).toBe(wire('+\r\n'));
      expect(encodedLength(simpleError('', ''))).toBe(wire('- \r\n'));
      expect(encodedLength(blobError('', ''))).toBe(wire('!1\r\n \r\n'));
      expect(encodedLength(verbatimString(VerbatimFormat.Text, ''))).toBe(wire('=4\r\ntxt:\r\n'));
      expect(encodedLength(array([]))).toBe(wire('*0\r\n'));
      expect(encodedLength(set([]))).toBe(wire('~0\r\n'));
      expect(encodedLength(map([]))).toBe(wire('%0\r\n'));
    });
  });

  describe('composite kinds', () => {
    it('Array of Number', () => {
      const val = array([number(1), number(2), number(3)]);
      expect(encodedLength(val)).toBe(wire('*3\r\n:1\r\n:2\r\n:3\r\n'));
      expect(encodedLength(val)).toBe(16);
    });

    it('Set of mixed kinds', () => {
      const val = set([
        simpleString('orange'),
        simpleString('apple'),
        boolean(true),
        number(100),
        number(999),
      ]);
      expect(encodedLength(val)).toBe(wire('~5\r\n+orange\r\n+apple\r\n#t\r\n:100\r\n:999\r\n'));
    });

    it('Map counts pairs, not fields', () => {
      const val = map([
        [simpleString('first'), number(1)],
        [simpleString('second'), number(2)],
      ]);
      expect(encodedLength(val)).toBe(wire('%2\r\n+first\r\n:1\r\n+second\r\n:2\r\n'));
      expect(encodedLength(val)).toBe(29);
    });

    it('Map built on a scoped table', () => {
      const len = withValueTable((table) => {
        table.set(blobString('k'), array([nullValue()]));
        return encodedLength(map(table));
      });
      expect(len).toBe(wire('%1\r\n$1\r\nk\r\n*1\r\n_\r\n'));
    });

    it('is additive over children', () => {
      const a = simpleString('a');
      const b = number(-5);
      const c = blobString('ccc');
      const total = encodedLength(array([a, b, c]));
      expect(total).toBe(3 + digits(3) + encodedLength(a) + encodedLength(b) + encodedLength(c));
    });

    it('uses a multi-digit count for ten or more children', () => {
      const items = Array.from({ length: 12 }, () => nullValue());
      expect(encodedLength(array(items))).toBe(wire(`*12\r\n${'_\r\n'.repeat(12)}`));
    });

    it('recurses through nested composites', () => {
      const nested = array([array([number(1)]), map([[set([]), boolean(false)]])]);
      expect(encodedLength(nested)).toBe(wire('*2\r\n*1\r\n:1\r\n%1\r\n~0\r\n#f\r\n'));
    });
  });
});
