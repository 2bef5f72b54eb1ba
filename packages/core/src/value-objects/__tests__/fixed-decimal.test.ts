import { describe, expect, it } from 'vitest';

import { FixedDecimalParseError } from '../../errors/index.js';
import { FixedDecimal } from '../fixed-decimal.js';

function parse(input: string): FixedDecimal {
  return FixedDecimal.parse(input)._unsafeUnwrap();
}

describe('FixedDecimal', () => {
  describe('parse', () => {
    it('should store four fractional digits as a scaled integer', () => {
      expect(parse('1.5').raw).toBe(15000n);
      expect(parse('0.0001').raw).toBe(1n);
      expect(parse('42').raw).toBe(420000n);
    });

    it('should trim surrounding whitespace', () => {
      expect(parse('  2.0 ').raw).toBe(20000n);
    });

    it('should accept a leading sign or a bare fraction', () => {
      expect(parse('+3').raw).toBe(30000n);
      expect(parse('-3').raw).toBe(-30000n);
      expect(parse('.5').raw).toBe(5000n);
    });

    it('should round ties away from zero past the fourth digit', () => {
      expect(parse('1.23455').format()).toBe('1.2346');
      expect(parse('-1.23455').format()).toBe('-1.2346');
      expect(parse('1.23454').format()).toBe('1.2345');
      expect(parse('0.99995').format()).toBe('1');
    });

    it('should collapse values that round to zero', () => {
      expect(parse('0.00004').raw).toBe(0n);
      expect(parse('-0.00004').format()).toBe('0');
    });

    it('should reject empty input', () => {
      const error = FixedDecimal.parse('   ')._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(FixedDecimalParseError);
      expect(error.message).toBe("Invalid amount '   ': empty value");
    });

    it('should reject anything other than plain decimal notation', () => {
      for (const input of ['abc', '1e3', '1.2.3', '0x10', '1,5', 'NaN', 'Infinity']) {
        const error = FixedDecimal.parse(input)._unsafeUnwrapErr();
        expect(error.message).toBe(`Invalid amount '${input}': not a decimal number`);
      }
    });

    it('should accept the largest and smallest representable values', () => {
      expect(parse('922337203685477.5807').raw).toBe(FixedDecimal.MAX_RAW);
      expect(parse('-922337203685477.5808').raw).toBe(FixedDecimal.MIN_RAW);
    });

    it('should reject values outside the 64-bit range', () => {
      const error = FixedDecimal.parse('922337203685477.5808')._unsafeUnwrapErr();

      expect(error.code).toBe('INVALID_AMOUNT');
      expect(error.message).toBe("Invalid amount '922337203685477.5808': exceeds the supported 64-bit range");
    });
  });

  describe('arithmetic', () => {
    it('should add and subtract exactly', () => {
      const a = parse('0.1');
      const b = parse('0.2');

      expect(a.add(b).format()).toBe('0.3');
      expect(a.subtract(b).format()).toBe('-0.1');
      expect(b.subtract(b)).toBe(FixedDecimal.ZERO);
    });

    it('should report results that leave the supported range', () => {
      const max = FixedDecimal.fromRaw(FixedDecimal.MAX_RAW);

      expect(max.isWithinCapacity()).toBe(true);
      expect(max.add(FixedDecimal.fromRaw(1n)).isWithinCapacity()).toBe(false);
    });
  });

  describe('comparison', () => {
    it('should order by value', () => {
      const one = parse('1');
      const two = parse('2.0000');

      expect(one.compare(two)).toBe(-1);
      expect(two.compare(one)).toBe(1);
      expect(one.compare(parse('1.0'))).toBe(0);
      expect(one.lessThan(two)).toBe(true);
      expect(two.greaterThanOrEqual(two)).toBe(true);
      expect(one.equals(parse('1.00001'))).toBe(true);
    });

    it('should classify sign', () => {
      expect(parse('-0.0001').isNegative()).toBe(true);
      expect(FixedDecimal.ZERO.isZero()).toBe(true);
      expect(FixedDecimal.ZERO.isNegative()).toBe(false);
    });
  });

  describe('format', () => {
    it('should trim trailing zeros', () => {
      expect(FixedDecimal.fromRaw(0n).format()).toBe('0');
      expect(FixedDecimal.fromRaw(100000n).format()).toBe('10');
      expect(FixedDecimal.fromRaw(15000n).format()).toBe('1.5');
      expect(FixedDecimal.fromRaw(12345n).format()).toBe('1.2345');
      expect(FixedDecimal.fromRaw(1001n).format()).toBe('0.1001');
    });

    it('should prefix negatives', () => {
      expect(FixedDecimal.fromRaw(-1n).format()).toBe('-0.0001');
      expect(FixedDecimal.fromRaw(-15000n).format()).toBe('-1.5');
    });

    it('should be stable when formatted output is parsed and formatted again', () => {
      const raws = [
        0n,
        1n,
        -1n,
        15000n,
        -15000n,
        100000n,
        -2500000n,
        12345n,
        -98761234n,
        FixedDecimal.MAX_RAW,
        FixedDecimal.MIN_RAW,
      ];

      for (const raw of raws) {
        const value = FixedDecimal.fromRaw(raw);
        const reparsed = FixedDecimal.parse(value.format())._unsafeUnwrap();

        expect(reparsed.raw).toBe(raw);
        expect(reparsed.format()).toBe(value.format());
        expect(FixedDecimal.parse(reparsed.format())._unsafeUnwrap().format()).toBe(value.format());
      }
    });

    it('should format the capacity bounds exactly', () => {
      expect(FixedDecimal.fromRaw(FixedDecimal.MAX_RAW).format()).toBe('922337203685477.5807');
      expect(FixedDecimal.fromRaw(FixedDecimal.MIN_RAW).format()).toBe('-922337203685477.5808');
    });

    it('should serialize to the formatted string', () => {
      const value = parse('2.50');

      expect(String(value)).toBe('2.5');
      expect(JSON.stringify({ value })).toBe('{"value":"2.5"}');
    });
  });
});
