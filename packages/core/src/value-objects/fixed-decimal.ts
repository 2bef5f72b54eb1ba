import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { FixedDecimalParseError } from '../errors/index.js';

/**
 * Dedicated decimal.js constructor for ingesting amounts. Precision is high
 * enough to hold any value that fits the 64-bit raw range exactly, and
 * ROUND_HALF_UP in decimal.js rounds ties away from zero.
 */
const IngestDecimal = Decimal.clone({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
});

const PLAIN_DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

const SCALE = 4;
const FACTOR = 10_000n;
const MAX_RAW = 9_223_372_036_854_775_807n;
const MIN_RAW = -9_223_372_036_854_775_808n;

/**
 * Fixed-point amount with four fractional digits.
 *
 * Stores `value × 10,000` as a bigint, so 1.5 is held as 15000n. Arithmetic is
 * exact; the signed 64-bit range is the supported capacity, which callers
 * check with {@link FixedDecimal.isWithinCapacity} before storing a result.
 */
export class FixedDecimal {
  static readonly SCALE = SCALE;
  static readonly MAX_RAW = MAX_RAW;
  static readonly MIN_RAW = MIN_RAW;
  static readonly ZERO = new FixedDecimal(0n);

  private constructor(readonly raw: bigint) {}

  /**
   * Create from the scaled integer representation (ten-thousandths).
   */
  static fromRaw(raw: bigint): FixedDecimal {
    return raw === 0n ? FixedDecimal.ZERO : new FixedDecimal(raw);
  }

  /**
   * Parse plain decimal notation, rounding past the fourth fractional digit
   * half away from zero: "1.23455" → 1.2346, "-1.23455" → -1.2346.
   */
  static parse(input: string): Result<FixedDecimal, FixedDecimalParseError> {
    const trimmed = input.trim();
    if (trimmed === '') {
      return err(new FixedDecimalParseError(input, 'empty value'));
    }
    if (!PLAIN_DECIMAL.test(trimmed)) {
      return err(new FixedDecimalParseError(input, 'not a decimal number'));
    }

    // toFixed(4) always yields exactly four fractional digits, e.g. "-0.0001"
    const fixed = new IngestDecimal(trimmed).toFixed(SCALE);
    const raw = BigInt(fixed.replace('.', ''));
    const value = FixedDecimal.fromRaw(raw);

    if (!value.isWithinCapacity()) {
      return err(new FixedDecimalParseError(input, 'exceeds the supported 64-bit range'));
    }
    return ok(value);
  }

  add(other: FixedDecimal): FixedDecimal {
    return FixedDecimal.fromRaw(this.raw + other.raw);
  }

  subtract(other: FixedDecimal): FixedDecimal {
    return FixedDecimal.fromRaw(this.raw - other.raw);
  }

  compare(other: FixedDecimal): -1 | 0 | 1 {
    if (this.raw < other.raw) return -1;
    if (this.raw > other.raw) return 1;
    return 0;
  }

  equals(other: FixedDecimal): boolean {
    return this.raw === other.raw;
  }

  greaterThan(other: FixedDecimal): boolean {
    return this.raw > other.raw;
  }

  greaterThanOrEqual(other: FixedDecimal): boolean {
    return this.raw >= other.raw;
  }

  lessThan(other: FixedDecimal): boolean {
    return this.raw < other.raw;
  }

  lessThanOrEqual(other: FixedDecimal): boolean {
    return this.raw <= other.raw;
  }

  isNegative(): boolean {
    return this.raw < 0n;
  }

  isZero(): boolean {
    return this.raw === 0n;
  }

  isWithinCapacity(): boolean {
    return this.raw >= MIN_RAW && this.raw <= MAX_RAW;
  }

  /**
   * At most four fractional digits, trailing zeros trimmed: "0", "1.5", "-0.0001".
   */
  format(): string {
    const negative = this.raw < 0n;
    const abs = negative ? -this.raw : this.raw;
    const whole = (abs / FACTOR).toString();
    const frac = (abs % FACTOR).toString().padStart(SCALE, '0').replace(/0+$/, '');
    const sign = negative ? '-' : '';

    return frac === '' ? `${sign}${whole}` : `${sign}${whole}.${frac}`;
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string {
    return this.format();
  }
}
