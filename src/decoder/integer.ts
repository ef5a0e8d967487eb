/**
 * Saturating integer scanning for `%d %i %u %o %x %X %p` and `%n` targets.
 */

import type { DecodeResult, InputCursor } from './cursor.ts';

/**
 * How to read one integer field.
 * @property base - 8, 10 or 16; 0 selects by prefix ('0x' hex, '0' octal, else decimal)
 * @property signed - Clamp to the signed range instead of the unsigned one
 * @property bits - Width class of the target
 * @property width - Maximum characters to read, sign and prefix included; 0 or less for no limit
 */
export type IntegerSpec = {
  base: 0 | 8 | 10 | 16;
  signed: boolean;
  bits: 8 | 16 | 32 | 64;
  width: number;
};

const DIGITS = '0123456789abcdef';

/**
 * Value of a digit character in a base, or -1.
 */
export function digitValue(c: string | undefined, base: number): number {
  if (c === undefined || c.length !== 1) {
    return -1;
  }
  const value = DIGITS.indexOf(c.toLowerCase());
  return value < base ? value : -1;
}

/**
 * Largest and smallest representable value of a target class.
 */
export function integerRange(signed: boolean, bits: number): { min: bigint; max: bigint } {
  if (signed) {
    const half = 1n << BigInt(bits - 1);
    return { min: -half, max: half - 1n };
  }
  return { min: 0n, max: (1n << BigInt(bits)) - 1n };
}

/**
 * Read an integer field.
 *
 * Accepts an optional sign and, for bases 0 and 16, an optional '0x'/'0X'
 * prefix (only when a hex digit follows it). Out-of-range values saturate:
 * signed targets clamp to their minimum or maximum, unsigned targets to their
 * maximum, and the remaining digits are consumed without accumulating. A
 * negative value read into an unsigned target wraps modulo 2^bits.
 *
 * @returns The value, or failure when no digit was read
 */
export function decodeInteger(input: InputCursor, spec: IntegerSpec): DecodeResult<bigint> {
  const start = input.position;
  const limit = spec.width > 0 ? spec.width : Number.POSITIVE_INFINITY;
  let used = 0;

  let negative = false;
  const sign = input.peek();
  if (used < limit && (sign === '+' || sign === '-')) {
    negative = sign === '-';
    input.advance();
    used++;
  }

  let base = spec.base;
  if ((base === 0 || base === 16) && input.peek() === '0') {
    const x = input.peek(1);
    if ((x === 'x' || x === 'X') && limit - used >= 3 && digitValue(input.peek(2), 16) >= 0) {
      input.advance(2);
      used += 2;
      base = 16;
    } else if (base === 0) {
      base = 8;
    }
  } else if (base === 0) {
    base = 10;
  }

  const { max } = integerRange(spec.signed, spec.bits);
  const bound = spec.signed && negative ? max + 1n : max;
  const radix = BigInt(base);
  let magnitude = 0n;
  let saturated = false;
  let count = 0;

  while (used < limit) {
    const digit = digitValue(input.peek(), base);
    if (digit < 0) {
      break;
    }
    if (!saturated) {
      magnitude = magnitude * radix + BigInt(digit);
      if (magnitude > bound) {
        magnitude = bound;
        saturated = true;
      }
    }
    input.advance();
    used++;
    count++;
  }

  if (count === 0) {
    input.reset(start);
    return { ok: false };
  }

  if (spec.signed) {
    return { ok: true, value: negative ? -magnitude : magnitude };
  }
  if (negative && !saturated) {
    return { ok: true, value: BigInt.asUintN(spec.bits, -magnitude) };
  }
  return { ok: true, value: magnitude };
}
