/**
 * Integer rendering for `%d %i %u %o %x %X %p`.
 */

import { kindInfo } from '../kinds.ts';
import type { Directive, LengthModifier } from '../types.ts';
import { type Field, signFor } from './field.ts';

/**
 * Bit width of the integer class selected by a length modifier.
 */
export function integerBits(length: LengthModifier): 8 | 16 | 32 | 64 {
  switch (length) {
    case 'hh':
      return 8;
    case 'h':
      return 16;
    case 'l':
    case 'll':
      return 64;
    default:
      return 32;
  }
}

/**
 * Reinterpret a value as the integer class of the length modifier, keeping
 * only its low bits.
 */
export function narrowInteger(value: bigint, length: LengthModifier, signed: boolean): bigint {
  const bits = integerBits(length);
  return signed ? BigInt.asIntN(bits, value) : BigInt.asUintN(bits, value);
}

/**
 * Render a non-negative magnitude in the given base.
 */
export function unsignedToDigits(magnitude: bigint, base: 8 | 10 | 16, upper = false): string {
  const digits = magnitude.toString(base);
  return upper ? digits.toUpperCase() : digits;
}

/**
 * Render an integer conversion.
 *
 * Precision is the minimum number of digits; precision 0 with value 0 gives no
 * digits at all. '#' adds '0' to octal and '0x'/'0X' to non-zero hex; pointers
 * always get '0x'.
 */
export function formatInteger(value: bigint, directive: Directive): Field {
  const info = kindInfo(directive.kind);
  const pointer = directive.kind === 'pointer';
  const narrowed = pointer ? BigInt.asUintN(64, value) : narrowInteger(value, directive.length, info.signed);
  const negative = narrowed < 0n;
  const magnitude = negative ? -narrowed : narrowed;
  const base = info.base === 0 ? 10 : info.base;

  let digits = magnitude === 0n && directive.precision === 0 ? '' : unsignedToDigits(magnitude, base, info.upper);
  digits = digits.padStart(directive.precision, '0');

  let prefix = '';
  if (directive.flags.alternate || pointer) {
    if (base === 8 && !digits.startsWith('0')) {
      digits = `0${digits}`;
    } else if (base === 16 && (magnitude !== 0n || pointer)) {
      prefix = info.upper ? '0X' : '0x';
    }
  }

  const sign = info.signed || pointer ? signFor(negative, directive.flags) : '';

  return {
    prefix: sign + prefix,
    body: digits,
    zeroPaddable: directive.precision < 0,
  };
}
