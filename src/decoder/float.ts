/**
 * Floating-point scanning for `%e %E %f %g %G`.
 */

import type { DecodeResult, InputCursor } from './cursor.ts';
import { digitValue } from './integer.ts';

const SPECIAL_VALUES: ReadonlyArray<[string, number]> = [
  ['infinity', Number.POSITIVE_INFINITY],
  ['inf', Number.POSITIVE_INFINITY],
  ['nan', Number.NaN],
];

function matchSpecial(input: InputCursor, available: number): number | undefined {
  for (const [word, value] of SPECIAL_VALUES) {
    if (available >= word.length && input.peekText(word.length).toLowerCase() === word) {
      input.advance(word.length);
      return value;
    }
  }
  return undefined;
}

function isDecimalDigit(c: string | undefined): boolean {
  return digitValue(c, 10) >= 0;
}

function hexValue(integer: string, fraction: string): number {
  let value = 0;
  for (const c of integer + fraction) {
    value = value * 16 + digitValue(c, 16);
  }
  for (let i = 0; i < fraction.length; i++) {
    value /= 16;
  }
  return value;
}

/**
 * Read a floating-point field.
 *
 * Grammar: `[+-]` then `inf`, `infinity` or `nan` (any case), or an optional
 * `0x` prefix, digits with at most one '.', and for decimal input an optional
 * `e[+-]digits` exponent. The exponent is only consumed when a digit follows
 * it inside the width. Hexadecimal input has no exponent.
 *
 * @param width - Maximum characters to read; 0 or less for no limit
 */
export function decodeFloat(input: InputCursor, width: number): DecodeResult<number> {
  const start = input.position;
  const limit = width > 0 ? width : Number.POSITIVE_INFINITY;
  let used = 0;

  let negative = false;
  const sign = input.peek();
  if (used < limit && (sign === '+' || sign === '-')) {
    negative = sign === '-';
    input.advance();
    used++;
  }

  const special = matchSpecial(input, limit - used);
  if (special !== undefined) {
    return { ok: true, value: negative ? -special : special };
  }

  let hex = false;
  const x = input.peek(1);
  if (input.peek() === '0' && (x === 'x' || x === 'X') && limit - used >= 3) {
    const next = input.peek(2);
    if (digitValue(next, 16) >= 0 || (next === '.' && limit - used >= 4 && digitValue(input.peek(3), 16) >= 0)) {
      input.advance(2);
      used += 2;
      hex = true;
    }
  }

  const base = hex ? 16 : 10;
  let integer = '';
  let fraction = '';
  let point = false;
  while (used < limit) {
    const c = input.peek();
    if (c !== undefined && digitValue(c, base) >= 0) {
      if (point) {
        fraction += c;
      } else {
        integer += c;
      }
    } else if (c === '.' && !point) {
      point = true;
    } else {
      break;
    }
    input.advance();
    used++;
  }

  if (integer.length === 0 && fraction.length === 0) {
    input.reset(start);
    return { ok: false };
  }

  let exponent = '0';
  const e = input.peek();
  if (!hex && (e === 'e' || e === 'E')) {
    const expSign = input.peek(1);
    const signed = expSign === '+' || expSign === '-';
    const firstDigit = signed ? 2 : 1;
    if (used + firstDigit < limit && isDecimalDigit(input.peek(firstDigit))) {
      exponent = expSign === '-' ? '-' : '';
      input.advance(firstDigit);
      used += firstDigit;
      for (let c = input.peek(); used < limit && c !== undefined && isDecimalDigit(c); c = input.peek()) {
        exponent += c;
        input.advance();
        used++;
      }
    }
  }

  // Number() rounds correctly and saturates to Infinity or 0
  const value = hex ? hexValue(integer, fraction) : Number(`${integer || '0'}.${fraction || '0'}e${exponent}`);
  return { ok: true, value: negative ? -value : value };
}
