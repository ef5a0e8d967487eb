/**
 * Floating-point rendering for `%f %e %E %g %G`.
 *
 * All digit generation works on the exact decimal expansion of the double,
 * rounded with `roundDigits`.
 */

import { kindInfo } from '../kinds.ts';
import type { Directive } from '../types.ts';
import { exactDecimal, roundDigits, roundedExponent } from './decimal.ts';
import { type Field, signFor } from './field.ts';

export const DEFAULT_PRECISION = 6;

/**
 * Fractional digits past which every double's expansion is zero (the
 * smallest subnormal has 1074).
 */
const EXACT_DIGITS = 1100;

/**
 * Render |value| in fixed-point notation with `precision` fractional digits.
 */
export function formatFixed(value: number, precision: number, alternate = false): string {
  const exact = Math.min(precision, EXACT_DIGITS);
  const { digits, point } = exactDecimal(value);
  const rounded = roundDigits(digits, point + exact);

  const all = rounded.digits.join('').padStart(exact + 1, '0');
  const integer = all.slice(0, all.length - exact);
  const fraction = all.slice(all.length - exact) + '0'.repeat(precision - exact);

  return precision > 0 || alternate ? `${integer}.${fraction}` : integer;
}

/**
 * Render |value| as `d.ddde±XX` with `precision` digits after the point.
 */
export function formatExponent(value: number, precision: number, upper = false, alternate = false): string {
  const exact = Math.min(precision, EXACT_DIGITS);
  let mantissa: number[];
  let exponent = 0;

  if (value === 0) {
    mantissa = new Array<number>(exact + 1).fill(0);
  } else {
    const { digits, point } = exactDecimal(value);
    const rounded = roundDigits(digits, exact + 1);
    // 9.99 -> 10.0: drop the extra digit and move the point instead
    mantissa = rounded.overflow ? rounded.digits.slice(0, exact + 1) : rounded.digits;
    exponent = point - 1 + (rounded.overflow ? 1 : 0);
  }

  const [lead, ...rest] = mantissa;
  const fraction = rest.join('') + '0'.repeat(precision - exact);
  const body = precision > 0 || alternate ? `${lead}.${fraction}` : `${lead}`;
  const sign = exponent < 0 ? '-' : '+';

  return `${body}${upper ? 'E' : 'e'}${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
}

/**
 * Remove trailing fractional zeros and a bare trailing point, leaving any
 * exponent suffix alone.
 */
export function stripTrailingZeros(text: string): string {
  const e = text.search(/[eE]/);
  const mantissa = e === -1 ? text : text.slice(0, e);
  const suffix = e === -1 ? '' : text.slice(e);
  if (!mantissa.includes('.')) {
    return text;
  }
  return mantissa.replace(/0+$/, '').replace(/\.$/, '') + suffix;
}

/**
 * Render |value| in `%g` style: fixed notation when the rounded exponent X
 * satisfies `-4 <= X < P`, exponential otherwise.
 */
export function formatGeneral(value: number, precision: number, upper = false, alternate = false): string {
  const significant = precision < 0 ? DEFAULT_PRECISION : Math.max(precision, 1);
  const exponent = roundedExponent(value, significant);

  const text =
    exponent >= -4 && exponent < significant
      ? formatFixed(value, significant - 1 - exponent, alternate)
      : formatExponent(value, significant - 1, upper, alternate);

  return alternate ? text : stripTrailingZeros(text);
}

/**
 * Render a floating-point conversion.
 */
export function formatFloat(value: number, directive: Directive): Field {
  const { upper } = kindInfo(directive.kind);
  const { flags } = directive;

  if (Number.isNaN(value)) {
    return { prefix: '', body: upper ? 'NAN' : 'nan', zeroPaddable: false };
  }

  const sign = signFor(value < 0 || Object.is(value, -0), flags);
  if (!Number.isFinite(value)) {
    return { prefix: sign, body: upper ? 'INF' : 'inf', zeroPaddable: false };
  }

  const magnitude = Math.abs(value);
  const precision = directive.precision < 0 ? DEFAULT_PRECISION : directive.precision;
  let body: string;
  switch (directive.kind) {
    case 'exponent':
    case 'exponentUpper':
      body = formatExponent(magnitude, precision, upper, flags.alternate);
      break;
    case 'general':
    case 'generalUpper':
      body = formatGeneral(magnitude, directive.precision, upper, flags.alternate);
      break;
    default:
      body = formatFixed(magnitude, precision, flags.alternate);
  }

  return { prefix: sign, body, zeroPaddable: true };
}
