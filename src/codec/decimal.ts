/**
 * Exact decimal digits of IEEE-754 doubles and digit-string rounding.
 *
 * Every finite double is a dyadic rational, so its decimal expansion is
 * finite. Rendering from the exact digits makes boundary cases such as
 * `2.675` or `0.125` round on the stored value, not on its shortest printed form.
 */

/**
 * Decimal expansion of a non-negative finite value.
 *
 * The value equals `0.d1d2d3... * 10^point`, i.e. the first `point` digits
 * form the integer part. `point` may be zero or negative for values below 1.
 */
export type DecimalDigits = {
  /** Significant digits without leading or trailing zeros ('0' for zero) */
  digits: string;
  point: number;
};

/**
 * Split a finite double into `mantissa * 2^exponent`.
 */
function decompose(value: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const high = view.getUint32(0);
  const low = view.getUint32(4);
  const biased = (high >>> 20) & 0x7ff;
  const fraction = (BigInt(high & 0xfffff) << 32n) | BigInt(low);

  if (biased === 0) {
    // Subnormal
    return { mantissa: fraction, exponent: -1074 };
  }
  return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/**
 * Exact decimal digits of |value|.
 */
export function exactDecimal(value: number): DecimalDigits {
  const { mantissa, exponent } = decompose(Math.abs(value));
  if (mantissa === 0n) {
    return { digits: '0', point: 1 };
  }

  let text: string;
  let point: number;
  if (exponent >= 0) {
    text = (mantissa << BigInt(exponent)).toString();
    point = text.length;
  } else {
    // m / 2^k == m * 5^k / 10^k
    const k = -exponent;
    text = (mantissa * 5n ** BigInt(k)).toString();
    point = text.length - k;
  }

  return { digits: text.replace(/0+$/, ''), point };
}

/**
 * Result of rounding a digit string.
 */
export type RoundedDigits = {
  /** Kept digits, each 0-9 */
  digits: number[];
  /** A carry escaped the leading digit and a new leading 1 was inserted */
  overflow: boolean;
};

/**
 * Keep the first `keep` digits of `digits`, padding with zeros, and round
 * on the discarded rest.
 *
 * The digit after the last kept one decides: above 5 (or 5 followed by any
 * non-zero digit) rounds up; exactly 5 with nothing after it rounds to an
 * even last digit. Carries propagate leftwards; a carry past the first digit
 * inserts a leading 1.
 */
export function roundDigits(digits: string, keep: number): RoundedDigits {
  if (keep < 0) {
    // Everything lies below half a unit of the last kept place
    return { digits: [], overflow: false };
  }

  const kept: number[] = [];
  for (let i = 0; i < keep; i++) {
    kept.push(i < digits.length ? digits.charCodeAt(i) - 48 : 0);
  }

  const next = keep < digits.length ? digits.charCodeAt(keep) - 48 : 0;
  const rest = digits.length > keep + 1 && /[1-9]/.test(digits.slice(keep + 1));
  const last = kept.length > 0 ? kept[kept.length - 1] : 0;
  const roundUp = next > 5 || (next === 5 && (rest || last % 2 === 1));

  if (!roundUp) {
    return { digits: kept, overflow: false };
  }

  let position = kept.length - 1;
  while (position >= 0 && kept[position] === 9) {
    kept[position] = 0;
    position--;
  }
  if (position >= 0) {
    kept[position]++;
    return { digits: kept, overflow: false };
  }

  kept.unshift(1);
  return { digits: kept, overflow: true };
}

/**
 * Decimal exponent of a finite non-zero value after rounding it to
 * `significant` digits, as `%e` would print it.
 */
export function roundedExponent(value: number, significant: number): number {
  if (value === 0) {
    return 0;
  }
  const { digits, point } = exactDecimal(value);
  if (significant >= digits.length) {
    return point - 1;
  }
  const { overflow } = roundDigits(digits, significant);
  return point - 1 + (overflow ? 1 : 0);
}
