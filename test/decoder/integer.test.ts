import { describe, expect, it } from 'vitest';
import { InputCursor } from '../../src/decoder/cursor.ts';
import { decodeInteger, digitValue, type IntegerSpec } from '../../src/decoder/integer.ts';

const DECIMAL: IntegerSpec = { base: 10, signed: true, bits: 32, width: 0 };

function decode(text: string, spec: Partial<IntegerSpec> = {}): { value?: bigint; position: number } {
  const cursor = new InputCursor(text);
  const result = decodeInteger(cursor, { ...DECIMAL, ...spec });
  return result.ok ? { value: result.value, position: cursor.position } : { position: cursor.position };
}

describe('digitValue', () => {
  it('accepts digits of the base in either case', () => {
    expect(digitValue('7', 8)).toBe(7);
    expect(digitValue('8', 8)).toBe(-1);
    expect(digitValue('F', 16)).toBe(15);
    expect(digitValue('g', 16)).toBe(-1);
    expect(digitValue(undefined, 10)).toBe(-1);
  });
});

describe('decodeInteger', () => {
  it('reads digits up to the first non-digit', () => {
    expect(decode('123abc')).toEqual({ value: 123n, position: 3 });
    expect(decode('+7')).toEqual({ value: 7n, position: 2 });
    expect(decode('-0')).toEqual({ value: 0n, position: 2 });
  });

  it('fails without digits and restores the cursor', () => {
    expect(decode('abc')).toEqual({ position: 0 });
    expect(decode('-')).toEqual({ position: 0 });
    expect(decode(' 12')).toEqual({ position: 0 });
  });

  describe('base selection', () => {
    it('detects hex and octal in base 0', () => {
      expect(decode('-0x1A', { base: 0 })).toEqual({ value: -26n, position: 5 });
      expect(decode('0755', { base: 0 })).toEqual({ value: 493n, position: 4 });
      expect(decode('089', { base: 0 })).toEqual({ value: 0n, position: 1 });
      expect(decode('42', { base: 0 })).toEqual({ value: 42n, position: 2 });
    });

    it('takes the 0x prefix only before a hex digit', () => {
      expect(decode('0xg', { base: 0 })).toEqual({ value: 0n, position: 1 });
      expect(decode('0x', { base: 16, signed: false })).toEqual({ value: 0n, position: 1 });
      expect(decode('0XfF', { base: 16, signed: false })).toEqual({ value: 255n, position: 4 });
      expect(decode('ff', { base: 16, signed: false })).toEqual({ value: 255n, position: 2 });
    });

    it('does not take a prefix in base 10 or 8', () => {
      expect(decode('0x10')).toEqual({ value: 0n, position: 1 });
      expect(decode('017', { base: 8 })).toEqual({ value: 15n, position: 3 });
    });
  });

  describe('width', () => {
    it('limits the digits read', () => {
      expect(decode('12345', { width: 3 })).toEqual({ value: 123n, position: 3 });
    });

    it('counts the sign', () => {
      expect(decode('-5', { width: 1 })).toEqual({ position: 0 });
      expect(decode('-56', { width: 2 })).toEqual({ value: -5n, position: 2 });
    });

    it('counts the prefix', () => {
      expect(decode('0x1f', { base: 16, signed: false, width: 2 })).toEqual({ value: 0n, position: 1 });
      expect(decode('0x1f', { base: 16, signed: false, width: 3 })).toEqual({ value: 1n, position: 3 });
    });
  });

  describe('saturation', () => {
    it('clamps signed values and keeps consuming digits', () => {
      expect(decode('99999999999')).toEqual({ value: 2147483647n, position: 11 });
      expect(decode('-99999999999')).toEqual({ value: -2147483648n, position: 12 });
      expect(decode('-2147483648')).toEqual({ value: -2147483648n, position: 11 });
    });

    it('clamps to the target width class', () => {
      expect(decode('300', { bits: 8 })).toEqual({ value: 127n, position: 3 });
      expect(decode('-129', { bits: 8 })).toEqual({ value: -128n, position: 4 });
      expect(decode('40000', { bits: 16 })).toEqual({ value: 32767n, position: 5 });
      expect(decode('9223372036854775808', { bits: 64 })).toEqual({ value: 9223372036854775807n, position: 19 });
    });

    it('clamps unsigned values to the maximum', () => {
      expect(decode('99999999999', { signed: false })).toEqual({ value: 4294967295n, position: 11 });
      expect(decode('-99999999999', { signed: false })).toEqual({ value: 4294967295n, position: 12 });
    });

    it('wraps negative unsigned values', () => {
      expect(decode('-1', { signed: false })).toEqual({ value: 4294967295n, position: 2 });
      expect(decode('-1', { signed: false, bits: 64 })).toEqual({ value: 18446744073709551615n, position: 2 });
      expect(decode('-2', { signed: false, bits: 8 })).toEqual({ value: 254n, position: 2 });
    });
  });
});
