import { describe, expect, it } from 'vitest';
import { arg, Slot, target } from '../src/arguments.ts';
import { sprintf } from '../src/formatter.ts';
import { sscanf } from '../src/matcher.ts';

describe('sprintf then sscanf', () => {
  it('restores int values in decimal', () => {
    for (const value of [0, 1, -1, 12345, 2147483647, -2147483648]) {
      const slot = new Slot<number>();
      expect(sscanf(sprintf('%d', arg.int(value)), '%d', target.int(slot))).toBe(1);
      expect(slot.value).toBe(value);
    }
  });

  it('restores unsigned values in every base', () => {
    for (const conversion of ['%u', '%o', '%x', '%X']) {
      for (const value of [0, 1, 4294967295, 3735928559]) {
        const slot = new Slot<number>();
        expect(sscanf(sprintf(conversion, arg.uint(value)), conversion, target.uint(slot))).toBe(1);
        expect(slot.value).toBe(value);
      }
    }
  });

  it('restores 64-bit extremes', () => {
    for (const value of [9223372036854775807n, -9223372036854775808n, 0n]) {
      const slot = new Slot<bigint>();
      expect(sscanf(sprintf('%ld', arg.int(value)), '%ld', target.long(slot))).toBe(1);
      expect(slot.value).toBe(value);
    }
    const slot = new Slot<bigint>();
    sscanf(sprintf('%lx', arg.uint(18446744073709551615n)), '%lx', target.ulong(slot));
    expect(slot.value).toBe(18446744073709551615n);
  });

  it('restores short extremes', () => {
    for (const value of [-32768, 32767]) {
      const slot = new Slot<number>();
      sscanf(sprintf('%hd', arg.int(value)), '%hd', target.int(slot));
      expect(slot.value).toBe(value);
    }
  });

  it('reads alternate forms back with %i', () => {
    const hex = new Slot<number>();
    const octal = new Slot<number>();
    const text = sprintf('%#x %#o', arg.uint(255), arg.uint(8));
    expect(text).toBe('0xff 010');
    expect(sscanf(text, '%i %i', target.int(hex), target.int(octal))).toBe(2);
    expect([hex.value, octal.value]).toEqual([255, 8]);
  });

  it('restores doubles printed with 17 significant digits', () => {
    for (const value of [0.1, 1 / 3, 1e-300, 123456.789, -2.5e10]) {
      const slot = new Slot<number>();
      expect(sscanf(sprintf('%.17g', arg.double(value)), '%lf', target.double(slot))).toBe(1);
      expect(slot.value).toBe(value);
    }
  });

  it('restores non-finite values', () => {
    for (const conversion of ['%f', '%e', '%G']) {
      const inf = new Slot<number>();
      const negative = new Slot<number>();
      const nan = new Slot<number>();
      const text = sprintf(`${conversion} ${conversion} ${conversion}`, arg.double(Infinity), arg.double(-Infinity), arg.double(NaN));
      expect(sscanf(text, '%lf %lf %lf', target.double(inf), target.double(negative), target.double(nan))).toBe(3);
      expect(inf.value).toBe(Infinity);
      expect(negative.value).toBe(-Infinity);
      expect(Number.isNaN(nan.value)).toBe(true);
    }
  });

  it('padding an already wide field changes nothing', () => {
    const once = sprintf('%5d', arg.int(42));
    expect(sprintf('%3s', arg.string(once))).toBe(once);
    expect(sprintf('%5s', arg.string(once))).toBe(once);
  });

  it('pads to the larger of the width and the natural length', () => {
    for (const value of [0, 7, -42, 123456]) {
      const natural = sprintf('%d', arg.int(value));
      for (const width of [0, 1, 3, 6, 10]) {
        const right = sprintf(`%${width}d`, arg.int(value));
        const left = sprintf(`%-${width}d`, arg.int(value));
        expect(right.length).toBe(Math.max(width, natural.length));
        expect(left.length).toBe(Math.max(width, natural.length));
        expect(right.trim()).toBe(natural);
        expect(sprintf(`%${width}s`, arg.string(right))).toBe(right);
      }
      expect(sprintf('%0d', arg.int(value))).toBe(natural);
      expect(sprintf('%-0d', arg.int(value))).toBe(natural);
    }
  });
});
