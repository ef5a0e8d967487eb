import { describe, expect, it } from 'vitest';
import { printfCommand } from '../../src/builtins/printf.ts';

describe('printf command', () => {
  it('no arguments returns error', async () => {
    const result = await printfCommand([]);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('printf: usage: printf format [arguments]\n');
  });

  it('prints literal string', async () => {
    const result = await printfCommand(['hello world']);
    expect(result.code).toBe(0);
    expect(result.stdout).toBe('hello world');
  });

  describe('string format specifiers', () => {
    it('%s substitutes string', async () => {
      const result = await printfCommand(['Hello %s!', 'World']);
      expect(result.code).toBe(0);
      expect(result.stdout).toBe('Hello World!');
    });

    it('%-s left aligns', async () => {
      const result = await printfCommand(['[%-10s]', 'test']);
      expect(result.stdout).toBe('[test      ]');
    });

    it('%.precision truncates string', async () => {
      const result = await printfCommand(['%.3s', 'hello']);
      expect(result.stdout).toBe('hel');
    });

    it('%c prints first character', async () => {
      const result = await printfCommand(['%c', 'abc']);
      expect(result.stdout).toBe('a');
    });
  });

  describe('integer format specifiers', () => {
    it('%d with width', async () => {
      const result = await printfCommand(['[%5d]', '42']);
      expect(result.code).toBe(0);
      expect(result.stdout).toBe('[   42]');
    });

    it('accepts hex, octal and quoted characters', async () => {
      expect((await printfCommand(['%d', '0x1f'])).stdout).toBe('31');
      expect((await printfCommand(['%d', '010'])).stdout).toBe('8');
      expect((await printfCommand(['%d', "'A"])).stdout).toBe('65');
      expect((await printfCommand(['%d', ' 7'])).stdout).toBe('7');
    });

    it('formats in other bases', async () => {
      expect((await printfCommand(['%o', '8'])).stdout).toBe('10');
      expect((await printfCommand(['%x', '255'])).stdout).toBe('ff');
      expect((await printfCommand(['%#X', '255'])).stdout).toBe('0XFF');
      expect((await printfCommand(['%u', '-1'])).stdout).toBe('4294967295');
    });

    it('narrows integers by the length modifier', async () => {
      expect((await printfCommand(['%u', '-1'])).stdout).toBe('4294967295');
      expect((await printfCommand(['%lu', '-1'])).stdout).toBe('18446744073709551615');
      expect((await printfCommand(['%hu', '-1'])).stdout).toBe('65535');
      expect((await printfCommand(['%d', '4294967297'])).stdout).toBe('1');
      expect((await printfCommand(['%ld', '4294967297'])).stdout).toBe('4294967297');
    });

    it('takes star widths from arguments', async () => {
      const result = await printfCommand(['%*d', '5', '42']);
      expect(result.stdout).toBe('   42');
    });

    it('reports invalid numbers', async () => {
      const result = await printfCommand(['%d', 'abc']);
      expect(result.code).toBe(1);
      expect(result.stdout).toBe('0');
      expect(result.stderr).toBe('printf: abc: invalid number\n');
    });

    it('uses the leading digits of a partial number', async () => {
      const result = await printfCommand(['%d', '12abc']);
      expect(result.code).toBe(1);
      expect(result.stdout).toBe('12');
      expect(result.stderr).toBe('printf: 12abc: invalid number\n');
    });
  });

  describe('floating point format specifiers', () => {
    it('%f formats float', async () => {
      const result = await printfCommand(['%f', '3.14159']);
      expect(result.stdout).toBe('3.141590');
    });

    it('%.2e formats scientific', async () => {
      const result = await printfCommand(['%.2e', '1234']);
      expect(result.stdout).toBe('1.23e+03');
    });

    it('accepts exponents', async () => {
      const result = await printfCommand(['%f', '1e3']);
      expect(result.stdout).toBe('1000.000000');
    });

    it('combines with other directives', async () => {
      const result = await printfCommand(['%5.1f|%-4s|', '2.25', 'ab']);
      expect(result.stdout).toBe('  2.2|ab  |');
    });
  });

  describe('escape sequences', () => {
    it('processes escapes in the format', async () => {
      const result = await printfCommand(['hello\\nworld\\t\\x41\\101']);
      expect(result.stdout).toBe('hello\nworld\tAA');
    });
  });

  it('%% produces literal percent', async () => {
    const result = await printfCommand(['100%%']);
    expect(result.stdout).toBe('100%');
  });

  describe('argument handling', () => {
    it('missing arguments use empty string or zero', async () => {
      expect((await printfCommand(['%s and %s', 'first'])).stdout).toBe('first and ');
      expect((await printfCommand(['%d'])).stdout).toBe('0');
    });

    it('reuses the format for remaining arguments', async () => {
      expect((await printfCommand(['%d\\n', '1', '2', '3'])).stdout).toBe('1\n2\n3\n');
      expect((await printfCommand(['%s-%s\\n', 'a', 'b', 'c'])).stdout).toBe('a-b\nc-\n');
    });

    it('ignores extra arguments without directives', async () => {
      const result = await printfCommand(['no directives', 'extra']);
      expect(result.code).toBe(0);
      expect(result.stdout).toBe('no directives');
    });
  });

  it('rejects unknown conversions', async () => {
    const result = await printfCommand(['%q']);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('printf: Invalid conversion directive: %q\n');
  });
});
