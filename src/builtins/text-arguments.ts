import { type ArgumentSource, Slot } from '../arguments.ts';
import { InputCursor } from '../decoder/cursor.ts';
import { decodeFloat } from '../decoder/float.ts';
import { decodeInteger } from '../decoder/integer.ts';

/**
 * Character code of a `'c` or `"c` argument, which numeric directives take as
 * the code of `c`.
 */
function quotedCharCode(text: string): number | undefined {
  if (text[0] !== "'" && text[0] !== '"') {
    return undefined;
  }
  return text.length > 1 ? text.charCodeAt(1) : 0;
}

/**
 * Argument source over command-line strings.
 *
 * Each directive coerces the next string to the type it needs. A missing
 * argument reads as the empty string or zero. Text that is not a complete
 * number converts as far as it parses and is reported in `warnings`.
 */
export class TextArguments implements ArgumentSource {
  private index = 0;

  /** Conversion problems, one line per argument */
  readonly warnings: string[] = [];

  constructor(private readonly values: readonly string[]) {}

  get consumed(): number {
    return this.index;
  }

  get remaining(): number {
    return this.values.length - this.index;
  }

  integer(): bigint {
    const text = this.next();
    return text === undefined ? 0n : this.parseInteger(text);
  }

  float(): number {
    const text = this.next();
    if (text === undefined) {
      return 0;
    }
    const quoted = quotedCharCode(text);
    if (quoted !== undefined) {
      return quoted;
    }

    const cursor = new InputCursor(text);
    cursor.skipWhitespace();
    if (cursor.done) {
      return 0;
    }
    const result = decodeFloat(cursor, 0);
    if (!result.ok || !cursor.done) {
      this.warnings.push(`${text}: invalid number`);
    }
    return result.ok ? result.value : 0;
  }

  char(): number {
    const text = this.next();
    return text !== undefined && text.length > 0 ? text.charCodeAt(0) : 0;
  }

  string(): string {
    return this.next() ?? '';
  }

  pointer(): bigint {
    return BigInt.asUintN(64, this.integer());
  }

  /** Commands have nowhere to store a position; the slot is discarded */
  count(): Slot<number> {
    return new Slot<number>();
  }

  star(): number {
    return Number(BigInt.asIntN(32, this.integer()));
  }

  private next(): string | undefined {
    const value = this.values[this.index];
    if (value !== undefined) {
      this.index++;
    }
    return value;
  }

  private parseInteger(text: string): bigint {
    const quoted = quotedCharCode(text);
    if (quoted !== undefined) {
      return BigInt(quoted);
    }

    const cursor = new InputCursor(text);
    cursor.skipWhitespace();
    if (cursor.done) {
      return 0n;
    }
    const result = decodeInteger(cursor, { base: 0, signed: true, bits: 64, width: 0 });
    if (!result.ok || !cursor.done) {
      this.warnings.push(`${text}: invalid number`);
    }
    return result.ok ? result.value : 0n;
  }
}
