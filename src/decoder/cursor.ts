/**
 * Forward-only cursor over the matcher's input text.
 */

const WHITESPACE = new Set([' ', '\t', '\n', '\v', '\f', '\r']);

export function isWhitespace(c: string | undefined): boolean {
  return c !== undefined && WHITESPACE.has(c);
}

/**
 * Outcome of decoding one field: the value, or a signal that nothing matched.
 * On failure the cursor is left where the field started.
 */
export type DecodeResult<T> = { ok: true; value: T } | { ok: false };

export class InputCursor {
  private pos: number;

  constructor(
    readonly text: string,
    position = 0,
  ) {
    this.pos = Math.min(Math.max(position, 0), text.length);
  }

  /** Characters consumed from the start of the text */
  get position(): number {
    return this.pos;
  }

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(offset = 0): string | undefined {
    const index = this.pos + offset;
    return index < this.text.length ? this.text[index] : undefined;
  }

  /** Up to `count` characters from the current position */
  peekText(count: number): string {
    return this.text.slice(this.pos, this.pos + count);
  }

  advance(count = 1): void {
    this.pos = Math.min(this.pos + count, this.text.length);
  }

  /** Move back to a position recorded earlier; never forward */
  reset(position: number): void {
    if (position < this.pos) {
      this.pos = Math.max(position, 0);
    }
  }

  /**
   * Skip any run of whitespace.
   *
   * @returns Number of characters skipped
   */
  skipWhitespace(): number {
    const start = this.pos;
    while (isWhitespace(this.peek())) {
      this.pos++;
    }
    return this.pos - start;
  }
}
