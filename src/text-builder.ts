/**
 * Growable text accumulator owned by one formatter call.
 */
export class TextBuilder {
  private chunks: string[] = [];
  private size = 0;

  /** Characters appended so far */
  get length(): number {
    return this.size;
  }

  append(text: string): void {
    if (text.length === 0) {
      return;
    }
    this.chunks.push(text);
    this.size += text.length;
  }

  toString(): string {
    if (this.chunks.length > 1) {
      this.chunks = [this.chunks.join('')];
    }
    return this.chunks[0] ?? '';
  }
}
