import { describe, expect, it } from 'vitest';
import { TextBuilder } from '../src/text-builder.ts';

describe('TextBuilder', () => {
  it('starts empty', () => {
    const out = new TextBuilder();
    expect(out.length).toBe(0);
    expect(out.toString()).toBe('');
  });

  it('tracks the length of appended text', () => {
    const out = new TextBuilder();
    out.append('abc');
    out.append('');
    out.append('de');
    expect(out.length).toBe(5);
    expect(out.toString()).toBe('abcde');
    expect(out.toString()).toBe('abcde');
  });
});
