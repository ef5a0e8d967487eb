/**
 * Matcher: the `sscanf` family.
 *
 * Walks the format and the input together. Whitespace in the format skips
 * input whitespace, other literal characters must match exactly, and every
 * directive decodes one field and hands its value to an AssignmentSink.
 */

import { type AssignmentSink, type ScanTarget, type ScanValue, TargetList, ValueCollector } from './arguments.ts';
import { InputCursor, isWhitespace } from './decoder/cursor.ts';
import { decodeFloat } from './decoder/float.ts';
import { decodeInteger } from './decoder/integer.ts';
import { parseDirective } from './directive.ts';
import { InvalidDirectiveError } from './errors.ts';
import { isFloatKind, isIntegerKind, kindInfo } from './kinds.ts';
import type { Directive, LengthModifier, ScanOptions } from './types.ts';

/**
 * Returned when the input ran out before the first assignment.
 */
export const SCAN_EOF = -1;

/**
 * Result of scanValues.
 */
export type ScanResult = {
  /** Same convention as sscanf */
  count: number;
  values: ScanValue[];
};

function isWide(length: LengthModifier): boolean {
  return length === 'l' || length === 'll' || length === 'L';
}

function scanBits(length: LengthModifier): 8 | 16 | 32 | 64 {
  switch (length) {
    case 'hh':
      return 8;
    case 'h':
      return 16;
    case 'none':
      return 32;
    default:
      return 64;
  }
}

function integerValue(value: bigint, signed: boolean, length: LengthModifier): ScanValue {
  if (isWide(length)) {
    return signed ? { type: 'long', value } : { type: 'ulong', value };
  }
  return signed ? { type: 'int', value: Number(value) } : { type: 'uint', value: Number(value) };
}

/**
 * Decode the field for one directive. Leading whitespace has already been
 * skipped where the kind asks for it.
 *
 * @returns The value, or undefined on a matching failure
 */
function decode(directive: Directive, input: InputCursor): ScanValue | undefined {
  const { kind, width, length } = directive;

  if (kind === 'pointer') {
    const result = decodeInteger(input, { base: 16, signed: false, bits: 64, width });
    return result.ok ? { type: 'pointer', value: result.value } : undefined;
  }

  if (isIntegerKind(kind)) {
    const { signed, base } = kindInfo(kind);
    const result = decodeInteger(input, { base, signed, bits: scanBits(length), width });
    return result.ok ? integerValue(result.value, signed, length) : undefined;
  }

  if (isFloatKind(kind)) {
    const result = decodeFloat(input, width);
    if (!result.ok) {
      return undefined;
    }
    return isWide(length) ? { type: 'double', value: result.value } : { type: 'float', value: Math.fround(result.value) };
  }

  switch (kind) {
    case 'char': {
      const text = input.peekText(width > 0 ? width : 1);
      if (text.length === 0) {
        return undefined;
      }
      input.advance(text.length);
      return { type: 'char', value: text };
    }

    case 'string': {
      const limit = width > 0 ? width : Number.POSITIVE_INFINITY;
      let text = '';
      for (let c = input.peek(); c !== undefined && !isWhitespace(c) && text.length < limit; c = input.peek()) {
        text += c;
        input.advance();
      }
      return text.length > 0 ? { type: 'string', value: text } : undefined;
    }

    default:
      return undefined;
  }
}

/**
 * Scan into any assignment sink.
 *
 * @param input - Text to read from
 * @param format - The format string
 * @param sink - Receives one value per non-suppressed directive
 * @param options - Matcher options
 * @returns Number of assignments, or SCAN_EOF when the input ran out before the first one
 */
export function scanWith(input: string, format: string, sink: AssignmentSink, options: ScanOptions = {}): number {
  const cursor = new InputCursor(input);
  let assigned = 0;
  let i = 0;

  // Input exhausted: an input failure rather than a matching failure
  const exhausted = (): number => (assigned === 0 ? SCAN_EOF : assigned);

  while (i < format.length) {
    const c = format[i];

    if (isWhitespace(c)) {
      while (isWhitespace(format[i])) {
        i++;
      }
      cursor.skipWhitespace();
      continue;
    }

    if (c !== '%') {
      if (cursor.done) {
        return exhausted();
      }
      if (cursor.peek() !== c) {
        return assigned;
      }
      cursor.advance();
      i++;
      continue;
    }

    const { directive, end } = parseDirective(format, i, 'scan');
    if (directive.kind === 'none') {
      if (options.strict) {
        throw new InvalidDirectiveError(format.slice(i, end + 1), i, format);
      }
      return assigned;
    }
    i = end;

    if (directive.kind === 'count') {
      if (!directive.suppress) {
        const position = BigInt(cursor.position);
        sink.assign(integerValue(BigInt.asIntN(scanBits(directive.length), position), true, directive.length), directive);
        if (options.countPositions) {
          assigned++;
        }
      }
      continue;
    }

    if (directive.kind !== 'char') {
      cursor.skipWhitespace();
    }
    if (cursor.done) {
      return exhausted();
    }

    if (directive.kind === 'percent') {
      if (cursor.peek() !== '%') {
        return assigned;
      }
      cursor.advance();
      continue;
    }

    const value = decode(directive, cursor);
    if (value === undefined) {
      return assigned;
    }
    if (!directive.suppress) {
      sink.assign(value, directive);
      assigned++;
    }
  }

  return assigned;
}

/**
 * Scan into a list of tagged targets.
 */
export function vsscanf(input: string, format: string, targets: readonly ScanTarget[], options?: ScanOptions): number {
  return scanWith(input, format, new TargetList(targets, format), options);
}

/**
 * Scan into tagged targets.
 *
 * @example
 * const day = new Slot<number>();
 * const month = new Slot<string>();
 * sscanf('25 Dec', '%d %s', target.int(day), target.string(month)); // 2
 */
export function sscanf(input: string, format: string, ...targets: ScanTarget[]): number {
  return vsscanf(input, format, targets);
}

/**
 * Scan and collect the converted values instead of writing into targets.
 */
export function scanValues(input: string, format: string, options?: ScanOptions): ScanResult {
  const collector = new ValueCollector();
  const count = scanWith(input, format, collector, options);
  return { count, values: collector.values };
}
