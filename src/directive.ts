/**
 * Directive parser.
 *
 * Consumes one `%...` directive from a format string. The formatter and the
 * matcher use the same entry point with their own grammar:
 *
 * - format: `%[flags][width|*][.precision|.*][h|l|L]kind`
 * - scan:   `%[*][width][*][hh|h|ll|l|L]kind`
 */

import { FieldTooLargeError } from './errors.ts';
import { kindOf } from './kinds.ts';
import type { Directive, DirectiveFlags, DirectiveGrammar, LengthModifier } from './types.ts';

/**
 * Result of parsing one directive.
 */
export type ParsedDirective = {
  directive: Directive;
  /** Offset in the format string just past the directive */
  end: number;
};

/**
 * Supplies the integer for a `*` width or precision (format grammar only).
 */
export type StarArgument = (at: number) => number;

/** Largest width or precision a directive may carry */
export const INT_MAX = 2147483647;

const FLAG_CHARS = new Map<string, keyof DirectiveFlags>([
  ['-', 'leftJustify'],
  ['+', 'forceSign'],
  [' ', 'spaceSign'],
  ['0', 'zeroPad'],
  ['#', 'alternate'],
]);

function isDigit(c: string | undefined): boolean {
  return c !== undefined && c >= '0' && c <= '9';
}

function checkLimit(value: number, format: string, start: number): number {
  if (value > INT_MAX) {
    throw new FieldTooLargeError(value, INT_MAX, start, format);
  }
  return value;
}

/**
 * Read a run of decimal digits.
 *
 * @throws FieldTooLargeError if the number exceeds INT_MAX
 */
function readNumber(format: string, pos: number, start: number): { value: number; end: number } {
  let value = 0;
  let end = pos;
  while (isDigit(format[end])) {
    value = value * 10 + (format.charCodeAt(end) - 48);
    end++;
  }
  return { value: checkLimit(value, format, start), end };
}

/**
 * Read a length modifier. Doubled forms only exist in the scan grammar.
 */
function readLength(format: string, pos: number, grammar: DirectiveGrammar): { length: LengthModifier; end: number } {
  const c = format[pos];
  const doubled = grammar === 'scan' && format[pos + 1] === c;
  switch (c) {
    case 'h':
      return doubled ? { length: 'hh', end: pos + 2 } : { length: 'h', end: pos + 1 };
    case 'l':
      return doubled ? { length: 'll', end: pos + 2 } : { length: 'l', end: pos + 1 };
    case 'L':
      return { length: 'L', end: pos + 1 };
    default:
      return { length: 'none', end: pos };
  }
}

/**
 * Parse the directive whose '%' is at `start`.
 *
 * An unknown conversion character yields kind `none` and is not consumed, so
 * `end` points at it.
 *
 * @param format - The format string
 * @param start - Offset of the '%'
 * @param grammar - Formatter or matcher grammar
 * @param takeStar - Source of `*` values; without it a `*` width or precision counts as unspecified
 * @throws FieldTooLargeError for a width or precision above INT_MAX
 */
export function parseDirective(format: string, start: number, grammar: DirectiveGrammar, takeStar?: StarArgument): ParsedDirective {
  const flags: DirectiveFlags = {
    leftJustify: false,
    forceSign: false,
    spaceSign: false,
    zeroPad: false,
    alternate: false,
  };
  let width = -1;
  let precision = -1;
  let suppress = false;
  let pos = start + 1;

  if (grammar === 'format') {
    for (let flag = FLAG_CHARS.get(format[pos]); flag !== undefined; flag = FLAG_CHARS.get(format[pos])) {
      flags[flag] = true;
      pos++;
    }

    if (isDigit(format[pos])) {
      ({ value: width, end: pos } = readNumber(format, pos, start));
    } else if (format[pos] === '*') {
      if (takeStar) {
        const value = takeStar(start);
        // A negative width is a '-' flag plus a positive width
        if (value < 0) {
          flags.leftJustify = true;
        }
        width = checkLimit(Math.abs(value), format, start);
      }
      pos++;
    }

    if (format[pos] === '.') {
      pos++;
      if (isDigit(format[pos])) {
        ({ value: precision, end: pos } = readNumber(format, pos, start));
      } else if (format[pos] === '*') {
        const value = takeStar ? takeStar(start) : -1;
        precision = checkLimit(Math.max(value, -1), format, start);
        pos++;
      } else {
        precision = 0;
      }
    }
  } else {
    if (format[pos] === '*') {
      suppress = true;
      pos++;
    }
    if (isDigit(format[pos])) {
      ({ value: width, end: pos } = readNumber(format, pos, start));
    }
    if (format[pos] === '*') {
      suppress = true;
      pos++;
    }
  }

  const { length, end: afterLength } = readLength(format, pos, grammar);
  pos = afterLength;

  const conversion = format[pos] ?? '';
  const kind = kindOf(format[pos]);
  if (kind !== 'none') {
    pos++;
  }

  return {
    directive: {
      flags,
      width,
      precision,
      length,
      kind,
      suppress,
      conversion: kind === 'none' ? '' : conversion,
      start,
      end: pos,
    },
    end: pos,
  };
}
