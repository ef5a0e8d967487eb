/**
 * Formatter: the `sprintf` family.
 *
 * Copies literal text, hands every `%` directive to the codec and appends the
 * padded result to a TextBuilder.
 */

import { type ArgumentSource, type FormatArg, TaggedArguments } from './arguments.ts';
import { formatFloat } from './codec/float.ts';
import { applyWidth, type Field } from './codec/field.ts';
import { formatInteger, narrowInteger } from './codec/integer.ts';
import { parseDirective } from './directive.ts';
import { BufferTooSmallError, FieldTooLargeError, InvalidDirectiveError } from './errors.ts';
import { isFloatKind, isIntegerKind } from './kinds.ts';
import { TextBuilder } from './text-builder.ts';
import type { Directive, FormatOptions } from './types.ts';

/** Most characters one formatter call produces */
export const MAX_OUTPUT_LENGTH = 2 ** 28;

/**
 * Map each code unit to a single byte, the way a wide string is narrowed.
 */
function toSingleByte(text: string): string {
  let result = '';
  for (let i = 0; i < text.length; i++) {
    result += String.fromCharCode(text.charCodeAt(i) & 0xff);
  }
  return result;
}

function textField(body: string): Field {
  return { prefix: '', body, zeroPaddable: false };
}

/**
 * Characters a directive asks for through its width or numeric precision.
 */
function requestedLength(directive: Directive): number {
  const numeric = isIntegerKind(directive.kind) || isFloatKind(directive.kind);
  return Math.max(directive.width, numeric ? directive.precision : 0);
}

/**
 * Convert one directive to its padded text.
 *
 * @param written - Characters produced so far, for `%n`
 */
function convert(directive: Directive, source: ArgumentSource, written: number): string {
  const { flags, width, precision, start } = directive;

  if (isIntegerKind(directive.kind)) {
    const value = directive.kind === 'pointer' ? source.pointer(start) : source.integer(start);
    return applyWidth(formatInteger(value, directive), flags, width);
  }

  if (isFloatKind(directive.kind)) {
    return applyWidth(formatFloat(source.float(start), directive), flags, width);
  }

  switch (directive.kind) {
    case 'char':
      return applyWidth(textField(String.fromCharCode(source.char(start) & 0xff)), flags, width);

    case 'string': {
      let text = source.string(start);
      if (directive.length === 'l') {
        text = toSingleByte(text);
      }
      if (precision >= 0) {
        text = text.slice(0, precision);
      }
      return applyWidth(textField(text), flags, width);
    }

    case 'percent':
      return applyWidth({ prefix: '', body: '%', zeroPaddable: true }, flags, width);

    case 'count':
      source.count(start).set(Number(narrowInteger(BigInt(written), directive.length, true)));
      return '';

    default:
      return '';
  }
}

/**
 * Format against any argument source.
 *
 * Processing stops at the first directive with an unknown conversion; the text
 * produced before it is returned, or InvalidDirectiveError is thrown in strict mode.
 *
 * @param format - The format string
 * @param source - Supplies one value per directive (and per `*`)
 * @param options - Formatter options
 * @returns The formatted text
 * @throws FieldTooLargeError if the output would exceed MAX_OUTPUT_LENGTH
 */
export function formatWith(format: string, source: ArgumentSource, options: FormatOptions = {}): string {
  const out = new TextBuilder();
  let i = 0;

  while (i < format.length) {
    const percent = format.indexOf('%', i);
    if (percent === -1) {
      out.append(format.slice(i));
      break;
    }
    out.append(format.slice(i, percent));

    const { directive, end } = parseDirective(format, percent, 'format', (at) => source.star(at));
    if (directive.kind === 'none') {
      if (options.strict) {
        throw new InvalidDirectiveError(format.slice(percent, end + 1), percent, format);
      }
      break;
    }

    const requested = out.length + requestedLength(directive);
    if (requested > MAX_OUTPUT_LENGTH) {
      throw new FieldTooLargeError(requested, MAX_OUTPUT_LENGTH, percent, format);
    }
    out.append(convert(directive, source, out.length));
    if (out.length > MAX_OUTPUT_LENGTH) {
      throw new FieldTooLargeError(out.length, MAX_OUTPUT_LENGTH, percent, format);
    }
    i = end;
  }

  return out.toString();
}

/**
 * Format tagged arguments given as a list.
 */
export function vsprintf(format: string, args: readonly FormatArg[], options?: FormatOptions): string {
  return formatWith(format, new TaggedArguments(args, format), options);
}

/**
 * Format tagged arguments.
 *
 * @example
 * sprintf('%-6s|%+.2f', arg.string('pi'), arg.double(3.14159)); // 'pi    |+3.14'
 */
export function sprintf(format: string, ...args: FormatArg[]): string {
  return vsprintf(format, args);
}

/**
 * Format into a caller-supplied byte buffer, one byte per character, followed
 * by a NUL terminator.
 *
 * @returns Characters written, not counting the terminator
 * @throws BufferTooSmallError if the text and terminator do not fit; nothing is written then
 */
export function sprintfInto(destination: Uint8Array, format: string, args: readonly FormatArg[], options?: FormatOptions): number {
  const text = vsprintf(format, args, options);
  const required = text.length + 1;
  if (destination.length < required) {
    throw new BufferTooSmallError(required, destination.length, format);
  }

  for (let i = 0; i < text.length; i++) {
    destination[i] = text.charCodeAt(i) & 0xff;
  }
  destination[text.length] = 0;
  return text.length;
}
