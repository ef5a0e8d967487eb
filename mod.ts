/**
 * fmtscan - printf/scanf-family text conversion.
 *
 * A formatter renders tagged values into text and a matcher reads typed
 * values back out of text, both driven by the same `%` directive grammar.
 *
 * @example
 * ```ts
 * import { arg, Slot, sprintf, sscanf, target } from 'fmtscan';
 *
 * sprintf('%05.1f|%-4s|%#x', arg.double(3.14159), arg.string('ab'), arg.int(255));
 * // '003.1|ab  |0xff'
 *
 * const n = new Slot<number>();
 * sscanf('  -42', '%d', target.int(n)); // 1, n.value === -42
 * ```
 *
 * @module
 */

// Core types
export * from './src/types.ts';
export * from './src/kinds.ts';
export * from './src/errors.ts';
export * from './src/arguments.ts';

// Directive grammar
export { INT_MAX, parseDirective } from './src/directive.ts';
export type { ParsedDirective, StarArgument } from './src/directive.ts';

// Codec and decoder building blocks
export { type DecimalDigits, exactDecimal, type RoundedDigits, roundDigits, roundedExponent } from './src/codec/decimal.ts';
export { applyWidth, type Field, signFor } from './src/codec/field.ts';
export { DEFAULT_PRECISION, formatExponent, formatFixed, formatFloat, formatGeneral } from './src/codec/float.ts';
export { formatInteger, integerBits, narrowInteger } from './src/codec/integer.ts';
export { type DecodeResult, InputCursor, isWhitespace } from './src/decoder/cursor.ts';
export { decodeFloat } from './src/decoder/float.ts';
export { decodeInteger, digitValue, integerRange, type IntegerSpec } from './src/decoder/integer.ts';
export { TextBuilder } from './src/text-builder.ts';

// Engines
export { formatWith, MAX_OUTPUT_LENGTH, sprintf, sprintfInto, vsprintf } from './src/formatter.ts';
export { SCAN_EOF, type ScanResult, scanValues, scanWith, sscanf, vsscanf } from './src/matcher.ts';

// Commands
export * from './src/builtins/mod.ts';
