import type { ConversionKind } from './kinds.ts';

/**
 * Directive flags.
 * @typedef {Object} DirectiveFlags
 * @property {boolean} leftJustify - '-' pads on the right.
 * @property {boolean} forceSign - '+' always prints a sign for signed conversions.
 * @property {boolean} spaceSign - ' ' prints a space where a '+' would go.
 * @property {boolean} zeroPad - '0' pads numbers with leading zeros.
 * @property {boolean} alternate - '#' selects the alternate form.
 */
export type DirectiveFlags = {
  leftJustify: boolean;
  forceSign: boolean;
  spaceSign: boolean;
  zeroPad: boolean;
  alternate: boolean;
};

/**
 * Length modifier of a directive. The formatter grammar only knows `h`, `l` and `L`.
 */
export type LengthModifier = 'none' | 'hh' | 'h' | 'l' | 'll' | 'L';

/**
 * Which grammar a directive is parsed with.
 */
export type DirectiveGrammar = 'format' | 'scan';

/**
 * One `%...` unit of a format string.
 */
export type Directive = Readonly<{
  flags: Readonly<DirectiveFlags>;
  /** Minimum field width (format) or maximum field width (scan); -1 when unspecified */
  width: number;
  /** -1 when unspecified, which is distinct from 0 */
  precision: number;
  length: LengthModifier;
  kind: ConversionKind;
  /** Scan only: '*' discards the converted value */
  suppress: boolean;
  /** The conversion character as written, '' when the format ended early */
  conversion: string;
  /** Offset of the '%' in the format string */
  start: number;
  /** Offset just past the directive */
  end: number;
}>;

/**
 * Options for the formatter.
 */
export type FormatOptions = {
  /** Throw InvalidDirectiveError on an unknown conversion instead of stopping silently */
  strict?: boolean;
};

/**
 * Options for the matcher.
 */
export type ScanOptions = {
  /** Throw InvalidDirectiveError on an unknown conversion instead of stopping */
  strict?: boolean;
  /** Count `%n` stores as assignments in the returned total */
  countPositions?: boolean;
};
