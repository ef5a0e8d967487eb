/**
 * Field assembly: sign selection and width padding shared by all conversions.
 */

import type { DirectiveFlags } from '../types.ts';

/**
 * The unpadded rendering of one converted value.
 */
export type Field = {
  /** Sign and base prefix; zero padding goes after it */
  prefix: string;
  body: string;
  /** Whether the '0' flag pads this field with zeros */
  zeroPaddable: boolean;
};

/**
 * Choose the sign character of a signed conversion.
 *
 * @returns '-' for negative values, otherwise '+' or ' ' per the flags, or ''
 */
export function signFor(negative: boolean, flags: Readonly<DirectiveFlags>): string {
  if (negative) {
    return '-';
  }
  if (flags.forceSign) {
    return '+';
  }
  if (flags.spaceSign) {
    return ' ';
  }
  return '';
}

/**
 * Pad a field to the minimum width.
 *
 * Left-justified fields are padded with spaces on the right. Otherwise the
 * padding goes on the left: zeros between prefix and body when the '0' flag
 * applies, spaces before everything when it does not.
 */
export function applyWidth(field: Field, flags: Readonly<DirectiveFlags>, width: number): string {
  const text = field.prefix + field.body;
  const fill = width - text.length;
  if (fill <= 0) {
    return text;
  }
  if (flags.leftJustify) {
    return text + ' '.repeat(fill);
  }
  if (flags.zeroPad && field.zeroPaddable) {
    return field.prefix + '0'.repeat(fill) + field.body;
  }
  return ' '.repeat(fill) + text;
}
