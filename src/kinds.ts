/**
 * Conversion kind catalog.
 *
 * Maps every supported conversion character to the kind it selects and
 * describes how the engines treat that kind.
 */

/**
 * Semantic type of one directive.
 */
export type ConversionKind =
  | 'char'
  | 'string'
  | 'decimal'
  | 'integer'
  | 'unsigned'
  | 'octal'
  | 'hex'
  | 'hexUpper'
  | 'pointer'
  | 'fixed'
  | 'exponent'
  | 'exponentUpper'
  | 'general'
  | 'generalUpper'
  | 'percent'
  | 'count'
  | 'none';

/**
 * Broad class of a kind: integer-like, float-like or opaque (text, literal, counter).
 */
export type KindClass = 'integer' | 'float' | 'opaque';

export type KindInfo = {
  kind: ConversionKind;
  /** The conversion character in a format string ('' for `none`) */
  conversion: string;
  class: KindClass;
  /** Signed integer kinds render and scan a '-' sign */
  signed: boolean;
  /** Digit base; 0 means auto-detected from the input prefix (scan `%i`) */
  base: 0 | 8 | 10 | 16;
  /** Upper-case digits, prefix and special values */
  upper: boolean;
};

function info(kind: ConversionKind, conversion: string, kindClass: KindClass, extra: Partial<KindInfo> = {}): KindInfo {
  return {
    kind,
    conversion,
    class: kindClass,
    signed: false,
    base: 10,
    upper: false,
    ...extra,
  };
}

const KINDS: readonly KindInfo[] = [
  info('char', 'c', 'opaque'),
  info('string', 's', 'opaque'),
  info('decimal', 'd', 'integer', { signed: true }),
  info('integer', 'i', 'integer', { signed: true, base: 0 }),
  info('unsigned', 'u', 'integer'),
  info('octal', 'o', 'integer', { base: 8 }),
  info('hex', 'x', 'integer', { base: 16 }),
  info('hexUpper', 'X', 'integer', { base: 16, upper: true }),
  info('pointer', 'p', 'integer', { base: 16 }),
  info('fixed', 'f', 'float'),
  info('exponent', 'e', 'float'),
  info('exponentUpper', 'E', 'float', { upper: true }),
  info('general', 'g', 'float'),
  info('generalUpper', 'G', 'float', { upper: true }),
  info('percent', '%', 'opaque'),
  info('count', 'n', 'opaque'),
];

const NONE: KindInfo = info('none', '', 'opaque');

/**
 * Conversion characters mapped to their kind descriptors.
 */
export const CONVERSIONS: ReadonlyMap<string, KindInfo> = new Map(KINDS.map((k) => [k.conversion, k]));

const BY_KIND: ReadonlyMap<ConversionKind, KindInfo> = new Map([...KINDS, NONE].map((k) => [k.kind, k]));

/**
 * Look up the kind selected by a conversion character.
 *
 * @returns The kind, or `none` for characters outside the catalog
 */
export function kindOf(conversion: string | undefined): ConversionKind {
  if (conversion === undefined) {
    return 'none';
  }
  return CONVERSIONS.get(conversion)?.kind ?? 'none';
}

export function kindInfo(kind: ConversionKind): KindInfo {
  return BY_KIND.get(kind) ?? NONE;
}

export function isIntegerKind(kind: ConversionKind): boolean {
  return kindInfo(kind).class === 'integer';
}

export function isFloatKind(kind: ConversionKind): boolean {
  return kindInfo(kind).class === 'float';
}
