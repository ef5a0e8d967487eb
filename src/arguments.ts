/**
 * Argument model shared by the formatter and the matcher.
 *
 * The formatter consumes an ordered list of tagged values, the matcher an
 * ordered list of tagged slot references. Both are consumed strictly left to
 * right, once each.
 */

import { ArgumentTypeError, MissingArgumentError } from './errors.ts';
import type { Directive } from './types.ts';

/**
 * A mutable reference the matcher (and the formatter's `%n`) writes into.
 */
export class Slot<T> {
  value: T | undefined;

  constructor(initial?: T) {
    this.value = initial;
  }

  set(value: T): void {
    this.value = value;
  }
}

/**
 * A tagged formatter argument.
 */
export type FormatArg =
  | { type: 'int'; value: number | bigint }
  | { type: 'uint'; value: number | bigint }
  | { type: 'double'; value: number }
  | { type: 'char'; value: string | number }
  | { type: 'string'; value: string }
  | { type: 'pointer'; value: number | bigint }
  | { type: 'count'; slot: Slot<number> };

export type FormatArgType = FormatArg['type'];

/**
 * Constructors for tagged formatter arguments.
 *
 * @example
 * sprintf('%s is %d', arg.string('x'), arg.int(42));
 */
export const arg = {
  int: (value: number | bigint): FormatArg => ({ type: 'int', value }),
  uint: (value: number | bigint): FormatArg => ({ type: 'uint', value }),
  double: (value: number): FormatArg => ({ type: 'double', value }),
  char: (value: string | number): FormatArg => ({ type: 'char', value }),
  string: (value: string): FormatArg => ({ type: 'string', value }),
  pointer: (value: number | bigint): FormatArg => ({ type: 'pointer', value }),
  count: (slot: Slot<number>): FormatArg => ({ type: 'count', slot }),
};

/**
 * Where the formatter pulls its values from. Every method consumes exactly one
 * argument; `at` is the format offset of the directive asking for it.
 */
export interface ArgumentSource {
  /** Value for an integer conversion, before narrowing to the length modifier */
  integer(at: number): bigint;
  float(at: number): number;
  /** Character code for `%c` */
  char(at: number): number;
  string(at: number): string;
  pointer(at: number): bigint;
  count(at: number): Slot<number>;
  /** Value for a `*` width or precision */
  star(at: number): number;
}

function isArgOf<T extends FormatArgType>(value: FormatArg, accepted: readonly T[]): value is Extract<FormatArg, { type: T }> {
  const types: readonly FormatArgType[] = accepted;
  return types.includes(value.type);
}

/**
 * Argument source over pre-materialized tagged values.
 */
export class TaggedArguments implements ArgumentSource {
  private index = 0;

  constructor(
    private readonly args: readonly FormatArg[],
    private readonly format: string,
  ) {}

  integer(at: number): bigint {
    const value = this.next(['int', 'uint', 'char'], at);
    if (value.type === 'char') {
      return BigInt(this.charCode(value.value, at));
    }
    return this.toBigInt(value.value, at);
  }

  float(at: number): number {
    return this.next(['double'], at).value;
  }

  char(at: number): number {
    const value = this.next(['char', 'int', 'uint'], at);
    if (value.type === 'char') {
      return this.charCode(value.value, at);
    }
    return Number(BigInt.asUintN(32, this.toBigInt(value.value, at)));
  }

  string(at: number): string {
    return this.next(['string'], at).value;
  }

  pointer(at: number): bigint {
    return this.toBigInt(this.next(['pointer'], at).value, at);
  }

  count(at: number): Slot<number> {
    return this.next(['count'], at).slot;
  }

  star(at: number): number {
    const value = this.next(['int', 'uint'], at);
    return Number(BigInt.asIntN(32, this.toBigInt(value.value, at)));
  }

  private next<T extends FormatArgType>(accepted: readonly T[], at: number): Extract<FormatArg, { type: T }> {
    const value = this.args[this.index];
    if (value === undefined) {
      throw new MissingArgumentError(this.index, at, this.format);
    }
    if (!isArgOf(value, accepted)) {
      throw new ArgumentTypeError(this.index, accepted, value.type, at, this.format);
    }
    this.index++;
    return value;
  }

  private toBigInt(value: number | bigint, at: number): bigint {
    if (typeof value === 'bigint') {
      return value;
    }
    if (!Number.isInteger(value)) {
      throw new ArgumentTypeError(this.index - 1, ['integer'], 'non-integral number', at, this.format);
    }
    return BigInt(value);
  }

  private charCode(value: string | number, at: number): number {
    if (typeof value === 'string') {
      return value.length > 0 ? value.charCodeAt(0) : 0;
    }
    return Number(BigInt.asUintN(32, this.toBigInt(value, at)));
  }
}

/**
 * A value produced by one matcher conversion.
 */
export type ScanValue =
  | { type: 'int'; value: number }
  | { type: 'uint'; value: number }
  | { type: 'long'; value: bigint }
  | { type: 'ulong'; value: bigint }
  | { type: 'float'; value: number }
  | { type: 'double'; value: number }
  | { type: 'char'; value: string }
  | { type: 'string'; value: string }
  | { type: 'pointer'; value: bigint };

export type ScanValueType = ScanValue['type'];

/**
 * A caller-supplied slot the matcher assigns into.
 */
export type ScanTarget =
  | { type: 'int'; ref: Slot<number> }
  | { type: 'uint'; ref: Slot<number> }
  | { type: 'long'; ref: Slot<bigint> }
  | { type: 'ulong'; ref: Slot<bigint> }
  | { type: 'float'; ref: Slot<number> }
  | { type: 'double'; ref: Slot<number> }
  | { type: 'char'; ref: Slot<string> }
  | { type: 'string'; ref: Slot<string> }
  | { type: 'pointer'; ref: Slot<bigint> };

/**
 * Constructors for matcher targets.
 *
 * @example
 * const n = new Slot<number>();
 * sscanf('42', '%d', target.int(n));
 */
export const target = {
  int: (ref: Slot<number>): ScanTarget => ({ type: 'int', ref }),
  uint: (ref: Slot<number>): ScanTarget => ({ type: 'uint', ref }),
  long: (ref: Slot<bigint>): ScanTarget => ({ type: 'long', ref }),
  ulong: (ref: Slot<bigint>): ScanTarget => ({ type: 'ulong', ref }),
  float: (ref: Slot<number>): ScanTarget => ({ type: 'float', ref }),
  double: (ref: Slot<number>): ScanTarget => ({ type: 'double', ref }),
  char: (ref: Slot<string>): ScanTarget => ({ type: 'char', ref }),
  string: (ref: Slot<string>): ScanTarget => ({ type: 'string', ref }),
  pointer: (ref: Slot<bigint>): ScanTarget => ({ type: 'pointer', ref }),
};

/**
 * Write a value into a target of the same type.
 *
 * @returns false when the types differ
 */
function store(slot: ScanTarget, value: ScanValue): boolean {
  switch (slot.type) {
    case 'int':
      if (value.type !== 'int') {
        return false;
      }
      slot.ref.set(value.value);
      return true;
    case 'uint':
      if (value.type !== 'uint') {
        return false;
      }
      slot.ref.set(value.value);
      return true;
    case 'long':
      if (value.type !== 'long') {
        return false;
      }
      slot.ref.set(value.value);
      return true;
    case 'ulong':
      if (value.type !== 'ulong') {
        return false;
      }
      slot.ref.set(value.value);
      return true;
    case 'float':
      if (value.type !== 'float') {
        return false;
      }
      slot.ref.set(value.value);
      return true;
    case 'double':
      if (value.type !== 'double') {
        return false;
      }
      slot.ref.set(value.value);
      return true;
    case 'char':
      if (value.type !== 'char') {
        return false;
      }
      slot.ref.set(value.value);
      return true;
    case 'string':
      if (value.type !== 'string') {
        return false;
      }
      slot.ref.set(value.value);
      return true;
    case 'pointer':
      if (value.type !== 'pointer') {
        return false;
      }
      slot.ref.set(value.value);
      return true;
  }
}

/**
 * Receiver of the matcher's assignments.
 */
export interface AssignmentSink {
  assign(value: ScanValue, directive: Directive): void;
}

/**
 * Sink writing into caller-supplied targets in order.
 */
export class TargetList implements AssignmentSink {
  private index = 0;

  constructor(
    private readonly targets: readonly ScanTarget[],
    private readonly format: string,
  ) {}

  assign(value: ScanValue, directive: Directive): void {
    const slot = this.targets[this.index];
    if (slot === undefined) {
      throw new MissingArgumentError(this.index, directive.start, this.format);
    }
    if (!store(slot, value)) {
      throw new ArgumentTypeError(this.index, [value.type], slot.type, directive.start, this.format);
    }
    this.index++;
  }
}

/**
 * Sink collecting the assigned values.
 */
export class ValueCollector implements AssignmentSink {
  readonly values: ScanValue[] = [];

  assign(value: ScanValue): void {
    this.values.push(value);
  }
}
