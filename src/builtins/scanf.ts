/**
 * Implementation of the scanf command on top of the matcher.
 */

import { arg, type ScanValue } from '../arguments.ts';
import { vsprintf } from '../formatter.ts';
import { scanValues } from '../matcher.ts';
import { processEscapes } from './escapes.ts';
import type { CommandHandler, CommandResult } from './types.ts';

/**
 * Render one scanned value as a line of output.
 * Floating-point values print the way `%g` does.
 */
export function renderValue(value: ScanValue): string {
  switch (value.type) {
    case 'float':
    case 'double':
      return vsprintf('%g', [arg.double(value.value)]);
    case 'pointer':
      return vsprintf('%p', [arg.pointer(value.value)]);
    default:
      return String(value.value);
  }
}

/**
 * The scanf command.
 *
 * Matches the input (the second argument, or stdin when absent) against the
 * format and prints every assigned value on its own line. Exits 1 when
 * nothing was assigned.
 *
 * @example
 * scanf "%d-%d-%d" "2024-01-31"
 * echo "x=0x1f" | scanf "x=%i"
 */
export const scanfCommand: CommandHandler = async (args: string[], stdin?: string): Promise<CommandResult> => {
  if (args.length === 0 || args.length > 2) {
    return {
      code: 1,
      stderr: 'scanf: usage: scanf format [input]\n',
    };
  }

  const format = processEscapes(args[0]);
  const input = args[1] ?? stdin ?? '';

  try {
    const { count, values } = scanValues(input, format, { strict: true });
    const stdout = values.map((value) => `${renderValue(value)}\n`).join('');
    return { code: count > 0 ? 0 : 1, stdout };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      code: 1,
      stderr: `scanf: ${message}\n`,
    };
  }
};
