/**
 * Implementation of the printf command on top of the formatter.
 *
 * Formats arguments according to a format string.
 */

import { formatWith } from '../formatter.ts';
import { processEscapes } from './escapes.ts';
import { TextArguments } from './text-arguments.ts';
import type { CommandHandler, CommandResult } from './types.ts';

/**
 * The printf command.
 *
 * Escape sequences in the format are processed first. Every directive takes
 * the next argument, coerced to the type the directive needs: numeric
 * arguments accept decimal, `0x` hex, leading-zero octal and `'c` for the
 * code of `c`. The format is reused while arguments remain.
 *
 * Integers are narrowed by the directive's length modifier, as in `sprintf`:
 * 32 bits by default and 64 with `l`. So `%u -1` prints 4294967295 where a
 * shell's own printf prints 18446744073709551615; `%lu -1` gives the latter.
 *
 * @example
 * printf "Hello %s\n" "World"
 * printf "%d + %d = %d\n" 2 3 5
 * printf "%-10s %5d\n" "name" 42
 * printf "%x\n" 255 4096
 */
export const printfCommand: CommandHandler = async (args: string[]): Promise<CommandResult> => {
  if (args.length === 0) {
    return {
      code: 1,
      stderr: 'printf: usage: printf format [arguments]\n',
    };
  }

  const format = processEscapes(args[0]);
  const source = new TextArguments(args.slice(1));

  try {
    let output = '';
    do {
      const before = source.consumed;
      output += formatWith(format, source, { strict: true });
      // A format without directives would never consume the rest
      if (source.consumed === before) {
        break;
      }
    } while (source.remaining > 0);

    if (source.warnings.length > 0) {
      return {
        code: 1,
        stdout: output,
        stderr: source.warnings.map((warning) => `printf: ${warning}\n`).join(''),
      };
    }
    return { code: 0, stdout: output };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      code: 1,
      stderr: `printf: ${message}\n`,
    };
  }
};
