/**
 * Backslash escape processing for command format strings.
 */

const SIMPLE_ESCAPES = new Map<string, string>([
  ['n', '\n'],
  ['t', '\t'],
  ['r', '\r'],
  ['a', '\x07'],
  ['b', '\b'],
  ['f', '\f'],
  ['v', '\v'],
  ['e', '\x1b'],
  ['\\', '\\'],
  ['"', '"'],
  ["'", "'"],
]);

/**
 * Read up to `max` characters matching `pattern` starting at `start`.
 */
function readRun(str: string, start: number, max: number, pattern: RegExp): string {
  let run = '';
  for (let j = start; j < str.length && run.length < max && pattern.test(str[j]); j++) {
    run += str[j];
  }
  return run;
}

/**
 * Process shell-style escape sequences in a string.
 * Handles: \n, \t, \r, \a, \b, \f, \v, \e, \\, \", \', \xHH (hex), \NNN (octal)
 *
 * Unknown escapes are kept as written.
 */
export function processEscapes(str: string): string {
  let result = '';
  let i = 0;

  while (i < str.length) {
    if (str[i] !== '\\' || i + 1 >= str.length) {
      result += str[i];
      i++;
      continue;
    }

    const next = str[i + 1];
    const simple = SIMPLE_ESCAPES.get(next);
    if (simple !== undefined) {
      result += simple;
      i += 2;
      continue;
    }

    if (next === 'x') {
      const hex = readRun(str, i + 2, 2, /[0-9a-fA-F]/);
      if (hex.length > 0) {
        result += String.fromCharCode(Number.parseInt(hex, 16));
        i += 2 + hex.length;
        continue;
      }
    }

    const octal = readRun(str, i + 1, 3, /[0-7]/);
    if (octal.length > 0) {
      result += String.fromCharCode(Number.parseInt(octal, 8) & 0xff);
      i += 1 + octal.length;
      continue;
    }

    result += str[i];
    i++;
  }

  return result;
}
