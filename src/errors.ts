/**
 * Error types for fmtscan with format-string location information.
 */

/**
 * Base error class for fmtscan errors.
 */
export class FormatScanError extends Error {
  /** Offset in the format string where the offending directive starts */
  readonly location?: number;

  /** Format string being processed */
  readonly source?: string;

  /** Error code for programmatic handling */
  readonly code: string;

  constructor(
    message: string,
    options: {
      code: string;
      location?: number;
      source?: string;
    },
  ) {
    super(message);
    this.name = 'FormatScanError';
    this.code = options.code;
    this.location = options.location;
    this.source = options.source;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get a snippet of the format string with a caret under the error location.
   * Returns undefined if source or location is not available.
   */
  getCodeSnippet(): string | undefined {
    if (this.source === undefined || this.location === undefined) {
      return undefined;
    }
    if (this.location < 0 || this.location > this.source.length) {
      return undefined;
    }

    const { line, column } = this.computePosition(this.source, this.location);
    const text = this.source.split('\n')[line - 1];
    const prefix = `${line} | `;

    return `${prefix}${text}\n${' '.repeat(prefix.length + column - 1)}^`;
  }

  /**
   * Compute line (1-indexed) and column (1-indexed) from a char offset (0-indexed).
   */
  private computePosition(source: string, offset: number): { line: number; column: number } {
    let line = 1;
    let column = 1;
    for (let i = 0; i < offset; i++) {
      if (source[i] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
    return { line, column };
  }
}

/**
 * Error thrown in strict mode for a directive with an unknown or missing conversion.
 */
export class InvalidDirectiveError extends FormatScanError {
  readonly directive: string;

  constructor(directive: string, location: number, source: string) {
    super(`Invalid conversion directive: ${directive === '%' ? 'incomplete %' : directive}`, {
      code: 'E_INVALID_DIRECTIVE',
      location,
      source,
    });
    this.name = 'InvalidDirectiveError';
    this.directive = directive;
  }
}

/**
 * Error thrown when a directive needs an argument or slot and none is left.
 */
export class MissingArgumentError extends FormatScanError {
  readonly index: number;

  constructor(index: number, location?: number, source?: string) {
    super(`Missing argument ${index + 1}`, {
      code: 'E_MISSING_ARGUMENT',
      location,
      source,
    });
    this.name = 'MissingArgumentError';
    this.index = index;
  }
}

/**
 * Error thrown when an argument or slot has a type the directive cannot use.
 */
export class ArgumentTypeError extends FormatScanError {
  readonly index: number;
  readonly expected: readonly string[];
  readonly actual: string;

  constructor(index: number, expected: readonly string[], actual: string, location?: number, source?: string) {
    super(`Argument ${index + 1} has type ${actual}, expected ${expected.join(' or ')}`, {
      code: 'E_ARGUMENT_TYPE',
      location,
      source,
    });
    this.name = 'ArgumentTypeError';
    this.index = index;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error thrown when formatted text does not fit a caller-supplied buffer.
 */
export class BufferTooSmallError extends FormatScanError {
  /** Bytes needed, including the terminator */
  readonly required: number;
  readonly capacity: number;

  constructor(required: number, capacity: number, source?: string) {
    super(`Buffer too small: ${required} bytes required, ${capacity} available`, {
      code: 'E_BUFFER_TOO_SMALL',
      source,
    });
    this.name = 'BufferTooSmallError';
    this.required = required;
    this.capacity = capacity;
  }
}

/**
 * Error thrown when a width, precision or the whole output exceeds what the
 * formatter will produce.
 */
export class FieldTooLargeError extends FormatScanError {
  /** Characters the directive asked for */
  readonly requested: number;
  readonly limit: number;

  constructor(requested: number, limit: number, location?: number, source?: string) {
    super(`Field too large: ${requested} characters requested, limit is ${limit}`, {
      code: 'E_FIELD_TOO_LARGE',
      location,
      source,
    });
    this.name = 'FieldTooLargeError';
    this.requested = requested;
    this.limit = limit;
  }
}
