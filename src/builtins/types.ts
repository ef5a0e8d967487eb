/**
 * Result from a command execution.
 */
export type CommandResult = {
  /** Exit code (0 = success, non-zero = failure) */
  code: number;
  /** Optional stdout output */
  stdout?: string;
  /** Optional stderr output */
  stderr?: string;
};

/**
 * Handler function for a command.
 *
 * @param args - Command arguments (excluding the command name)
 * @param stdin - Text available on standard input, if any
 * @returns Promise resolving to the command result
 */
export type CommandHandler = (args: string[], stdin?: string) => Promise<CommandResult>;

/**
 * Registry mapping command names to their handlers.
 */
export type CommandRegistry = Map<string, CommandHandler>;
