/**
 * Shell-style commands built on the formatter and the matcher.
 */

export * from './types.ts';

export { processEscapes } from './escapes.ts';
export { printfCommand } from './printf.ts';
export { renderValue, scanfCommand } from './scanf.ts';
export { TextArguments } from './text-arguments.ts';

import { printfCommand } from './printf.ts';
import { scanfCommand } from './scanf.ts';
import type { CommandHandler, CommandRegistry, CommandResult } from './types.ts';

/**
 * Create a new command registry with all implemented commands.
 *
 * @returns A Map of command names to their handlers
 */
export function createCommandRegistry(): CommandRegistry {
  const registry: CommandRegistry = new Map();
  registry.set('printf', printfCommand);
  registry.set('scanf', scanfCommand);
  return registry;
}

/**
 * Register a command handler in the registry.
 */
export function registerCommand(registry: CommandRegistry, name: string, handler: CommandHandler): void {
  registry.set(name, handler);
}

/**
 * Check if a name is a registered command.
 */
export function isCommand(registry: CommandRegistry, name: string): boolean {
  return registry.has(name);
}

/**
 * Run a command by name.
 *
 * @returns The command's result, or exit code 127 when the name is unknown
 */
export async function runCommand(registry: CommandRegistry, name: string, args: string[], stdin?: string): Promise<CommandResult> {
  const handler = registry.get(name);
  if (handler === undefined) {
    return { code: 127, stderr: `${name}: command not found\n` };
  }
  return await handler(args, stdin);
}
