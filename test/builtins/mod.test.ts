import { describe, expect, it } from 'vitest';
import { createCommandRegistry, isCommand, registerCommand, runCommand } from '../../src/builtins/mod.ts';

describe('command registry', () => {
  it('registers printf and scanf', () => {
    const registry = createCommandRegistry();
    expect([...registry.keys()]).toEqual(['printf', 'scanf']);
    expect(isCommand(registry, 'printf')).toBe(true);
    expect(isCommand(registry, 'echo')).toBe(false);
  });

  it('runs commands by name', async () => {
    const registry = createCommandRegistry();
    const result = await runCommand(registry, 'printf', ['%03d', '7']);
    expect(result).toEqual({ code: 0, stdout: '007' });
  });

  it('passes stdin through', async () => {
    const registry = createCommandRegistry();
    const result = await runCommand(registry, 'scanf', ['%s'], 'word rest');
    expect(result.stdout).toBe('word\n');
  });

  it('returns 127 for unknown commands', async () => {
    const result = await runCommand(createCommandRegistry(), 'nope', []);
    expect(result).toEqual({ code: 127, stderr: 'nope: command not found\n' });
  });

  it('accepts custom commands', async () => {
    const registry = createCommandRegistry();
    registerCommand(registry, 'upper', async (args) => ({ code: 0, stdout: args.join(' ').toUpperCase() }));
    expect(await runCommand(registry, 'upper', ['a', 'b'])).toEqual({ code: 0, stdout: 'A B' });
  });
});
