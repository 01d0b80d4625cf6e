import { describe, it, expect } from 'vitest';
import { createProgram, name } from './program';

describe('cli program', () => {
  it('exports name', () => {
    expect(name).toBe('@pacup/cli');
  });

  it('registers update as the default command', () => {
    const program = createProgram();

    expect(program.commands.map((command) => command.name())).toEqual(['update', 'doctor']);
    expect(program.version()).toBe('PacUp 0.1.0');
  });

  it('passes options given before the pacscripts to the update command', () => {
    const program = createProgram();
    const update = program.commands[0];
    let received: string[] = [];
    update.action((pacscripts: string[]) => {
      received = pacscripts;
    });

    program.parse(['-y', '-r', 'foo.pacscript'], { from: 'user' });

    expect(received).toEqual(['foo.pacscript']);
    expect(update.opts()).toEqual({ yes: true, showRepology: true });
  });
});
