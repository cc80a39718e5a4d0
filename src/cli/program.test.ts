import { describe, it, expect } from 'vitest';
import { createProgram } from './program.js';

describe('createProgram', () => {
  it('creates a commander program with the correct name and version', () => {
    const program = createProgram();
    expect(program.name()).toBe('gapflow');
    expect(program.version()).toBe('0.1.0');
  });

  it('has the expected top-level commands', () => {
    const program = createProgram();
    expect(program.commands.map((c) => c.name())).toEqual([
      'init',
      'run',
      'session',
      'memory',
      'trace',
      'watch',
    ]);
  });

  it('memory has get, put and list subcommands', () => {
    const memory = createProgram().commands.find((c) => c.name() === 'memory');
    expect(memory?.commands.map((c) => c.name())).toEqual(['get', 'put', 'list']);
  });

  it('declares the global options', () => {
    const longs = createProgram().options.map((o) => o.long);
    expect(longs).toEqual(expect.arrayContaining(['--json', '--verbose', '--cwd']));
  });

  it('run takes a variadic question and the run options', () => {
    const run = createProgram().commands.find((c) => c.name() === 'run');
    expect(run?.registeredArguments.map((a) => [a.name(), a.variadic, a.required])).toEqual([
      ['question', true, true],
    ]);
    expect(run?.options.map((o) => o.long)).toEqual(['--session', '--backend', '--project', '--timeout']);
  });
});
