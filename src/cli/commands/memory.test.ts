import { join } from 'node:path';
import { mkdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { Command } from 'commander';
import { MemoryStore } from '@infra/memory/memory-store.js';
import { registerMemoryCommands } from './memory.js';

function createProgram(): Command {
  const program = new Command();
  program.option('--json').option('--verbose').option('--cwd <path>');
  program.exitOverride();
  registerMemoryCommands(program);
  return program;
}

describe('registerMemoryCommands', () => {
  const baseDir = join(tmpdir(), `gapflow-memory-cmd-test-${randomUUID()}`);
  const gapflowDir = join(baseDir, '.gapflow');
  let consoleSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    mkdirSync(baseDir, { recursive: true });
    MemoryStore.open({ root: gapflowDir });
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('puts a JSON value and reads it back', async () => {
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'memory', 'put', 'notes', 'React', '{"owner":"web"}']);
    expect(consoleSpy).toHaveBeenCalledWith('Stored notes/React');

    const entry = await MemoryStore.open({ root: gapflowDir }).getLongTerm('notes', 'React');
    expect(entry?.value).toEqual({ owner: 'web' });

    consoleSpy.mockClear();
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, '--json', 'memory', 'get', 'notes', 'React']);
    const parsed: unknown = JSON.parse(String(consoleSpy.mock.calls[0]?.[0]));
    expect(parsed).toMatchObject({ category: 'notes', key: 'React', value: { owner: 'web' } });
  });

  it('keeps the last write for a key', async () => {
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'memory', 'put', 'notes', 'React', '"first"']);
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'memory', 'put', 'notes', 'React', '"second"']);
    consoleSpy.mockClear();

    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'memory', 'list', 'notes']);

    expect(consoleSpy).toHaveBeenCalledWith(['Key    Value', '------------', 'React  "second"'].join('\n'));
  });

  it('rejects a value that is not JSON', async () => {
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'memory', 'put', 'notes', 'React', 'not json']);

    expect(errorSpy).toHaveBeenCalledWith('Error: Value must be valid JSON, got: not json');
    expect(process.exitCode).toBe(1);
  });

  it('rejects an invalid category', async () => {
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'memory', 'list', 'Bad Category']);

    expect(errorSpy).toHaveBeenCalledWith('Error: Invalid long-term category: "Bad Category"');
    expect(process.exitCode).toBe(1);
  });

  it('reports a missing entry', async () => {
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'memory', 'get', 'notes', 'Rust']);

    expect(errorSpy).toHaveBeenCalledWith('Error: No long-term entry notes/Rust');
    expect(process.exitCode).toBe(1);
  });

  it('prints an empty category', async () => {
    await createProgram().parseAsync(['node', 'test', '--cwd', baseDir, 'memory', 'list', 'skill-gaps']);

    expect(consoleSpy).toHaveBeenCalledWith('No entries found.');
  });
});
