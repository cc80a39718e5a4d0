import type { Command } from 'commander';
import { MemoryStore } from '@infra/memory/memory-store.js';
import { GapflowError, ValidationError } from '@shared/lib/errors.js';
import {
  formatLongTermEntry,
  formatLongTermJson,
  formatLongTermTable,
} from '@cli/formatters/memory-formatter.js';
import { argAt, withCommandContext, type CommandContext } from '@cli/utils.js';

function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError(`Value must be valid JSON, got: ${raw}`, []);
  }
}

async function withStore<T>(ctx: CommandContext, fn: (store: MemoryStore) => Promise<T>): Promise<T> {
  const store = MemoryStore.open({ root: ctx.gapflowDir });
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

/**
 * Register the `gapflow memory` subcommands over the long-term tier.
 */
export function registerMemoryCommands(program: Command): void {
  const memory = program
    .command('memory')
    .description('Read and write long-term memory entries');

  memory
    .command('get')
    .description('Show one long-term entry')
    .argument('<category>', 'Entry category, e.g. skill-gaps')
    .argument('<key>', 'Entry key')
    .action(withCommandContext(async (ctx) => {
      const category = argAt(ctx.cmd, 0, 'category');
      const key = argAt(ctx.cmd, 1, 'key');
      const entry = await withStore(ctx, (store) => store.getLongTerm(category, key));
      if (!entry) {
        throw new GapflowError(`No long-term entry ${category}/${key}`);
      }
      console.log(ctx.globalOpts.json ? formatLongTermJson(entry) : formatLongTermEntry(entry));
    }));

  memory
    .command('put')
    .description('Write a long-term entry; the last write wins')
    .argument('<category>', 'Entry category')
    .argument('<key>', 'Entry key')
    .argument('<value>', 'JSON value, e.g. \'{"note":"hiring freeze"}\'')
    .action(withCommandContext(async (ctx) => {
      const category = argAt(ctx.cmd, 0, 'category');
      const key = argAt(ctx.cmd, 1, 'key');
      const value = parseValue(argAt(ctx.cmd, 2, 'value'));
      const entry = await withStore(ctx, (store) => store.putLongTerm(category, key, value));
      console.log(ctx.globalOpts.json ? formatLongTermJson(entry) : `Stored ${category}/${key}`);
    }));

  memory
    .command('list')
    .description('List the entries of a category')
    .argument('<category>', 'Entry category')
    .action(withCommandContext(async (ctx) => {
      const category = argAt(ctx.cmd, 0, 'category');
      const entries = await withStore(ctx, (store) => store.listLongTerm(category));
      console.log(ctx.globalOpts.json ? formatLongTermJson(entries) : formatLongTermTable(entries));
    }));
}
