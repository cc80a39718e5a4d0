import type { Command } from 'commander';
import { z } from 'zod/v4';
import { SessionStatusSchema } from '@domain/types/session.js';
import { MemoryStore } from '@infra/memory/memory-store.js';
import { SessionNotFoundError } from '@shared/lib/errors.js';
import {
  formatSessionDetail,
  formatSessionJson,
  formatSessionTable,
} from '@cli/formatters/session-formatter.js';
import { argAt, parseLocalOptions, withCommandContext } from '@cli/utils.js';

const ListOptionsSchema = z.object({
  status: SessionStatusSchema.optional(),
});

/**
 * Register the `gapflow session` subcommands.
 */
export function registerSessionCommands(program: Command): void {
  const session = program
    .command('session')
    .description('Inspect stored sessions');

  session
    .command('list')
    .description('List stored sessions, most recently updated first')
    .option('--status <status>', 'Only sessions in this status: pending, running, completed, failed')
    .action(withCommandContext(async (ctx) => {
      const opts = parseLocalOptions(ctx.cmd, ListOptionsSchema);
      const store = MemoryStore.open({ root: ctx.gapflowDir });
      try {
        const sessions = (await store.listSessions())
          .filter((s) => !opts.status || s.status === opts.status);
        console.log(ctx.globalOpts.json ? formatSessionJson(sessions) : formatSessionTable(sessions));
      } finally {
        await store.close();
      }
    }));

  session
    .command('show')
    .description('Show one session: context, stage history and any error')
    .argument('<session-id>', 'Session id')
    .action(withCommandContext(async (ctx) => {
      const id = argAt(ctx.cmd, 0, 'session-id');
      const store = MemoryStore.open({ root: ctx.gapflowDir });
      try {
        const state = await store.loadSession(id);
        if (!state) {
          throw new SessionNotFoundError(id);
        }
        console.log(ctx.globalOpts.json ? formatSessionJson(state) : formatSessionDetail(state));
      } finally {
        await store.close();
      }
    }));
}
