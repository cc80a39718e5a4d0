import type { Command } from 'commander';
import { z } from 'zod/v4';
import { TraceOutcomeSchema } from '@domain/types/trace.js';
import { MemoryStore } from '@infra/memory/memory-store.js';
import { formatTraceJson, formatTraceTable } from '@cli/formatters/trace-formatter.js';
import { parseLocalOptions, withCommandContext } from '@cli/utils.js';

const TraceOptionsSchema = z.object({
  session: z.string().min(1).optional(),
  outcome: TraceOutcomeSchema.optional(),
  limit: z.coerce.number().int().positive().optional(),
});

/**
 * Register the `gapflow trace` command.
 */
export function registerTraceCommand(program: Command): void {
  program
    .command('trace')
    .description('Show the trace log of stage and backend-selector invocations')
    .option('--session <id>', 'Only entries for this session')
    .option('--outcome <outcome>', 'Only entries with this outcome: ok, fallback, error')
    .option('--limit <n>', 'Only the most recent n entries')
    .action(withCommandContext(async (ctx) => {
      const opts = parseLocalOptions(ctx.cmd, TraceOptionsSchema);
      const store = MemoryStore.open({ root: ctx.gapflowDir });
      try {
        const entries = await store.readTrace({
          sessionId: opts.session,
          outcome: opts.outcome,
          limit: opts.limit,
        });
        console.log(ctx.globalOpts.json ? formatTraceJson(entries) : formatTraceTable(entries));
      } finally {
        await store.close();
      }
    }));
}
