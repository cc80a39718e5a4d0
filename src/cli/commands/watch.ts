import { join } from 'node:path';
import React from 'react';
import { render } from 'ink';
import type { Command } from 'commander';
import { z } from 'zod/v4';
import { SessionStatusSchema } from '@domain/types/session.js';
import { loadConfig } from '@infra/config/config-loader.js';
import { GAPFLOW_DIRS } from '@shared/constants/paths.js';
import { parseLocalOptions, withCommandContext } from '@cli/utils.js';
import WatchApp from '@cli/tui/WatchApp.js';

const WatchOptionsSchema = z.object({
  status: SessionStatusSchema.optional(),
});

export function registerWatchCommand(parent: Command): void {
  parent
    .command('watch')
    .description('Watch sessions progress through their stages in real time (TUI)')
    .option('--status <status>', 'Only sessions in this status')
    .action(
      withCommandContext(async (ctx) => {
        const opts = parseLocalOptions(ctx.cmd, WatchOptionsSchema);
        const { stages } = loadConfig(ctx.gapflowDir);

        const { waitUntilExit } = render(
          React.createElement(WatchApp, {
            sessionsDir: join(ctx.gapflowDir, GAPFLOW_DIRS.sessions),
            stageNames: stages,
            status: opts.status,
          }),
        );

        await waitUntilExit();
      }),
    );
}
