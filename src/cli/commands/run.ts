import type { Command } from 'commander';
import { z } from 'zod/v4';
import type { GapflowConfig } from '@domain/types/config.js';
import { loadConfig } from '@infra/config/config-loader.js';
import { openWorkflow } from '@features/workflow/open-workflow.js';
import { formatSessionResult, formatSessionResultJson } from '@cli/formatters/session-formatter.js';
import { parseLocalOptions, withCommandContext } from '@cli/utils.js';

const RunOptionsSchema = z.object({
  session: z.string().min(1).optional(),
  backend: z.string().min(1).optional(),
  project: z.string().min(1).optional(),
  timeout: z.coerce.number().int().positive().optional(),
});

type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Apply the per-run flags to the loaded config. `--backend` replaces the
 * default backend and every per-stage override.
 */
export function applyRunOverrides(config: GapflowConfig, opts: RunOptions): GapflowConfig {
  let result = config;
  if (opts.timeout !== undefined) {
    result = { ...result, timeoutMs: opts.timeout };
  }
  if (opts.backend !== undefined) {
    result = { ...result, backend: { name: opts.backend, params: {} }, stageBackends: {} };
  }
  return result;
}

/**
 * Register the `gapflow run` command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Answer a staffing question by running every stage, or resume a session')
    .argument('<question...>', 'Free-text question')
    .option('--session <id>', 'Resume this session (or start it under this id)')
    .option('--backend <name>', 'Backend for every stage of this run')
    .option('--project <id>', 'Project to analyse, e.g. proj-portal')
    .option('--timeout <ms>', 'Per-call backend timeout in milliseconds')
    .action(withCommandContext(async (ctx) => {
      const opts = parseLocalOptions(ctx.cmd, RunOptionsSchema);
      const question = ctx.cmd.args.join(' ');

      const config = applyRunOverrides(loadConfig(ctx.gapflowDir), opts);
      const workflow = openWorkflow({ gapflowDir: ctx.gapflowDir, config });

      try {
        const result = await workflow.engine.run({
          sessionId: opts.session,
          userInput: question,
          seed: opts.project ? { project_id: opts.project } : undefined,
        });

        console.log(ctx.globalOpts.json ? formatSessionResultJson(result) : formatSessionResult(result));
        if (result.status === 'failed') {
          process.exitCode = 1;
        }
      } finally {
        await workflow.close();
      }
    }));
}
