import type { Command } from 'commander';
import { z } from 'zod/v4';
import { handleInit } from '@features/init/init-handler.js';
import { parseLocalOptions, withCommandContext } from '@cli/utils.js';

const InitOptionsSchema = z.object({
  backend: z.string().min(1).optional(),
  skipPrompts: z.boolean().default(false),
});

const BACKEND_LABELS: Record<string, string> = {
  anthropic: 'Anthropic Messages API',
  groq: 'Groq chat completions',
  stub: 'Stub (offline, deterministic)',
};

/**
 * Register the `gapflow init` command.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a gapflow project in the current directory')
    .option('--backend <name>', 'Default backend: anthropic, groq, stub')
    .option('--skip-prompts', 'Skip interactive prompts and use defaults')
    .action(withCommandContext(async (ctx) => {
      const opts = parseLocalOptions(ctx.cmd, InitOptionsSchema);
      const result = await handleInit({
        cwd: ctx.globalOpts.cwd ?? process.cwd(),
        backend: opts.backend,
        skipPrompts: opts.skipPrompts,
      });

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      const backend = result.config.backend.name;
      console.log(result.reinitialized ? '✓ gapflow project re-initialized' : '✓ gapflow project initialized');
      console.log('');
      console.log(`  Directory: ${result.gapflowDir}`);
      console.log(`  Backend:   ${BACKEND_LABELS[backend] ?? backend}`);
      if (result.missingCredentials.length > 0) {
        console.log('');
        console.log(`  ⚠ Set ${result.missingCredentials.join(', ')} to use ${backend}; until then stages run on the stub.`);
      }
      console.log('');
      console.log('  What\'s next:');
      console.log('  → Ask a question:   gapflow run "Which skills does proj-portal lack?"');
      console.log('  → Review sessions:  gapflow session list');
      console.log('  → Watch live:       gapflow watch');
    }, { needsGapflowDir: false }));
}
