import { join } from 'node:path';
import { existsSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod/v4';
import { ConfigNotFoundError, ValidationError } from '@shared/lib/errors.js';
import { GAPFLOW_DIRS } from '@shared/constants/paths.js';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { loadConfig } from '@infra/config/config-loader.js';

/**
 * Resolve the .gapflow/ directory path from a given cwd (or process.cwd()).
 * Throws ConfigNotFoundError if the directory does not exist.
 */
export function resolveGapflowDir(cwd?: string): string {
  const dir = join(cwd ?? process.cwd(), GAPFLOW_DIRS.root);
  if (!existsSync(dir)) {
    throw new ConfigNotFoundError(dir);
  }
  return dir;
}

const GlobalOptionsSchema = z.object({
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
  cwd: z.string().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CommandContext {
  globalOpts: GlobalOptions;
  gapflowDir: string;
  cmd: Command;
}

type CommandHandler = (ctx: CommandContext) => void | Promise<void>;

/**
 * Extract global CLI options from a Commander command.
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  return GlobalOptionsSchema.parse(cmd.optsWithGlobals());
}

/**
 * Parse a command's own options against a schema.
 * Throws ValidationError listing the offending options.
 */
export function parseLocalOptions<T>(cmd: Command, schema: z.ZodType<T>): T {
  const result = schema.safeParse(cmd.opts());
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `--${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid options: ${detail}`, result.error.issues);
  }
  return result.data;
}

/**
 * Read the operand at `index`. Throws ValidationError naming `name` when absent.
 */
export function argAt(cmd: Command, index: number, name: string): string {
  const value = cmd.args[index];
  if (value === undefined || value === '') {
    throw new ValidationError(`Missing argument <${name}>`, []);
  }
  return value;
}

/**
 * Wrap a CLI command handler with standard boilerplate:
 * resolves gapflowDir, extracts global options, applies the logging config,
 * catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd).
 * The wrapper passes cmd via context; handlers read operands with argAt().
 */
export function withCommandContext(
  handler: CommandHandler,
  options?: { needsGapflowDir?: boolean },
): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args.at(-1);
    if (!(cmd instanceof Command)) {
      throw new TypeError('withCommandContext must wrap a Commander action handler');
    }
    let verbose = false;

    try {
      const globalOpts = getGlobalOptions(cmd);
      verbose = globalOpts.verbose;
      const gapflowDir = options?.needsGapflowDir === false
        ? ''
        : resolveGapflowDir(globalOpts.cwd);

      if (gapflowDir) {
        applyLoggingConfig(gapflowDir, verbose);
      }

      const ctx: CommandContext = { globalOpts, gapflowDir, cmd };
      await handler(ctx);
    } catch (error) {
      handleCommandError(error, verbose);
    }
  };
}

/** Config logging settings apply unless --verbose already asked for debug. */
function applyLoggingConfig(gapflowDir: string, verbose: boolean): void {
  const { logging } = loadConfig(gapflowDir);
  setLoggerOptions({ level: verbose ? 'debug' : logging.level, json: logging.json });
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and optionally the stack trace if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
