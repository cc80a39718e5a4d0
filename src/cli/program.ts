import { Command } from 'commander';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { registerInitCommand } from './commands/init.js';
import { registerRunCommand } from './commands/run.js';
import { registerSessionCommands } from './commands/session.js';
import { registerMemoryCommands } from './commands/memory.js';
import { registerTraceCommand } from './commands/trace.js';
import { registerWatchCommand } from './commands/watch.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('gapflow')
    .description('Skill-gap workflow engine — perceive a staffing question, analyse gaps, recommend actions')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging')
    .option('--cwd <path>', 'Set working directory');

  // Wire --verbose to logger before any command runs
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    if (opts['verbose']) {
      setLoggerOptions({ level: 'debug' });
    }
  });

  // Wire command modules
  registerInitCommand(program);
  registerRunCommand(program);
  registerSessionCommands(program);
  registerMemoryCommands(program);
  registerTraceCommand(program);
  registerWatchCommand(program);

  return program;
}
