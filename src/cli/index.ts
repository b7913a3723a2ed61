#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { registerBootstrapCommand } from './commands/bootstrap.js';
import { registerComposeCommands } from './commands/compose.js';
import { registerFeatureCommands } from './commands/feature.js';
import { registerHostCommands } from './commands/host.js';
import { registerRepoCommands } from './commands/repo.js';
import { registerServeCommand } from './commands/serve.js';
import { registerSessionCommands } from './commands/session.js';
import { registerStateCommands } from './commands/state.js';
import { registerUpCommand } from './commands/up.js';
import type { GlobalOptions } from './context.js';
import { setLogLevel } from '../utils/logger.js';

const program = new Command();

program
  .name('sf')
  .description(chalk.cyan('Session Forge') + ' - feature workspaces and llm sessions across hosts')
  .version('0.3.0')
  .option('--state-dir <path>', 'State directory (default $SF_STATE_DIR or ~/.sf)')
  .option('-v, --verbose', 'Debug logging')
  .hook('preAction', () => {
    if (program.opts<{ verbose?: boolean }>().verbose) {
      setLogLevel('debug');
    }
  });

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

registerStateCommands(program, globals);
registerHostCommands(program, globals);
registerRepoCommands(program, globals);
registerFeatureCommands(program, globals);
registerSessionCommands(program, globals);
registerComposeCommands(program, globals);
registerBootstrapCommand(program, globals);
registerServeCommand(program, globals);
registerUpCommand(program, globals);

await program.parseAsync();
