import chalk from 'chalk';
import type { Command } from 'commander';
import { ForgeServer } from '../../server.js';
import { logger } from '../../utils/logger.js';
import { openOrchestrator, parsePositiveInt, type GlobalOptions } from '../context.js';
import { humanMessage } from '../../errors.js';

interface ServeOptions {
  port: number;
  bind: string;
}

/**
 * Set up signal handlers for graceful shutdown
 */
function setupSignalHandlers(server: ForgeServer): void {
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress, forcing exit...');
      process.exit(1);
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);

    try {
      await server.stop();
      process.exit(0);
    } catch (err) {
      logger.error('Error during shutdown', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

export function registerServeCommand(program: Command, globals: () => GlobalOptions): void {
  program
    .command('serve')
    .description('Serve the HTTP API')
    .option('-p, --port <port>', 'Port', parsePositiveInt, 8765)
    .option('--bind <address>', 'Address to listen on', '127.0.0.1')
    .action(async (options: ServeOptions) => {
      try {
        const orchestrator = await openOrchestrator(globals());
        const server = new ForgeServer(orchestrator, options.port, options.bind);
        setupSignalHandlers(server);
        await server.start();
        console.log(chalk.green(`Listening on http://${options.bind}:${options.port}`));
      } catch (err) {
        console.error(chalk.red(humanMessage(err)));
        process.exitCode = 1;
      }
    });
}
