import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { humanMessage } from '../errors.js';
import { Orchestrator } from '../orchestrator.js';
import { configureLogDirectory, logger } from '../utils/logger.js';

export interface GlobalOptions {
  stateDir?: string;
}

/**
 * Open the orchestrator over the state root, with file logs under
 * `<root>/logs`.
 */
export async function openOrchestrator(options: GlobalOptions = {}): Promise<Orchestrator> {
  const orchestrator = await Orchestrator.open({ stateRoot: options.stateDir });
  configureLogDirectory(orchestrator.model.store.paths.logsDir);
  return orchestrator;
}

/**
 * Wrap a command action: open the orchestrator, run, and turn any error into
 * a one-line message and exit code 1.
 */
export function action<Args extends unknown[]>(
  globals: () => GlobalOptions,
  fn: (orchestrator: Orchestrator, ...args: Args) => Promise<void>
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      const orchestrator = await openOrchestrator(globals());
      await fn(orchestrator, ...args);
    } catch (err) {
      logger.debug('Command failed', err);
      console.error(chalk.red(humanMessage(err)));
      process.exitCode = 1;
    }
  };
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Split `a,b c` style option values. */
export function list(value: string, previous: string[] = []): string[] {
  return [
    ...previous,
    ...value
      .split(/[,\s]+/)
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  ];
}

export function parseEnvPairs(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const index = value.indexOf('=');
  if (index <= 0) {
    throw new InvalidArgumentError(`Expected KEY=VALUE, got '${value}'`);
  }
  return { ...previous, [value.slice(0, index)]: value.slice(index + 1) };
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}
