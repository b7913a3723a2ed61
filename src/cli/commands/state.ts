import { readFile } from 'fs/promises';
import chalk from 'chalk';
import type { Command } from 'commander';
import { ValidationError } from '../../errors.js';
import { action, type GlobalOptions } from '../context.js';

export function registerStateCommands(program: Command, globals: () => GlobalOptions): void {
  program
    .command('init')
    .description('Create the state directory and an empty config')
    .action(
      action(globals, async (orchestrator) => {
        const config = await orchestrator.model.loadConfig();
        await orchestrator.model.store.saveConfig(config);
        console.log(chalk.green(`State initialised at ${orchestrator.model.store.paths.root}`));
      })
    );

  const state = program.command('state').description('Export or import the whole state');

  state
    .command('export <file>')
    .description('Write hosts, repos, settings and features to a JSON file')
    .action(
      action(globals, async (orchestrator, file: string) => {
        const snapshot = await orchestrator.model.exportState(file);
        console.log(chalk.green(`Exported ${Object.keys(snapshot.features).length} features to ${file}`));
      })
    );

  state
    .command('import <file>')
    .description('Load a JSON export, merging into the current state')
    .option('--replace', 'Replace the current state wholesale')
    .action(
      action(globals, async (orchestrator, file: string, options: { replace?: boolean }) => {
        let document: unknown;
        try {
          document = JSON.parse(await readFile(file, 'utf-8'));
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          throw new ValidationError(`Cannot read state document ${file}: ${reason}`);
        }
        const imported = await orchestrator.model.importState(document, { replace: options.replace });
        const mode = options.replace ? 'replaced' : 'merged';
        console.log(chalk.green(`State ${mode}: ${Object.keys(imported.features).length} features`));
      })
    );
}
