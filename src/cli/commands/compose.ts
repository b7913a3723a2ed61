import chalk from 'chalk';
import type { Command } from 'commander';
import type { ComposeAction } from '../../compose/manager.js';
import { action, type GlobalOptions } from '../context.js';

const ACTIONS: Array<{ name: ComposeAction; description: string }> = [
  { name: 'up', description: 'docker compose up -d in the feature worktree' },
  { name: 'down', description: 'docker compose down in the feature worktree' },
  { name: 'ps', description: 'docker compose ps in the feature worktree' },
];

export function registerComposeCommands(program: Command, globals: () => GlobalOptions): void {
  const compose = program.command('compose').description('Run the per-feature compose stack');

  for (const { name, description } of ACTIONS) {
    compose
      .command(`${name} <feature> <repo> [args...]`)
      .description(description)
      .option('-H, --host <host>', 'Host, when the repo is attached on several')
      .action(
        action(
          globals,
          async (orchestrator, feature: string, repo: string, extraArgs: string[], options: { host?: string }) => {
            const result = await orchestrator.runCompose(name, { feature, repo, host: options.host, extraArgs });
            process.stdout.write(result.stdout);
            process.stderr.write(result.stderr);
            if (result.exitCode !== 0) {
              console.error(chalk.red(`docker compose ${name} exited with ${result.exitCode}`));
              process.exitCode = 1;
            }
          }
        )
      );
  }
}
