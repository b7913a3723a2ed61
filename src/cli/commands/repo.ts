import chalk from 'chalk';
import type { Command } from 'commander';
import { ValidationError } from '../../errors.js';
import { extractRepoName } from '../../utils/repo.js';
import { action, printJson, type GlobalOptions } from '../context.js';

interface RepoAddOptions {
  name?: string;
  base: string;
  anchorSubdir?: string;
}

interface RepoUpdateOptions {
  base?: string;
  anchorSubdir?: string;
  clearAnchorSubdir?: boolean;
}

export function registerRepoCommands(program: Command, globals: () => GlobalOptions): void {
  const repo = program.command('repo').description('Manage repositories');

  repo
    .command('add <url>')
    .description('Register a repository')
    .option('-n, --name <name>', 'Repo name (defaults to the last path segment of the url)')
    .option('-b, --base <branch>', 'Base branch', 'main')
    .option('--anchor-subdir <path>', 'Subdirectory used as the effective root')
    .action(
      action(globals, async (orchestrator, url: string, options: RepoAddOptions) => {
        const name = options.name ?? extractRepoName(url);
        if (!name) {
          throw new ValidationError(`Cannot derive a repo name from '${url}'; pass --name`);
        }
        const added = await orchestrator.model.addRepo({
          name,
          url,
          baseBranch: options.base,
          anchorSubdir: options.anchorSubdir,
        });
        console.log(chalk.green(`Repo '${added.name}' added (base ${added.baseBranch})`));
      })
    );

  repo
    .command('list')
    .description('List repositories')
    .option('--json', 'Print JSON')
    .action(
      action(globals, async (orchestrator, options: { json?: boolean }) => {
        const repos = await orchestrator.model.listRepos();
        if (options.json) {
          printJson(repos);
          return;
        }
        for (const r of repos) {
          const subdir = r.anchorSubdir ? chalk.gray(` (${r.anchorSubdir})`) : '';
          console.log(`${chalk.cyan(r.name)}  ${r.url}  ${r.baseBranch}${subdir}`);
        }
      })
    );

  repo
    .command('update <name>')
    .description('Change the base branch or anchor subdirectory')
    .option('-b, --base <branch>', 'Base branch')
    .option('--anchor-subdir <path>', 'Subdirectory used as the effective root')
    .option('--clear-anchor-subdir', 'Remove the anchor subdirectory')
    .action(
      action(globals, async (orchestrator, name: string, options: RepoUpdateOptions) => {
        await orchestrator.model.updateRepo(name, {
          baseBranch: options.base,
          anchorSubdir: options.clearAnchorSubdir ? null : options.anchorSubdir,
        });
        console.log(chalk.green(`Repo '${name}' updated`));
      })
    );

  repo
    .command('remove <name>')
    .description('Remove a repository that no feature is attached to')
    .action(
      action(globals, async (orchestrator, name: string) => {
        await orchestrator.model.removeRepo(name);
        console.log(chalk.green(`Repo '${name}' removed`));
      })
    );
}
