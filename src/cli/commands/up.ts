import chalk from 'chalk';
import { InvalidArgumentError, type Command } from 'commander';
import { action, list, parsePositiveInt, printJson, type GlobalOptions } from '../context.js';
import { printSyncReport } from './feature.js';

interface NamedValue {
  name: string;
  value: string;
}

interface UpCliOptions {
  host: NamedValue;
  repo: NamedValue;
  feature: string;
  llm: string;
  base?: string;
  repoBase?: string;
  prompt?: boolean;
  file?: string;
  include: string[];
  exclude: string[];
  maxBytes?: number;
  dryRun?: boolean;
  json?: boolean;
}

/** `name=value`, split at the first '='. */
export function parseNamedValue(raw: string): NamedValue {
  const index = raw.indexOf('=');
  const name = index === -1 ? '' : raw.slice(0, index).trim();
  const value = index === -1 ? '' : raw.slice(index + 1).trim();
  if (!name || !value) {
    throw new InvalidArgumentError(`Expected name=value, got '${raw}'`);
  }
  return { name, value };
}

export function registerUpCommand(program: Command, globals: () => GlobalOptions): void {
  program
    .command('up')
    .description('Register host and repo, attach, sync and start a session in one step')
    .requiredOption('-H, --host <name=address>', 'Host name and ssh address', parseNamedValue)
    .requiredOption('-r, --repo <name=url>', 'Repo name and git url', parseNamedValue)
    .requiredOption('--feature <name>', 'Feature to create or reuse')
    .option('-l, --llm <id>', 'llm id', 'claude')
    .option('-b, --base <branch>', 'Base branch of a new feature')
    .option('--repo-base <branch>', 'Base branch of the repo (defaults to --base)')
    .option('--prompt', 'Send a prompt once the session runs')
    .option('-f, --file <path>', 'Local prompt file, appended last')
    .option('-i, --include <globs>', 'Globs matched in the remote worktree (repeatable)', list, [])
    .option('-x, --exclude <globs>', 'Globs dropping included files (repeatable)', list, [])
    .option('--max-bytes <n>', 'Truncate the payload to this many bytes', parsePositiveInt)
    .option('--dry-run', 'Register state, then only report what sync and start would do')
    .option('--json', 'Print the result as JSON')
    .action(
      action(globals, async (orchestrator, options: UpCliOptions) => {
        const wantsPrompt =
          options.prompt ||
          options.file !== undefined ||
          options.include.length > 0 ||
          options.exclude.length > 0 ||
          options.maxBytes !== undefined;

        const result = await orchestrator.up({
          host: { name: options.host.name, address: options.host.value },
          repo: { name: options.repo.name, url: options.repo.value, baseBranch: options.repoBase ?? options.base },
          feature: options.feature,
          baseBranch: options.base,
          llm: options.llm,
          prompt: wantsPrompt
            ? {
                include: options.include,
                exclude: options.exclude,
                promptFile: options.file,
                maxBytes: options.maxBytes,
              }
            : undefined,
          dryRun: options.dryRun,
        });

        if (options.json) {
          printJson(result);
        } else {
          printSyncReport(result.sync);
          if (result.session) {
            const state = result.session.dryRun ? 'would start' : result.session.created ? 'started' : 'already running';
            console.log(chalk.green(`Session ${result.session.key} ${state} on ${result.session.host} (${result.session.cwd})`));
          }
          if (result.prompt) {
            console.log(chalk.green(`Sent ${result.prompt.bytes} bytes (${result.prompt.files.length} files)`));
          } else if (wantsPrompt && options.dryRun) {
            console.log(chalk.yellow('Prompt skipped on a dry run'));
          }
        }
        if (!result.sync.ok) {
          process.exitCode = 1;
        }
      })
    );
}
