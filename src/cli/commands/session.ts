import chalk from 'chalk';
import type { Command } from 'commander';
import { action, parsePositiveInt, printJson, list, type GlobalOptions } from '../context.js';

interface SessionCliOptions {
  llm: string;
  host?: string;
  subdir?: string;
  command?: string;
  force?: boolean;
  dryRun?: boolean;
}

interface PromptCliOptions {
  llm: string;
  host?: string;
  include: string[];
  exclude: string[];
  file?: string;
  maxBytes?: number;
}

export function registerSessionCommands(program: Command, globals: () => GlobalOptions): void {
  const session = program.command('session').description('Manage interactive sessions');

  session
    .command('start <feature> <repo>')
    .description('Start an llm session in the feature worktree (sync first)')
    .option('-l, --llm <id>', 'llm id', 'claude')
    .option('-H, --host <host>', 'Host, when the repo is attached on several')
    .option('--subdir <path>', 'Start in this subdirectory of the working directory')
    .option('-c, --command <cmd>', 'Run this instead of the llm command')
    .option('-f, --force', 'Replace a running session')
    .option('--dry-run', 'Only show the session that would be started')
    .action(
      action(globals, async (orchestrator, feature: string, repo: string, options: SessionCliOptions) => {
        const result = await orchestrator.startSession({ feature, repo, ...options });
        if (result.dryRun) {
          console.log(chalk.yellow(`Would start ${result.key} on ${result.host} in ${result.cwd}: ${result.command}`));
          return;
        }
        const verb = result.created ? 'started' : 'already running';
        console.log(chalk.green(`Session ${result.key} ${verb} on ${result.host}`));
        console.log(chalk.gray(`  attach: tmux attach -t '=${result.session}'`));
      })
    );

  session
    .command('stop <feature> <repo>')
    .description('Stop a session')
    .option('-l, --llm <id>', 'llm id', 'claude')
    .option('-H, --host <host>', 'Host, when the repo is attached on several')
    .action(
      action(globals, async (orchestrator, feature: string, repo: string, options: SessionCliOptions) => {
        const stopped = await orchestrator.stopSession({ feature, repo, llm: options.llm, host: options.host });
        console.log(chalk.green(`Session ${stopped.key} stopped on ${stopped.host}`));
      })
    );

  session
    .command('status')
    .description('List running sessions')
    .option('-H, --host <host>', 'Only this host')
    .option('--json', 'Print JSON')
    .action(
      action(globals, async (orchestrator, options: { host?: string; json?: boolean }) => {
        const sessions = await orchestrator.sessionStatus(options.host);
        if (options.json) {
          printJson(sessions);
          return;
        }
        if (sessions.length === 0) {
          console.log(chalk.gray('No sessions running'));
        }
        for (const s of sessions) {
          console.log(`${chalk.cyan(s.host)}  ${s.key}`);
        }
      })
    );

  program
    .command('prompt <feature> <repo>')
    .description('Send worktree files and a prompt file into a running session')
    .option('-l, --llm <id>', 'llm id', 'claude')
    .option('-H, --host <host>', 'Host, when the repo is attached on several')
    .option('-i, --include <globs>', 'Globs matched in the remote worktree (repeatable)', list, [])
    .option('-x, --exclude <globs>', 'Globs dropping included files (repeatable)', list, [])
    .option('-f, --file <path>', 'Local prompt file, appended last')
    .option('--max-bytes <n>', 'Truncate the payload to this many bytes', parsePositiveInt)
    .action(
      action(globals, async (orchestrator, feature: string, repo: string, options: PromptCliOptions) => {
        const result = await orchestrator.sendPrompt({
          feature,
          repo,
          llm: options.llm,
          host: options.host,
          include: options.include,
          exclude: options.exclude,
          promptFile: options.file,
          maxBytes: options.maxBytes,
        });
        console.log(
          chalk.green(`Sent ${result.bytes} bytes (${result.files.length} files) to ${result.session} on ${result.host}`)
        );
        if (result.truncated) {
          console.log(chalk.yellow(`Truncated from ${result.totalBytes} bytes`));
        }
      })
    );
}
