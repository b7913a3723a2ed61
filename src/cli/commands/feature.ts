import chalk from 'chalk';
import type { Command } from 'commander';
import type { TeardownReport } from '../../orchestrator.js';
import type { SyncReport } from '../../sync/engine.js';
import { logger } from '../../utils/logger.js';
import { action, list, printJson, type GlobalOptions } from '../context.js';

interface AttachCliOptions {
  hosts: string[];
  replace?: boolean;
  subdir?: string;
  composeFile?: string;
}

interface SyncCliOptions {
  repo: string[];
  host: string[];
  json?: boolean;
  dryRun?: boolean;
}

export function printSyncReport(report: SyncReport): void {
  if (report.dryRun) {
    console.log(chalk.yellow('Dry run: planned actions, nothing was changed'));
  }
  for (const result of report.results) {
    const target = `${result.repo}@${result.host}`;
    if (result.status === 'ok') {
      const actions = result.actions.length > 0 ? result.actions.join(', ') : 'up to date';
      const head = result.head ? result.head.slice(0, 12) : '(new)';
      console.log(`${chalk.green('✓')} ${target}  ${result.branch} ${head}  ${chalk.gray(actions)}`);
    } else {
      const hint = result.error.transient ? chalk.yellow(' (likely transient, retry)') : '';
      console.log(`${chalk.red('✗')} ${target}  ${result.error.kind}: ${result.error.message}${hint}`);
    }
  }
}

export function printTeardownReport(report: TeardownReport): void {
  for (const result of report.results) {
    const target = `${result.repo}@${result.host}`;
    if (result.status === 'ok') {
      const killed = result.killedSessions.length > 0 ? chalk.gray(` (stopped ${result.killedSessions.join(', ')})`) : '';
      console.log(`${chalk.green('✓')} ${target} removed${killed}`);
    } else if (result.error) {
      console.log(`${chalk.red('✗')} ${target}  ${result.error.kind}: ${result.error.message}`);
    }
  }
}

export function registerFeatureCommands(program: Command, globals: () => GlobalOptions): void {
  const feature = program.command('feature').description('Manage features and their workspaces');

  feature
    .command('new <name>')
    .description('Create a feature')
    .option('-b, --base <branch>', 'Base branch for every repo (defaults to each repo\'s base)')
    .action(
      action(globals, async (orchestrator, name: string, options: { base?: string }) => {
        const created = await orchestrator.model.createFeature(name, options.base);
        console.log(chalk.green(`Feature '${created.name}' created`));
      })
    );

  feature
    .command('list')
    .description('List features')
    .action(
      action(globals, async (orchestrator) => {
        for (const name of await orchestrator.model.listFeatures()) {
          console.log(name);
        }
      })
    );

  feature
    .command('show <name>')
    .description('Show a feature and its attachments')
    .action(
      action(globals, async (orchestrator, name: string) => {
        printJson(await orchestrator.model.getFeature(name));
      })
    );

  feature
    .command('attach <feature> <repo>')
    .description('Attach a repo to a feature on a set of hosts')
    .requiredOption('-H, --hosts <hosts>', 'Hosts, comma separated (repeatable)', list, [])
    .option('--replace', 'Set the host set exactly instead of adding to it')
    .option('--subdir <path>', 'Working subdirectory for sessions')
    .option('--compose-file <path>', 'Compose file inside the worktree')
    .action(
      action(globals, async (orchestrator, featureName: string, repo: string, options: AttachCliOptions) => {
        const outcome = await orchestrator.attach(featureName, repo, options.hosts, {
          mode: options.replace ? 'replace' : 'union',
          subdir: options.subdir,
          composeFile: options.composeFile,
        });
        console.log(
          chalk.green(`Attached '${repo}' to '${featureName}' on ${outcome.attachment.hosts.join(', ')}`)
        );
        if (outcome.removedHosts.length > 0 && !outcome.teardown) {
          console.log(
            chalk.yellow(`Removed hosts keep their worktrees: ${outcome.removedHosts.join(', ')} (detach policy orphan)`)
          );
        }
        if (outcome.teardown) {
          printTeardownReport(outcome.teardown);
          if (!outcome.teardown.ok) {
            process.exitCode = 1;
          }
        }
      })
    );

  feature
    .command('detach <feature> <repo>')
    .description('Detach a repo (or some of its hosts) and remove the worktrees')
    .option('-H, --hosts <hosts>', 'Only these hosts', list)
    .action(
      action(globals, async (orchestrator, featureName: string, repo: string, options: { hosts?: string[] }) => {
        const report = await orchestrator.detach(featureName, repo, options.hosts);
        printTeardownReport(report);
        if (!report.ok) {
          process.exitCode = 1;
        }
      })
    );

  feature
    .command('sync <feature>')
    .description('Reconcile anchors, branches and worktrees on every attached host')
    .option('-r, --repo <repos>', 'Only these repos (repeatable)', list, [])
    .option('-H, --host <hosts>', 'Only these hosts (repeatable)', list, [])
    .option('--json', 'Print the report as JSON')
    .option('--dry-run', 'Only report what would change')
    .action(
      action(globals, async (orchestrator, featureName: string, options: SyncCliOptions) => {
        const controller = new AbortController();
        const abort = (signal: NodeJS.Signals) => {
          logger.warn(`Received ${signal}, finishing in-flight steps and stopping`);
          controller.abort();
        };
        process.once('SIGINT', abort);
        process.once('SIGTERM', abort);

        try {
          const report = await orchestrator.sync(featureName, {
            repos: options.repo.length > 0 ? options.repo : undefined,
            hosts: options.host.length > 0 ? options.host : undefined,
            signal: controller.signal,
            dryRun: options.dryRun,
          });
          if (options.json) {
            printJson(report);
          } else {
            printSyncReport(report);
          }
          if (!report.ok) {
            process.exitCode = 1;
          }
        } finally {
          process.off('SIGINT', abort);
          process.off('SIGTERM', abort);
        }
      })
    );

  feature
    .command('destroy <feature>')
    .description('Stop sessions, remove worktrees and branches, and delete the feature')
    .action(
      action(globals, async (orchestrator, featureName: string) => {
        const report = await orchestrator.destroyFeature(featureName);
        printTeardownReport(report);
        if (report.ok) {
          console.log(chalk.green(`Feature '${featureName}' destroyed`));
        } else {
          console.log(chalk.red(`Feature '${featureName}' kept; re-run destroy once the failed hosts are reachable`));
          process.exitCode = 1;
        }
      })
    );
}
