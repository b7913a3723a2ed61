import chalk from 'chalk';
import type { Command } from 'commander';
import { action, list, printJson, type GlobalOptions } from '../context.js';

export function registerBootstrapCommand(program: Command, globals: () => GlobalOptions): void {
  program
    .command('bootstrap')
    .description('Check that hosts have git, tmux and the llm CLIs')
    .option('-H, --hosts <hosts>', 'Only these hosts', list)
    .option('--json', 'Print JSON')
    .action(
      action(globals, async (orchestrator, options: { hosts?: string[]; json?: boolean }) => {
        const reports = await orchestrator.bootstrap(options.hosts);
        if (options.json) {
          printJson(reports);
        } else {
          for (const report of reports) {
            console.log(report.ok ? chalk.green(report.host) : chalk.red(report.host));
            for (const check of report.checks) {
              const mark = check.ok ? chalk.green('✓') : chalk.red('✗');
              console.log(`  ${mark} ${check.name.padEnd(10)} ${chalk.gray(check.detail)}`);
            }
          }
        }
        if (reports.some((r) => !r.ok)) {
          process.exitCode = 1;
        }
      })
    );
}
